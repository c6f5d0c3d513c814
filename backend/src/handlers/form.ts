import type { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { API_PATHS, ERRORS, type FormDefinitionResponse, type FormSubmitResponse } from '@formveil/shared';
import { success, error } from '../utils/response.js';
import { parseSubmission } from '../utils/request.js';
import { validateHoneypot } from '../middleware/honeypot.js';
import { buildForm, getBlueprint, missingRequired, type FormBlueprint } from '../services/forms.js';
import type { FieldRegistry } from '../services/field-registry.js';
import { extractSubmittedData } from '../services/validator.js';
import { config, getFormSecret } from '../config.js';

function formIdFromPath(path: string): string | null {
  const prefix = `${API_PATHS.FORM}/`;
  if (!path.startsWith(prefix)) return null;
  const formId = path.slice(prefix.length);
  return formId && !formId.includes('/') ? formId : null;
}

async function registryFor(blueprint: FormBlueprint): Promise<FieldRegistry> {
  return buildForm(blueprint, {
    secretKey: await getFormSecret(),
    now: new Date(),
    timeZone: config.form.timeZone,
    seedHoneypots: config.form.seedDefaultHoneypots,
    sigilName: config.features.sigilEnabled ? config.form.sigilName : null,
  });
}

export async function handler(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  const formId = event.pathParameters?.formId ?? formIdFromPath(event.path);
  const method = event.httpMethod;

  try {
    if (!formId) return error(ERRORS.NOT_FOUND, 404);
    const blueprint = getBlueprint(formId);
    if (!blueprint) return error(ERRORS.UNKNOWN_FORM, 404);

    // GET /form/{formId}
    if (method === 'GET') {
      return await handleDefinition(blueprint);
    }
    // POST /form/{formId}
    if (method === 'POST') {
      return await handleSubmit(event, blueprint);
    }

    return error(ERRORS.NOT_FOUND, 404);
  } catch (err) {
    console.error('Form handler error:', err);
    return error(ERRORS.INTERNAL, 500);
  }
}

async function handleDefinition(blueprint: FormBlueprint): Promise<APIGatewayProxyResult> {
  const registry = await registryFor(blueprint);
  const response: FormDefinitionResponse = {
    formId: blueprint.id,
    fields: registry.describe(),
  };
  return success(response);
}

async function handleSubmit(event: APIGatewayProxyEvent, blueprint: FormBlueprint): Promise<APIGatewayProxyResult> {
  const parsed = parseSubmission(event);
  if ('parseError' in parsed) return parsed.parseError;

  const registry = await registryFor(blueprint);

  const honeypot = validateHoneypot(event, registry, parsed.submission);
  if (honeypot.errorResponse) return honeypot.errorResponse;

  const data = extractSubmittedData(registry, parsed.submission);
  const missing = missingRequired(blueprint, data);
  if (missing.length > 0) {
    return error(ERRORS.MISSING_FIELDS, 400, missing);
  }

  const response: FormSubmitResponse = { formId: blueprint.id, data };
  return success(response);
}
