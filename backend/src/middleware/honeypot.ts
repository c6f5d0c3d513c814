import type { APIGatewayProxyEvent } from 'aws-lambda';
import { ERRORS, type FormSubmission } from '@formveil/shared';
import type { FieldRegistry } from '../services/field-registry.js';
import { inspectSubmission } from '../services/validator.js';
import { getHeader } from '../utils/request.js';
import { error } from '../utils/response.js';
import { config } from '../config.js';

// Rejects a submission that filled any decoy field or failed the sigil
// handshake, re-deriving the wire ids of the registry for the current and
// previous hour. The user agent verifying the handshake is the one of this
// request; a proxy that rewrites it makes every sigil check fail.
//
// The 403 never says which check failed. The reason is only logged.
// Passes everything when honeypotEnabled is false for this environment.
export function validateHoneypot(
  event: APIGatewayProxyEvent,
  registry: FieldRegistry,
  submission: FormSubmission,
) {
  if (!config.features.honeypotEnabled) {
    return { valid: true, errorResponse: null };
  }

  const userAgent = getHeader(event, 'User-Agent') ?? '';
  const verdict = inspectSubmission(registry, submission, userAgent);
  if (!verdict.valid) {
    console.warn('Form submission rejected', {
      path: event.path,
      reason: verdict.reason,
      field: verdict.field,
      environment: config.environment,
    });
    return { valid: false, errorResponse: error(ERRORS.FORBIDDEN, 403) };
  }

  return { valid: true, errorResponse: null };
}
