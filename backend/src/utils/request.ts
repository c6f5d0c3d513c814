import type { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { ERRORS, type FormSubmission } from '@formveil/shared';
import { error } from './response.js';

export function getHeader(event: APIGatewayProxyEvent, name: string): string | undefined {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(event.headers ?? {})) {
    if (key.toLowerCase() === wanted) return value;
  }
  return undefined;
}

function decodeBody(event: APIGatewayProxyEvent): string {
  if (!event.body) return '';
  return event.isBase64Encoded ? Buffer.from(event.body, 'base64').toString('utf8') : event.body;
}

function fromJson(raw: string): FormSubmission | null {
  const parsed: unknown = JSON.parse(raw || '{}');
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return null;
  }
  const submission: Record<string, string> = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (typeof value === 'string') {
      submission[key] = value;
    } else if (typeof value === 'number' || typeof value === 'boolean') {
      submission[key] = String(value);
    }
  }
  return submission;
}

// Decodes a wire-id keyed form body, either JSON or urlencoded. A repeated
// urlencoded key keeps its last value.
export function parseSubmission(
  event: APIGatewayProxyEvent,
): { submission: FormSubmission } | { parseError: APIGatewayProxyResult } {
  const raw = decodeBody(event);
  const contentType = getHeader(event, 'Content-Type') ?? '';

  if (contentType.includes('application/x-www-form-urlencoded')) {
    return { submission: Object.fromEntries(new URLSearchParams(raw)) };
  }

  try {
    const submission = fromJson(raw);
    if (!submission) return { parseError: error(ERRORS.INVALID_BODY, 400) };
    return { submission };
  } catch {
    return { parseError: error('Invalid JSON', 400) };
  }
}
