import type { FormSubmission } from '@formveil/shared';
import type { FieldRegistry } from './field-registry.js';
import { verifySigilProof } from './sigil.js';

export type RejectionReason = 'honeypot_filled' | 'sigil_missing' | 'sigil_mismatch';

export type SubmissionVerdict =
  | { valid: true }
  | { valid: false; reason: RejectionReason; field?: string };

/**
 * Decides whether a submission came from a bot.
 *
 * Every honeypot is looked up under its wire id for each candidate bucket
 * (current hour, then the previous one). Any non-empty value fails at once;
 * an empty string does not count as filled, whitespace does. Sigil fields
 * are never trap-checked: the first non-empty value found for each of them
 * is kept and, when the handshake is enabled, the proof is recomputed from
 * the request's user agent and the submitted time token.
 */
export function inspectSubmission(
  registry: FieldRegistry,
  submitted: FormSubmission,
  userAgent: string,
): SubmissionVerdict {
  const sigil = registry.sigilNames;
  let sigilTime = '';
  let sigilProof = '';

  for (const bucket of registry.candidateBuckets()) {
    for (const field of registry.getFields()) {
      if (field.isLegitimate) continue;

      const value = submitted[registry.wireIdFor(field.logicalName, bucket)] ?? '';

      if (field.isSigil) {
        if (field.logicalName === sigil?.time && !sigilTime) {
          sigilTime = value;
        } else if (field.logicalName === sigil?.proof && !sigilProof) {
          sigilProof = value;
        }
        continue;
      }

      if (value !== '') {
        return { valid: false, reason: 'honeypot_filled', field: field.logicalName };
      }
    }
  }

  if (sigil) {
    if (!sigilTime || !sigilProof) {
      return { valid: false, reason: 'sigil_missing' };
    }
    if (!verifySigilProof(userAgent, sigilTime, sigilProof)) {
      return { valid: false, reason: 'sigil_mismatch' };
    }
  }

  return { valid: true };
}

export function validateSubmission(
  registry: FieldRegistry,
  submitted: FormSubmission,
  userAgent: string,
): boolean {
  return inspectSubmission(registry, submitted, userAgent).valid;
}

function collectLegit(
  registry: FieldRegistry,
  submitted: FormSubmission,
  bucket: string,
): Record<string, string> {
  const entries: [string, string][] = [];
  for (const field of registry.getFields()) {
    if (!field.isLegitimate) continue;
    const value = submitted[registry.wireIdFor(field.logicalName, bucket)];
    if (value !== undefined) {
      entries.push([field.logicalName, value]);
    }
  }
  // fromEntries defines own properties, so a field named __proto__ survives
  return Object.fromEntries(entries);
}

/**
 * Legitimate values keyed by logical name. Reads every field under the
 * current bucket; only when that finds nothing at all does it read every
 * field under the previous bucket instead. Buckets are never mixed.
 */
export function extractSubmittedData(
  registry: FieldRegistry,
  submitted: FormSubmission,
): Record<string, string> {
  const [current, previous] = registry.candidateBuckets();
  const data = collectLegit(registry, submitted, current);
  if (Object.keys(data).length === 0 && previous !== undefined) {
    return collectLegit(registry, submitted, previous);
  }
  return data;
}
