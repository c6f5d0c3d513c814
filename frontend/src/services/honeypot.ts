// Client side of the decoy-field scheme: how trap inputs are hidden and how
// the sigil handshake proof is written before the form is posted.
//
// Wire names come from the server and are never derived here. The browser
// only needs hash32 (shared with the server) and its own user agent.

import type { CSSProperties } from 'react';
import { SIGIL, computeSigilProof, type FieldDescriptor } from '@formveil/shared';

// Keeps decoys in the DOM, where scrapers read them, but out of sight and out
// of reach of pointer and keyboard.
export const HIDDEN_FIELD_STYLE: CSSProperties = {
  pointerEvents: 'none',
  position: 'absolute',
  display: 'block',
  opacity: 0,
  left: '-9999px',
  maxWidth: 0,
  width: 0,
  height: 0,
  maxHeight: 0,
};

export function isTrap(field: FieldDescriptor): boolean {
  return !field.isLegitimate;
}

/**
 * Finds the sigil proof field and its time field. The proof field is the
 * sigil field whose name plus `_time` is also a sigil field.
 */
export function findSigilPair(
  fields: readonly FieldDescriptor[],
): { proof: FieldDescriptor; time: FieldDescriptor } | null {
  const sigil = fields.filter(f => f.isSigil);
  for (const proof of sigil) {
    const time = sigil.find(f => f.logicalName === proof.logicalName + SIGIL.TIME_SUFFIX);
    if (time) return { proof, time };
  }
  return null;
}

/**
 * Returns the fields with the proof field's value replaced by
 * "tck_" + hash32(userAgent + T). Fields are returned as-is when the form has
 * no handshake.
 */
export function applySigilProof(fields: readonly FieldDescriptor[], userAgent: string): FieldDescriptor[] {
  const pair = findSigilPair(fields);
  if (!pair) return [...fields];
  const proof = computeSigilProof(userAgent, pair.time.value);
  return fields.map(f => (f === pair.proof ? { ...f, value: proof } : f));
}

/**
 * Reads what the page holds in each decoy input, keyed by logical name.
 * Sigil fields are left out: their values are set by the handshake.
 */
export function readTrapValues(fields: readonly FieldDescriptor[], form: FormData): Record<string, string> {
  const entries: [string, string][] = [];
  for (const field of fields) {
    if (!isTrap(field) || field.isSigil) continue;
    const entry = form.get(field.wireId);
    if (typeof entry === 'string') entries.push([field.logicalName, entry]);
  }
  return Object.fromEntries(entries);
}

/**
 * Wire-id keyed body. Legitimate fields and decoys carry the values given by
 * logical name (decoys fall back to their rendered value); sigil fields always
 * carry their rendered tokens.
 */
export function buildSubmission(
  fields: readonly FieldDescriptor[],
  values: Readonly<Record<string, string>>,
): Record<string, string> {
  const entries = fields.map((field): [string, string] => {
    const given = Object.hasOwn(values, field.logicalName) ? values[field.logicalName] : undefined;
    if (field.isSigil) return [field.wireId, field.value];
    return [field.wireId, given ?? (isTrap(field) ? field.value : '')];
  });
  return Object.fromEntries(entries);
}
