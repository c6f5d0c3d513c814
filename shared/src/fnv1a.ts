import { SIGIL } from './constants.js';

const FNV_OFFSET_BASIS = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

const encoder = new TextEncoder();

/**
 * 32-bit FNV-1a over the UTF-8 bytes of the input, as 8 lower-case hex digits.
 *
 * Both the server verifier and the browser run this exact function, so a
 * string is always encoded with TextEncoder first. Iterating UTF-16 code
 * units instead would silently diverge for any non-ASCII user agent.
 *
 * Not a security hash.
 */
export function hash32(input: string | Uint8Array): string {
  const bytes = typeof input === 'string' ? encoder.encode(input) : input;
  let hash = FNV_OFFSET_BASIS;
  for (const byte of bytes) {
    hash ^= byte;
    hash = Math.imul(hash, FNV_PRIME);
  }
  return (hash >>> 0).toString(16).padStart(8, '0');
}

/**
 * The value a browser writes into the sigil field: prefix + hash32(UA + T),
 * where T is the value the server rendered into the `_time` field.
 */
export function computeSigilProof(userAgent: string, timeToken: string): string {
  return SIGIL.PROOF_PREFIX + hash32(userAgent + timeToken);
}
