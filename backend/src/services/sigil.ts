import { SIGIL, computeSigilProof } from '@formveil/shared';
import { digestHex, generateNonce } from '../utils/crypto.js';

export interface SigilFieldNames {
  /** Field the browser overwrites with the computed proof. */
  proof: string;
  /** Field carrying the server-issued time token T. */
  time: string;
}

export function sigilFieldNames(name: string): SigilFieldNames {
  return { proof: name, time: name + SIGIL.TIME_SUFFIX };
}

// SHA-1 of the decimal unix-epoch seconds
export function createTimeToken(now: Date): string {
  return digestHex('sha1', String(Math.floor(now.getTime() / 1000)));
}

// Rendered into the proof field until client script replaces it. Longer than
// a real proof so the two can never be confused.
export function createPlaceholderToken(): string {
  return SIGIL.PROOF_PREFIX + generateNonce(SIGIL.PLACEHOLDER_BYTES);
}

export function verifySigilProof(userAgent: string, timeToken: string, proof: string): boolean {
  return computeSigilProof(userAgent, timeToken) === proof;
}
