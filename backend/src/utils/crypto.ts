import { createHash, randomBytes } from 'crypto';

export type DigestAlgorithm = 'sha1' | 'sha512';

export function digestHex(algorithm: DigestAlgorithm, input: string): string {
  return createHash(algorithm).update(input, 'utf8').digest('hex');
}

export function generateNonce(bytes: number): string {
  return randomBytes(bytes).toString('hex');
}
