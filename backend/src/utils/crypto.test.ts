import { describe, it, expect } from 'vitest';
import { digestHex, generateNonce } from './crypto.js';

describe('digestHex', () => {
  it('returns the SHA-1 hex digest', () => {
    expect(digestHex('sha1', 'abc')).toBe('a9993e364706816aba3e25717850c26c9cd0d89d');
  });

  it('returns a 128-character SHA-512 hex digest', () => {
    const digest = digestHex('sha512', 'abc');
    expect(digest).toHaveLength(128);
    expect(digest.startsWith('ddaf35a193617aba')).toBe(true);
  });
});

describe('generateNonce', () => {
  it('returns a lowercase hex string of double the requested byte length', () => {
    const nonce = generateNonce(16);
    expect(nonce).toMatch(/^[0-9a-f]+$/);
    expect(nonce).toHaveLength(32);
  });

  it('respects different byte sizes', () => {
    expect(generateNonce(8)).toHaveLength(16);
    expect(generateNonce(32)).toHaveLength(64);
  });

  it('produces unique values', () => {
    const nonces = new Set(Array.from({ length: 10 }, () => generateNonce(16)));
    expect(nonces.size).toBe(10);
  });
});
