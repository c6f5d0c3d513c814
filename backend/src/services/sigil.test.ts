import { describe, it, expect } from 'vitest';
import { computeSigilProof } from '@formveil/shared';
import {
  createPlaceholderToken,
  createTimeToken,
  sigilFieldNames,
  verifySigilProof,
} from './sigil.js';
import { digestHex } from '../utils/crypto.js';

describe('sigilFieldNames', () => {
  it('suffixes the time field', () => {
    expect(sigilFieldNames('handshake')).toEqual({ proof: 'handshake', time: 'handshake_time' });
  });
});

describe('createTimeToken', () => {
  it('is the SHA-1 of the whole unix seconds', () => {
    const token = createTimeToken(new Date('2026-03-14T09:26:53.750Z'));
    expect(token).toBe(digestHex('sha1', '1773480413'));
  });
});

describe('createPlaceholderToken', () => {
  it('carries the proof prefix but not the shape of a proof', () => {
    const token = createPlaceholderToken();
    expect(token).toMatch(/^tck_[0-9a-f]{16}$/);
    expect(token).not.toMatch(/^tck_[0-9a-f]{8}$/);
  });

  it('is unique per call', () => {
    expect(createPlaceholderToken()).not.toBe(createPlaceholderToken());
  });
});

describe('verifySigilProof', () => {
  const ua = 'Mozilla/5.0 (test agent)';
  const time = 'a'.repeat(40);

  it('accepts the proof computed from the same user agent and time token', () => {
    expect(verifySigilProof(ua, time, computeSigilProof(ua, time))).toBe(true);
  });

  it('rejects a proof computed for another user agent', () => {
    expect(verifySigilProof(ua, time, computeSigilProof('curl/8.0', time))).toBe(false);
  });

  it('rejects a proof with a different prefix', () => {
    const proof = computeSigilProof(ua, time).replace('tck_', 'tok_');
    expect(verifySigilProof(ua, time, proof)).toBe(false);
  });

  it('rejects the untouched placeholder', () => {
    expect(verifySigilProof(ua, time, createPlaceholderToken())).toBe(false);
  });
});
