import { describe, it, expect } from 'vitest';
import { hash32, computeSigilProof } from './fnv1a.js';

describe('hash32', () => {
  it('returns the offset basis for empty input', () => {
    expect(hash32('')).toBe('811c9dc5');
  });

  it('matches the published FNV-1a/32 vectors', () => {
    expect(hash32('a')).toBe('e40c292c');
    expect(hash32('foobar')).toBe('bf9cf968');
  });

  it('always returns 8 lower-case hex digits', () => {
    for (const input of ['x', 'hello world', 'Mozilla/5.0 (X11; Linux x86_64)']) {
      expect(hash32(input)).toMatch(/^[0-9a-f]{8}$/);
    }
  });

  it('hashes a string and its UTF-8 bytes identically', () => {
    const text = 'café ☃';
    expect(hash32(text)).toBe(hash32(new TextEncoder().encode(text)));
  });

  it('hashes UTF-8 bytes rather than UTF-16 code units', () => {
    // U+00E9 is one UTF-16 unit but two UTF-8 bytes (0xc3 0xa9)
    expect(hash32('é')).toBe(hash32(new Uint8Array([0xc3, 0xa9])));
    expect(hash32('é')).not.toBe(hash32(new Uint8Array([0xe9])));
  });

  it('is deterministic', () => {
    expect(hash32('same input')).toBe(hash32('same input'));
  });
});

describe('computeSigilProof', () => {
  it('prefixes the hash of user agent followed by time token', () => {
    expect(computeSigilProof('', '')).toBe('tck_811c9dc5');
    expect(computeSigilProof('foo', 'bar')).toBe('tck_bf9cf968');
  });

  it('depends on the user agent', () => {
    expect(computeSigilProof('agent-a', 't')).not.toBe(computeSigilProof('agent-b', 't'));
  });
});
