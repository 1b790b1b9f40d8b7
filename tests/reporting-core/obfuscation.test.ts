import { describe, it, expect } from 'vitest';
import { createHash } from 'crypto';
import { generateMultiplier, obfuscateSeverity } from '@core/obfuscation';

const SEED = { nonce: 1, submissionCount: 0, caller: 'reporter-1', now: new Date('2026-01-01T00:00:00Z') };

describe('generateMultiplier', () => {
  it('derives the multiplier from a hash of the seed', () => {
    const digest = createHash('sha256').update('1:0:reporter-1:1767225600000').digest();
    expect(generateMultiplier(SEED)).toBe((digest.readUInt32BE(0) % 1000) + 1);
  });

  it('is deterministic for the same seed', () => {
    expect(generateMultiplier(SEED)).toBe(generateMultiplier({ ...SEED }));
  });

  it('stays within 1..1000 across many seeds', () => {
    for (let nonce = 1; nonce <= 500; nonce++) {
      const m = generateMultiplier({ ...SEED, nonce, submissionCount: nonce - 1 });
      expect(m).toBeGreaterThanOrEqual(1);
      expect(m).toBeLessThanOrEqual(1000);
      expect(Number.isInteger(m)).toBe(true);
    }
  });
});

describe('obfuscateSeverity', () => {
  it('multiplies modulo 1000', () => {
    expect(obfuscateSeverity(50, 3)).toBe(150);
    expect(obfuscateSeverity(50, 21)).toBe(50);
    expect(obfuscateSeverity(100, 1000)).toBe(0);
    expect(obfuscateSeverity(7, 143)).toBe(1);
  });
});
