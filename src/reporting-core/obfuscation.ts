import { createHash } from 'crypto';
import type { Principal } from '@shared/types';

export interface MultiplierSeed {
  nonce: number;
  submissionCount: number;
  caller: Principal;
  now: Date;
}

/**
 * Pseudo-random multiplier in [1, 1000]. Every input is public or guessable,
 * so the derived value is a disguise for the public log, not a secret.
 */
export function generateMultiplier(seed: MultiplierSeed): number {
  const digest = createHash('sha256')
    .update(`${seed.nonce}:${seed.submissionCount}:${seed.caller}:${seed.now.getTime()}`)
    .digest();
  return (digest.readUInt32BE(0) % 1000) + 1;
}

export function obfuscateSeverity(severity: number, multiplier: number): number {
  return (severity * multiplier) % 1000;
}
