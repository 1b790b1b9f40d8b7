// src/reporting-core/proof.ts
// Verification strategies for oracle callbacks.

import { createHmac, timingSafeEqual } from 'crypto';

export type ClearValues = readonly number[];

export interface ProofVerifier {
  verify(requestId: string, clearValues: ClearValues, proof: string): boolean | Promise<boolean>;
}

/** Canonical byte string a proof commits to. */
export function canonicalContext(requestId: string, clearValues: ClearValues): string {
  return `${requestId}|${clearValues.join(',')}`;
}

export function signCallback(secret: string, requestId: string, clearValues: ClearValues): string {
  return createHmac('sha256', secret)
    .update(canonicalContext(requestId, clearValues))
    .digest('hex');
}

const HEX_DIGEST = /^[0-9a-f]{64}$/i;

export class HmacProofVerifier implements ProofVerifier {
  constructor(private readonly secret: string) {}

  verify(requestId: string, clearValues: ClearValues, proof: string): boolean {
    // Buffer.from(…, 'hex') stops at the first non-hex character
    if (!HEX_DIGEST.test(proof)) return false;
    const expected = Buffer.from(signCallback(this.secret, requestId, clearValues), 'hex');
    const given = Buffer.from(proof, 'hex');
    if (given.length !== expected.length) return false;
    return timingSafeEqual(given, expected);
  }
}

export const acceptAllVerifier: ProofVerifier = {
  verify: () => true,
};
