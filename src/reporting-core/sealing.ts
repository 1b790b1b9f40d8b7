// src/reporting-core/sealing.ts
// Sealed-value capability consumed by the desk, plus a plaintext-plus-ACL
// simulator that satisfies it.

import { randomUUID } from 'crypto';
import type { Principal } from '@shared/types';
import { AuthorizationError, ValidationError } from './errors';

export interface SealedHandle {
  readonly id: string;
}

export type SealableValue = number | boolean | string;

export interface SealingService {
  seal(value: SealableValue): SealedHandle;
  grantAccess(handle: SealedHandle, principal: Principal): void;
  canRead(handle: SealedHandle, principal: Principal): boolean;
  /** Clear value for a granted principal; AuthorizationError otherwise. */
  read(handle: SealedHandle, principal: Principal): SealableValue;
}

interface SealedEntry {
  value: SealableValue;
  readers: Set<Principal>;
}

export class InMemorySealingService implements SealingService {
  private readonly entries = new Map<string, SealedEntry>();

  seal(value: SealableValue): SealedHandle {
    const id = `sealed-${randomUUID()}`;
    this.entries.set(id, { value, readers: new Set() });
    return { id };
  }

  grantAccess(handle: SealedHandle, principal: Principal): void {
    this.entry(handle).readers.add(principal);
  }

  canRead(handle: SealedHandle, principal: Principal): boolean {
    return this.entries.get(handle.id)?.readers.has(principal) ?? false;
  }

  read(handle: SealedHandle, principal: Principal): SealableValue {
    const entry = this.entry(handle);
    if (!entry.readers.has(principal)) {
      throw new AuthorizationError(`Principal '${principal}' has no access to ${handle.id}`);
    }
    return entry.value;
  }

  /** Oracle-side decryption. Never reachable through the desk's caller-facing API. */
  unseal(handle: SealedHandle): SealableValue {
    return this.entry(handle).value;
  }

  private entry(handle: SealedHandle): SealedEntry {
    const entry = this.entries.get(handle.id);
    if (!entry) {
      throw new ValidationError(`Unknown sealed handle ${handle.id}`);
    }
    return entry;
  }
}
