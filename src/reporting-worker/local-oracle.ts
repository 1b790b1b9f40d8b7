// src/reporting-worker/local-oracle.ts
// In-process stand-in for the off-band decryption oracle. Requests queue up on
// dispatch; drain() unseals them, signs the clear values and calls back.

import { randomUUID } from 'crypto';
import type { DecryptionTransport } from '@core/dependencies';
import type { ReportingDesk } from '@core/desk';
import { signCallback } from '@core/proof';
import type { InMemorySealingService, SealedHandle } from '@core/sealing';

export interface OracleJob {
  requestId: string;
  handles: readonly SealedHandle[];
  queuedAt: Date;
}

export interface DrainResult {
  delivered: { requestId: string; reportId: number; autoResolved: boolean }[];
  failed: { requestId: string; error: string }[];
}

export class LocalDecryptionOracle implements DecryptionTransport {
  private readonly queue: OracleJob[] = [];

  constructor(
    private readonly sealing: InMemorySealingService,
    private readonly secret: string,
  ) {}

  async dispatch(handles: readonly SealedHandle[]): Promise<string> {
    const requestId = randomUUID();
    this.queue.push({ requestId, handles: [...handles], queuedAt: new Date() });
    console.warn(`[ORACLE] Queued request ${requestId} (${handles.length} handles)`);
    return requestId;
  }

  pending(): readonly OracleJob[] {
    return this.queue;
  }

  /** Answers every queued request. A rejected callback is reported, not retried. */
  async drain(desk: ReportingDesk): Promise<DrainResult> {
    const jobs = this.queue.splice(0, this.queue.length);
    const result: DrainResult = { delivered: [], failed: [] };

    for (const job of jobs) {
      try {
        const clearValues = job.handles.map((handle) => this.unsealNumber(handle));
        const proof = signCallback(this.secret, job.requestId, clearValues);
        const outcome = await desk.handleCallback(job.requestId, clearValues, proof);
        result.delivered.push({
          requestId: job.requestId,
          reportId: outcome.reportId,
          autoResolved: outcome.autoResolved,
        });
        console.warn(
          `[ORACLE] Delivered ${job.requestId} -> report ${outcome.reportId}` +
            (outcome.autoResolved ? ' (auto-resolved)' : ''),
        );
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        result.failed.push({ requestId: job.requestId, error: message });
        console.error(`[ORACLE] Callback for ${job.requestId} rejected:`, message);
      }
    }

    return result;
  }

  private unsealNumber(handle: SealedHandle): number {
    const value = this.sealing.unseal(handle);
    if (typeof value !== 'number') {
      throw new TypeError(`Sealed value ${handle.id} is not numeric`);
    }
    return value;
  }
}
