// src/reporting-core/store.ts
// Single linearizable store. Mutations run one at a time against a draft copy
// of the state; the draft replaces the committed state only when the
// transaction function returns, and buffered log entries are published after.

import type {
  LedgerEventName,
  LedgerEventRecord,
  Principal,
  ReportStatus,
  SealedField,
} from '@shared/types';
import type { Clock } from './clock';
import type { SealedHandle } from './sealing';

// ---------------------------------------------------------------------------
// Records
// ---------------------------------------------------------------------------

export interface ReportRecord {
  id: number;
  sealed: Record<SealedField, SealedHandle>;
  status: ReportStatus;
  submittedAt: Date;
  decryptionRequestId: string | null;
  decryptionRequestedAt: Date | null;
  decryptionDeadline: Date | null;
  investigator: Principal | null;
  callbackCompleted: boolean;
  revealedSeverity: number;
  refundClaimed: boolean;
}

export interface InvestigationRecord {
  reportId: number;
  investigator: Principal;
  startedAt: Date;
  lastUpdatedAt: Date;
  deadline: Date;
  isActive: boolean;
  notes: string;
  cost: number;
}

export interface LedgerState {
  authority: Principal;
  investigators: Set<Principal>;
  reports: Map<number, ReportRecord>;
  investigations: Map<number, InvestigationRecord>;
  portfolios: Map<Principal, number[]>;
  requestIndex: Map<string, number>;
  nextReportId: number;
  resolvedCount: number;
  refundedCount: number;
  obfuscationNonce: number;
}

export function createLedgerState(authority: Principal): LedgerState {
  return {
    authority,
    investigators: new Set(),
    reports: new Map(),
    investigations: new Map(),
    portfolios: new Map(),
    requestIndex: new Map(),
    nextReportId: 1,
    resolvedCount: 0,
    refundedCount: 0,
    obfuscationNonce: 0,
  };
}

// ---------------------------------------------------------------------------
// Transactions
// ---------------------------------------------------------------------------

export interface LedgerTransaction {
  readonly state: LedgerState;
  /** Transaction timestamp, fixed for the whole operation. */
  readonly now: Date;
  emit(name: LedgerEventName, reportId: number | null, data?: Record<string, unknown>): void;
}

export type LedgerListener = (event: LedgerEventRecord) => void;

interface BufferedEvent {
  name: LedgerEventName;
  reportId: number | null;
  data: Record<string, unknown>;
}

export class LedgerStore {
  private committed: LedgerState;
  private queue: Promise<unknown> = Promise.resolve();
  private readonly log: LedgerEventRecord[] = [];
  private readonly listeners = new Set<LedgerListener>();

  constructor(
    authority: Principal,
    private readonly clock: Clock,
  ) {
    this.committed = createLedgerState(authority);
  }

  /** Committed state. Callers must treat it as read-only. */
  get state(): Readonly<LedgerState> {
    return this.committed;
  }

  now(): Date {
    return this.clock.now();
  }

  events(): readonly LedgerEventRecord[] {
    return this.log;
  }

  subscribe(listener: LedgerListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  transact<T>(fn: (tx: LedgerTransaction) => T | Promise<T>): Promise<T> {
    const run = this.queue.then(() => this.execute(fn));
    // the caller observes failures through `run`; the queue only needs ordering
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async execute<T>(fn: (tx: LedgerTransaction) => T | Promise<T>): Promise<T> {
    const draft = structuredClone(this.committed);
    const buffered: BufferedEvent[] = [];
    const now = this.clock.now();

    const result = await fn({
      state: draft,
      now,
      emit: (name, reportId, data = {}) => {
        buffered.push({ name, reportId, data });
      },
    });

    this.committed = draft;
    for (const entry of buffered) {
      this.publish({
        sequence: this.log.length + 1,
        name: entry.name,
        reportId: entry.reportId,
        at: now.toISOString(),
        data: entry.data,
      });
    }
    return result;
  }

  private publish(event: LedgerEventRecord): void {
    this.log.push(event);
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        console.error(`[LEDGER] Listener failed on ${event.name}:`, err);
      }
    }
  }
}
