// src/db/journal.ts
// Archives ledger events to Postgres. Writes are fire-and-forget: the
// in-memory ledger stays authoritative and a failed insert is only logged.

import type { LedgerEventRecord } from '@shared/types';
import type { Database } from './connection';
import { ledgerEvents } from './schema';

export function toJournalRow(event: LedgerEventRecord): typeof ledgerEvents.$inferInsert {
  return {
    sequence: event.sequence,
    name: event.name,
    reportId: event.reportId,
    payload: event.data,
    occurredAt: new Date(event.at),
  };
}

export function createLedgerJournal(db: Database): (event: LedgerEventRecord) => void {
  return (event) => {
    db.insert(ledgerEvents)
      .values(toJournalRow(event))
      .catch((err: unknown) => console.error(`[DB] Failed to journal event #${event.sequence}:`, err));
  };
}
