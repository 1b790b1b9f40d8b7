import { describe, it, expect } from 'vitest';
import { getTableColumns, getTableName } from 'drizzle-orm';
import { ledgerEvents } from '@db/schema';

describe('ledger_events schema', () => {
  it('exports the ledger_events table', () => {
    expect(getTableName(ledgerEvents)).toBe('ledger_events');
  });

  it('has the journal columns', () => {
    expect(Object.keys(getTableColumns(ledgerEvents)).sort()).toEqual(
      ['createdAt', 'id', 'name', 'occurredAt', 'payload', 'reportId', 'sequence'],
    );
  });

  it('allows log entries that belong to no report', () => {
    expect(ledgerEvents.reportId.notNull).toBe(false);
    expect(ledgerEvents.sequence.notNull).toBe(true);
  });
});
