import { describe, it, expect, vi, afterEach } from 'vitest';
import { ManualClock } from '@core/clock';
import { LedgerStore } from '@core/store';
import { START } from './fixtures';

function makeStore() {
  return new LedgerStore('authority', new ManualClock(START));
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('LedgerStore.transact', () => {
  it('commits the draft and publishes buffered events in order', async () => {
    const store = makeStore();
    const result = await store.transact((tx) => {
      tx.state.nextReportId = 5;
      tx.emit('InvestigatorAdded', null, { investigator: 'a' });
      tx.emit('InvestigatorAdded', null, { investigator: 'b' });
      return 'done';
    });

    expect(result).toBe('done');
    expect(store.state.nextReportId).toBe(5);
    expect(store.events()).toEqual([
      { sequence: 1, name: 'InvestigatorAdded', reportId: null, at: START.toISOString(), data: { investigator: 'a' } },
      { sequence: 2, name: 'InvestigatorAdded', reportId: null, at: START.toISOString(), data: { investigator: 'b' } },
    ]);
  });

  it('drops the draft and its events when the function throws', async () => {
    const store = makeStore();
    await expect(
      store.transact((tx) => {
        tx.state.nextReportId = 99;
        tx.state.investigators.add('ghost');
        tx.emit('InvestigatorAdded', null, { investigator: 'ghost' });
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    expect(store.state.nextReportId).toBe(1);
    expect(store.state.investigators.has('ghost')).toBe(false);
    expect(store.events()).toEqual([]);
  });

  it('keeps running after a failed transaction', async () => {
    const store = makeStore();
    const failed = store.transact(() => {
      throw new Error('first');
    });
    const next = store.transact((tx) => {
      tx.state.resolvedCount = 3;
    });

    await expect(failed).rejects.toThrow('first');
    await next;
    expect(store.state.resolvedCount).toBe(3);
  });

  it('runs transactions one at a time, each on the previous result', async () => {
    const store = makeStore();
    const order: string[] = [];

    const slow = store.transact(async (tx) => {
      order.push('slow:start');
      await new Promise((resolve) => setTimeout(resolve, 10));
      tx.state.nextReportId += 1;
      order.push('slow:end');
    });
    const fast = store.transact((tx) => {
      order.push(`fast:${tx.state.nextReportId}`);
      tx.state.nextReportId += 1;
    });

    await Promise.all([slow, fast]);
    expect(order).toEqual(['slow:start', 'slow:end', 'fast:2']);
    expect(store.state.nextReportId).toBe(3);
  });
});

describe('LedgerStore.subscribe', () => {
  it('delivers committed events until unsubscribed', async () => {
    const store = makeStore();
    const seen: string[] = [];
    const unsubscribe = store.subscribe((event) => seen.push(`${event.sequence}:${event.name}`));

    await store.transact((tx) => tx.emit('InvestigatorAdded', null));
    unsubscribe();
    await store.transact((tx) => tx.emit('InvestigatorRemoved', null));

    expect(seen).toEqual(['1:InvestigatorAdded']);
    expect(store.events()).toHaveLength(2);
  });

  it('logs and skips a listener that throws', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const store = makeStore();
    const seen: number[] = [];
    store.subscribe(() => {
      throw new Error('listener down');
    });
    store.subscribe((event) => seen.push(event.sequence));

    await store.transact((tx) => tx.emit('InvestigatorAdded', null));

    expect(seen).toEqual([1]);
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy.mock.calls[0][0]).toBe('[LEDGER] Listener failed on InvestigatorAdded:');
  });
});
