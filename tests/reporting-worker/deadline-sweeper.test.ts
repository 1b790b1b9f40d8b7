import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { DAY_MS } from '@shared/constants';
import { ReportingDesk } from '@core/desk';
import { ManualClock } from '@core/clock';
import { acceptAllVerifier } from '@core/proof';
import { InMemorySealingService } from '@core/sealing';
import { LocalDecryptionOracle, sweepExpiredReports } from '@worker/index';

const AUTHORITY = { caller: 'authority' };

async function setup() {
  const clock = new ManualClock();
  const sealing = new InMemorySealingService();
  const desk = new ReportingDesk({
    authority: 'authority',
    sealing,
    transport: new LocalDecryptionOracle(sealing, 'test-secret'),
    verifier: acceptAllVerifier,
    clock,
  });
  await desk.addInvestigator(AUTHORITY, 'investigator-a');
  for (let i = 0; i < 3; i++) {
    await desk.submit({ caller: 'reporter-1' }, { category: 0, anonymous: true, severity: 30 });
  }
  return { desk, clock };
}

beforeEach(() => {
  vi.spyOn(console, 'warn').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('sweepExpiredReports', () => {
  it('claims nothing while deadlines are open', async () => {
    const { desk } = await setup();
    await desk.assign(AUTHORITY, 1, 'investigator-a');
    expect(await sweepExpiredReports(desk, 'sweeper')).toEqual({ claimed: [], failed: [] });
  });

  it('claims each expired report with the matching refund', async () => {
    const { desk, clock } = await setup();
    await desk.assign(AUTHORITY, 1, 'investigator-a');
    await desk.assign(AUTHORITY, 2, 'investigator-a');
    await desk.requestDecryption(AUTHORITY, 2);

    clock.advance(8 * DAY_MS);
    const first = await sweepExpiredReports(desk, 'sweeper');
    expect(first.claimed).toEqual([{ reportId: 2, kind: 'decryption_timeout' }]);

    clock.advance(90 * DAY_MS);
    const second = await sweepExpiredReports(desk, 'sweeper');
    expect(second.claimed).toEqual([{ reportId: 1, kind: 'investigation_timeout' }]);

    expect(desk.getStats()).toEqual({ total: 3, resolved: 0, pending: 1, refunded: 2 });
    const refund = desk.events().find((e) => e.name === 'RefundIssued');
    expect(refund?.data.claimant).toBe('sweeper');
  });
});
