import { ReportingDesk } from '@core/desk';
import { ManualClock } from '@core/clock';
import { InMemorySealingService, type SealedHandle } from '@core/sealing';
import { acceptAllVerifier, type ProofVerifier } from '@core/proof';
import type { DecryptionTransport } from '@core/dependencies';

// ---------------------------------------------------------------------------
// Principals
// ---------------------------------------------------------------------------

export const AUTHORITY = 'authority';
export const INVESTIGATOR_A = 'investigator-a';
export const INVESTIGATOR_B = 'investigator-b';
export const REPORTER = 'reporter-1';
export const OUTSIDER = 'outsider';

export const by = (caller: string) => ({ caller });

export const START = new Date('2026-01-01T00:00:00Z');

// ---------------------------------------------------------------------------
// Recording transport: hands out req-1, req-2, ... and remembers the handles
// ---------------------------------------------------------------------------

export class RecordingTransport implements DecryptionTransport {
  readonly requests: { requestId: string; handles: readonly SealedHandle[] }[] = [];

  async dispatch(handles: readonly SealedHandle[]): Promise<string> {
    const requestId = `req-${this.requests.length + 1}`;
    this.requests.push({ requestId, handles });
    return requestId;
  }
}

export interface DeskFixture {
  desk: ReportingDesk;
  clock: ManualClock;
  sealing: InMemorySealingService;
  transport: RecordingTransport;
}

export function makeDesk(verifier: ProofVerifier = acceptAllVerifier): DeskFixture {
  const clock = new ManualClock(START);
  const sealing = new InMemorySealingService();
  const transport = new RecordingTransport();
  const desk = new ReportingDesk({
    authority: AUTHORITY,
    sealing,
    transport,
    verifier,
    clock,
  });
  return { desk, clock, sealing, transport };
}

/** Desk with investigator A on the roster and report 1 assigned to A. */
export async function makeAssignedDesk(severity = 50): Promise<DeskFixture & { reportId: number }> {
  const fixture = makeDesk();
  await fixture.desk.addInvestigator(by(AUTHORITY), INVESTIGATOR_A);
  const reportId = await fixture.desk.submit(by(REPORTER), { category: 0, anonymous: true, severity });
  await fixture.desk.assign(by(AUTHORITY), reportId, INVESTIGATOR_A);
  return { ...fixture, reportId };
}
