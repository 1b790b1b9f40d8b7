// reporting-worker: background loops that run beside the API.
// - local oracle: answers queued decryption requests
// - deadline sweeper: claims refunds once deadlines pass

import type { ReportingDesk } from '@core/desk';
import type { Principal } from '@shared/types';
import { sweepExpiredReports } from './deadline-sweeper';
import type { LocalDecryptionOracle } from './local-oracle';

export { LocalDecryptionOracle } from './local-oracle';
export { sweepExpiredReports } from './deadline-sweeper';

export interface WorkerOptions {
  oraclePollMs: number;
  sweepIntervalMs: number;
  sweeperPrincipal: Principal;
}

/** Starts both loops; the returned function stops them. */
export function startWorkers(
  desk: ReportingDesk,
  oracle: LocalDecryptionOracle,
  options: WorkerOptions,
): () => void {
  const oracleTimer = setInterval(() => {
    if (oracle.pending().length === 0) return;
    oracle.drain(desk).catch((err) => console.error('[ORACLE] Drain failed:', err));
  }, options.oraclePollMs);

  const sweepTimer = setInterval(() => {
    sweepExpiredReports(desk, options.sweeperPrincipal).catch((err) =>
      console.error('[SWEEPER] Sweep failed:', err),
    );
  }, options.sweepIntervalMs);

  oracleTimer.unref();
  sweepTimer.unref();

  return () => {
    clearInterval(oracleTimer);
    clearInterval(sweepTimer);
  };
}
