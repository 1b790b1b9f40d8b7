import type { ReportingDesk } from '@core/desk';
import type { RefundKind } from '@core/recovery';
import type { Principal } from '@shared/types';

export interface SweepResult {
  claimed: { reportId: number; kind: RefundKind }[];
  failed: { reportId: number; error: string }[];
}

/**
 * Claims every refund whose deadline has passed. Claims are open to any
 * caller, so the sweeper acts under its own principal.
 */
export async function sweepExpiredReports(
  desk: ReportingDesk,
  claimant: Principal,
): Promise<SweepResult> {
  const result: SweepResult = { claimed: [], failed: [] };
  const ctx = { caller: claimant };

  for (const reportId of desk.listReportIds()) {
    const kind = desk.availableRefund(reportId);
    if (!kind) continue;

    try {
      if (kind === 'decryption_timeout') {
        await desk.claimDecryptionTimeoutRefund(ctx, reportId);
      } else {
        await desk.claimInvestigationTimeoutRefund(ctx, reportId);
      }
      result.claimed.push({ reportId, kind });
      console.warn(`[SWEEPER] Refunded report ${reportId} (${kind})`);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      result.failed.push({ reportId, error: message });
      console.error(`[SWEEPER] Refund for report ${reportId} failed:`, message);
    }
  }

  return result;
}
