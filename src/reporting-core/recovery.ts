// src/reporting-core/recovery.ts
// Timeout-driven refunds. Open to any caller; the guards in the state machine
// are the only gate.

import {
  buildTransitionContext,
  checkTransition,
  enterStatus,
  requireReport,
  roleFor,
  type CallerContext,
} from './report-context';
import { transition } from './state-machine';
import type { LedgerState, LedgerTransaction } from './store';

export type RefundKind = 'decryption_timeout' | 'investigation_timeout';

function claimRefund(
  tx: LedgerTransaction,
  ctx: CallerContext,
  reportId: number,
  kind: RefundKind,
): void {
  const report = requireReport(tx.state, reportId);
  const role = roleFor(tx.state, report, ctx.caller);
  const previous = report.status;
  const next = checkTransition(tx, report, kind, { role, principal: ctx.caller });
  const investigation = tx.state.investigations.get(reportId);

  enterStatus(tx, report, next);

  tx.emit('RefundIssued', reportId, { reason: kind, from: previous, claimant: ctx.caller });
  if (kind === 'investigation_timeout') {
    tx.emit('InvestigationTimeout', reportId, {
      investigator: report.investigator,
      deadline: investigation?.deadline.toISOString() ?? null,
    });
  }
}

export function claimDecryptionTimeoutRefund(
  tx: LedgerTransaction,
  ctx: CallerContext,
  reportId: number,
): void {
  claimRefund(tx, ctx, reportId, 'decryption_timeout');
}

export function claimInvestigationTimeoutRefund(
  tx: LedgerTransaction,
  ctx: CallerContext,
  reportId: number,
): void {
  claimRefund(tx, ctx, reportId, 'investigation_timeout');
}

/** Which refund, if any, could be claimed at `at`. Pure. */
export function availableRefund(
  state: Readonly<LedgerState>,
  reportId: number,
  at: Date,
): RefundKind | null {
  const report = requireReport(state, reportId);
  const ctx = buildTransitionContext(state, report, { role: 'public', principal: '' }, at);
  const kinds: RefundKind[] = ['decryption_timeout', 'investigation_timeout'];
  return kinds.find((kind) => transition(report.status, kind, ctx).ok) ?? null;
}

export function isRefundAvailable(state: Readonly<LedgerState>, reportId: number, at: Date): boolean {
  return availableRefund(state, reportId, at) !== null;
}
