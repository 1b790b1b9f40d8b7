// src/reporting-core/report-context.ts
// Glue between stored records and the pure state machine.

import type { Principal, ReportStatus } from '@shared/types';
import { AuthorizationError, StateError, TimeoutNotReachedError, ValidationError } from './errors';
import { transition, type ActorRole, type ReportAction, type TransitionContext } from './state-machine';
import type { LedgerState, LedgerTransaction, ReportRecord } from './store';

export interface CallerContext {
  caller: Principal;
}

export function requireReport(state: Readonly<LedgerState>, reportId: number): ReportRecord {
  const report = state.reports.get(reportId);
  if (!report) {
    throw new ValidationError(`Report ${reportId} does not exist`, 'UNKNOWN_REPORT');
  }
  return report;
}

export function roleFor(state: Readonly<LedgerState>, report: ReportRecord, caller: Principal): ActorRole {
  if (caller === state.authority) return 'authority';
  if (report.investigator !== null && caller === report.investigator) return 'assigned_investigator';
  return 'public';
}

/** Authority or the report's assigned investigator. */
export function requireCaseWorker(state: Readonly<LedgerState>, report: ReportRecord, caller: Principal): ActorRole {
  const role = roleFor(state, report, caller);
  if (role === 'public') {
    throw new AuthorizationError(`Not authorized to update report ${report.id}`);
  }
  return role;
}

export function buildTransitionContext(
  state: Readonly<LedgerState>,
  report: ReportRecord,
  actor: { role: ActorRole; principal: Principal },
  timestamp: Date,
): TransitionContext {
  const investigation = state.investigations.get(report.id);
  return {
    reportId: report.id,
    actor,
    timestamp,
    report: {
      decryptionRequestId: report.decryptionRequestId,
      decryptionDeadline: report.decryptionDeadline,
      callbackCompleted: report.callbackCompleted,
      refundClaimed: report.refundClaimed,
    },
    investigation: investigation
      ? { deadline: investigation.deadline, isActive: investigation.isActive }
      : null,
  };
}

/**
 * Runs the reducer and converts a rejection into the matching DeskError.
 * Returns the target status without applying it.
 */
export function checkTransition(
  tx: LedgerTransaction,
  report: ReportRecord,
  action: ReportAction,
  actor: { role: ActorRole; principal: Principal },
): ReportStatus {
  const ctx = buildTransitionContext(tx.state, report, actor, tx.now);
  const result = transition(report.status, action, ctx);
  if (result.ok) return result.newState;

  switch (result.reason) {
    case 'role':
      throw new AuthorizationError(result.error);
    case 'state':
      throw new StateError(result.error);
    case 'guard': {
      const failed = (result.guardResults ?? []).filter((g) => !g.passed);
      if (failed.some((g) => g.kind === 'state')) {
        throw new StateError(result.error);
      }
      throw new TimeoutNotReachedError(result.error);
    }
  }
}

/**
 * Moves a report into `status` and applies the bookkeeping that belongs to
 * that status: counters, refund flag and investigation deactivation.
 */
export function enterStatus(tx: LedgerTransaction, report: ReportRecord, status: ReportStatus): void {
  const investigation = tx.state.investigations.get(report.id);
  report.status = status;

  switch (status) {
    case 'RESOLVED':
      tx.state.resolvedCount += 1;
      break;
    case 'REFUNDED':
      report.refundClaimed = true;
      tx.state.refundedCount += 1;
      break;
    default:
      break;
  }

  if (investigation && (status === 'RESOLVED' || status === 'DISMISSED' || status === 'REFUNDED')) {
    investigation.isActive = false;
    investigation.lastUpdatedAt = tx.now;
  }
}
