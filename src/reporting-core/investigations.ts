import { NOTE_COST_UNIT } from '@shared/constants';
import type {
  InvestigationInfo,
  InvestigationNotes,
  Principal,
  ReportStatus,
} from '@shared/types';
import { isAuthorized, isNullPrincipal, requireAuthority } from './access-control';
import type { DeskDependencies } from './dependencies';
import { AuthorizationError, StateError, ValidationError } from './errors';
import {
  checkTransition,
  enterStatus,
  requireCaseWorker,
  requireReport,
  type CallerContext,
} from './report-context';
import { MANUAL_STATUS_ACTIONS } from './state-machine';
import type { InvestigationRecord, LedgerState, LedgerTransaction } from './store';

// ---------------------------------------------------------------------------
// Mutations
// ---------------------------------------------------------------------------

export function assignInvestigator(
  deps: DeskDependencies,
  tx: LedgerTransaction,
  ctx: CallerContext,
  reportId: number,
  investigator: Principal,
): Date {
  const { state, now } = tx;
  requireAuthority(state, ctx);
  const report = requireReport(state, reportId);

  if (isNullPrincipal(investigator) || !isAuthorized(state, investigator)) {
    throw new ValidationError('Investigator not authorized');
  }
  if (report.investigator !== null) {
    throw new StateError('Report already assigned');
  }

  const next = checkTransition(tx, report, 'assign', { role: 'authority', principal: ctx.caller });
  const deadline = new Date(now.getTime() + deps.windows.investigationWindowMs);

  report.investigator = investigator;
  report.status = next;
  state.investigations.set(reportId, {
    reportId,
    investigator,
    startedAt: now,
    lastUpdatedAt: now,
    deadline,
    isActive: true,
    notes: '',
    cost: 0,
  });
  state.portfolios.set(investigator, [...(state.portfolios.get(investigator) ?? []), reportId]);

  deps.sealing.grantAccess(report.sealed.category, investigator);
  deps.sealing.grantAccess(report.sealed.timestamp, investigator);
  deps.sealing.grantAccess(report.sealed.severity, investigator);

  tx.emit('ReportAssigned', reportId, { investigator, deadline: deadline.toISOString() });
  return deadline;
}

export function addNotes(
  tx: LedgerTransaction,
  ctx: CallerContext,
  reportId: number,
  text: string,
): void {
  const report = requireReport(tx.state, reportId);
  requireCaseWorker(tx.state, report, ctx.caller);
  const investigation = requireInvestigation(tx.state, reportId);

  investigation.notes = text;
  investigation.lastUpdatedAt = tx.now;
  investigation.cost += NOTE_COST_UNIT;

  tx.emit('InvestigationNotesAdded', reportId, { author: ctx.caller });
}

export function updateStatus(
  tx: LedgerTransaction,
  ctx: CallerContext,
  reportId: number,
  newStatus: ReportStatus,
): void {
  const report = requireReport(tx.state, reportId);
  const role = requireCaseWorker(tx.state, report, ctx.caller);

  const action = MANUAL_STATUS_ACTIONS[newStatus];
  if (!action) {
    throw new StateError(`Status '${newStatus}' cannot be set manually`);
  }

  const previous = report.status;
  const next = checkTransition(tx, report, action, { role, principal: ctx.caller });
  enterStatus(tx, report, next);

  const investigation = tx.state.investigations.get(reportId);
  if (investigation) investigation.lastUpdatedAt = tx.now;

  tx.emit('ReportStatusChanged', reportId, { from: previous, to: next, by: ctx.caller });
}

// ---------------------------------------------------------------------------
// Queries
// ---------------------------------------------------------------------------

function requireInvestigation(state: Readonly<LedgerState>, reportId: number): InvestigationRecord {
  const investigation = state.investigations.get(reportId);
  if (!investigation) {
    throw new StateError(`Report ${reportId} has not been assigned`);
  }
  return investigation;
}

export function getInvestigationInfo(state: Readonly<LedgerState>, reportId: number): InvestigationInfo {
  requireReport(state, reportId);
  const investigation = requireInvestigation(state, reportId);
  return {
    reportId,
    investigator: investigation.investigator,
    startTime: investigation.startedAt.toISOString(),
    lastUpdate: investigation.lastUpdatedAt.toISOString(),
    deadline: investigation.deadline.toISOString(),
    isActive: investigation.isActive,
  };
}

export function getInvestigationNotes(
  state: Readonly<LedgerState>,
  ctx: CallerContext,
  reportId: number,
): InvestigationNotes {
  const report = requireReport(state, reportId);
  requireCaseWorker(state, report, ctx.caller);
  const investigation = requireInvestigation(state, reportId);
  return { reportId, notes: investigation.notes, cost: investigation.cost };
}

export function getInvestigatorReports(
  state: Readonly<LedgerState>,
  ctx: CallerContext,
  investigator: Principal,
): number[] {
  if (ctx.caller !== state.authority && ctx.caller !== investigator) {
    throw new AuthorizationError('Only authority or the investigator can list assigned reports');
  }
  return [...(state.portfolios.get(investigator) ?? [])];
}
