// src/reporting-core/decryption.ts
// Request/callback protocol with the external decryption oracle.
//
// requestDecryption dispatches sealed handles and parks the report in
// DECRYPTION_PENDING. The oracle answers later through handleCallback with the
// clear values and a proof over (requestId, clearValues). A request that is
// never answered is recovered through the decryption-timeout refund.

import { z } from 'zod';
import { AUTO_RESOLVE_SEVERITY, CATEGORY_MAX, SEVERITY_MAX, SEVERITY_MIN } from '@shared/constants';
import type { DecryptionStatus } from '@shared/types';
import type { DeskDependencies } from './dependencies';
import { ProofVerificationError, StateError, ValidationError } from './errors';
import type { ClearValues } from './proof';
import {
  checkTransition,
  enterStatus,
  requireCaseWorker,
  requireReport,
  type CallerContext,
} from './report-context';
import type { LedgerState, LedgerTransaction } from './store';

// ── Clear value codec ────────────────────────────────────────────────────────

export const clearValuesSchema = z.tuple([
  z.number().int().min(0).max(CATEGORY_MAX),
  z.number().int().min(SEVERITY_MIN).max(SEVERITY_MAX),
  z.number().int().nonnegative(),
]);

export interface RevealedFields {
  category: number;
  severity: number;
  timestamp: number;
}

/** Order in which sealed fields are packed into one request. */
export const REVEAL_ORDER = ['category', 'severity', 'timestamp'] as const;

export function decodeClearValues(clearValues: ClearValues): RevealedFields {
  const parsed = clearValuesSchema.safeParse(clearValues);
  if (!parsed.success) {
    throw new ValidationError(`Malformed clear values: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
  }
  const [category, severity, timestamp] = parsed.data;
  return { category, severity, timestamp };
}

// ── Request ──────────────────────────────────────────────────────────────────

export interface DecryptionRequestReceipt {
  requestId: string;
  deadline: Date;
}

export async function requestDecryption(
  deps: DeskDependencies,
  tx: LedgerTransaction,
  ctx: CallerContext,
  reportId: number,
): Promise<DecryptionRequestReceipt> {
  const { state, now } = tx;
  const report = requireReport(state, reportId);
  const role = requireCaseWorker(state, report, ctx.caller);
  const next = checkTransition(tx, report, 'request_decryption', { role, principal: ctx.caller });

  const handles = REVEAL_ORDER.map((field) => report.sealed[field]);
  const requestId = await deps.transport.dispatch(handles);
  if (state.requestIndex.has(requestId)) {
    throw new StateError(`Oracle reused request id ${requestId}`);
  }

  const deadline = new Date(now.getTime() + deps.windows.decryptionWindowMs);
  report.decryptionRequestId = requestId;
  report.decryptionRequestedAt = now;
  report.decryptionDeadline = deadline;
  report.status = next;
  state.requestIndex.set(requestId, reportId);

  const investigation = state.investigations.get(reportId);
  if (investigation) investigation.lastUpdatedAt = now;

  tx.emit('DecryptionRequested', reportId, { requestId, deadline: deadline.toISOString() });
  return { requestId, deadline };
}

// ── Callback ─────────────────────────────────────────────────────────────────

export interface CallbackOutcome {
  reportId: number;
  revealedSeverity: number;
  autoResolved: boolean;
}

export async function handleCallback(
  deps: DeskDependencies,
  tx: LedgerTransaction,
  requestId: string,
  clearValues: ClearValues,
  proof: string,
): Promise<CallbackOutcome> {
  const valid = await deps.verifier.verify(requestId, clearValues, proof);
  if (!valid) {
    throw new ProofVerificationError(`Proof for request ${requestId} did not verify`);
  }

  const { state } = tx;
  const reportId = state.requestIndex.get(requestId);
  if (reportId === undefined) {
    throw new ValidationError(`Unknown decryption request ${requestId}`, 'UNKNOWN_REQUEST');
  }
  const report = requireReport(state, reportId);
  if (report.callbackCompleted) {
    throw new StateError(`Callback for request ${requestId} already processed`);
  }
  if (report.status !== 'DECRYPTION_PENDING') {
    throw new StateError(`Report ${reportId} is ${report.status}; callback no longer applicable`);
  }

  const revealed = decodeClearValues(clearValues);
  report.revealedSeverity = revealed.severity;
  report.callbackCompleted = true;

  const autoResolved = revealed.severity >= AUTO_RESOLVE_SEVERITY;
  if (autoResolved) {
    const next = checkTransition(tx, report, 'resolve', { role: 'oracle', principal: 'oracle' });
    enterStatus(tx, report, next);
  }

  tx.emit('DecryptionCompleted', reportId, {
    requestId,
    revealedSeverity: revealed.severity,
    autoResolved,
  });
  return { reportId, revealedSeverity: revealed.severity, autoResolved };
}

// ── Queries ──────────────────────────────────────────────────────────────────

export function getDecryptionStatus(state: Readonly<LedgerState>, reportId: number): DecryptionStatus {
  const report = requireReport(state, reportId);
  return {
    requestId: report.decryptionRequestId,
    requestedAt: report.decryptionRequestedAt?.toISOString() ?? null,
    deadline: report.decryptionDeadline?.toISOString() ?? null,
    callbackCompleted: report.callbackCompleted,
    revealedSeverity: report.revealedSeverity,
    refundClaimed: report.refundClaimed,
  };
}
