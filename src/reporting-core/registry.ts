// src/reporting-core/registry.ts
// Report creation, projections and aggregates.

import { CATEGORY_MAX, SEALED_FIELDS, SEVERITY_MAX, SEVERITY_MIN } from '@shared/constants';
import type { ReportBasicInfo, SealedField, SystemStats } from '@shared/types';
import type { DeskDependencies } from './dependencies';
import { ValidationError } from './errors';
import { generateMultiplier, obfuscateSeverity } from './obfuscation';
import { requireReport, type CallerContext } from './report-context';
import type { SealableValue, SealedHandle } from './sealing';
import type { LedgerState, LedgerTransaction } from './store';

export interface SubmitReportInput {
  category: number;
  anonymous: boolean;
  severity: number;
}

export function validateSubmission(input: SubmitReportInput): void {
  if (!Number.isInteger(input.category) || input.category < 0 || input.category > CATEGORY_MAX) {
    throw new ValidationError('Invalid category');
  }
  if (
    !Number.isInteger(input.severity) ||
    input.severity < SEVERITY_MIN ||
    input.severity > SEVERITY_MAX
  ) {
    throw new ValidationError(`Severity must be between ${SEVERITY_MIN} and ${SEVERITY_MAX}`);
  }
}

export function submitReport(
  deps: DeskDependencies,
  tx: LedgerTransaction,
  ctx: CallerContext,
  input: SubmitReportInput,
): number {
  validateSubmission(input);

  const { state, now } = tx;
  const reportId = state.nextReportId;

  state.obfuscationNonce += 1;
  const multiplier = generateMultiplier({
    nonce: state.obfuscationNonce,
    submissionCount: state.reports.size,
    caller: ctx.caller,
    now,
  });
  const obfuscated = obfuscateSeverity(input.severity, multiplier);

  const clear: Record<SealedField, SealableValue> = {
    reporter: ctx.caller,
    category: input.category,
    timestamp: now.getTime(),
    anonymous: input.anonymous,
    severity: input.severity,
    obfuscatedSeverity: obfuscated,
  };
  const sealed = sealAll(deps, clear);
  for (const field of SEALED_FIELDS) {
    deps.sealing.grantAccess(sealed[field], state.authority);
  }

  state.reports.set(reportId, {
    id: reportId,
    sealed,
    status: 'SUBMITTED',
    submittedAt: now,
    decryptionRequestId: null,
    decryptionRequestedAt: null,
    decryptionDeadline: null,
    investigator: null,
    callbackCompleted: false,
    revealedSeverity: 0,
    refundClaimed: false,
  });
  state.nextReportId = reportId + 1;

  tx.emit('ReportSubmitted', reportId, {
    obfuscatedSeverity: obfuscated,
    submissionTime: now.toISOString(),
  });
  return reportId;
}

function sealAll(
  deps: DeskDependencies,
  clear: Record<SealedField, SealableValue>,
): Record<SealedField, SealedHandle> {
  return {
    reporter: deps.sealing.seal(clear.reporter),
    category: deps.sealing.seal(clear.category),
    timestamp: deps.sealing.seal(clear.timestamp),
    anonymous: deps.sealing.seal(clear.anonymous),
    severity: deps.sealing.seal(clear.severity),
    obfuscatedSeverity: deps.sealing.seal(clear.obfuscatedSeverity),
  };
}

export function getBasicInfo(state: Readonly<LedgerState>, reportId: number): ReportBasicInfo {
  const report = requireReport(state, reportId);
  return {
    status: report.status,
    submissionTime: report.submittedAt.toISOString(),
    investigator: report.investigator,
    exists: true,
    callbackCompleted: report.callbackCompleted,
    revealedSeverity: report.revealedSeverity,
  };
}

/** Clear values of the sealed fields the caller has been granted. */
export function getSealedFields(
  deps: DeskDependencies,
  state: Readonly<LedgerState>,
  ctx: CallerContext,
  reportId: number,
): Partial<Record<SealedField, SealableValue>> {
  const report = requireReport(state, reportId);
  const visible: Partial<Record<SealedField, SealableValue>> = {};
  for (const field of SEALED_FIELDS) {
    const handle = report.sealed[field];
    if (deps.sealing.canRead(handle, ctx.caller)) {
      visible[field] = deps.sealing.read(handle, ctx.caller);
    }
  }
  return visible;
}

/**
 * Reads the resolved and refunded counters kept by `enterStatus` instead of
 * scanning every record. `scanStats` is the full-scan equivalent.
 */
export function getStats(state: Readonly<LedgerState>): SystemStats {
  const total = state.reports.size;
  const resolved = state.resolvedCount;
  const refunded = state.refundedCount;
  return { total, resolved, pending: total - resolved - refunded, refunded };
}

/**
 * Stats recomputed from the records themselves. Agrees with `getStats`
 * whenever the counters are intact.
 */
export function scanStats(state: Readonly<LedgerState>): SystemStats {
  let resolved = 0;
  let refunded = 0;
  for (const report of state.reports.values()) {
    if (report.status === 'RESOLVED') resolved += 1;
    if (report.status === 'REFUNDED') refunded += 1;
  }
  const total = state.reports.size;
  return { total, resolved, pending: total - resolved - refunded, refunded };
}
