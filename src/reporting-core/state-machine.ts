import { REPORT_ACTIONS } from '@shared/constants';
import type { Principal, ReportStatus } from '@shared/types';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ReportAction = (typeof REPORT_ACTIONS)[number];

/** Caller's role relative to one specific report. */
export type ActorRole = 'authority' | 'assigned_investigator' | 'oracle' | 'public';

export interface TransitionContext {
  reportId: number;
  actor: {
    role: ActorRole;
    principal: Principal;
  };
  timestamp: Date;
  report: {
    decryptionRequestId: string | null;
    decryptionDeadline: Date | null;
    callbackCompleted: boolean;
    refundClaimed: boolean;
  };
  investigation: {
    deadline: Date;
    isActive: boolean;
  } | null;
}

export type GuardFailureKind = 'state' | 'timeout';

export interface GuardResult {
  guardName: string;
  passed: boolean;
  reason?: string;
  kind?: GuardFailureKind;
}

export interface TransitionSuccess {
  ok: true;
  newState: ReportStatus;
  guardResults: GuardResult[];
}

export interface TransitionFailure {
  ok: false;
  reason: 'role' | 'state' | 'guard';
  error: string;
  guardResults?: GuardResult[];
}

export type TransitionResult = TransitionSuccess | TransitionFailure;

// ---------------------------------------------------------------------------
// Role Permissions
// ---------------------------------------------------------------------------

const EVERYONE: readonly ActorRole[] = ['authority', 'assigned_investigator', 'oracle', 'public'];

export const ROLE_PERMISSIONS: Record<ReportAction, readonly ActorRole[]> = {
  assign: ['authority'],
  request_decryption: ['authority', 'assigned_investigator'],
  resolve: ['authority', 'assigned_investigator', 'oracle'],
  dismiss: ['authority', 'assigned_investigator'],
  decryption_timeout: EVERYONE,
  investigation_timeout: EVERYONE,
};

// ---------------------------------------------------------------------------
// Transition Table
// ---------------------------------------------------------------------------

export const TRANSITION_TABLE: Record<
  ReportStatus,
  Partial<Record<ReportAction, ReportStatus>>
> = {
  SUBMITTED: {
    assign: 'UNDER_INVESTIGATION',
    resolve: 'RESOLVED',
    dismiss: 'DISMISSED',
  },
  UNDER_INVESTIGATION: {
    request_decryption: 'DECRYPTION_PENDING',
    resolve: 'RESOLVED',
    dismiss: 'DISMISSED',
    investigation_timeout: 'REFUNDED',
  },
  DECRYPTION_PENDING: {
    resolve: 'RESOLVED',
    dismiss: 'DISMISSED',
    decryption_timeout: 'REFUNDED',
    investigation_timeout: 'REFUNDED',
  },
  RESOLVED: {},
  DISMISSED: {},
  REFUNDED: {},
};

/**
 * Statuses an `updateStatus` call may target, and the action each one maps to.
 * Both are edges out of every non-terminal status.
 */
export const MANUAL_STATUS_ACTIONS: Partial<Record<ReportStatus, ReportAction>> = {
  RESOLVED: 'resolve',
  DISMISSED: 'dismiss',
};

export function isTerminal(status: ReportStatus): boolean {
  return Object.keys(TRANSITION_TABLE[status]).length === 0;
}

// ---------------------------------------------------------------------------
// Guard Functions
// ---------------------------------------------------------------------------

type GuardFn = (ctx: TransitionContext) => GuardResult;

export function guardRefundNotClaimed(ctx: TransitionContext): GuardResult {
  if (!ctx.report.refundClaimed) {
    return { guardName: 'guardRefundNotClaimed', passed: true };
  }
  return {
    guardName: 'guardRefundNotClaimed',
    passed: false,
    reason: `Refund already claimed for report ${ctx.reportId}`,
    kind: 'state',
  };
}

export function guardInvestigationActive(ctx: TransitionContext): GuardResult {
  if (ctx.investigation?.isActive) {
    return { guardName: 'guardInvestigationActive', passed: true };
  }
  return {
    guardName: 'guardInvestigationActive',
    passed: false,
    reason: `Report ${ctx.reportId} has no active investigation`,
    kind: 'state',
  };
}

/**
 * A decryption may only be requested while the investigation window is open
 * and no earlier request is still waiting for its callback.
 */
export function guardDecryptionRequestable(ctx: TransitionContext): GuardResult {
  if (ctx.report.decryptionRequestId !== null && !ctx.report.callbackCompleted) {
    return {
      guardName: 'guardDecryptionRequestable',
      passed: false,
      reason: `Decryption already in flight for report ${ctx.reportId}`,
      kind: 'state',
    };
  }
  if (ctx.investigation && ctx.timestamp.getTime() > ctx.investigation.deadline.getTime()) {
    return {
      guardName: 'guardDecryptionRequestable',
      passed: false,
      reason: `Investigation of report ${ctx.reportId} expired at ${ctx.investigation.deadline.toISOString()}`,
      kind: 'state',
    };
  }
  return { guardName: 'guardDecryptionRequestable', passed: true };
}

export function guardCallbackOutstanding(ctx: TransitionContext): GuardResult {
  if (!ctx.report.callbackCompleted) {
    return { guardName: 'guardCallbackOutstanding', passed: true };
  }
  return {
    guardName: 'guardCallbackOutstanding',
    passed: false,
    reason: `Decryption callback for report ${ctx.reportId} already completed`,
    kind: 'state',
  };
}

export function guardDecryptionDeadlinePassed(ctx: TransitionContext): GuardResult {
  const deadline = ctx.report.decryptionDeadline;
  if (deadline && ctx.timestamp.getTime() > deadline.getTime()) {
    return { guardName: 'guardDecryptionDeadlinePassed', passed: true };
  }
  return {
    guardName: 'guardDecryptionDeadlinePassed',
    passed: false,
    reason: deadline
      ? `Decryption deadline ${deadline.toISOString()} not reached`
      : 'No decryption deadline recorded',
    kind: 'timeout',
  };
}

export function guardInvestigationDeadlinePassed(ctx: TransitionContext): GuardResult {
  const deadline = ctx.investigation?.deadline;
  if (deadline && ctx.timestamp.getTime() > deadline.getTime()) {
    return { guardName: 'guardInvestigationDeadlinePassed', passed: true };
  }
  return {
    guardName: 'guardInvestigationDeadlinePassed',
    passed: false,
    reason: deadline
      ? `Investigation deadline ${deadline.toISOString()} not reached`
      : 'No investigation deadline recorded',
    kind: 'timeout',
  };
}

/**
 * Map of action -> guard functions that must ALL pass.
 */
export const GUARDS: Record<ReportAction, GuardFn[]> = {
  assign: [],
  request_decryption: [guardInvestigationActive, guardDecryptionRequestable],
  resolve: [],
  dismiss: [],
  decryption_timeout: [
    guardRefundNotClaimed,
    guardCallbackOutstanding,
    guardDecryptionDeadlinePassed,
  ],
  investigation_timeout: [
    guardRefundNotClaimed,
    guardInvestigationActive,
    guardInvestigationDeadlinePassed,
  ],
};

export function checkGuards(action: ReportAction, ctx: TransitionContext): GuardResult[] {
  return GUARDS[action].map((fn) => fn(ctx));
}

// ---------------------------------------------------------------------------
// Transition Reducer
// ---------------------------------------------------------------------------

/**
 * Pure reducer: given (currentState, action, context), returns either the
 * new state or the reason the transition was rejected.
 */
export function transition(
  currentState: ReportStatus,
  action: ReportAction,
  ctx: TransitionContext,
): TransitionResult {
  if (!ROLE_PERMISSIONS[action].includes(ctx.actor.role)) {
    return {
      ok: false,
      reason: 'role',
      error: `Role '${ctx.actor.role}' is not permitted to perform '${action}'`,
    };
  }

  const newState = TRANSITION_TABLE[currentState][action];
  if (!newState) {
    return {
      ok: false,
      reason: 'state',
      error: `Action '${action}' is not valid in state '${currentState}'`,
    };
  }

  const guardResults = checkGuards(action, ctx);
  const failed = guardResults.filter((g) => !g.passed);
  if (failed.length > 0) {
    return {
      ok: false,
      reason: 'guard',
      error: failed.map((g) => g.reason ?? g.guardName).join('; '),
      guardResults,
    };
  }

  return { ok: true, newState, guardResults };
}
