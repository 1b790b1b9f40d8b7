import { describe, it, expect } from 'vitest';
import { REPORT_ACTIONS, REPORT_STATUSES, TERMINAL_STATUSES } from '@shared/constants';
import type { ReportStatus } from '@shared/types';
import {
  ROLE_PERMISSIONS,
  TRANSITION_TABLE,
  GUARDS,
  MANUAL_STATUS_ACTIONS,
  guardDecryptionDeadlinePassed,
  guardDecryptionRequestable,
  guardInvestigationDeadlinePassed,
  guardRefundNotClaimed,
  isTerminal,
  transition,
  type TransitionContext,
} from '@core/state-machine';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const NOW = new Date('2026-03-01T00:00:00Z');
const EARLIER = new Date('2026-02-01T00:00:00Z');
const LATER = new Date('2026-04-01T00:00:00Z');

function makeCtx(overrides: Partial<TransitionContext> = {}): TransitionContext {
  return {
    reportId: 1,
    actor: { role: 'authority', principal: 'authority' },
    timestamp: NOW,
    report: {
      decryptionRequestId: null,
      decryptionDeadline: null,
      callbackCompleted: false,
      refundClaimed: false,
    },
    investigation: { deadline: LATER, isActive: true },
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// Tables
// ---------------------------------------------------------------------------

describe('ROLE_PERMISSIONS', () => {
  it('covers every report action', () => {
    for (const action of REPORT_ACTIONS) {
      expect(ROLE_PERMISSIONS[action].length).toBeGreaterThan(0);
    }
  });

  it('lets anyone claim timeouts but only the authority assign', () => {
    expect(ROLE_PERMISSIONS.decryption_timeout).toContain('public');
    expect(ROLE_PERMISSIONS.investigation_timeout).toContain('public');
    expect(ROLE_PERMISSIONS.assign).toEqual(['authority']);
  });
});

describe('TRANSITION_TABLE', () => {
  it('has an entry for every status', () => {
    expect(Object.keys(TRANSITION_TABLE).sort()).toEqual([...REPORT_STATUSES].sort());
  });

  it('matches the report lifecycle graph exactly', () => {
    const edges: string[] = [];
    for (const from of REPORT_STATUSES) {
      for (const [action, to] of Object.entries(TRANSITION_TABLE[from])) {
        edges.push(`${from} -${action}-> ${to}`);
      }
    }
    expect(edges.sort()).toEqual(
      [
        'SUBMITTED -assign-> UNDER_INVESTIGATION',
        'SUBMITTED -resolve-> RESOLVED',
        'SUBMITTED -dismiss-> DISMISSED',
        'UNDER_INVESTIGATION -request_decryption-> DECRYPTION_PENDING',
        'UNDER_INVESTIGATION -resolve-> RESOLVED',
        'UNDER_INVESTIGATION -dismiss-> DISMISSED',
        'UNDER_INVESTIGATION -investigation_timeout-> REFUNDED',
        'DECRYPTION_PENDING -resolve-> RESOLVED',
        'DECRYPTION_PENDING -dismiss-> DISMISSED',
        'DECRYPTION_PENDING -decryption_timeout-> REFUNDED',
        'DECRYPTION_PENDING -investigation_timeout-> REFUNDED',
      ].sort(),
    );
  });

  it('treats exactly the terminal statuses as terminal', () => {
    const terminal = REPORT_STATUSES.filter((s) => isTerminal(s));
    expect(terminal).toEqual([...TERMINAL_STATUSES]);
  });

  it('only allows RESOLVED and DISMISSED as manual targets', () => {
    expect(Object.keys(MANUAL_STATUS_ACTIONS).sort()).toEqual(['DISMISSED', 'RESOLVED']);
  });

  it('lets every open status be closed manually', () => {
    for (const status of REPORT_STATUSES) {
      if (isTerminal(status)) continue;
      expect(TRANSITION_TABLE[status].resolve).toBe('RESOLVED');
      expect(TRANSITION_TABLE[status].dismiss).toBe('DISMISSED');
    }
  });

  it('registers guards for every action', () => {
    for (const action of REPORT_ACTIONS) {
      expect(Array.isArray(GUARDS[action])).toBe(true);
    }
  });
});

// ---------------------------------------------------------------------------
// Guards
// ---------------------------------------------------------------------------

describe('guardRefundNotClaimed', () => {
  it('fails with kind state once a refund was claimed', () => {
    const result = guardRefundNotClaimed(
      makeCtx({
        report: {
          decryptionRequestId: 'req-1',
          decryptionDeadline: EARLIER,
          callbackCompleted: false,
          refundClaimed: true,
        },
      }),
    );
    expect(result.passed).toBe(false);
    expect(result.kind).toBe('state');
  });
});

describe('guardDecryptionRequestable', () => {
  it('passes for a fresh investigation', () => {
    expect(guardDecryptionRequestable(makeCtx()).passed).toBe(true);
  });

  it('fails while a request is in flight', () => {
    const result = guardDecryptionRequestable(
      makeCtx({
        report: {
          decryptionRequestId: 'req-1',
          decryptionDeadline: LATER,
          callbackCompleted: false,
          refundClaimed: false,
        },
      }),
    );
    expect(result.passed).toBe(false);
    expect(result.reason).toBe('Decryption already in flight for report 1');
  });

  it('fails once the investigation deadline has passed', () => {
    const result = guardDecryptionRequestable(
      makeCtx({ investigation: { deadline: EARLIER, isActive: true } }),
    );
    expect(result.passed).toBe(false);
    expect(result.kind).toBe('state');
  });
});

describe('deadline guards', () => {
  it('require the clock to be strictly past the decryption deadline', () => {
    const at = (deadline: Date) =>
      makeCtx({
        report: {
          decryptionRequestId: 'req-1',
          decryptionDeadline: deadline,
          callbackCompleted: false,
          refundClaimed: false,
        },
      });
    expect(guardDecryptionDeadlinePassed(at(NOW)).passed).toBe(false);
    expect(guardDecryptionDeadlinePassed(at(EARLIER)).passed).toBe(true);
    expect(guardDecryptionDeadlinePassed(at(NOW)).kind).toBe('timeout');
  });

  it('fail without a recorded decryption deadline', () => {
    const result = guardDecryptionDeadlinePassed(makeCtx());
    expect(result.passed).toBe(false);
    expect(result.reason).toBe('No decryption deadline recorded');
  });

  it('compare the investigation deadline the same way', () => {
    expect(
      guardInvestigationDeadlinePassed(makeCtx({ investigation: { deadline: NOW, isActive: true } })).passed,
    ).toBe(false);
    expect(
      guardInvestigationDeadlinePassed(makeCtx({ investigation: { deadline: EARLIER, isActive: true } })).passed,
    ).toBe(true);
  });
});

// ---------------------------------------------------------------------------
// Reducer
// ---------------------------------------------------------------------------

describe('transition', () => {
  it('assigns a submitted report', () => {
    const result = transition('SUBMITTED', 'assign', makeCtx({ investigation: null }));
    expect(result).toEqual({ ok: true, newState: 'UNDER_INVESTIGATION', guardResults: [] });
  });

  it('rejects roles without permission before looking at the table', () => {
    const result = transition(
      'SUBMITTED',
      'assign',
      makeCtx({ actor: { role: 'assigned_investigator', principal: 'investigator-a' } }),
    );
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.reason).toBe('role');
  });

  it('rejects actions that are not edges of the current state', () => {
    const result = transition('SUBMITTED', 'request_decryption', makeCtx());
    expect(result).toEqual({
      ok: false,
      reason: 'state',
      error: "Action 'request_decryption' is not valid in state 'SUBMITTED'",
    });
  });

  it('reports guard failures with their results', () => {
    const result = transition(
      'DECRYPTION_PENDING',
      'decryption_timeout',
      makeCtx({
        actor: { role: 'public', principal: 'anyone' },
        report: {
          decryptionRequestId: 'req-1',
          decryptionDeadline: LATER,
          callbackCompleted: false,
          refundClaimed: false,
        },
      }),
    );
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.reason).toBe('guard');
      expect(result.guardResults?.map((g) => g.passed)).toEqual([true, true, false]);
    }
  });

  it('dismisses a submitted report for the authority', () => {
    const result = transition('SUBMITTED', 'dismiss', makeCtx({ investigation: null }));
    expect(result).toEqual({ ok: true, newState: 'DISMISSED', guardResults: [] });
  });

  it('never leaves a terminal state', () => {
    const terminal: ReportStatus[] = ['RESOLVED', 'DISMISSED', 'REFUNDED'];
    for (const status of terminal) {
      for (const action of REPORT_ACTIONS) {
        expect(transition(status, action, makeCtx({ actor: { role: 'authority', principal: 'a' } })).ok).toBe(false);
      }
    }
  });
});
