// src/reporting-core/errors.ts

export type DeskErrorCode =
  | 'UNAUTHORIZED'
  | 'INVALID_INPUT'
  | 'UNKNOWN_REPORT'
  | 'UNKNOWN_REQUEST'
  | 'INVALID_STATE'
  | 'TIMEOUT_NOT_REACHED'
  | 'INVALID_PROOF';

/**
 * Base class for every rejection raised by the desk. A thrown DeskError
 * aborts the surrounding transaction and leaves the store untouched.
 */
export class DeskError extends Error {
  constructor(
    message: string,
    public readonly code: DeskErrorCode,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Caller holds the wrong role for the operation. */
export class AuthorizationError extends DeskError {
  constructor(message: string) {
    super(message, 'UNAUTHORIZED');
  }
}

/** Out-of-range input, unknown id or null principal. */
export class ValidationError extends DeskError {
  constructor(message: string, code: 'INVALID_INPUT' | 'UNKNOWN_REPORT' | 'UNKNOWN_REQUEST' = 'INVALID_INPUT') {
    super(message, code);
  }
}

/** Operation is not valid for the report's current status. */
export class StateError extends DeskError {
  constructor(message: string) {
    super(message, 'INVALID_STATE');
  }
}

export class TimeoutNotReachedError extends DeskError {
  constructor(message: string) {
    super(message, 'TIMEOUT_NOT_REACHED');
  }
}

/** Oracle callback proof did not verify; nothing was written. */
export class ProofVerificationError extends DeskError {
  constructor(message: string) {
    super(message, 'INVALID_PROOF');
  }
}
