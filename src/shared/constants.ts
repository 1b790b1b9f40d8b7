export const API_PREFIX = '/api';

export const PRINCIPAL_HEADER = 'x-principal';

export const REPORT_STATUSES = [
  'SUBMITTED',
  'UNDER_INVESTIGATION',
  'DECRYPTION_PENDING',
  'RESOLVED',
  'DISMISSED',
  'REFUNDED',
] as const;

export const TERMINAL_STATUSES = ['RESOLVED', 'DISMISSED', 'REFUNDED'] as const;

export const REPORT_CATEGORIES = [
  'CORRUPTION',
  'FRAUD',
  'ENVIRONMENTAL',
  'SAFETY',
  'DISCRIMINATION',
  'OTHER',
] as const;

export const LEDGER_EVENTS = [
  'ReportSubmitted',
  'ReportAssigned',
  'ReportStatusChanged',
  'InvestigatorAdded',
  'InvestigatorRemoved',
  'AuthorityTransferred',
  'InvestigationNotesAdded',
  'DecryptionRequested',
  'DecryptionCompleted',
  'RefundIssued',
  'InvestigationTimeout',
] as const;

export const REPORT_ACTIONS = [
  'assign',
  'request_decryption',
  'resolve',
  'dismiss',
  'decryption_timeout',
  'investigation_timeout',
] as const;

export const SEALED_FIELDS = [
  'reporter',
  'category',
  'timestamp',
  'anonymous',
  'severity',
  'obfuscatedSeverity',
] as const;

export const DAY_MS = 24 * 60 * 60 * 1000;

export const DEFAULT_INVESTIGATION_WINDOW_MS = 90 * DAY_MS;
export const DEFAULT_DECRYPTION_WINDOW_MS = 7 * DAY_MS;

export const AUTO_RESOLVE_SEVERITY = 80;
export const NOTE_COST_UNIT = 1;

export const CATEGORY_MAX = REPORT_CATEGORIES.length - 1;
export const SEVERITY_MIN = 1;
export const SEVERITY_MAX = 100;
