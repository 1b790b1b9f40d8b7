import type { LEDGER_EVENTS, REPORT_STATUSES, SEALED_FIELDS } from './constants';

export type ReportStatus = (typeof REPORT_STATUSES)[number];
export type LedgerEventName = (typeof LEDGER_EVENTS)[number];
export type SealedField = (typeof SEALED_FIELDS)[number];

/** Opaque identity of a caller, supplied by the identity layer. */
export type Principal = string;

export interface ReportBasicInfo {
  status: ReportStatus;
  submissionTime: string;
  investigator: Principal | null;
  exists: boolean;
  callbackCompleted: boolean;
  revealedSeverity: number;
}

export interface InvestigationInfo {
  reportId: number;
  investigator: Principal;
  startTime: string;
  lastUpdate: string;
  deadline: string;
  isActive: boolean;
}

export interface InvestigationNotes {
  reportId: number;
  notes: string;
  cost: number;
}

export interface DecryptionStatus {
  requestId: string | null;
  requestedAt: string | null;
  deadline: string | null;
  callbackCompleted: boolean;
  revealedSeverity: number;
  refundClaimed: boolean;
}

export interface SystemStats {
  total: number;
  resolved: number;
  pending: number;
  refunded: number;
}

export interface LedgerEventRecord {
  sequence: number;
  name: LedgerEventName;
  reportId: number | null;
  at: string;
  data: Record<string, unknown>;
}

export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
}
