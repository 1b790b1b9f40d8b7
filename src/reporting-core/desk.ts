// src/reporting-core/desk.ts
// Facade over the ledger store. Every public method maps to one operation of
// the reporting workflow; mutating ones run as a single store transaction.

import {
  DEFAULT_DECRYPTION_WINDOW_MS,
  DEFAULT_INVESTIGATION_WINDOW_MS,
} from '@shared/constants';
import type {
  DecryptionStatus,
  InvestigationInfo,
  InvestigationNotes,
  LedgerEventRecord,
  Principal,
  ReportBasicInfo,
  ReportStatus,
  SealedField,
  SystemStats,
} from '@shared/types';
import * as access from './access-control';
import { systemClock, type Clock } from './clock';
import * as decryption from './decryption';
import type { DecryptionTransport, DeskDependencies, DeskWindows } from './dependencies';
import * as investigations from './investigations';
import type { ClearValues, ProofVerifier } from './proof';
import * as recovery from './recovery';
import * as registry from './registry';
import type { CallerContext } from './report-context';
import type { SealableValue, SealingService } from './sealing';
import { LedgerStore, type LedgerListener, type LedgerState } from './store';

export interface ReportingDeskOptions {
  authority: Principal;
  sealing: SealingService;
  transport: DecryptionTransport;
  verifier: ProofVerifier;
  clock?: Clock;
  windows?: Partial<DeskWindows>;
}

export class ReportingDesk {
  private readonly store: LedgerStore;
  private readonly deps: DeskDependencies;

  constructor(options: ReportingDeskOptions) {
    this.store = new LedgerStore(options.authority, options.clock ?? systemClock);
    this.deps = {
      sealing: options.sealing,
      transport: options.transport,
      verifier: options.verifier,
      windows: {
        investigationWindowMs: options.windows?.investigationWindowMs ?? DEFAULT_INVESTIGATION_WINDOW_MS,
        decryptionWindowMs: options.windows?.decryptionWindowMs ?? DEFAULT_DECRYPTION_WINDOW_MS,
      },
    };
  }

  // --- Access control -----------------------------------------------------

  addInvestigator(ctx: CallerContext, investigator: Principal): Promise<void> {
    return this.store.transact((tx) => access.addInvestigator(tx, ctx, investigator));
  }

  removeInvestigator(ctx: CallerContext, investigator: Principal): Promise<void> {
    return this.store.transact((tx) => access.removeInvestigator(tx, ctx, investigator));
  }

  transferAuthority(ctx: CallerContext, newAuthority: Principal): Promise<void> {
    return this.store.transact((tx) => access.transferAuthority(tx, ctx, newAuthority));
  }

  getAuthority(): Principal {
    return this.store.state.authority;
  }

  isAuthorizedInvestigator(principal: Principal): boolean {
    return access.isAuthorized(this.store.state, principal);
  }

  // --- Reports ------------------------------------------------------------

  submit(ctx: CallerContext, input: registry.SubmitReportInput): Promise<number> {
    return this.store.transact((tx) => registry.submitReport(this.deps, tx, ctx, input));
  }

  getBasicInfo(reportId: number): ReportBasicInfo {
    return registry.getBasicInfo(this.store.state, reportId);
  }

  getSealedFields(ctx: CallerContext, reportId: number): Partial<Record<SealedField, SealableValue>> {
    return registry.getSealedFields(this.deps, this.store.state, ctx, reportId);
  }

  getStats(): SystemStats {
    return registry.getStats(this.store.state);
  }

  /** Every report id currently known, in submission order. */
  listReportIds(): number[] {
    return [...this.store.state.reports.keys()];
  }

  // --- Investigations -----------------------------------------------------

  assign(ctx: CallerContext, reportId: number, investigator: Principal): Promise<Date> {
    return this.store.transact((tx) =>
      investigations.assignInvestigator(this.deps, tx, ctx, reportId, investigator),
    );
  }

  addNotes(ctx: CallerContext, reportId: number, text: string): Promise<void> {
    return this.store.transact((tx) => investigations.addNotes(tx, ctx, reportId, text));
  }

  updateStatus(ctx: CallerContext, reportId: number, status: ReportStatus): Promise<void> {
    return this.store.transact((tx) => investigations.updateStatus(tx, ctx, reportId, status));
  }

  getInvestigationInfo(reportId: number): InvestigationInfo {
    return investigations.getInvestigationInfo(this.store.state, reportId);
  }

  getInvestigationNotes(ctx: CallerContext, reportId: number): InvestigationNotes {
    return investigations.getInvestigationNotes(this.store.state, ctx, reportId);
  }

  getInvestigatorReports(ctx: CallerContext, investigator: Principal): number[] {
    return investigations.getInvestigatorReports(this.store.state, ctx, investigator);
  }

  // --- Decryption ---------------------------------------------------------

  requestDecryption(ctx: CallerContext, reportId: number): Promise<decryption.DecryptionRequestReceipt> {
    return this.store.transact((tx) => decryption.requestDecryption(this.deps, tx, ctx, reportId));
  }

  handleCallback(
    requestId: string,
    clearValues: ClearValues,
    proof: string,
  ): Promise<decryption.CallbackOutcome> {
    return this.store.transact((tx) =>
      decryption.handleCallback(this.deps, tx, requestId, clearValues, proof),
    );
  }

  getDecryptionStatus(reportId: number): DecryptionStatus {
    return decryption.getDecryptionStatus(this.store.state, reportId);
  }

  // --- Recovery -----------------------------------------------------------

  claimDecryptionTimeoutRefund(ctx: CallerContext, reportId: number): Promise<void> {
    return this.store.transact((tx) => recovery.claimDecryptionTimeoutRefund(tx, ctx, reportId));
  }

  claimInvestigationTimeoutRefund(ctx: CallerContext, reportId: number): Promise<void> {
    return this.store.transact((tx) => recovery.claimInvestigationTimeoutRefund(tx, ctx, reportId));
  }

  isRefundAvailable(reportId: number): boolean {
    return recovery.isRefundAvailable(this.store.state, reportId, this.store.now());
  }

  availableRefund(reportId: number): recovery.RefundKind | null {
    return recovery.availableRefund(this.store.state, reportId, this.store.now());
  }

  // --- Log ----------------------------------------------------------------

  events(): readonly LedgerEventRecord[] {
    return this.store.events();
  }

  subscribe(listener: LedgerListener): () => void {
    return this.store.subscribe(listener);
  }

  /** Committed store state, for invariant checks and diagnostics. */
  inspect(): Readonly<LedgerState> {
    return this.store.state;
  }
}
