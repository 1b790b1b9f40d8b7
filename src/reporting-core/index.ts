// reporting-core: ledger store, state machine, oracle protocol, recovery.
// No HTTP. Side effects are limited to the injected sealing service and
// decryption transport.

export { ReportingDesk, type ReportingDeskOptions } from './desk';
export { ManualClock, systemClock, type Clock } from './clock';
export { InMemorySealingService, type SealingService, type SealedHandle } from './sealing';
export { HmacProofVerifier, acceptAllVerifier, signCallback, type ProofVerifier } from './proof';
export type { DecryptionTransport } from './dependencies';
export type { CallerContext } from './report-context';
export * from './errors';
