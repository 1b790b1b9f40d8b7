import type { ProofVerifier } from './proof';
import type { SealedHandle, SealingService } from './sealing';

/** Opaque channel that carries a decryption request to the oracle. */
export interface DecryptionTransport {
  /** Resolves with the request id the oracle will quote in its callback. */
  dispatch(handles: readonly SealedHandle[]): Promise<string>;
}

export interface DeskWindows {
  investigationWindowMs: number;
  decryptionWindowMs: number;
}

export interface DeskDependencies {
  sealing: SealingService;
  transport: DecryptionTransport;
  verifier: ProofVerifier;
  windows: DeskWindows;
}
