import type { LedgerSnapshot } from '../../domain/entities/Ledger.js';

export interface LedgerStoragePort {
  readonly kind: string;
  /** An empty snapshot when nothing has been stored yet. */
  readLedger(): Promise<LedgerSnapshot>;
  /** Replaces the stored ledger in one step; readers never see a partial write. */
  writeLedger(ledger: LedgerSnapshot): Promise<void>;
}
