import type { LedgerSnapshot } from '../../../domain/entities/Ledger.js';
import { emptyLedger } from '../../../domain/entities/Ledger.js';
import type { LedgerStoragePort } from '../../../application/ports/LedgerStoragePort.js';

const copy = (ledger: LedgerSnapshot): LedgerSnapshot => ({
  rows: ledger.rows.map((row) => ({ ...row })),
  summary: ledger.summary.map((row) => ({ ...row })),
});

export class InMemoryLedgerStorageAdapter implements LedgerStoragePort {
  readonly kind = 'memory';
  private ledger: LedgerSnapshot;
  private writes = 0;

  constructor(initial: LedgerSnapshot = emptyLedger()) {
    this.ledger = copy(initial);
  }

  async readLedger(): Promise<LedgerSnapshot> {
    return copy(this.ledger);
  }

  async writeLedger(ledger: LedgerSnapshot): Promise<void> {
    this.ledger = copy(ledger);
    this.writes += 1;
  }

  writeCount(): number {
    return this.writes;
  }
}
