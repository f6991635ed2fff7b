import type { AddressBook } from '../../domain/entities/Contact.js';
import type { ChatMessage } from '../../domain/entities/ChatMessage.js';
import type { LedgerSnapshot } from '../../domain/entities/Ledger.js';
import { mergeLedger } from '../../domain/services/LedgerMerger.js';
import type { LedgerStoragePort } from '../ports/LedgerStoragePort.js';

export interface LedgerMergeOutcome {
  ledger: LedgerSnapshot;
  newRowsCount: number;
}

/**
 * The only writer of the persisted ledger. Merges run one at a time so the
 * cutoff read and the write of one merge never interleave with another.
 */
export class LedgerMergeService {
  private queue: Promise<unknown> = Promise.resolve();

  constructor(private readonly storage: LedgerStoragePort) {}

  merge(messages: ChatMessage[], book: AddressBook): Promise<LedgerMergeOutcome> {
    const run = this.queue.then(() => this.mergeExclusive(messages, book));
    // A failed merge must not block the ones queued behind it.
    this.queue = run.catch(() => undefined);
    return run;
  }

  private async mergeExclusive(messages: ChatMessage[], book: AddressBook): Promise<LedgerMergeOutcome> {
    const existing = await this.storage.readLedger();
    const { ledger, newRows, cutoffDate } = mergeLedger(existing, messages, book);

    await this.storage.writeLedger(ledger);

    console.log('📒 Ledger merged:', {
      storage: this.storage.kind,
      cutoffDate,
      candidates: messages.length,
      newRows: newRows.length,
      totalRows: ledger.rows.length,
    });

    return { ledger, newRowsCount: newRows.length };
  }
}
