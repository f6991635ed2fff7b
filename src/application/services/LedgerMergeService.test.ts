import { describe, expect, it } from 'vitest';
import type { ChatMessage } from '../../domain/entities/ChatMessage.js';
import type { LedgerSnapshot } from '../../domain/entities/Ledger.js';
import { buildAddressBook } from '../../domain/services/ContactResolver.js';
import { InMemoryLedgerStorageAdapter } from '../../infrastructure/adapters/storage/InMemoryLedgerStorageAdapter.js';
import { LedgerMergeService } from './LedgerMergeService.js';

const book = buildAddressBook([{ savedName: 'Alice', displayName: '', phone: '+8801711000001' }]);

const deposit = (date: string, sender: string, text: string): ChatMessage => ({ date, time: '9:00 PM', sender, text });

class FailingOnceStorage extends InMemoryLedgerStorageAdapter {
  private failed = false;

  async writeLedger(ledger: LedgerSnapshot): Promise<void> {
    if (!this.failed) {
      this.failed = true;
      throw new Error('disk full');
    }

    return super.writeLedger(ledger);
  }
}

describe('LedgerMergeService', () => {
  it('persists the merged ledger', async () => {
    const storage = new InMemoryLedgerStorageAdapter();
    const service = new LedgerMergeService(storage);

    const outcome = await service.merge([deposit('3/5/24', 'Alice', 'Saved 160 Tk')], book);

    expect(outcome.newRowsCount).toBe(1);
    expect(await storage.readLedger()).toEqual(outcome.ledger);
    expect(storage.writeCount()).toBe(1);
  });

  it('runs overlapping merges one after another', async () => {
    const storage = new InMemoryLedgerStorageAdapter();
    const service = new LedgerMergeService(storage);

    const [first, second] = await Promise.all([
      service.merge([deposit('3/5/24', 'Alice', '100 tk')], book),
      service.merge([deposit('3/5/24', 'Bob', '50 tk')], book),
    ]);

    // The second merge sees the first one's rows, so 3/5/24 is already recorded.
    expect(first.newRowsCount).toBe(1);
    expect(second.newRowsCount).toBe(0);
    expect((await storage.readLedger()).rows).toHaveLength(1);
  });

  it('keeps serving merges after one fails', async () => {
    const storage = new FailingOnceStorage();
    const service = new LedgerMergeService(storage);

    const failing = service.merge([deposit('3/5/24', 'Alice', '100 tk')], book);
    const following = service.merge([deposit('3/6/24', 'Alice', '20 tk')], book);

    await expect(failing).rejects.toThrow('disk full');
    await expect(following).resolves.toMatchObject({ newRowsCount: 1 });
    expect((await storage.readLedger()).rows.map((row) => row.amount)).toEqual([20]);
  });

  it('reports zero new rows and rewrites the same ledger when nothing is new', async () => {
    const storage = new InMemoryLedgerStorageAdapter();
    const service = new LedgerMergeService(storage);
    await service.merge([deposit('3/5/24', 'Alice', '100 tk')], book);
    const before = await storage.readLedger();

    const outcome = await service.merge([], book);

    expect(outcome.newRowsCount).toBe(0);
    expect(await storage.readLedger()).toEqual(before);
  });
});
