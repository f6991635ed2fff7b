import { randomUUID } from 'node:crypto';
import { readFile, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { read, utils, write, type WorkBook } from 'xlsx';
import type { LedgerSnapshot } from '../../../domain/entities/Ledger.js';
import { emptyLedger } from '../../../domain/entities/Ledger.js';
import {
  DATA_COLUMNS,
  LedgerDataRowSchema,
  LedgerSummaryRowSchema,
  SUMMARY_COLUMNS,
  fromDepositRow,
  fromSummaryRow,
  toDepositRow,
  toSummaryRow,
} from '../../../application/dto/LedgerSheetDTO.js';
import { LedgerReadError } from '../../../application/errors/LedgerErrors.js';
import type { LedgerStoragePort } from '../../../application/ports/LedgerStoragePort.js';
import { summarize } from '../../../domain/services/LedgerMerger.js';

const DATA_SHEET = 'Data';
const SUMMARY_SHEET = 'Summary';

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

const sheetRows = (workbook: WorkBook, name: string): Record<string, unknown>[] => {
  const sheet = workbook.Sheets[name];
  return sheet ? utils.sheet_to_json<Record<string, unknown>>(sheet, { defval: '' }) : [];
};

/**
 * Ledger kept as a workbook with a `Data` sheet of deposits and a `Summary`
 * sheet of totals per contact.
 */
export class XlsxLedgerStorageAdapter implements LedgerStoragePort {
  readonly kind = 'xlsx';

  constructor(private readonly filePath: string) {}

  async readLedger(): Promise<LedgerSnapshot> {
    let buffer: Buffer;

    try {
      buffer = await readFile(this.filePath);
    } catch (error) {
      if (isMissingFile(error)) {
        return emptyLedger();
      }
      throw new LedgerReadError(this.filePath, error);
    }

    try {
      const workbook = read(buffer, { type: 'buffer' });
      const rows = sheetRows(workbook, DATA_SHEET).map((row) => toDepositRow(LedgerDataRowSchema.parse(row)));

      // The summary sheet is derived; rebuild it when it is missing.
      const summary = workbook.Sheets[SUMMARY_SHEET]
        ? sheetRows(workbook, SUMMARY_SHEET).map((row) => toSummaryRow(LedgerSummaryRowSchema.parse(row)))
        : summarize(rows);

      return { rows, summary };
    } catch (error) {
      throw new LedgerReadError(this.filePath, error);
    }
  }

  async writeLedger(ledger: LedgerSnapshot): Promise<void> {
    const workbook = utils.book_new();
    utils.book_append_sheet(
      workbook,
      utils.json_to_sheet(ledger.rows.map(fromDepositRow), { header: [...DATA_COLUMNS] }),
      DATA_SHEET,
    );
    utils.book_append_sheet(
      workbook,
      utils.json_to_sheet(ledger.summary.map(fromSummaryRow), { header: [...SUMMARY_COLUMNS] }),
      SUMMARY_SHEET,
    );

    const buffer: Buffer = write(workbook, { type: 'buffer', bookType: 'xlsx' });
    const tempPath = path.join(path.dirname(this.filePath), `.${path.basename(this.filePath)}.${randomUUID()}.tmp`);

    try {
      await writeFile(tempPath, buffer);
      await rename(tempPath, this.filePath);
    } catch (error) {
      await rm(tempPath, { force: true });
      throw error;
    }
  }
}
