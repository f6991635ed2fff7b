import { z } from 'zod';
import type { DepositRow } from '../../domain/entities/DepositRow.js';
import type { SummaryRow } from '../../domain/entities/Ledger.js';
import { amountCell, textCell } from './SheetCells.js';

export const DATA_COLUMNS = ['Date', 'Time', 'Name', 'Phone', 'Amount', 'howSaved'] as const;
export const SUMMARY_COLUMNS = ['Name', 'Phone', 'Total_Amount'] as const;

export const LedgerDataRowSchema = z.object({
  Date: textCell,
  Time: textCell,
  Name: textCell,
  Phone: textCell,
  Amount: amountCell,
  howSaved: textCell,
});

export const LedgerSummaryRowSchema = z.object({
  Name: textCell,
  Phone: textCell,
  Total_Amount: amountCell,
});

type LedgerDataRowDTO = z.infer<typeof LedgerDataRowSchema>;
type LedgerSummaryRowDTO = z.infer<typeof LedgerSummaryRowSchema>;

export const toDepositRow = (row: LedgerDataRowDTO): DepositRow => ({
  date: row.Date,
  time: row.Time,
  name: row.Name,
  phone: row.Phone,
  amount: row.Amount,
  howSaved: row.howSaved,
});

export const fromDepositRow = (row: DepositRow): LedgerDataRowDTO => ({
  Date: row.date,
  Time: row.time,
  Name: row.name,
  Phone: row.phone,
  Amount: row.amount,
  howSaved: row.howSaved,
});

export const toSummaryRow = (row: LedgerSummaryRowDTO): SummaryRow => ({
  name: row.Name,
  phone: row.Phone,
  totalAmount: row.Total_Amount,
});

export const fromSummaryRow = (row: SummaryRow): LedgerSummaryRowDTO => ({
  Name: row.name,
  Phone: row.phone,
  Total_Amount: row.totalAmount,
});
