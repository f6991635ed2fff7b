import type { DepositRow } from './DepositRow.js';

export interface SummaryRow {
  name: string;
  phone: string;
  totalAmount: number;
}

/**
 * The persisted ledger. `rows` is the source of truth and `summary` is always
 * regenerated from it.
 */
export interface LedgerSnapshot {
  rows: DepositRow[];
  summary: SummaryRow[];
}

export const emptyLedger = (): LedgerSnapshot => ({ rows: [], summary: [] });
