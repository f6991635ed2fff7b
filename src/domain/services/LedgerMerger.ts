import type { AddressBook } from '../entities/Contact.js';
import type { ChatMessage } from '../entities/ChatMessage.js';
import type { DepositRow } from '../entities/DepositRow.js';
import type { LedgerSnapshot, SummaryRow } from '../entities/Ledger.js';
import { extractAmount } from './AmountExtractor.js';
import { resolveContact } from './ContactResolver.js';
import { parseExportDate, parseExportTime } from './ExportDateTime.js';
import { isSavingMessage } from './SavingMessageClassifier.js';

export interface LedgerMergeResult {
  ledger: LedgerSnapshot;
  newRows: DepositRow[];
  cutoffDate: string | null;
}

/** Latest calendar date in the ledger as an ISO date, ignoring rows that do not parse. */
export const findCutoffDate = (rows: DepositRow[]): string | null => {
  let cutoff: string | null = null;

  for (const row of rows) {
    const date = parseExportDate(row.date);
    if (date !== null && (cutoff === null || date > cutoff)) {
      cutoff = date;
    }
  }

  return cutoff;
};

export const buildDepositRows = (
  messages: ChatMessage[],
  book: AddressBook,
  cutoffDate: string | null,
): DepositRow[] => {
  const rows: DepositRow[] = [];

  for (const message of messages) {
    if (!message.sender) {
      continue;
    }

    const messageDate = parseExportDate(message.date);
    if (cutoffDate !== null && messageDate !== null && messageDate <= cutoffDate) {
      continue;
    }

    if (!isSavingMessage(message.text)) {
      continue;
    }

    const amount = extractAmount(message.text);
    if (!amount) {
      continue;
    }

    const contact = resolveContact(message.sender, book);

    rows.push({
      date: message.date,
      time: message.time,
      name: contact.name,
      phone: contact.phone,
      amount,
      howSaved: message.text,
    });
  }

  return rows;
};

const compareDescending = <T extends string | number>(a: T | null, b: T | null): number => {
  // Unparsable values sort as the earliest.
  if (a === b) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  return a > b ? -1 : a < b ? 1 : 0;
};

/** Latest first by date, then time. Stable for ties. */
export const sortNewestFirst = (rows: DepositRow[]): DepositRow[] =>
  [...rows].sort(
    (a, b) =>
      compareDescending(parseExportDate(a.date), parseExportDate(b.date)) ||
      compareDescending(parseExportTime(a.time), parseExportTime(b.time)),
  );

/** Group-by-sum over (name, phone), ordered by name then phone. */
export const summarize = (rows: DepositRow[]): SummaryRow[] => {
  const totals = new Map<string, SummaryRow>();

  for (const row of rows) {
    const key = JSON.stringify([row.name, row.phone]);
    const current = totals.get(key);

    if (current) {
      current.totalAmount += row.amount;
    } else {
      totals.set(key, { name: row.name, phone: row.phone, totalAmount: row.amount });
    }
  }

  return Array.from(totals.values()).sort((a, b) =>
    a.name !== b.name ? (a.name < b.name ? -1 : 1) : a.phone < b.phone ? -1 : a.phone > b.phone ? 1 : 0,
  );
};

/**
 * Appends deposits found in `messages` to `existing`. Only messages dated after
 * the ledger's latest day are considered; existing rows keep their order.
 */
export const mergeLedger = (
  existing: LedgerSnapshot,
  messages: ChatMessage[],
  book: AddressBook,
): LedgerMergeResult => {
  const cutoffDate = findCutoffDate(existing.rows);
  const newRows = sortNewestFirst(buildDepositRows(messages, book, cutoffDate));
  const rows = [...existing.rows, ...newRows];

  return {
    ledger: { rows, summary: summarize(rows) },
    newRows,
    cutoffDate,
  };
};
