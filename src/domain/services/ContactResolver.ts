import type { AddressBook, ContactEntry } from '../entities/Contact.js';

export interface ContactBookRow {
  savedName?: string;
  displayName?: string;
  phone?: string;
}

// Exports wrap unsaved numbers in bidi marks (U+202A ... U+202C).
const formatCharacters = /\p{Cf}/gu;

const stripFormatCharacters = (value: string): string => value.replace(formatCharacters, '').trim();

export const normalizePhone = (phone: string): string => {
  const trimmed = stripFormatCharacters(phone);
  const digits = trimmed.replace(/\D/g, '');
  return trimmed.startsWith('+') && digits ? `+${digits}` : digits;
};

/**
 * Canonical identity per address-book row: saved name, then public display
 * name, then the phone number itself. Rows with no name and no phone are
 * skipped; a later row wins over an earlier one with the same key.
 */
export const buildAddressBook = (rows: ContactBookRow[]): AddressBook => {
  const byName = new Map<string, ContactEntry>();
  const byPhone = new Map<string, ContactEntry>();

  for (const row of rows) {
    const phone = normalizePhone(row.phone ?? '');
    const name = row.savedName?.trim() || row.displayName?.trim() || phone;

    if (!name) {
      continue;
    }

    const entry: ContactEntry = { name, phone };
    byName.set(name.toLowerCase(), entry);

    if (phone) {
      byPhone.set(phone, entry);
    }
  }

  return { byName, byPhone };
};

/**
 * Never fails: an unknown sender keeps its label as the name with an empty
 * phone.
 */
export const resolveContact = (sender: string, book: AddressBook): ContactEntry => {
  const label = stripFormatCharacters(sender);

  const byName = book.byName.get(label.toLowerCase());
  if (byName) {
    return byName;
  }

  if (/\d/.test(label)) {
    const byPhone = book.byPhone.get(normalizePhone(label));
    if (byPhone) {
      return byPhone;
    }
  }

  return { name: label, phone: '' };
};
