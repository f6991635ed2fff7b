import { z } from 'zod';
import { textCell } from './SheetCells.js';

export const ContactBookRowSchema = z
  .object({
    'Saved Name': textCell,
    "Contact's Public Display Name": textCell,
    'Phone Number': textCell,
  })
  .transform((row) => ({
    savedName: row['Saved Name'],
    displayName: row["Contact's Public Display Name"],
    phone: row['Phone Number'],
  }));
