import { z } from 'zod';

/** Spreadsheet cell as trimmed text; empty and missing cells become "". */
export const textCell = z.preprocess(
  (value) => (value === undefined || value === null ? '' : String(value).trim()),
  z.string(),
);

/** Spreadsheet cell as a number; anything non-numeric becomes 0. */
export const amountCell = z.preprocess(
  (value) => (typeof value === 'string' ? value.replace(/,/g, '').trim() : value),
  z.coerce.number().finite().catch(0),
);
