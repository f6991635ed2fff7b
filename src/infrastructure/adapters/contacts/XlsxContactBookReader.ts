import { read, utils } from 'xlsx';
import { ContactBookRowSchema } from '../../../application/dto/ContactBookRowDTO.js';
import { ContactBookError } from '../../../application/errors/LedgerErrors.js';
import type { ContactBookReaderPort } from '../../../application/ports/ContactBookReaderPort.js';
import type { ContactBookRow } from '../../../domain/services/ContactResolver.js';

export const isExcelFileName = (fileName: string): boolean => /\.xlsx?$/i.test(fileName);

/** Reads the first worksheet of an exported address book. */
export class XlsxContactBookReader implements ContactBookReaderPort {
  async read(rawContactBook: Buffer, options: { fileName: string }): Promise<ContactBookRow[]> {
    if (!isExcelFileName(options.fileName)) {
      throw new ContactBookError('Contact file must be an Excel (.xlsx / .xls)');
    }

    try {
      const workbook = read(rawContactBook, { type: 'buffer' });
      const sheetName = workbook.SheetNames[0];
      if (!sheetName) {
        throw new Error('Excel file has no worksheets');
      }

      return utils
        .sheet_to_json<Record<string, unknown>>(workbook.Sheets[sheetName], { defval: '' })
        .map((row) => ContactBookRowSchema.parse(row));
    } catch (error) {
      throw new ContactBookError(
        `Failed to read contact Excel: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
    }
  }
}
