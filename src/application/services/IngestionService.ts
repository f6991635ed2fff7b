import { buildAddressBook } from '../../domain/services/ContactResolver.js';
import { tokenizeChatLog } from '../../domain/services/ChatLogTokenizer.js';
import { EmptyExportError } from '../errors/LedgerErrors.js';
import type { ContactBookReaderPort } from '../ports/ContactBookReaderPort.js';
import type { LedgerMergeService } from './LedgerMergeService.js';

export interface IngestExportParams {
  contactBook: Buffer;
  contactBookFileName: string;
  exportText: string;
}

export interface IngestExportResult {
  status: 'success';
  newRowsAdded: number;
  totalRowsInData: number;
  uniqueSavers: number;
  totalAmount: number;
}

export class IngestionService {
  constructor(
    private readonly contactReader: ContactBookReaderPort,
    private readonly ledgerMerge: LedgerMergeService,
  ) {}

  async ingestExport(params: IngestExportParams): Promise<IngestExportResult> {
    const contactRows = await this.contactReader.read(params.contactBook, { fileName: params.contactBookFileName });
    const messages = tokenizeChatLog(params.exportText);
    if (messages.length === 0) {
      throw new EmptyExportError();
    }

    const book = buildAddressBook(contactRows);
    const { ledger, newRowsCount } = await this.ledgerMerge.merge(messages, book);

    return {
      status: 'success',
      newRowsAdded: newRowsCount,
      totalRowsInData: ledger.rows.length,
      uniqueSavers: new Set(ledger.summary.map((row) => row.name)).size,
      totalAmount: ledger.summary.reduce((total, row) => total + row.totalAmount, 0),
    };
  }
}
