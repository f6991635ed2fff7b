import { IngestionService } from '../../application/services/IngestionService.js';
import { LedgerMergeService } from '../../application/services/LedgerMergeService.js';
import { MemberReportService } from '../../application/services/MemberReportService.js';
import type { ContactBookReaderPort } from '../../application/ports/ContactBookReaderPort.js';
import type { LedgerStoragePort } from '../../application/ports/LedgerStoragePort.js';
import { XlsxContactBookReader } from '../adapters/contacts/XlsxContactBookReader.js';
import { InMemoryLedgerStorageAdapter } from '../adapters/storage/InMemoryLedgerStorageAdapter.js';
import { XlsxLedgerStorageAdapter } from '../adapters/storage/XlsxLedgerStorageAdapter.js';
import { type AppConfig, loadConfig } from '../config/Config.js';

export interface AppContainerOverrides {
  config?: AppConfig;
  storage?: LedgerStoragePort;
  contactReader?: ContactBookReaderPort;
  clock?: () => Date;
}

export class AppContainer {
  readonly config: AppConfig;

  readonly storage: LedgerStoragePort;
  readonly contactReader: ContactBookReaderPort;
  readonly ledgerMerge: LedgerMergeService;
  readonly ingestionService: IngestionService;
  readonly reportService: MemberReportService;

  constructor(overrides: AppContainerOverrides = {}) {
    this.config = overrides.config ?? loadConfig();

    this.storage =
      overrides.storage ??
      (this.config.ledger.storage === 'memory'
        ? new InMemoryLedgerStorageAdapter()
        : new XlsxLedgerStorageAdapter(this.config.ledger.path));
    this.contactReader = overrides.contactReader ?? new XlsxContactBookReader();

    this.ledgerMerge = new LedgerMergeService(this.storage);
    this.ingestionService = new IngestionService(this.contactReader, this.ledgerMerge);
    this.reportService = new MemberReportService(this.storage, {
      timezone: this.config.app.timezone,
      clock: overrides.clock,
    });
  }
}
