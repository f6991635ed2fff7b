import type { DepositRow } from '../../domain/entities/DepositRow.js';
import { DEFAULT_TIMEZONE, dayjs, toZonedInstant } from '../../domain/services/ExportDateTime.js';
import { hasSavingNarrative } from '../../domain/services/HowSavedFilter.js';
import { weeksBetween } from '../../domain/services/WeekRange.js';
import type {
  MemberReportDTO,
  NarrativeEntryDTO,
  ReportRecordDTO,
  SaverListItemDTO,
  WeekBucketDTO,
} from '../dto/MemberReportDTO.js';
import { LedgerEmptyError, MemberNotFoundError, NoNarrativeEntriesError } from '../errors/LedgerErrors.js';
import type { LedgerStoragePort } from '../ports/LedgerStoragePort.js';

export interface MemberReportServiceOptions {
  timezone?: string;
  clock?: () => Date;
}

const BOUNDARY_FORMAT = 'YYYY-MM-DDTHH:mm:ss.SSSZ';

export class MemberReportService {
  private readonly timezone: string;
  private readonly clock: () => Date;

  constructor(
    private readonly storage: LedgerStoragePort,
    options: MemberReportServiceOptions = {},
  ) {
    this.timezone = options.timezone ?? DEFAULT_TIMEZONE;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Records, monthly and yearly totals and Friday-to-Thursday weeks for the
   * member whose phone equals `identifier` or whose name matches it ignoring
   * case.
   */
  async buildMemberReport(identifier: string): Promise<MemberReportDTO> {
    const rows = await this.loadRows();

    const wanted = identifier.toLowerCase();
    const matched = rows.filter((row) => row.phone === identifier || row.name.toLowerCase() === wanted);
    if (matched.length === 0) {
      throw new MemberNotFoundError(identifier);
    }

    const now = this.clock();
    const dated = matched
      .map((row) => ({ row, ...toZonedInstant(row.date, row.time, this.timezone, now) }))
      .sort((a, b) => b.instant.valueOf() - a.instant.valueOf());

    const records: ReportRecordDTO[] = dated.map(({ row, instant, inferred }) => ({
      timestamp: instant.format(),
      amount: row.amount,
      howSaved: row.howSaved,
      timestampInferred: inferred,
    }));

    const monthly: Record<string, number> = {};
    const yearly: Record<string, number> = {};

    for (const { row, instant } of dated) {
      const month = instant.format('MMMM YYYY');
      const year = instant.format('YYYY');
      monthly[month] = (monthly[month] ?? 0) + row.amount;
      yearly[year] = (yearly[year] ?? 0) + row.amount;
    }

    const oldest = dated[dated.length - 1].instant;
    const newest = dated[0].instant;
    // Weeks run up to the current one, or further when a record is dated ahead of the clock.
    const until = newest.isAfter(now) ? newest : dayjs(now);
    const ranges = weeksBetween(oldest, until, this.timezone);
    const weeks: WeekBucketDTO[] = ranges.map((range) => ({
      start: range.start.format(BOUNDARY_FORMAT),
      end: range.end.format(BOUNDARY_FORMAT),
      records: [],
      total: 0,
    }));

    dated.forEach(({ instant }, index) => {
      const at = instant.valueOf();
      const slot = ranges.findIndex((range) => range.start.valueOf() <= at && at <= range.end.valueOf());

      if (slot !== -1) {
        weeks[slot].records.push(records[index]);
        weeks[slot].total += records[index].amount;
      }
    });

    const latest = dated[0].row;

    return {
      identifier,
      name: latest.name || 'Unknown',
      phone: latest.phone,
      records,
      monthly,
      yearly,
      weeks,
    };
  }

  /** One entry per (name, phone), biggest savers first. */
  async listSavers(): Promise<SaverListItemDTO[]> {
    const { rows } = await this.storage.readLedger();
    const savers = new Map<string, SaverListItemDTO>();

    for (const row of rows) {
      const key = JSON.stringify([row.name, row.phone]);
      const saver = savers.get(key) ?? {
        name: row.name || row.phone || 'Unknown',
        identifier: row.phone || row.name,
        count: 0,
        total: 0,
      };

      saver.count += 1;
      saver.total += row.amount;
      savers.set(key, saver);
    }

    return Array.from(savers.values()).sort((a, b) => b.total - a.total);
  }

  /** Deposits whose text explains how the money was saved. */
  async listNarratives(): Promise<NarrativeEntryDTO[]> {
    const rows = await this.loadRows();

    const entries = rows
      .filter((row) => hasSavingNarrative(row.howSaved))
      .map((row) => ({ name: row.name, howSaved: row.howSaved.trim() }));

    if (entries.length === 0) {
      throw new NoNarrativeEntriesError();
    }

    return entries;
  }

  private async loadRows(): Promise<DepositRow[]> {
    const { rows } = await this.storage.readLedger();
    if (rows.length === 0) {
      throw new LedgerEmptyError();
    }

    return rows;
  }
}
