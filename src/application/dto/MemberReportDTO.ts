export interface ReportRecordDTO {
  timestamp: string; // ISO 8601 with offset
  amount: number;
  howSaved: string;
  timestampInferred: boolean;
}

export interface WeekBucketDTO {
  start: string;
  end: string;
  records: ReportRecordDTO[];
  total: number;
}

export interface MemberReportDTO {
  identifier: string;
  name: string;
  phone: string;
  records: ReportRecordDTO[];
  monthly: Record<string, number>; // "March 2024"
  yearly: Record<string, number>;
  weeks: WeekBucketDTO[];
}

export interface SaverListItemDTO {
  name: string;
  identifier: string; // phone when known, otherwise the name
  count: number;
  total: number;
}

export interface NarrativeEntryDTO {
  name: string;
  howSaved: string;
}
