import dayjs, { type Dayjs } from 'dayjs';
import customParseFormat from 'dayjs/plugin/customParseFormat.js';
import timezone from 'dayjs/plugin/timezone.js';
import utc from 'dayjs/plugin/utc.js';

dayjs.extend(customParseFormat);
dayjs.extend(utc);
dayjs.extend(timezone);

export const DEFAULT_TIMEZONE = 'Asia/Dhaka';

const exportDate = /^(\d{1,2})\/(\d{1,2})\/(\d{2})$/;
const exportTime = /^(\d{1,2}):(\d{2})\s*([AP]M)$/i;

const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * `M/D/YY` as an ISO calendar date, or null. Two-digit years above 68 land in
 * the 1900s.
 */
export const parseExportDate = (value: string): string | null => {
  const match = exportDate.exec(value.trim());
  if (!match) {
    return null;
  }

  const month = Number(match[1]);
  const day = Number(match[2]);
  const shortYear = Number(match[3]);
  const year = shortYear > 68 ? 1900 + shortYear : 2000 + shortYear;
  const iso = `${year}-${pad(month)}-${pad(day)}`;

  return dayjs(iso, 'YYYY-MM-DD', true).isValid() ? iso : null;
};

/** `h:mm AM` as minutes since midnight, or null. */
export const parseExportTime = (value: string): number | null => {
  const match = exportTime.exec(value.trim());
  if (!match) {
    return null;
  }

  const hour = Number(match[1]);
  const minute = Number(match[2]);
  if (hour < 1 || hour > 12 || minute > 59) {
    return null;
  }

  const isPm = match[3].toUpperCase() === 'PM';
  return (hour % 12) * 60 + minute + (isPm ? 720 : 0);
};

export interface ZonedInstant {
  instant: Dayjs;
  inferred: boolean; // true when the row could not be parsed and `now` was used
}

/**
 * Combines exported date and time strings into an instant in `zone`. Rows that
 * do not parse fall back to `now` in the same zone and are flagged.
 */
export const toZonedInstant = (date: string, time: string, zone: string, now: Date): ZonedInstant => {
  const isoDate = parseExportDate(date);
  const minutes = parseExportTime(time);

  if (isoDate === null || minutes === null) {
    return { instant: dayjs(now).tz(zone), inferred: true };
  }

  const wallClock = `${isoDate}T${pad(Math.floor(minutes / 60))}:${pad(minutes % 60)}:00`;
  return { instant: dayjs.tz(wallClock, zone), inferred: false };
};

export { dayjs };
