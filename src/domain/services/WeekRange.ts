import type { Dayjs } from 'dayjs';
import { dayjs } from './ExportDateTime.js';

const FRIDAY = 5;

export interface WeekRange {
  start: Dayjs; // Friday 00:00:00.000
  end: Dayjs; // Thursday 23:59:59.999
}

const rangeFromFriday = (friday: string, zone: string): WeekRange => {
  const thursday = dayjs.utc(friday).add(6, 'day').format('YYYY-MM-DD');

  return {
    start: dayjs.tz(`${friday}T00:00:00.000`, zone),
    end: dayjs.tz(`${thursday}T23:59:59.999`, zone),
  };
};

// Calendar arithmetic runs on plain dates so offset changes cannot shift a boundary.
const fridayOnOrBefore = (instant: Dayjs, zone: string): string => {
  const local = instant.tz(zone);
  const daysSinceFriday = (local.day() - FRIDAY + 7) % 7;

  return dayjs.utc(local.format('YYYY-MM-DD')).subtract(daysSinceFriday, 'day').format('YYYY-MM-DD');
};

/** The Friday-to-Thursday week holding `instant`, in `zone`. */
export const weekContaining = (instant: Dayjs, zone: string): WeekRange =>
  rangeFromFriday(fridayOnOrBefore(instant, zone), zone);

/**
 * Every week from the one holding `from` through the one holding `to`, latest
 * first and without gaps. Instants after `to` fall outside every week, so
 * callers pass the later of "now" and their latest record.
 */
export const weeksBetween = (from: Dayjs, to: Dayjs, zone: string): WeekRange[] => {
  const first = weekContaining(from, zone).start.format('YYYY-MM-DD');
  const last = weekContaining(to, zone).start.format('YYYY-MM-DD');
  const weeks: WeekRange[] = [];

  for (let cursor = dayjs.utc(first); cursor.format('YYYY-MM-DD') <= last; cursor = cursor.add(7, 'day')) {
    weeks.push(rangeFromFriday(cursor.format('YYYY-MM-DD'), zone));
  }

  return weeks.reverse();
};
