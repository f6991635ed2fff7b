import { describe, expect, it } from 'vitest';
import { dayjs } from './ExportDateTime.js';
import { weekContaining, weeksBetween } from './WeekRange.js';

const ZONE = 'Asia/Dhaka';
const FORMAT = 'YYYY-MM-DDTHH:mm:ss.SSSZ';
const WEEK_MS = 7 * 24 * 60 * 60 * 1000;

const at = (wallClock: string) => dayjs.tz(wallClock, ZONE);

describe('weekContaining', () => {
  it('runs from Friday midnight through Thursday night', () => {
    const week = weekContaining(at('2024-03-05T21:00:00'), ZONE);

    expect(week.start.format(FORMAT)).toBe('2024-03-01T00:00:00.000+06:00');
    expect(week.end.format(FORMAT)).toBe('2024-03-07T23:59:59.999+06:00');
  });

  it('starts a new week on Friday', () => {
    expect(weekContaining(at('2024-03-08T00:00:00'), ZONE).start.format(FORMAT)).toBe('2024-03-08T00:00:00.000+06:00');
    expect(weekContaining(at('2024-03-07T23:59:00'), ZONE).start.format(FORMAT)).toBe('2024-03-01T00:00:00.000+06:00');
  });

  it('uses the wall clock of the zone, not UTC', () => {
    // Thursday 19:00 UTC is already Friday 01:00 in Dhaka.
    const week = weekContaining(dayjs.utc('2024-03-07T19:00:00Z'), ZONE);
    expect(week.start.format(FORMAT)).toBe('2024-03-08T00:00:00.000+06:00');
  });
});

describe('weeksBetween', () => {
  const weeks = weeksBetween(at('2024-03-05T09:00:00'), at('2024-03-20T12:00:00'), ZONE);

  it('covers every week from the first to the last, latest first', () => {
    expect(weeks.map((week) => week.start.format('YYYY-MM-DD'))).toEqual(['2024-03-15', '2024-03-08', '2024-03-01']);
  });

  it('produces contiguous seven-day windows', () => {
    for (const week of weeks) {
      expect(week.end.valueOf() - week.start.valueOf()).toBe(WEEK_MS - 1);
    }

    for (let index = 1; index < weeks.length; index += 1) {
      expect(weeks[index].end.valueOf() + 1).toBe(weeks[index - 1].start.valueOf());
    }
  });

  it('returns a single week when both ends fall in it', () => {
    expect(weeksBetween(at('2024-03-09T09:00:00'), at('2024-03-14T09:00:00'), ZONE)).toHaveLength(1);
  });
});
