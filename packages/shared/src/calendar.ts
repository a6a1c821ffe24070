const DAY_MS = 86_400_000;
const CALENDAR_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Calendar dates travel as `YYYY-MM-DD` strings and are interpreted at UTC
 * midnight. All arithmetic goes through whole UTC days.
 */
export type CalendarDate = string;

export function parseCalendarDate(value: string): Date {
  const match = CALENDAR_DATE_PATTERN.exec(value.trim());
  if (!match) {
    throw new RangeError(`Invalid calendar date '${value}'`);
  }
  const parsed = new Date(Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3])));
  if (formatCalendarDate(parsed) !== value.trim()) {
    throw new RangeError(`Invalid calendar date '${value}'`);
  }
  return parsed;
}

export function isCalendarDate(value: string): boolean {
  try {
    parseCalendarDate(value);
    return true;
  } catch {
    return false;
  }
}

export function formatCalendarDate(date: Date): CalendarDate {
  return date.toISOString().slice(0, 10);
}

export function toCalendarDate(date: Date): CalendarDate {
  return formatCalendarDate(date);
}

export function addDays(date: CalendarDate, days: number): CalendarDate {
  return formatCalendarDate(new Date(parseCalendarDate(date).getTime() + days * DAY_MS));
}

/** Whole days from `from` to `to`; negative when `to` is earlier. */
export function daysBetween(from: CalendarDate, to: CalendarDate): number {
  return Math.round((parseCalendarDate(to).getTime() - parseCalendarDate(from).getTime()) / DAY_MS);
}

export function eachDate(start: CalendarDate, end: CalendarDate): CalendarDate[] {
  const dates: CalendarDate[] = [];
  for (let current = start; daysBetween(current, end) >= 0; current = addDays(current, 1)) {
    dates.push(current);
  }
  return dates;
}
