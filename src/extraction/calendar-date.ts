/**
 * Calendar dates without time or zone, and their letter formats
 */

export interface CalendarDate {
  readonly year: number;
  readonly month: number; // 1-12
  readonly day: number;
}

const UA_MONTHS_GENITIVE = [
  "січня",
  "лютого",
  "березня",
  "квітня",
  "травня",
  "червня",
  "липня",
  "серпня",
  "вересня",
  "жовтня",
  "листопада",
  "грудня",
] as const;

function toUtcDate(year: number, month: number, day: number): Date {
  const date = new Date(0);
  // setUTCFullYear keeps years below 100 as given, unlike Date.UTC
  date.setUTCFullYear(year, month - 1, day);
  return date;
}

function fromUtcDate(date: Date): CalendarDate {
  return {
    year: date.getUTCFullYear(),
    month: date.getUTCMonth() + 1,
    day: date.getUTCDate(),
  };
}

/**
 * Null unless the parts name a real day between years 1 and 9999
 */
export function createCalendarDate(
  year: number,
  month: number,
  day: number
): CalendarDate | null {
  if (year < 1 || year > 9999 || month < 1 || month > 12 || day < 1) {
    return null;
  }
  const date = fromUtcDate(toUtcDate(year, month, day));
  return date.year === year && date.month === month && date.day === day
    ? date
    : null;
}

export function addDays(date: CalendarDate, days: number): CalendarDate {
  return fromUtcDate(toUtcDate(date.year, date.month, date.day + days));
}

export function compareDates(a: CalendarDate, b: CalendarDate): number {
  return a.year - b.year || a.month - b.month || a.day - b.day;
}

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

/**
 * «05» березня 2024 року
 */
export function formatUkrainianDate(date: CalendarDate): string {
  return `«${pad2(date.day)}» ${UA_MONTHS_GENITIVE[date.month - 1]} ${date.year} року`;
}

/**
 * YY-MM
 */
export function formatYearMonth(date: CalendarDate): string {
  return `${pad2(date.year % 100)}-${pad2(date.month)}`;
}

export function formatMonth(date: CalendarDate): string {
  return pad2(date.month);
}
