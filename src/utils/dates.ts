/**
 * Calendar-date helpers. Dates are ISO `YYYY-MM-DD` strings and all
 * arithmetic is done on year/month/day fields, never on millisecond
 * durations, so results do not depend on time of day or timezone.
 */

export interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

export function daysInMonth(year: number, month: number): number {
  if (month === 2) {
    return isLeapYear(year) ? 29 : 28;
  }
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

export function parseCalendarDate(value: string): CalendarDate | null {
  const match = ISO_DATE.exec(value);
  if (!match) {
    return null;
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);

  if (year < 1 || month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) {
    return null;
  }

  return { year, month, day };
}

export function isCalendarDate(value: string): boolean {
  return parseCalendarDate(value) !== null;
}

function requireCalendarDate(value: string): CalendarDate {
  const date = parseCalendarDate(value);
  if (!date) {
    throw new RangeError(`Not a calendar date: ${value}`);
  }
  return date;
}

const pad = (value: number, width: number = 2) => String(value).padStart(width, '0');

export function formatCalendarDate(date: CalendarDate): string {
  return `${pad(date.year, 4)}-${pad(date.month)}-${pad(date.day)}`;
}

/**
 * Completed years between a date of birth and a reference date. The year
 * only counts once the birthday (month, day) has been reached; someone born
 * on 29 February turns a year older on 1 March in common years.
 */
export function computeAge(dateOfBirth: string, referenceDate: string): number {
  const dob = requireCalendarDate(dateOfBirth);
  const ref = requireCalendarDate(referenceDate);

  let age = ref.year - dob.year;
  if (ref.month < dob.month || (ref.month === dob.month && ref.day < dob.day)) {
    age -= 1;
  }
  return age;
}

/**
 * Move a date by whole years, keeping month and day as they are. The result
 * can name 29 February in a common year; it is meant for lexical comparison
 * against stored dates, where it orders between 28 February and 1 March.
 */
export function shiftYears(date: string, years: number): string {
  const parsed = requireCalendarDate(date);
  return `${pad(parsed.year + years, 4)}-${pad(parsed.month)}-${pad(parsed.day)}`;
}

/**
 * Date-of-birth bounds for people aged [minAge, maxAge] on the reference
 * date: born on or before `latest`, and strictly after `earliestExclusive`.
 */
export function birthDateBounds(
  referenceDate: string,
  minAge?: number,
  maxAge?: number
): { latest?: string; earliestExclusive?: string } {
  return {
    latest: minAge !== undefined ? shiftYears(referenceDate, -minAge) : undefined,
    earliestExclusive: maxAge !== undefined ? shiftYears(referenceDate, -(maxAge + 1)) : undefined,
  };
}

/**
 * Local calendar date of an instant, as the clinic's wall calendar shows it
 */
export function localDateString(instant: Date): string {
  return formatCalendarDate({
    year: instant.getFullYear(),
    month: instant.getMonth() + 1,
    day: instant.getDate(),
  });
}

/**
 * The `count` month keys ending with the reference date's month, oldest first
 */
export function recentMonthKeys(referenceDate: string, count: number): string[] {
  const ref = requireCalendarDate(referenceDate);
  const keys: string[] = [];

  for (let offset = count - 1; offset >= 0; offset--) {
    const index = ref.year * 12 + (ref.month - 1) - offset;
    const year = Math.floor(index / 12);
    const month = (index % 12) + 1;
    keys.push(`${pad(year, 4)}-${pad(month)}`);
  }

  return keys;
}
