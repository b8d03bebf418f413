/**
 * Calendar dates in the `Month DD, YYYY` form used by the WIF header.
 *
 * Dates are kept as plain year/month/day triples rather than JS Date
 * objects, so no time zone ever enters the picture.
 */

import { InvalidDateError } from './errors';

export interface CalendarDate {
  year: number;
  /** 1-based month. */
  month: number;
  day: number;
}

const MONTH_NAMES = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December',
];

const DATE_RE = /^([A-Za-z]+)\s+(\d{1,2}),\s*(\d{1,4})$/;

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

export function daysInMonth(year: number, month: number): number {
  if (month === 2) return isLeapYear(year) ? 29 : 28;
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

export function parseCalendarDate(raw: string): CalendarDate {
  const match = DATE_RE.exec(raw.trim());
  if (!match) {
    throw new InvalidDateError(raw, 'expected "Month DD, YYYY"');
  }

  const monthName = match[1].toLowerCase();
  const monthIndex = MONTH_NAMES.findIndex(name => name.toLowerCase() === monthName);
  if (monthIndex === -1) {
    throw new InvalidDateError(raw, `unknown month "${match[1]}"`);
  }

  const month = monthIndex + 1;
  const day = Number(match[2]);
  const year = Number(match[3]);
  if (day < 1 || day > daysInMonth(year, month)) {
    throw new InvalidDateError(raw, `day ${day} is out of range for ${MONTH_NAMES[monthIndex]} ${year}`);
  }

  return { year, month, day };
}

export function formatCalendarDate(date: CalendarDate): string {
  const day = String(date.day).padStart(2, '0');
  const year = String(date.year).padStart(4, '0');
  return `${MONTH_NAMES[date.month - 1]} ${day}, ${year}`;
}
