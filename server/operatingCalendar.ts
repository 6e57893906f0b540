/**
 * Resolve the concrete operating dates of a pairing from its
 * "effective MON DD - MON DD" clause, weekday mask and EXCEPT list
 */

import {
  eachDayOfInterval,
  format,
  getISODay,
  isAfter,
  isBefore,
  startOfDay,
} from 'date-fns';
import { PARSER_CONFIG } from './config';
import { resolveWeekdayMask } from './weekdayMask';

export const MONTH_MAP: { [key: string]: number } = {
  JAN: 0,
  FEB: 1,
  MAR: 2,
  APR: 3,
  MAY: 4,
  JUN: 5,
  JUL: 6,
  AUG: 7,
  SEP: 8,
  OCT: 9,
  NOV: 10,
  DEC: 11,
};

const MONTHS = 'JAN|FEB|MAR|APR|MAY|JUN|JUL|AUG|SEP|OCT|NOV|DEC';

export const MONTH_DAY_PATTERN = new RegExp(`\\b(${MONTHS})\\s+(\\d{1,2})`, 'i');
const MONTH_DAY_GLOBAL = new RegExp(MONTH_DAY_PATTERN.source, 'gi');
const EFFECTIVE_RANGE = new RegExp(
  `\\b(${MONTHS})\\s+(\\d{1,2})\\s*-\\s*(${MONTHS})\\s+(\\d{1,2})`,
  'i'
);
const EXCEPT_CLAUSE = /except\s+(.*)/i;

export const ISO_DATE_FORMAT = 'yyyy-MM-dd';

/**
 * Weekday index with Monday = 0 .. Sunday = 6
 */
export function weekdayIndex(date: Date): number {
  return getISODay(date) - 1;
}

/**
 * Build a local calendar date, or null when the day does not exist (FEB 30)
 */
export function buildDate(year: number, monthName: string, day: number): Date | null {
  const month = MONTH_MAP[monthName.toUpperCase()];
  if (month === undefined) return null;

  const date = new Date(year, month, day);
  if (date.getMonth() !== month || date.getDate() !== day) return null;
  return date;
}

/**
 * Pick the year a block's dates belong to, relative to a reference date.
 * Dates already behind the reference date are taken to be next year's.
 */
export function determineEffectiveYear(block: string, referenceDate: Date): number {
  const referenceYear = referenceDate.getFullYear();
  const firstDate = block.match(MONTH_DAY_PATTERN);
  if (!firstDate) return referenceYear;

  const monthName = firstDate[1].toUpperCase();
  if (monthName === 'JAN' && referenceDate.getMonth() === MONTH_MAP.DEC) {
    return referenceYear + 1;
  }

  const candidate = buildDate(referenceYear, monthName, parseInt(firstDate[2], 10));
  if (candidate && isBefore(candidate, startOfDay(referenceDate))) {
    return referenceYear + 1;
  }
  return referenceYear;
}

/**
 * Text surrounding the first "effective" keyword, or null when there is none
 */
export function effectiveWindow(block: string): string | null {
  const effectiveIndex = block.toLowerCase().indexOf('effective');
  if (effectiveIndex === -1) return null;

  const span = PARSER_CONFIG.EFFECTIVE_WINDOW;
  return block.substring(Math.max(0, effectiveIndex - span), effectiveIndex + span);
}

function parseExceptions(window: string, start: Date, end: Date, effectiveYear: number): Set<string> {
  const exceptions = new Set<string>();
  const clause = window.match(EXCEPT_CLAUSE);
  if (!clause) return exceptions;

  for (const match of clause[1].matchAll(MONTH_DAY_GLOBAL)) {
    const day = parseInt(match[2], 10);
    // An exception may sit on either side of a year boundary
    for (const year of [effectiveYear, effectiveYear + 1]) {
      const excluded = buildDate(year, match[1], day);
      if (excluded && !isBefore(excluded, start) && !isAfter(excluded, end)) {
        exceptions.add(format(excluded, ISO_DATE_FORMAT));
      }
    }
  }
  return exceptions;
}

/**
 * Calculate every date the pairing operates on, ascending, as ISO strings
 */
export function parseOperatingDates(block: string, effectiveYear: number): string[] {
  const window = effectiveWindow(block);
  if (window === null) return [];

  const range = window.match(EFFECTIVE_RANGE);
  if (!range) return [];

  const start = buildDate(effectiveYear, range[1], parseInt(range[2], 10));
  let end = buildDate(effectiveYear, range[3], parseInt(range[4], 10));
  if (!start || !end) return [];

  if (isBefore(end, start)) {
    // Range crosses the year boundary (DEC 20 - JAN 10)
    end = buildDate(effectiveYear + 1, range[3], parseInt(range[4], 10));
    if (!end) return [];
  }

  const weekdays = resolveWeekdayMask(window);
  const exceptions = parseExceptions(window, start, end, effectiveYear);

  return eachDayOfInterval({ start, end })
    .filter(date => weekdays.has(weekdayIndex(date)))
    .map(date => format(date, ISO_DATE_FORMAT))
    .filter(isoDate => !exceptions.has(isoDate));
}
