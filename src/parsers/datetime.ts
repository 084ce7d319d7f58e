/**
 * Date and time normalization.
 *
 * Dates come out as YYYY-MM-DD and times as 24-hour HH:MM:SS. Whatever the
 * text does not state explicitly is taken from the fallback instant (the
 * message receipt time), in local time.
 */

import { addDays, format, subDays } from 'date-fns';

export type ValueSource = 'text' | 'fallback';

export interface Resolved {
  value: string;
  source: ValueSource;
}

interface DateParts {
  year: number;
  month: number;
  day: number;
}

const MONTHS: Readonly<Record<string, number>> = {
  jan: 1, january: 1,
  feb: 2, february: 2,
  mar: 3, march: 3,
  apr: 4, april: 4,
  may: 5,
  jun: 6, june: 6,
  jul: 7, july: 7,
  aug: 8, august: 8,
  sep: 9, sept: 9, september: 9,
  oct: 10, october: 10,
  nov: 11, november: 11,
  dec: 12, december: 12,
};

const MONTH_NAME = Object.keys(MONTHS)
  .sort((a, b) => b.length - a.length)
  .join('|');

const RELATIVE_PATTERN = /\b(today|yesterday|tomorrow)\b/gi;
const DAY_MONTH_YEAR_PATTERN = /(?<![0-9])([0-9]{1,2})[-/]([0-9]{1,2})[-/]([0-9]{4})(?![0-9])/g;
const YEAR_MONTH_DAY_PATTERN = /(?<![0-9])([0-9]{4})[-/]([0-9]{1,2})[-/]([0-9]{1,2})(?![0-9])/g;
const DAY_MONTH_SHORT_YEAR_PATTERN = /(?<![0-9])([0-9]{1,2})[-/]([0-9]{1,2})[-/]([0-9]{2})(?![0-9])/g;
const MONTH_NAME_PATTERN = new RegExp(
  `(?<![0-9])([0-9]{1,2})(?:st|nd|rd|th)?[\\s-]*(${MONTH_NAME})\\b\\.?(?:[\\s,-]+([0-9]{4}|[0-9]{2})(?![0-9:]))?`,
  'gi'
);

const TIME_PATTERN = /(?<![0-9:])([0-9]{1,2}):([0-9]{2})(?::([0-9]{2}))?(?:\s*([ap]m)\b)?(?![0-9:])/gi;

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

export function isValidCalendarDate(year: number, month: number, day: number): boolean {
  if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) return false;
  if (year < 1 || month < 1 || month > 12 || day < 1) return false;
  const limit = month === 2 && isLeapYear(year) ? 29 : DAYS_IN_MONTH[month - 1];
  return day <= limit;
}

/**
 * 00-50 are read as 2000-2050, 51-99 as 1951-1999.
 */
export function expandTwoDigitYear(year: number): number {
  return year <= 50 ? 2000 + year : 1900 + year;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

function formatParts({ year, month, day }: DateParts): string {
  return `${pad(year, 4)}-${pad(month)}-${pad(day)}`;
}

type DateTier = (text: string, fallback: Date) => DateParts[];

function numericTier(pattern: RegExp, order: (groups: number[]) => DateParts): DateTier {
  return text => {
    const result: DateParts[] = [];
    for (const match of text.matchAll(pattern)) {
      result.push(order([Number(match[1]), Number(match[2]), Number(match[3])]));
    }
    return result;
  };
}

const relativeTier: DateTier = (text, fallback) => {
  const result: DateParts[] = [];
  for (const match of text.matchAll(RELATIVE_PATTERN)) {
    const word = match[1].toLowerCase();
    const day = word === 'yesterday' ? subDays(fallback, 1) : word === 'tomorrow' ? addDays(fallback, 1) : fallback;
    result.push({ year: day.getFullYear(), month: day.getMonth() + 1, day: day.getDate() });
  }
  return result;
};

const monthNameTier: DateTier = (text, fallback) => {
  const result: DateParts[] = [];
  for (const match of text.matchAll(MONTH_NAME_PATTERN)) {
    const month = MONTHS[match[2].toLowerCase()];
    if (month === undefined) continue;

    const rawYear: string | undefined = match[3];
    let year = fallback.getFullYear();
    if (rawYear) {
      year = rawYear.length === 2 ? expandTwoDigitYear(Number(rawYear)) : Number(rawYear);
    }
    result.push({ year, month, day: Number(match[1]) });
  }
  return result;
};

const DATE_TIERS: readonly DateTier[] = [
  relativeTier,
  numericTier(DAY_MONTH_YEAR_PATTERN, ([day, month, year]) => ({ year, month, day })),
  numericTier(YEAR_MONTH_DAY_PATTERN, ([year, month, day]) => ({ year, month, day })),
  numericTier(DAY_MONTH_SHORT_YEAR_PATTERN, ([day, month, year]) => ({
    year: expandTwoDigitYear(year),
    month,
    day,
  })),
  monthNameTier,
];

/**
 * First calendar-valid date found, trying each tier in order. An invalid
 * candidate ("31-02-2024") is skipped rather than ending the search.
 */
export function resolveDate(text: string, fallback: Date): Resolved {
  if (text.trim()) {
    for (const tier of DATE_TIERS) {
      const valid = tier(text, fallback).find(parts => isValidCalendarDate(parts.year, parts.month, parts.day));
      if (valid) return { value: formatParts(valid), source: 'text' };
    }
  }
  return { value: format(fallback, 'yyyy-MM-dd'), source: 'fallback' };
}

export function resolveTime(text: string, fallback: Date): Resolved {
  for (const match of text.matchAll(TIME_PATTERN)) {
    let hours = Number(match[1]);
    const minutes = Number(match[2]);
    const rawSeconds: string | undefined = match[3];
    const seconds = rawSeconds ? Number(rawSeconds) : 0;
    const meridiem: string | undefined = match[4];

    if (meridiem) {
      const pm = meridiem.toLowerCase() === 'pm';
      if (pm && hours !== 12) hours += 12;
      if (!pm && hours === 12) hours = 0;
    }

    if (hours <= 23 && minutes <= 59 && seconds <= 59) {
      return { value: `${pad(hours)}:${pad(minutes)}:${pad(seconds)}`, source: 'text' };
    }
  }
  return { value: format(fallback, 'HH:mm:ss'), source: 'fallback' };
}

export function extractDate(text: string, fallback: Date): string {
  return resolveDate(text, fallback).value;
}

export function extractTime(text: string, fallback: Date): string {
  return resolveTime(text, fallback).value;
}

export function extractBoth(text: string, fallback: Date): { date: string; time: string } {
  return {
    date: extractDate(text, fallback),
    time: extractTime(text, fallback),
  };
}
