import { DateOutOfRangeError, InvalidDateFormatError } from './errors.js';

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const MS_PER_DAY = 24 * 60 * 60 * 1000;
const MAX_YEAR = 9999;

/**
 * Parses a strict `YYYY-MM-DD` string into UTC midnight of that calendar day.
 *
 * Only the zero-padded, hyphen-separated form is accepted, and the day must exist
 * (`2023-02-30` is rejected). Years before 0001 are rejected as well.
 */
export const parseBaseDate = (text: string): Date => {
  const match = ISO_DATE_PATTERN.exec(text);
  if (!match) {
    throw new InvalidDateFormatError();
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (year < 1) {
    throw new InvalidDateFormatError();
  }

  // setUTCFullYear keeps years 0001-0099 literal; Date.UTC would map them to 19xx.
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    throw new InvalidDateFormatError();
  }
  return date;
};

export const toUtcMidnight = (date: Date): Date => {
  const midnight = new Date(date.getTime());
  midnight.setUTCHours(0, 0, 0, 0);
  return midnight;
};

export const formatIsoDate = (date: Date): string => {
  const year = String(date.getUTCFullYear()).padStart(4, '0');
  const month = String(date.getUTCMonth() + 1).padStart(2, '0');
  const day = String(date.getUTCDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
};

/**
 * Renders a number with exactly one fractional digit, rounding the exact binary value
 * and sending ties to the even digit (`0.25` -> `"0.2"`, `0.75` -> `"0.8"`).
 * Never switches to exponent notation.
 */
export const formatOneDecimal = (amount: number): string => {
  if (Object.is(amount, -0)) {
    return '-0.0';
  }
  if (Math.abs(amount) >= 1e21) {
    // Every double this large is an integer.
    return `${BigInt(amount).toString()}.0`;
  }

  // A tie at one decimal needs amount * 10 = k + 0.5 exactly, which for a double
  // means amount * 4 (an exact scaling) is an odd integer.
  const quarters = amount * 4;
  if (Number.isInteger(quarters) && quarters % 2 !== 0) {
    const scaledTwice = BigInt(Math.abs(quarters)) * 5n;
    const lower = (scaledTwice - 1n) / 2n;
    const tenths = lower % 2n === 0n ? lower : lower + 1n;
    const digits = tenths.toString().padStart(2, '0');
    return `${amount < 0 ? '-' : ''}${digits.slice(0, -1)}.${digits.slice(-1)}`;
  }
  return amount.toFixed(1);
};

export const shiftDays =(date: Date, deltaDays: number): Date => {
  const shifted = new Date(date.getTime() + deltaDays * MS_PER_DAY);
  if (shifted.getUTCFullYear() > MAX_YEAR) {
    throw new DateOutOfRangeError(formatIsoDate(date), deltaDays);
  }
  return shifted;
};

export const dayOfYear = (date: Date): number => {
  const startOfYear = new Date(0);
  startOfYear.setUTCFullYear(date.getUTCFullYear(), 0, 1);
  return Math.floor((toUtcMidnight(date).getTime() - startOfYear.getTime()) / MS_PER_DAY) + 1;
};

export const daysInYear = (year: number): number =>
  (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0 ? 366 : 365;
