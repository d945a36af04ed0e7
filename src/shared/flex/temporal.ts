/**
 * Temporal Values
 *
 * Calendar dates, wall-clock times and their combination as immutable value
 * objects. Flex statements carry no time-zone information, so nothing here
 * goes through `Date`.
 *
 * The parse functions return a result instead of throwing; the coercion
 * engine turns failures into located parser errors.
 *
 * @module shared/flex/temporal
 */

import type { DateFormatMode } from '../types/config.types';

// ============================================================================
// Value Classes
// ============================================================================

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

export function daysInMonth(year: number, month: number): number {
  if (month === 2) return isLeapYear(year) ? 29 : 28;
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

export class LocalDate {
  readonly year: number;
  readonly month: number;
  readonly day: number;

  constructor(year: number, month: number, day: number) {
    if (!LocalDate.isValid(year, month, day)) {
      throw new RangeError(`Invalid calendar date ${year}-${month}-${day}`);
    }
    this.year = year;
    this.month = month;
    this.day = day;
    Object.freeze(this);
  }

  static isValid(year: number, month: number, day: number): boolean {
    return (
      Number.isInteger(year) &&
      Number.isInteger(month) &&
      Number.isInteger(day) &&
      year >= 1 &&
      year <= 9999 &&
      month >= 1 &&
      month <= 12 &&
      day >= 1 &&
      day <= daysInMonth(year, month)
    );
  }

  equals(other: LocalDate): boolean {
    return this.year === other.year && this.month === other.month && this.day === other.day;
  }

  compare(other: LocalDate): number {
    return this.year - other.year || this.month - other.month || this.day - other.day;
  }

  toString(): string {
    return `${pad(this.year, 4)}-${pad(this.month)}-${pad(this.day)}`;
  }

  toJSON(): string {
    return this.toString();
  }
}

export class LocalTime {
  readonly hour: number;
  readonly minute: number;
  readonly second: number;

  static readonly MIDNIGHT = new LocalTime(0, 0, 0);

  constructor(hour: number, minute: number, second: number) {
    if (!LocalTime.isValid(hour, minute, second)) {
      throw new RangeError(`Invalid time of day ${hour}:${minute}:${second}`);
    }
    this.hour = hour;
    this.minute = minute;
    this.second = second;
    Object.freeze(this);
  }

  static isValid(hour: number, minute: number, second: number): boolean {
    return (
      Number.isInteger(hour) &&
      Number.isInteger(minute) &&
      Number.isInteger(second) &&
      hour >= 0 &&
      hour <= 23 &&
      minute >= 0 &&
      minute <= 59 &&
      second >= 0 &&
      second <= 59
    );
  }

  equals(other: LocalTime): boolean {
    return this.hour === other.hour && this.minute === other.minute && this.second === other.second;
  }

  toString(): string {
    return `${pad(this.hour)}:${pad(this.minute)}:${pad(this.second)}`;
  }

  toJSON(): string {
    return this.toString();
  }
}

export class LocalDateTime {
  readonly date: LocalDate;
  readonly time: LocalTime;

  constructor(date: LocalDate, time: LocalTime) {
    this.date = date;
    this.time = time;
    Object.freeze(this);
  }

  equals(other: LocalDateTime): boolean {
    return this.date.equals(other.date) && this.time.equals(other.time);
  }

  toString(): string {
    return `${this.date.toString()}T${this.time.toString()}`;
  }

  toJSON(): string {
    return this.toString();
  }
}

// ============================================================================
// Parsing
// ============================================================================

export type TemporalParseResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly ambiguous: boolean; readonly reason: string };

export interface DateParseSettings {
  readonly mode: DateFormatMode;
  readonly strictAmbiguity: boolean;
}

const MONTH_ABBREVIATIONS: Readonly<Record<string, number>> = {
  JAN: 1,
  FEB: 2,
  MAR: 3,
  APR: 4,
  MAY: 5,
  JUN: 6,
  JUL: 7,
  AUG: 8,
  SEP: 9,
  OCT: 10,
  NOV: 11,
  DEC: 12,
};

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const COMPACT_DATE = /^(\d{4})(\d{2})(\d{2})$/;
const SLASH_DATE = /^(\d{2})\/(\d{2})\/(\d{4}|\d{2})$/;
const ABBREVIATED_DATE = /^(\d{2})-([A-Za-z]{3})-(\d{2})$/;
const COLON_TIME = /^(\d{2}):(\d{2}):(\d{2})$/;
const COMPACT_TIME = /^(\d{2})(\d{2})(\d{2})$/;

/** Two-digit years above the pivot belong to the 1900s */
const CENTURY_PIVOT = 68;

function expandYear(digits: string): number {
  const year = Number(digits);
  if (digits.length === 4) return year;
  return year > CENTURY_PIVOT ? 1900 + year : 2000 + year;
}

function ok<T>(value: T): TemporalParseResult<T> {
  return { ok: true, value };
}

function malformed<T>(reason: string): TemporalParseResult<T> {
  return { ok: false, ambiguous: false, reason };
}

function buildDate(year: number, month: number, day: number, raw: string): TemporalParseResult<LocalDate> {
  if (!LocalDate.isValid(year, month, day)) {
    return malformed(`"${raw}" is not a valid calendar date`);
  }
  return ok(new LocalDate(year, month, day));
}

/**
 * Resolve the two leading numeric groups of a slash date into month and day
 * according to the active mode.
 */
function resolveSlashDate(
  first: number,
  second: number,
  year: number,
  raw: string,
  settings: DateParseSettings
): TemporalParseResult<LocalDate> {
  switch (settings.mode) {
    case 'iso':
      return malformed(`"${raw}" is not an ISO date (yyyy-MM-dd)`);
    case 'legacy':
      return buildDate(year, first, second, raw);
    case 'legacy-dayfirst':
      return buildDate(year, second, first, raw);
    case 'auto': {
      if (first > 12 && second <= 12) return buildDate(year, second, first, raw);
      if (second > 12 || first === second) return buildDate(year, first, second, raw);
      if (settings.strictAmbiguity) {
        return {
          ok: false,
          ambiguous: true,
          reason: `"${raw}" reads as both MM/dd and dd/MM; select an explicit date format`,
        };
      }
      return buildDate(year, first, second, raw);
    }
  }
}

export function parseLocalDate(raw: string, settings: DateParseSettings): TemporalParseResult<LocalDate> {
  let match = ISO_DATE.exec(raw) ?? COMPACT_DATE.exec(raw);
  if (match) {
    return buildDate(Number(match[1]), Number(match[2]), Number(match[3]), raw);
  }

  match = ABBREVIATED_DATE.exec(raw);
  if (match) {
    if (settings.mode === 'iso') return malformed(`"${raw}" is not an ISO date (yyyy-MM-dd)`);
    const month = MONTH_ABBREVIATIONS[match[2].toUpperCase()];
    if (month === undefined) return malformed(`"${raw}" has an unknown month "${match[2]}"`);
    return buildDate(expandYear(match[3]), month, Number(match[1]), raw);
  }

  match = SLASH_DATE.exec(raw);
  if (match) {
    return resolveSlashDate(Number(match[1]), Number(match[2]), expandYear(match[3]), raw, settings);
  }

  return malformed(`"${raw}" is not a recognized date format`);
}

export function parseLocalTime(raw: string): TemporalParseResult<LocalTime> {
  const match = COLON_TIME.exec(raw) ?? COMPACT_TIME.exec(raw);
  if (!match) return malformed(`"${raw}" is not a recognized time format`);

  const [hour, minute, second] = [Number(match[1]), Number(match[2]), Number(match[3])];
  if (!LocalTime.isValid(hour, minute, second)) {
    return malformed(`"${raw}" is not a valid time of day`);
  }
  return ok(new LocalTime(hour, minute, second));
}

function combine(
  datePart: string,
  timePart: string,
  settings: DateParseSettings
): TemporalParseResult<LocalDateTime> {
  const date = parseLocalDate(datePart, settings);
  if (!date.ok) return date;
  const time = parseLocalTime(timePart);
  if (!time.ok) return time;
  return ok(new LocalDateTime(date.value, time.value));
}

/**
 * Parse a combined date and time.
 *
 * The configured separator splits the two parts. Without it, a trailing
 * `HH:mm:ss` or `HHmmss` is taken as the time, and a bare date means
 * midnight.
 */
export function parseLocalDateTime(
  raw: string,
  separator: string,
  settings: DateParseSettings
): TemporalParseResult<LocalDateTime> {
  const separatorIndex = raw.indexOf(separator);
  if (separatorIndex >= 0) {
    if (raw.indexOf(separator, separatorIndex + 1) >= 0) {
      return malformed(`"${raw}" contains more than one "${separator}" separator`);
    }
    return combine(raw.slice(0, separatorIndex), raw.slice(separatorIndex + 1), settings);
  }

  const bareDate = parseLocalDate(raw, settings);
  if (bareDate.ok || bareDate.ambiguous) {
    return bareDate.ok ? ok(new LocalDateTime(bareDate.value, LocalTime.MIDNIGHT)) : bareDate;
  }

  for (const timeLength of [8, 6]) {
    if (raw.length <= timeLength) continue;
    const timePart = raw.slice(-timeLength);
    if (!parseLocalTime(timePart).ok) continue;
    return combine(raw.slice(0, -timeLength), timePart, settings);
  }

  return malformed(`"${raw}" is not a recognized date-time format`);
}
