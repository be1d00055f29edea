import { DateTime } from 'luxon';
import { ValidationError } from '../../shared/errors.js';
import { lookupMonth } from './monthNames.js';
import type { CellValue, ItemsInput } from './records.types.js';

export const DATE_FORMAT = 'dd-MM-yyyy';
export const DATE_FORMAT_LABEL = 'DD-MM-YYYY';

// Day zero of spreadsheet date serials
const SERIAL_EPOCH = { year: 1899, month: 12, day: 30 } as const;

const DATE_FORMATS = ['d-M-yyyy', 'd.M.yyyy', 'd/M/yyyy', 'yyyy-M-d', 'd-M-yy', 'd.M.yy', 'd/M/yy'];
const DASHED_FORMATS = ['d-M-yyyy', 'd-M-yy'];

const SPACE_VARIANTS = /[\u00a0\u2007\u2009\u202f]/g;
const YEAR_SUFFIX = /\s*(?:год|г)\.?$/iu;
const NAMED_MONTH_DATE = /^(\d{1,2})\.?\s+(\p{L}+)\.?,?\s+(\d{4})$/u;

const toEpoch = (date: DateTime): number => Math.floor(date.toSeconds());

const normalizeDateText = (value: string): string =>
  value
    .replace(SPACE_VARIANTS, ' ')
    .replace(/\s+/g, ' ')
    .trim()
    .replace(/^'/, '')
    .replace(YEAR_SUFFIX, '')
    .trim();

const parseWithFormats = (text: string, formats: string[], zone: string): number | null => {
  for (const format of formats) {
    const parsed = DateTime.fromFormat(text, format, { zone });
    if (parsed.isValid) {
      return toEpoch(parsed);
    }
  }
  return null;
};

const parseNamedMonth = (text: string, zone: string): number | null => {
  const match = NAMED_MONTH_DATE.exec(text);
  if (!match) {
    return null;
  }
  const month = lookupMonth(match[2]);
  if (month === null) {
    return null;
  }
  const parsed = DateTime.fromObject(
    { year: Number(match[3]), month, day: Number(match[1]) },
    { zone }
  );
  return parsed.isValid ? toEpoch(parsed) : null;
};

const parseSerial = (serial: number, zone: string): number | null => {
  if (!Number.isFinite(serial) || serial < 0) {
    return null;
  }
  const parsed = DateTime.fromObject(SERIAL_EPOCH, { zone }).plus({ days: Math.floor(serial) });
  return parsed.isValid ? toEpoch(parsed) : null;
};

/**
 * Converts a date cell to epoch seconds at local midnight in `zone`.
 *
 * Accepts spreadsheet date serials, DD-MM-YYYY with `-`, `.` or `/`
 * separators (also two-digit years and mixed separators), YYYY-MM-DD,
 * `<day> <month name> <year>` in English or Bulgarian, and ISO date-times.
 * Returns null when nothing matches.
 */
export const parseDateToEpoch = (value: CellValue | null | undefined, zone: string): number | null => {
  if (typeof value === 'number') {
    return parseSerial(value, zone);
  }
  if (typeof value !== 'string') {
    return null;
  }

  const text = normalizeDateText(value);
  if (!text) {
    return null;
  }

  const direct = parseWithFormats(text, DATE_FORMATS, zone);
  if (direct !== null) {
    return direct;
  }

  const dashed = parseWithFormats(text.replace(/[./]/g, '-'), DASHED_FORMATS, zone);
  if (dashed !== null) {
    return dashed;
  }

  const named = parseNamedMonth(text, zone);
  if (named !== null) {
    return named;
  }

  if (text.includes('T')) {
    const iso = DateTime.fromISO(text, { zone });
    if (iso.isValid) {
      return toEpoch(iso);
    }
  }

  return null;
};

export const formatEpoch = (epoch: number, zone: string): string =>
  DateTime.fromSeconds(epoch, { zone }).toFormat(DATE_FORMAT);

export const todayString = (zone: string, now: DateTime = DateTime.now()): string =>
  now.setZone(zone).toFormat(DATE_FORMAT);

/**
 * Pulls the first signed digit run out of noisy revenue text ("лв 120", "1 200", "1,200").
 * Never throws; anything without digits is 0.
 */
export const parseIntLoose = (value: CellValue | null | undefined): number => {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? Math.trunc(value) : 0;
  }
  if (typeof value !== 'string') {
    return 0;
  }
  const cleaned = value.replace(SPACE_VARIANTS, '').replace(/\s+/g, '').replace(/,/g, '');
  const match = /[+-]?\d+/.exec(cleaned) ?? /[+-]?\d+/.exec(value);
  return match ? Number.parseInt(match[0], 10) : 0;
};

// Absent or blank input means "no value"
export const parseStrictInt = (value: unknown, field: string): number | null => {
  if (value === undefined || value === null) {
    return null;
  }
  if (typeof value === 'number') {
    if (!Number.isInteger(value)) {
      throw new ValidationError(`${field} must be a whole number.`, field);
    }
    return value;
  }
  if (typeof value !== 'string') {
    throw new ValidationError(`${field} must be a whole number.`, field);
  }
  const trimmed = value.trim();
  if (!trimmed) {
    return null;
  }
  if (!/^-?\d+$/.test(trimmed)) {
    throw new ValidationError(`${field} must be a whole number.`, field);
  }
  return Number.parseInt(trimmed, 10);
};

// Canonical item tokenizer: comma split, trimmed, empties dropped
export const splitItems = (value: CellValue | null | undefined): string[] => {
  if (value === null || value === undefined || typeof value === 'boolean') {
    return [];
  }
  return String(value)
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
};

export const normalizeItems = (input: ItemsInput): string => {
  const parts = Array.isArray(input) ? input : [input];
  return parts.flatMap((part) => splitItems(part)).join(', ');
};
