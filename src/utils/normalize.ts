import { Field, FieldType, FieldValue } from '../schemas/record.js';
import { UnresolvableTypeError } from './errors.js';

/**
 * Field name and value normalization applied before encoding.
 *
 * Each logical value has exactly one textual form:
 * - string / categorical: label text, Unicode NFC
 * - number: fixed significant-digit rendering, -0 folded into 0
 * - date: Date#toISOString(), whatever the input representation
 * - boolean: 'true' | 'false'
 */

/**
 * Single-character type tags written in front of every value token
 */
export type ValueTag = 's' | 'n' | 'd' | 'b' | 'z';

export interface ResolvedValue {
  type: FieldType | 'null';
  tag: ValueTag;
  text: string;
}

const NULL_VALUE: ResolvedValue = { type: 'null', tag: 'z', text: '' };

// Largest |ms| a Date can hold
const MAX_EPOCH_MS = 8.64e15;

const ISO_DATE =
  /^(\d{4})-(\d{2})-(\d{2})(?:T(\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?(Z|[+-]\d{2}:\d{2}))?$/;

export function cleanFieldName(name: string): string {
  return name.normalize('NFC').trim().replace(/\s+/g, ' ').toLowerCase();
}

export function inferFieldType(value: FieldValue): FieldType | null {
  if (value === null) return null;
  if (typeof value === 'string') return 'string';
  if (typeof value === 'number') return 'number';
  if (typeof value === 'boolean') return 'boolean';
  if (value instanceof Date) return 'date';
  return 'categorical';
}

function describe(value: FieldValue): string {
  if (value instanceof Date) return 'Date';
  if (typeof value === 'object' && value !== null) return 'categorical value';
  return typeof value;
}

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function daysInMonth(year: number, month: number): number {
  const days = [31, isLeapYear(year) ? 29 : 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];
  return days[month - 1] ?? 0;
}

/**
 * Parse an ISO-8601 date or zoned date-time into epoch milliseconds.
 *
 * Date-times without an explicit zone are rejected: their instant depends on
 * the host time zone.
 */
export function parseIsoDate(text: string): number | null {
  const match = ISO_DATE.exec(text);
  if (!match) return null;

  const [, y, mo, d, h = '0', mi = '0', s = '0', frac = '', zone = 'Z'] = match;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hour = Number(h);
  const minute = Number(mi);
  const second = Number(s);

  if (month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) return null;
  if (hour > 23 || minute > 59 || second > 59) return null;

  let offsetMinutes = 0;
  if (zone !== 'Z') {
    const sign = zone.startsWith('-') ? -1 : 1;
    const [oh, om] = zone.slice(1).split(':').map(Number);
    if (oh > 23 || om > 59) return null;
    offsetMinutes = sign * (oh * 60 + om);
  }

  // setUTCFullYear keeps years 0-99 literal where Date.UTC would map them to 19xx
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hour, minute, second, Number(frac.padEnd(3, '0').slice(0, 3)));
  return date.getTime() - offsetMinutes * 60_000;
}

/**
 * Render a finite number with `precision` significant digits.
 * Safe integers are written out in full. Integers beyond
 * `Number.MAX_SAFE_INTEGER` are rounded like fractions, so distinct large
 * integers such as 2^53 and 2^53 + 2 share a token at the default precision.
 */
export function canonicalizeNumber(num: number, precision: number): string {
  if (!Number.isFinite(num)) {
    throw new RangeError('Cannot canonicalize non-finite numbers');
  }

  if (Object.is(num, -0)) return '0';
  if (Number.isSafeInteger(num)) return String(num);

  return String(Number.parseFloat(num.toPrecision(precision)));
}

function resolveDate(field: Field, context: Record<string, unknown>): string {
  const { value } = field;
  let ms: number | null = null;

  if (value instanceof Date) {
    ms = value.getTime();
  } else if (typeof value === 'string') {
    ms = parseIsoDate(value.trim());
  } else if (typeof value === 'number') {
    ms = value;
  } else {
    throw new UnresolvableTypeError(field.name, 'date', `got ${describe(value)}`, context);
  }

  if (ms === null || !Number.isFinite(ms) || Math.abs(ms) > MAX_EPOCH_MS) {
    throw new UnresolvableTypeError(field.name, 'date', `${JSON.stringify(String(value))} is not a valid date`, context);
  }
  return new Date(ms).toISOString();
}

function resolveLabel(field: Field, declared: FieldType, context: Record<string, unknown>): string {
  const { value } = field;
  if (typeof value === 'string') {
    return value.normalize('NFC');
  }
  if (typeof value === 'object' && value !== null && !(value instanceof Date)) {
    const code = String(value.code);
    if (!Object.hasOwn(value.labels, code)) {
      throw new UnresolvableTypeError(field.name, declared, `no label for code ${JSON.stringify(code)}`, context);
    }
    return value.labels[code].normalize('NFC');
  }
  throw new UnresolvableTypeError(field.name, declared, `got ${describe(value)}`, context);
}

/**
 * Resolve a field's value under its declared type (or the type its runtime
 * shape implies when nothing is declared).
 *
 * Categorical values and plain strings resolve to the same 's' token, so a
 * column read as codes and the same column read as labels are
 * indistinguishable. Null resolves to its own sentinel under any type.
 */
export function resolveValue(
  field: Field,
  declared: FieldType | undefined,
  precision: number,
  context: Record<string, unknown> = {}
): ResolvedValue {
  if (field.value === null) return NULL_VALUE;

  const type = declared ?? inferFieldType(field.value) ?? 'string';
  const { value } = field;

  switch (type) {
    case 'string':
    case 'categorical':
      return { type, tag: 's', text: resolveLabel(field, type, context) };

    case 'number':
      if (typeof value !== 'number') {
        throw new UnresolvableTypeError(field.name, type, `got ${describe(value)}`, context);
      }
      if (!Number.isFinite(value)) {
        throw new UnresolvableTypeError(field.name, type, `${value} is not finite`, context);
      }
      return { type, tag: 'n', text: canonicalizeNumber(value, precision) };

    case 'boolean':
      if (typeof value !== 'boolean') {
        throw new UnresolvableTypeError(field.name, type, `got ${describe(value)}`, context);
      }
      return { type, tag: 'b', text: value ? 'true' : 'false' };

    case 'date':
      return { type, tag: 'd', text: resolveDate(field, context) };
  }
}
