import type { ColumnConstraints, ColumnKind } from '../model/ColumnKind.js';
import type { ResolvedValue } from '../model/ResolvedColumns.js';

/** Outcome of casting a literal cell. */
export type CastResult = { readonly ok: true; readonly value: ResolvedValue } | { readonly ok: false; readonly reason: string };

const INTEGER = /^[+-]?\d+$/;
const DECIMAL = /^([+-]?)(\d*)(?:\.(\d*))?$/;
const DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const DATE_TIME = /^(\d{4})-(\d{2})-(\d{2})[ T](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?$/;

const TRUE_SPELLINGS = new Set(['y', 'yes', 'true', '1', 's', 'si']);
const FALSE_SPELLINGS = new Set(['n', 'no', 'false', '0']);

function ok(value: ResolvedValue): CastResult {
  return { ok: true, value };
}

function fail(reason: string): CastResult {
  return { ok: false, reason };
}

/** Cast a non-empty literal to the value stored for a column of the given kind. */
export function castLiteral(raw: string, kind: ColumnKind, constraints: ColumnConstraints): CastResult {
  switch (kind) {
    case 'integer':
      return castInteger(raw);
    case 'decimal':
      return castDecimal(raw);
    case 'boolean':
      return castBoolean(raw);
    case 'temporal':
      return castTemporal(raw);
    case 'text':
      if (constraints.maxLength > 0 && raw.length > constraints.maxLength) {
        return fail(`exceeds maximum length ${String(constraints.maxLength)} (length ${String(raw.length)})`);
      }
      return ok(raw);
  }
}

export function castInteger(raw: string): CastResult {
  if (!INTEGER.test(raw)) return fail('not an integer');
  const value = Number(raw);
  if (!Number.isSafeInteger(value)) return fail('integer out of range');
  return ok(value);
}

/** Decimals are returned as canonical strings: no `+`, no superfluous leading zeros, scale preserved. */
export function castDecimal(raw: string): CastResult {
  const match = DECIMAL.exec(raw);
  if (!match) return fail('not a decimal number');
  const [, sign = '', intPart = '', fraction] = match;
  if (intPart === '' && (fraction === undefined || fraction === '')) return fail('not a decimal number');

  const integer = intPart.replace(/^0+(?=\d)/, '') || '0';
  const scale = fraction === undefined || fraction === '' ? '' : `.${fraction}`;
  return ok(`${sign === '-' ? '-' : ''}${integer}${scale}`);
}

/** Booleans are stored as `'Y'` / `'N'`. */
export function castBoolean(raw: string): CastResult {
  const normalized = raw.toLowerCase();
  if (TRUE_SPELLINGS.has(normalized)) return ok('Y');
  if (FALSE_SPELLINGS.has(normalized)) return ok('N');
  return fail('not a yes/no value');
}

/**
 * A 10-character value is a date (`YYYY-MM-DD`); anything else must be a
 * date-time (`YYYY-MM-DD HH:mm[:ss[.fff]]`). Values are read as UTC.
 */
export function castTemporal(raw: string): CastResult {
  if (raw.length === 10) {
    const match = DATE.exec(raw);
    if (!match) return fail('expected a date as YYYY-MM-DD');
    return buildDate(Number(match[1]), Number(match[2]), Number(match[3]), 0, 0, 0, 0);
  }

  const match = DATE_TIME.exec(raw);
  if (!match) return fail('expected a date-time as YYYY-MM-DD HH:mm:ss');
  const millis = Number((match[7] ?? '').padEnd(3, '0').slice(0, 3));
  return buildDate(
    Number(match[1]),
    Number(match[2]),
    Number(match[3]),
    Number(match[4]),
    Number(match[5]),
    Number(match[6] ?? '0'),
    millis,
  );
}

function buildDate(
  year: number,
  month: number,
  day: number,
  hours: number,
  minutes: number,
  seconds: number,
  millis: number,
): CastResult {
  if (hours > 23 || minutes > 59 || seconds > 59) return fail('invalid time of day');
  const date = new Date(Date.UTC(year, month - 1, day, hours, minutes, seconds, millis));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return fail('invalid calendar date');
  }
  return ok(date);
}
