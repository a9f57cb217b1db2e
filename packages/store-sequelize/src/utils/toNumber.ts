/**
 * Coerce a numeric column value to a number.
 *
 * PostgreSQL returns BIGINT and NUMERIC columns as strings, SQLite and MySQL
 * usually as numbers. `null`, `undefined` and non-numeric values give `null`.
 */
export function toNumber(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'bigint') return Number(value);
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}
