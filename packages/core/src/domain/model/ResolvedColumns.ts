/**
 * Typed value accepted by the database driver.
 *
 * - `number`: integer columns (always a safe integer).
 * - `string`: text, boolean (`'Y'` / `'N'`) and decimal columns. Decimals are
 *   kept as canonical decimal strings so amounts never pass through floating point.
 * - `Date`: temporal columns.
 */
export type ResolvedValue = null | number | string | Date;

/** Column name → resolved value, in header order. Built fresh for each row. */
export type ResolvedColumns = Map<string, ResolvedValue>;

/** Find the key matching `column` regardless of letter case. */
export function findColumnKey(columns: ReadonlyMap<string, ResolvedValue>, column: string): string | undefined {
  const wanted = column.toLowerCase();
  for (const key of columns.keys()) {
    if (key.toLowerCase() === wanted) return key;
  }
  return undefined;
}

/** Value of `column` (case-insensitive), or `undefined` when the row does not carry it. */
export function getColumn(columns: ReadonlyMap<string, ResolvedValue>, column: string): ResolvedValue | undefined {
  const key = findColumnKey(columns, column);
  return key === undefined ? undefined : columns.get(key);
}

/**
 * Set `column` only when the row has no non-null value for it. An existing
 * `null` entry keeps its position and receives the default.
 */
export function putIfAbsent(columns: ResolvedColumns, column: string, value: ResolvedValue): void {
  const key = findColumnKey(columns, column);
  if (key === undefined) {
    columns.set(column, value);
  } else if (columns.get(key) === null) {
    columns.set(key, value);
  }
}
