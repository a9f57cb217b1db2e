import type { ResolvedValue } from './ResolvedColumns.js';

/** A parameterized SQL statement with positional `?` placeholders. */
export interface SqlStatement {
  readonly sql: string;
  readonly params: readonly ResolvedValue[];
}

/** One `column = value` condition of an UPDATE. A `null` value renders as `IS NULL`. */
export interface Predicate {
  readonly column: string;
  readonly value: ResolvedValue;
}

/** Render predicates for messages: `Value='ACME01' AND AD_Org_ID=11`. */
export function describePredicates(predicates: readonly Predicate[]): string {
  return predicates.map((p) => `${p.column}=${formatValue(p.value)}`).join(' AND ');
}

function formatValue(value: ResolvedValue): string {
  if (value === null) return 'NULL';
  if (typeof value === 'number') return String(value);
  if (value instanceof Date) return `'${value.toISOString()}'`;
  return `'${value}'`;
}
