/**
 * Closed set of semantic column kinds.
 *
 * Catalog adapters map their own type codes into this set; value casting only
 * ever switches over these five kinds.
 */
export type ColumnKind = 'integer' | 'decimal' | 'text' | 'boolean' | 'temporal';

/** Constraints declared by the catalog for a column. */
export interface ColumnConstraints {
  /** Maximum text length. `0` means unbounded. */
  readonly maxLength: number;
}

export function isNumericKind(kind: ColumnKind): kind is 'integer' | 'decimal' {
  return kind === 'integer' || kind === 'decimal';
}
