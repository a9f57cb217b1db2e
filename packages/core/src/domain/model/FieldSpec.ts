/**
 * Structured form of one header token.
 *
 * A token such as `AD_User>C_BPartner_ID[Value]/K` parses to
 * `pathParts: ['AD_User', 'C_BPartner_ID']`, `targetColumn: 'C_BPartner_ID'`,
 * `lookupColumn: 'Value'`, `lookupTable: 'AD_User'` and `isKey: true`.
 */
export interface FieldSpec {
  /** Raw token text as it appeared in the header, used in diagnostics. */
  readonly original: string;
  /** Identifiers obtained by splitting the token on `>`. Never empty. */
  readonly pathParts: readonly string[];
  /** Last path segment: the column written on the destination table. */
  readonly targetColumn: string;
  /** Column used as lookup key when the token carries a `[Column]` suffix. */
  readonly lookupColumn: string | null;
  /**
   * Table queried for the lookup: the second-to-last path segment, or the
   * target column without its trailing `_ID`. `null` when neither applies.
   */
  readonly lookupTable: string | null;
  /** `true` when the token ends with `/K`: values must be unique within the file. */
  readonly isKey: boolean;
  /** 1-based position in the header. Stable handle for the column across the run. */
  readonly columnIndex: number;
}

/** Label of a column in error messages: `column 2 (C_BPartner_ID[Value]/K)`. */
export function describeField(field: Pick<FieldSpec, 'columnIndex' | 'original'>): string {
  return `column ${String(field.columnIndex)} (${field.original})`;
}

/** Return `true` when the field resolves its value through a lookup query. */
export function hasLookup(spec: FieldSpec): spec is FieldSpec & { readonly lookupColumn: string } {
  return spec.lookupColumn !== null;
}
