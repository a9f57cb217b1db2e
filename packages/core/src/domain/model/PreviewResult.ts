import type { FieldSpec } from './FieldSpec.js';
import type { ResolvedColumns } from './ResolvedColumns.js';

/** A data row resolved during preview. */
export interface PreviewRow {
  readonly rowNumber: number;
  readonly columns: ResolvedColumns;
}

/** Result of resolving a sample of rows without writing them. */
export interface PreviewResult {
  /** Destination table name. */
  readonly table: string;
  /** Detected data-line separator. */
  readonly separator: string;
  /** Parsed header fields, in header order. */
  readonly fields: readonly FieldSpec[];
  /** Resolved rows, up to the requested maximum. */
  readonly rows: readonly PreviewRow[];
  /** Total number of data rows in the file (all of them passed shape and key validation). */
  readonly totalRows: number;
}
