import type { ImportMode } from './ImportMode.js';

/** What happened to a single data row. */
export type RowAction = 'inserted' | 'updated' | 'skipped';

/** Outcome record for one data row. */
export interface RowOutcome {
  /** 1-based row number, as used in error messages. */
  readonly rowNumber: number;
  readonly action: RowAction;
  /** Rows affected in the destination table (may exceed 1 for bulk updates). */
  readonly affectedRows: number;
  /** Rendered WHERE predicate for updates. */
  readonly where?: string;
}

/** Final result of an import run. */
export interface ImportResult {
  /** Destination table name. */
  readonly table: string;
  readonly mode: ImportMode;
  /** Total rows inserted in the destination table. */
  readonly inserted: number;
  /** Total rows updated in the destination table. */
  readonly updated: number;
  /** One outcome per data row, in file order. */
  readonly rows: readonly RowOutcome[];
  /** Human-readable summary: `Import finished. Inserted=1, Updated=0`. */
  readonly summary: string;
}

export function formatSummary(inserted: number, updated: number): string {
  return `Import finished. Inserted=${String(inserted)}, Updated=${String(updated)}`;
}
