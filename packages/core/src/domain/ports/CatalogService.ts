import type { ColumnConstraints, ColumnKind } from '../model/ColumnKind.js';

/**
 * Port to the relational store's metadata catalog.
 *
 * Implementations translate their own type taxonomy into `ColumnKind` and
 * must answer `'text'` with `maxLength: 0` for columns they do not know.
 *
 * @example
 * ```typescript
 * const catalog: CatalogService = {
 *   async resolveTableName(tabId) { return tabId === 220 ? 'C_BPartner' : null; },
 *   async columnType() { return 'text'; },
 *   async columnConstraints() { return { maxLength: 60 }; },
 *   async tableHasColumn(_table, column) { return column === 'IsActive'; },
 *   async nextPrimaryKey() { return 1000000; },
 * };
 * ```
 */
export interface CatalogService {
  /** Table behind a window tab, or `null` when the tab or table is unknown. */
  resolveTableName(tabId: number): Promise<string | null>;
  columnType(table: string, column: string): Promise<ColumnKind>;
  columnConstraints(table: string, column: string): Promise<ColumnConstraints>;
  tableHasColumn(table: string, column: string): Promise<boolean>;
  /**
   * Reserve the next primary key value for `table`.
   *
   * @throws SequenceExhaustionError when the table has no sequence.
   */
  nextPrimaryKey(table: string): Promise<number>;
}
