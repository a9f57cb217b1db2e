import type { FieldSpec } from '../model/FieldSpec.js';
import type { ImportTemplate } from '../model/ImportTemplate.js';
import type { RowOutcome } from '../model/ImportResult.js';
import type { ResolvedColumns } from '../model/ResolvedColumns.js';
import type { Predicate } from '../model/SqlStatement.js';
import { describePredicates } from '../model/SqlStatement.js';
import type { CatalogService } from '../ports/CatalogService.js';
import type { ExecutionContext } from '../ports/ExecutionContext.js';
import type { SqlExecutor } from '../ports/SqlExecutor.js';
import { RecordNotFoundError } from '../errors/ImportErrors.js';
import { StatementBuilder } from './StatementBuilder.js';
import {
  ACTIVE_COLUMN,
  CLIENT_COLUMN,
  applyInsertDefaults,
  defaultClientId,
  hasValue,
  primaryKeyColumn,
} from './SystemColumns.js';

export interface RowWriterOptions {
  readonly table: string;
  readonly template: ImportTemplate;
  readonly context: ExecutionContext;
  readonly catalog: CatalogService;
  readonly executor: SqlExecutor;
  readonly clock: () => Date;
  readonly uuid: () => string;
}

/** Writes resolved rows to the destination table, one statement per row. */
export class RowWriter {
  private hasActiveColumn: boolean | null = null;

  constructor(private readonly options: RowWriterOptions) {}

  /** INSERT the row with its system columns completed. */
  async insert(rowNumber: number, columns: ResolvedColumns): Promise<RowOutcome> {
    const { table, catalog } = this.options;
    const primaryKey = hasValue(columns, primaryKeyColumn(table)) ? null : await catalog.nextPrimaryKey(table);
    const all = applyInsertDefaults(columns, {
      table,
      template: this.options.template,
      context: this.options.context,
      primaryKey,
      hasActiveColumn: await this.tableHasActiveColumn(),
      now: this.options.clock(),
      uuid: this.options.uuid(),
    });

    const affectedRows = await this.options.executor.insert(StatementBuilder.insert(table, all));
    return { rowNumber, action: 'inserted', affectedRows };
  }

  /**
   * UPDATE targeted by the key-flagged fields, or, without key fields, every
   * row of the default client. A keyed update that matches nothing fails.
   */
  async update(rowNumber: number, fields: readonly FieldSpec[], columns: ResolvedColumns): Promise<RowOutcome> {
    const { table, executor } = this.options;
    const keys = fields.filter((f) => f.isKey);
    const sets: ResolvedColumns = new Map(columns);
    let where: Predicate[];

    if (keys.length > 0) {
      where = keys.map((f) => ({ column: f.targetColumn, value: columns.get(f.targetColumn) ?? null }));
      for (const key of keys) sets.delete(key.targetColumn);
    } else {
      where = [{ column: CLIENT_COLUMN, value: defaultClientId(this.options.template, this.options.context) }];
    }

    const predicate = describePredicates(where);
    if (sets.size === 0) {
      return { rowNumber, action: 'skipped', affectedRows: 0, where: predicate };
    }

    const affectedRows = await executor.update(StatementBuilder.update(table, sets, where));
    const firstKey = keys[0];
    if (affectedRows === 0 && firstKey) {
      throw new RecordNotFoundError(rowNumber, firstKey, table, predicate);
    }
    return { rowNumber, action: 'updated', affectedRows, where: predicate };
  }

  private async tableHasActiveColumn(): Promise<boolean> {
    if (this.hasActiveColumn === null) {
      this.hasActiveColumn = await this.options.catalog.tableHasColumn(this.options.table, ACTIVE_COLUMN);
    }
    return this.hasActiveColumn;
  }
}
