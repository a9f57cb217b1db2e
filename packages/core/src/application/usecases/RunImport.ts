import type { ImportResult, RowOutcome } from '../../domain/model/ImportResult.js';
import { formatSummary } from '../../domain/model/ImportResult.js';
import { ConfigurationError, isImportError } from '../../domain/errors/ImportErrors.js';
import { RowWriter } from '../../domain/services/RowWriter.js';
import { ValueResolver } from '../../domain/services/ValueResolver.js';
import type { ImportContext } from '../ImportContext.js';
import { PrepareImport } from './PrepareImport.js';

/**
 * Use case: validate the whole file, then resolve and write it row by row.
 *
 * Rows are processed strictly in file order and the first error aborts the
 * run. Statements already executed are left to the caller's transaction.
 */
export class RunImport {
  private inserted = 0;
  private updated = 0;

  constructor(private readonly ctx: ImportContext) {}

  async execute(): Promise<ImportResult> {
    if (this.ctx.started) {
      throw new ConfigurationError('Import already started. Create a new TableImport to run again.');
    }
    this.ctx.started = true;

    try {
      return await this.run();
    } catch (error) {
      this.ctx.eventBus.emit({
        type: 'import:failed',
        importId: this.ctx.importId,
        error: error instanceof Error ? error.message : String(error),
        ...(isImportError(error) ? { code: error.code } : {}),
        inserted: this.inserted,
        updated: this.updated,
        timestamp: Date.now(),
      });
      throw error;
    }
  }

  private async run(): Promise<ImportResult> {
    const { ctx } = this;
    const prepare = new PrepareImport(ctx);
    const parsed = await prepare.parse();

    // Yield to next microtask so handlers registered after run() on the same tick receive this event
    await Promise.resolve();

    const fileName = ctx.requireSource().metadata().fileName;
    ctx.eventBus.emit({
      type: 'import:started',
      importId: ctx.importId,
      templateId: ctx.template.id,
      table: parsed.table,
      mode: ctx.mode,
      ...(fileName !== undefined ? { fileName } : {}),
      timestamp: Date.now(),
    });

    const rows = prepare.validate(parsed);
    ctx.eventBus.emit({
      type: 'import:validated',
      importId: ctx.importId,
      totalRows: rows.length,
      keyColumns: parsed.fields.filter((f) => f.isKey).map((f) => f.targetColumn),
      timestamp: Date.now(),
    });

    const resolver = new ValueResolver(parsed.table, ctx.catalog, ctx.executor);
    const writer = new RowWriter({
      table: parsed.table,
      template: ctx.template,
      context: ctx.session,
      catalog: ctx.catalog,
      executor: ctx.executor,
      clock: ctx.clock,
      uuid: ctx.uuid,
    });

    const outcomes: RowOutcome[] = [];
    for (const row of rows) {
      const columns = await resolver.resolveRow(parsed.fields, row);
      const outcome =
        ctx.mode === 'update'
          ? await writer.update(row.rowNumber, parsed.fields, columns)
          : await writer.insert(row.rowNumber, columns);
      outcomes.push(outcome);
      this.record(outcome);
    }

    const result: ImportResult = {
      table: parsed.table,
      mode: ctx.mode,
      inserted: this.inserted,
      updated: this.updated,
      rows: outcomes,
      summary: formatSummary(this.inserted, this.updated),
    };

    ctx.eventBus.emit({
      type: 'import:completed',
      importId: ctx.importId,
      result,
      timestamp: Date.now(),
    });

    return result;
  }

  private record(outcome: RowOutcome): void {
    const base = { importId: this.ctx.importId, rowNumber: outcome.rowNumber, timestamp: Date.now() };
    switch (outcome.action) {
      case 'inserted':
        this.inserted += outcome.affectedRows;
        this.ctx.eventBus.emit({ type: 'row:inserted', ...base, affectedRows: outcome.affectedRows });
        break;
      case 'updated':
        this.updated += outcome.affectedRows;
        this.ctx.eventBus.emit({
          type: 'row:updated',
          ...base,
          affectedRows: outcome.affectedRows,
          where: outcome.where ?? '',
        });
        break;
      case 'skipped':
        this.ctx.eventBus.emit({ type: 'row:skipped', ...base, reason: 'no columns to update' });
        break;
    }
  }
}
