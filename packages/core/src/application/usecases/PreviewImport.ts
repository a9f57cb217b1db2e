import type { PreviewResult, PreviewRow } from '../../domain/model/PreviewResult.js';
import { ValueResolver } from '../../domain/services/ValueResolver.js';
import type { ImportContext } from '../ImportContext.js';
import { PrepareImport } from './PrepareImport.js';

/** Use case: validate the file and resolve a sample of rows, lookups included, without writing. */
export class PreviewImport {
  constructor(private readonly ctx: ImportContext) {}

  async execute(maxRows: number): Promise<PreviewResult> {
    const prepared = await new PrepareImport(this.ctx).execute();
    const resolver = new ValueResolver(prepared.table, this.ctx.catalog, this.ctx.executor);

    const rows: PreviewRow[] = [];
    for (const row of prepared.rows.slice(0, Math.max(0, maxRows))) {
      rows.push({ rowNumber: row.rowNumber, columns: await resolver.resolveRow(prepared.fields, row) });
    }

    return {
      table: prepared.table,
      separator: prepared.separator,
      fields: prepared.fields,
      rows,
      totalRows: prepared.rows.length,
    };
  }
}
