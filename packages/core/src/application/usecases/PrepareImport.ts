import type { FieldSpec } from '../../domain/model/FieldSpec.js';
import type { RawRow } from '../../domain/model/RawRow.js';
import { templateHeader } from '../../domain/model/ImportTemplate.js';
import type { DataSource } from '../../domain/ports/DataSource.js';
import { ConfigurationError, EmptySourceError } from '../../domain/errors/ImportErrors.js';
import { parseHeaderTokens } from '../../domain/services/HeaderTokenParser.js';
import {
  RowIngestor,
  TEMPLATE_HEADER_SEPARATOR,
  detectSeparator,
  nonBlankLines,
} from '../../domain/services/RowIngestor.js';
import { assertFieldIdentifiers, assertIdentifier } from '../../domain/services/StatementBuilder.js';
import type { ImportContext } from '../ImportContext.js';

const BOM = '\uFEFF';

/** Header parsed and destination table resolved; data lines not yet checked. */
export interface ParsedImport {
  readonly table: string;
  readonly separator: string;
  readonly fields: readonly FieldSpec[];
  readonly dataLines: readonly string[];
  /** Row number of the first data line (2 when the file carries the header). */
  readonly firstRowNumber: number;
}

/** A file read, parsed and validated, ready to be resolved row by row. */
export interface PreparedImport {
  readonly table: string;
  readonly separator: string;
  readonly fields: readonly FieldSpec[];
  readonly rows: readonly RawRow[];
}

/**
 * Use case: read the source, resolve the destination table, parse the header
 * and validate every data row. Nothing is written.
 */
export class PrepareImport {
  constructor(private readonly ctx: ImportContext) {}

  async execute(): Promise<PreparedImport> {
    const parsed = await this.parse();
    return { table: parsed.table, separator: parsed.separator, fields: parsed.fields, rows: this.validate(parsed) };
  }

  async parse(): Promise<ParsedImport> {
    const source = this.ctx.requireSource();
    const lines = nonBlankLines(await readText(source));
    const firstLine = lines[0];
    if (firstLine === undefined) {
      throw new EmptySourceError(source.metadata().fileName ?? 'source');
    }

    const table = await this.resolveTable();
    const separator = detectSeparator(firstLine);

    const header = templateHeader(this.ctx.template);
    const fields =
      header === null
        ? parseHeaderTokens(this.ctx.split(firstLine, separator))
        : parseHeaderTokens(this.ctx.split(header, TEMPLATE_HEADER_SEPARATOR));
    fields.forEach(assertFieldIdentifiers);

    return {
      table,
      separator,
      fields,
      dataLines: header === null ? lines.slice(1) : lines,
      firstRowNumber: header === null ? 2 : 1,
    };
  }

  /** Shape and duplicate-key checks over every data line. Throws the first conflict found. */
  validate(parsed: ParsedImport): RawRow[] {
    return new RowIngestor(this.ctx.split).ingest(
      parsed.dataLines,
      parsed.fields,
      parsed.separator,
      parsed.firstRowNumber,
    );
  }

  private async resolveTable(): Promise<string> {
    const { template, catalog } = this.ctx;
    const table = await catalog.resolveTableName(template.tabId);
    if (table === null) {
      throw new ConfigurationError(`No table found for tab ${String(template.tabId)}`, {
        templateId: template.id,
        tabId: template.tabId,
      });
    }
    return assertIdentifier(table, 'table');
  }
}

async function readText(source: DataSource): Promise<string> {
  let text = '';
  for await (const chunk of source.read()) {
    text += typeof chunk === 'string' ? chunk : chunk.toString('utf-8');
  }
  return text.startsWith(BOM) ? text.slice(1) : text;
}
