import type { FieldSpec } from '../model/FieldSpec.js';
import type { RawRow } from '../model/RawRow.js';
import { createRawRow } from '../model/RawRow.js';
import type { RowValidationError } from '../errors/ImportErrors.js';
import { DuplicateKeyError, MalformedRowError } from '../errors/ImportErrors.js';

/** Splits one line into trimmed cells, keeping empty fields. */
export type LineSplitter = (line: string, separator: string) => string[];

/** Separator used by template header definitions, whatever the file uses. */
export const TEMPLATE_HEADER_SEPARATOR = ',';

/** Split text into lines and drop the ones that are empty or whitespace only. */
export function nonBlankLines(text: string): string[] {
  return text.split(/\r?\n/).filter((line) => line.trim() !== '');
}

/** Pick the separator from a sample line: `;` if present, else tab, else `,`. */
export function detectSeparator(line: string): string {
  if (line.includes(';')) return ';';
  if (line.includes('\t')) return '\t';
  return ',';
}

/**
 * Splits data lines into rows aligned with the header fields and validates
 * them as a whole before anything is written:
 *
 * - every line must have at least one cell per field (extra cells are ignored);
 * - values of key-flagged fields must not repeat across rows.
 *
 * The pass always inspects every line. When it finds conflicts it throws the
 * first one, with all of them in `conflicts`.
 */
export class RowIngestor {
  constructor(private readonly split: LineSplitter) {}

  /**
   * @param lines - Non-blank data lines, in file order.
   * @param firstRowNumber - Row number of `lines[0]`: `2` when the header came from the file, `1` otherwise.
   */
  ingest(lines: readonly string[], fields: readonly FieldSpec[], separator: string, firstRowNumber = 2): RawRow[] {
    const rows: RawRow[] = [];
    const conflicts: RowValidationError[] = [];
    const keyValueFirstRow = new Map<number, Map<string, number>>();
    for (const field of fields) {
      if (field.isKey) keyValueFirstRow.set(field.columnIndex, new Map());
    }

    lines.forEach((line, i) => {
      const rowNumber = firstRowNumber + i;
      const cells = this.split(line, separator);

      if (cells.length < fields.length) {
        const missing = fields[cells.length];
        if (missing) {
          conflicts.push(new MalformedRowError(rowNumber, missing, fields.length, cells.length, line));
        }
        return;
      }

      const row = createRawRow(rowNumber, line, cells.slice(0, fields.length));
      for (const field of fields) {
        const seen = keyValueFirstRow.get(field.columnIndex);
        if (!seen) continue;
        const value = row.cells.get(field.columnIndex) ?? '';
        const firstRow = seen.get(value);
        if (firstRow === undefined) {
          seen.set(value, rowNumber);
        } else {
          conflicts.push(new DuplicateKeyError(rowNumber, field, value, firstRow));
        }
      }
      rows.push(row);
    });

    const first = conflicts[0];
    if (first) {
      first.conflicts = conflicts;
      throw first;
    }
    return rows;
  }
}
