import type { ColumnKind } from '../model/ColumnKind.js';
import type { FieldSpec } from '../model/FieldSpec.js';
import { describeField } from '../model/FieldSpec.js';

/** Machine-readable error codes. */
export type ImportErrorCode =
  | 'CONFIGURATION'
  | 'SOURCE_NOT_FOUND'
  | 'EMPTY_SOURCE'
  | 'MALFORMED_ROW'
  | 'DUPLICATE_KEY'
  | 'LOOKUP_NOT_FOUND'
  | 'LOOKUP_AMBIGUOUS'
  | 'TYPE_CAST'
  | 'RECORD_NOT_FOUND'
  | 'SEQUENCE_EXHAUSTED';

export type ImportErrorDetails = Readonly<Record<string, unknown>>;

/** Base class of every error raised by the import engine. All of them abort the run. */
export class ImportError extends Error {
  readonly code: ImportErrorCode;
  readonly details: ImportErrorDetails;

  constructor(code: ImportErrorCode, message: string, details: ImportErrorDetails = {}, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'ImportError';
    this.code = code;
    this.details = details;
  }
}

export function isImportError(err: unknown): err is ImportError {
  return err instanceof ImportError;
}

/** Missing or invalid template, unresolved table, unusable identifier. */
export class ConfigurationError extends ImportError {
  constructor(message: string, details?: ImportErrorDetails) {
    super('CONFIGURATION', message, details);
    this.name = 'ConfigurationError';
  }
}

export class SourceNotFoundError extends ImportError {
  readonly path: string;

  constructor(path: string, cause?: unknown) {
    super('SOURCE_NOT_FOUND', `File not found: ${path}`, { path }, cause);
    this.name = 'SourceNotFoundError';
    this.path = path;
  }
}

/** The source holds no non-blank line. */
export class EmptySourceError extends ImportError {
  constructor(source: string) {
    super('EMPTY_SOURCE', `Empty file: ${source}`, { source });
    this.name = 'EmptySourceError';
  }
}

/** No sequence is registered for the destination table's primary key. */
export class SequenceExhaustionError extends ImportError {
  readonly table: string;

  constructor(table: string) {
    super('SEQUENCE_EXHAUSTED', `No primary key sequence found for table ${table}`, { table });
    this.name = 'SequenceExhaustionError';
    this.table = table;
  }
}

/**
 * Error tied to a cell of the file. The message always starts with
 * `Row <n>, column <c> (<token>): ` so an operator can locate the cell.
 */
export abstract class RowError extends ImportError {
  readonly rowNumber: number;
  readonly columnIndex: number;
  readonly token: string;

  protected constructor(
    code: ImportErrorCode,
    rowNumber: number,
    field: Pick<FieldSpec, 'columnIndex' | 'original'>,
    reason: string,
    details: ImportErrorDetails = {},
  ) {
    super(
      code,
      `Row ${String(rowNumber)}, ${describeField(field)}: ${reason}`,
      { rowNumber, columnIndex: field.columnIndex, token: field.original, ...details },
    );
    this.rowNumber = rowNumber;
    this.columnIndex = field.columnIndex;
    this.token = field.original;
  }
}

/**
 * Raised by the pre-write validation pass. The pass always runs to the end:
 * the thrown error is the first conflict and `conflicts` lists all of them.
 */
export abstract class RowValidationError extends RowError {
  conflicts: readonly RowValidationError[] = [this];
}

/** A data line has fewer cells than the header defines. */
export class MalformedRowError extends RowValidationError {
  readonly expected: number;
  readonly found: number;
  readonly line: string;

  /** `missing` is the first header field without a cell. */
  constructor(rowNumber: number, missing: FieldSpec, expected: number, found: number, line: string) {
    super(
      'MALFORMED_ROW',
      rowNumber,
      missing,
      `incomplete row, expected ${String(expected)} cells, found ${String(found)} -> ${line}`,
      { expected, found, line },
    );
    this.name = 'MalformedRowError';
    this.expected = expected;
    this.found = found;
    this.line = line;
  }
}

/** A key-flagged (`/K`) column repeats a value already seen on an earlier row. */
export class DuplicateKeyError extends RowValidationError {
  readonly firstRowNumber: number;
  readonly value: string;

  constructor(rowNumber: number, field: FieldSpec, value: string, firstRowNumber: number) {
    super(
      'DUPLICATE_KEY',
      rowNumber,
      field,
      `duplicate key value '${value}', already present in row ${String(firstRowNumber)}`,
      { value, firstRowNumber },
    );
    this.name = 'DuplicateKeyError';
    this.firstRowNumber = firstRowNumber;
    this.value = value;
  }
}

export class LookupNotFoundError extends RowError {
  readonly table: string;
  readonly lookupColumn: string;
  readonly value: string;

  constructor(rowNumber: number, field: FieldSpec, table: string, lookupColumn: string, value: string) {
    super('LOOKUP_NOT_FOUND', rowNumber, field, `no value '${value}' found in ${table}.${lookupColumn}`, {
      table,
      lookupColumn,
      value,
    });
    this.name = 'LookupNotFoundError';
    this.table = table;
    this.lookupColumn = lookupColumn;
    this.value = value;
  }
}

export class LookupAmbiguousError extends RowError {
  readonly table: string;
  readonly lookupColumn: string;
  readonly value: string;
  readonly matches: number;

  constructor(rowNumber: number, field: FieldSpec, table: string, lookupColumn: string, value: string, matches: number) {
    super(
      'LOOKUP_AMBIGUOUS',
      rowNumber,
      field,
      `ambiguous value, ${String(matches)} rows found in ${table} for ${lookupColumn}='${value}'`,
      { table, lookupColumn, value, matches },
    );
    this.name = 'LookupAmbiguousError';
    this.table = table;
    this.lookupColumn = lookupColumn;
    this.value = value;
    this.matches = matches;
  }
}

/** A literal cannot be converted to the destination column's kind, or exceeds its maximum length. */
export class TypeCastError extends RowError {
  readonly value: string;
  readonly kind: ColumnKind;

  constructor(rowNumber: number, field: FieldSpec, value: string, kind: ColumnKind, reason: string) {
    super('TYPE_CAST', rowNumber, field, `cannot cast '${value}' to ${kind}: ${reason}`, { value, kind, reason });
    this.name = 'TypeCastError';
    this.value = value;
    this.kind = kind;
  }
}

/** A keyed UPDATE matched no row in the destination table. */
export class RecordNotFoundError extends RowError {
  readonly table: string;
  readonly predicate: string;

  /** `field` is the first key column of the predicate. */
  constructor(rowNumber: number, field: FieldSpec, table: string, predicate: string) {
    super('RECORD_NOT_FOUND', rowNumber, field, `UPDATE found no record in ${table} where ${predicate}`, {
      table,
      predicate,
    });
    this.name = 'RecordNotFoundError';
    this.table = table;
    this.predicate = predicate;
  }
}
