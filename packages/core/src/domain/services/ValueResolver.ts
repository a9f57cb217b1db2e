import type { ColumnConstraints, ColumnKind } from '../model/ColumnKind.js';
import { isNumericKind } from '../model/ColumnKind.js';
import type { FieldSpec } from '../model/FieldSpec.js';
import { describeField, hasLookup } from '../model/FieldSpec.js';
import type { RawRow } from '../model/RawRow.js';
import type { ResolvedColumns, ResolvedValue } from '../model/ResolvedColumns.js';
import type { CatalogService } from '../ports/CatalogService.js';
import type { SqlExecutor } from '../ports/SqlExecutor.js';
import {
  ConfigurationError,
  LookupAmbiguousError,
  LookupNotFoundError,
  TypeCastError,
} from '../errors/ImportErrors.js';
import { castLiteral } from './ValueCaster.js';
import type { CastResult } from './ValueCaster.js';
import { StatementBuilder } from './StatementBuilder.js';

const NULL_TOKEN = '(null)';
const DIGITS = /^\d+$/;
const UNBOUNDED: ColumnConstraints = { maxLength: 0 };

/** `true` for a missing cell, an empty cell, or the literal `(null)` in any case. */
export function isNullCell(raw: string | undefined): boolean {
  return raw === undefined || raw === '' || raw.toLowerCase() === NULL_TOKEN;
}

/**
 * Turns raw cells into typed values for the destination table.
 *
 * Resolution order for a cell:
 * 1. empty / missing / `(null)` → `null`;
 * 2. numeric destination column and an all-digit cell → the number itself,
 *    even when the field declares a lookup;
 * 3. field with `[LookupColumn]` → value returned by the lookup query;
 * 4. otherwise the literal cast to the destination column kind.
 *
 * Column kinds and constraints are fetched once per column position and
 * reused for every row of the run.
 */
export class ValueResolver {
  private readonly kinds = new Map<number, ColumnKind>();
  private readonly constraints = new Map<number, ColumnConstraints>();

  constructor(
    private readonly table: string,
    private readonly catalog: CatalogService,
    private readonly executor: SqlExecutor,
  ) {}

  /** Resolve every field of a row, keyed by target column in header order. */
  async resolveRow(fields: readonly FieldSpec[], row: RawRow): Promise<ResolvedColumns> {
    const columns: ResolvedColumns = new Map();
    for (const field of fields) {
      columns.set(field.targetColumn, await this.resolve(field, row.cells.get(field.columnIndex), row.rowNumber));
    }
    return columns;
  }

  async resolve(field: FieldSpec, raw: string | undefined, rowNumber: number): Promise<ResolvedValue> {
    if (raw === undefined || isNullCell(raw)) return null;

    const kind = await this.kindOf(field);
    if (isNumericKind(kind) && DIGITS.test(raw)) {
      return this.unwrap(castLiteral(raw, kind, UNBOUNDED), field, raw, kind, rowNumber);
    }

    if (hasLookup(field)) {
      return this.lookup(field, raw, kind, rowNumber);
    }

    const constraints = kind === 'text' ? await this.constraintsOf(field) : UNBOUNDED;
    return this.unwrap(castLiteral(raw, kind, constraints), field, raw, kind, rowNumber);
  }

  private async lookup(
    field: FieldSpec & { readonly lookupColumn: string },
    raw: string,
    kind: ColumnKind,
    rowNumber: number,
  ): Promise<ResolvedValue> {
    const table = field.lookupTable;
    if (table === null) {
      throw new ConfigurationError(
        `Row ${String(rowNumber)}, ${describeField(field)}: cannot derive the lookup table from column ${field.targetColumn}`,
        { rowNumber, columnIndex: field.columnIndex, token: field.original },
      );
    }

    const countRows = await this.executor.select(StatementBuilder.lookupCount(table, field.lookupColumn, raw));
    const matches = toCount(countRows[0]?.['total']);
    if (matches <= 0) {
      throw new LookupNotFoundError(rowNumber, field, table, field.lookupColumn, raw);
    }
    if (matches > 1) {
      throw new LookupAmbiguousError(rowNumber, field, table, field.lookupColumn, raw, matches);
    }

    const rows = await this.executor.select(
      StatementBuilder.lookupValue(table, field.targetColumn, field.lookupColumn, raw),
    );
    return normalizeLookupValue(rows[0]?.['value'], kind);
  }

  private unwrap(
    result: CastResult,
    field: FieldSpec,
    raw: string,
    kind: ColumnKind,
    rowNumber: number,
  ): ResolvedValue {
    if (!result.ok) {
      throw new TypeCastError(rowNumber, field, raw, kind, result.reason);
    }
    return result.value;
  }

  private async kindOf(field: FieldSpec): Promise<ColumnKind> {
    const cached = this.kinds.get(field.columnIndex);
    if (cached !== undefined) return cached;
    const kind = await this.catalog.columnType(this.table, field.targetColumn);
    this.kinds.set(field.columnIndex, kind);
    return kind;
  }

  private async constraintsOf(field: FieldSpec): Promise<ColumnConstraints> {
    const cached = this.constraints.get(field.columnIndex);
    if (cached !== undefined) return cached;
    const constraints = await this.catalog.columnConstraints(this.table, field.targetColumn);
    this.constraints.set(field.columnIndex, constraints);
    return constraints;
  }
}

function toCount(value: unknown): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'bigint' || typeof value === 'string') return Number(value);
  return 0;
}

/** Bring a driver value returned by a lookup into the representation used for `kind`. */
export function normalizeLookupValue(value: unknown, kind: ColumnKind): ResolvedValue {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) return value;
  if (typeof value === 'boolean') return value ? 'Y' : 'N';
  if (typeof value === 'number') {
    return kind === 'decimal' || kind === 'text' ? String(value) : value;
  }
  if (typeof value === 'bigint') {
    const asNumber = Number(value);
    return kind === 'integer' && Number.isSafeInteger(asNumber) ? asNumber : value.toString();
  }
  const text = typeof value === 'string' ? value : String(value);
  if (kind === 'integer' && /^[+-]?\d+$/.test(text) && Number.isSafeInteger(Number(text))) {
    return Number(text);
  }
  return text;
}
