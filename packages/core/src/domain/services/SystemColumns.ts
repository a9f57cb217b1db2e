import type { ImportTemplate } from '../model/ImportTemplate.js';
import type { ResolvedColumns } from '../model/ResolvedColumns.js';
import { getColumn, putIfAbsent } from '../model/ResolvedColumns.js';
import type { ExecutionContext } from '../ports/ExecutionContext.js';

export const CLIENT_COLUMN = 'AD_Client_ID';
export const ORG_COLUMN = 'AD_Org_ID';
export const ACTIVE_COLUMN = 'IsActive';
export const UUID_COLUMN = 'UUID';

/** First value greater than zero, or `0`. */
export function firstNonZero(...values: readonly (number | null | undefined)[]): number {
  for (const value of values) {
    if (value !== null && value !== undefined && value > 0) return value;
  }
  return 0;
}

/** First value that is neither `null` nor `undefined`, or `null`. */
export function firstNonNull<T>(...values: readonly (T | null | undefined)[]): T | null {
  for (const value of values) {
    if (value !== null && value !== undefined) return value;
  }
  return null;
}

/** Primary key column of a table: `C_BPartner` → `C_BPartner_ID`. */
export function primaryKeyColumn(table: string): string {
  return `${table}_ID`;
}

/** `true` when the row carries a non-null value for `column` (case-insensitive). */
export function hasValue(columns: ResolvedColumns, column: string): boolean {
  const value = getColumn(columns, column);
  return value !== undefined && value !== null;
}

/** Client scope of a bulk update: template default, then session default. */
export function defaultClientId(template: ImportTemplate, context: ExecutionContext): number {
  return firstNonZero(template.clientId, context.clientId);
}

export interface InsertDefaults {
  readonly table: string;
  readonly template: ImportTemplate;
  readonly context: ExecutionContext;
  /** Reserved key, or `null` when the row already supplies one. */
  readonly primaryKey: number | null;
  /** Whether the destination table defines `IsActive`. */
  readonly hasActiveColumn: boolean;
  readonly now: Date;
  readonly uuid: string;
}

/**
 * Add the system columns an inserted row does not supply: primary key,
 * client and organization, active flag, audit columns and UUID. Values the
 * row already carries are never replaced.
 */
export function applyInsertDefaults(columns: ResolvedColumns, defaults: InsertDefaults): ResolvedColumns {
  const { table, template, context } = defaults;
  const all: ResolvedColumns = new Map(columns);

  if (defaults.primaryKey !== null) {
    putIfAbsent(all, primaryKeyColumn(table), defaults.primaryKey);
  }
  putIfAbsent(all, CLIENT_COLUMN, firstNonZero(template.clientId, context.clientId));
  putIfAbsent(all, ORG_COLUMN, firstNonZero(template.orgId, context.orgId));
  if (defaults.hasActiveColumn) {
    putIfAbsent(all, ACTIVE_COLUMN, 'Y');
  }
  putIfAbsent(all, 'Created', defaults.now);
  putIfAbsent(all, 'CreatedBy', context.userId);
  putIfAbsent(all, 'Updated', defaults.now);
  putIfAbsent(all, 'UpdatedBy', context.userId);
  putIfAbsent(all, UUID_COLUMN, defaults.uuid);

  return all;
}
