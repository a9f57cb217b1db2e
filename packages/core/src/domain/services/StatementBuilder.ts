import type { FieldSpec } from '../model/FieldSpec.js';
import type { ResolvedColumns, ResolvedValue } from '../model/ResolvedColumns.js';
import type { Predicate, SqlStatement } from '../model/SqlStatement.js';
import { ConfigurationError } from '../errors/ImportErrors.js';

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Reject anything that is not a plain SQL identifier. Table and column names
 * come from the file header and are written into the statement text.
 */
export function assertIdentifier(name: string, role: string): string {
  if (!IDENTIFIER.test(name)) {
    throw new ConfigurationError(`Invalid ${role} name '${name}'`, { name, role });
  }
  return name;
}

/** Builds the dynamic statements of an import. Values always travel as parameters. */
export const StatementBuilder = {
  /** `INSERT INTO T (a,b) VALUES (?,?)`, columns in insertion order. */
  insert(table: string, columns: ResolvedColumns): SqlStatement {
    assertIdentifier(table, 'table');
    const names = [...columns.keys()].map((c) => assertIdentifier(c, 'column'));
    if (names.length === 0) {
      throw new ConfigurationError(`Nothing to insert into ${table}`, { table });
    }
    return {
      sql: `INSERT INTO ${table} (${names.join(',')}) VALUES (${names.map(() => '?').join(',')})`,
      params: [...columns.values()],
    };
  },

  /** `UPDATE T SET a=?,b=? WHERE k=? AND j IS NULL`. */
  update(table: string, sets: ResolvedColumns, where: readonly Predicate[]): SqlStatement {
    assertIdentifier(table, 'table');
    if (sets.size === 0) {
      throw new ConfigurationError(`Nothing to update in ${table}`, { table });
    }
    if (where.length === 0) {
      throw new ConfigurationError(`UPDATE on ${table} requires a WHERE clause`, { table });
    }
    const assignments = [...sets.keys()].map((c) => `${assertIdentifier(c, 'column')}=?`);
    const conditions: string[] = [];
    const whereParams: ResolvedValue[] = [];
    for (const predicate of where) {
      const column = assertIdentifier(predicate.column, 'column');
      if (predicate.value === null) {
        conditions.push(`${column} IS NULL`);
      } else {
        conditions.push(`${column}=?`);
        whereParams.push(predicate.value);
      }
    }
    return {
      sql: `UPDATE ${table} SET ${assignments.join(',')} WHERE ${conditions.join(' AND ')}`,
      params: [...sets.values(), ...whereParams],
    };
  },

  /** `SELECT COUNT(*) AS total FROM T WHERE k=?`. */
  lookupCount(table: string, lookupColumn: string, value: string): SqlStatement {
    return {
      sql: `SELECT COUNT(*) AS total FROM ${assertIdentifier(table, 'table')} WHERE ${assertIdentifier(lookupColumn, 'column')}=?`,
      params: [value],
    };
  },

  /** `SELECT c AS value FROM T WHERE k=?`. */
  lookupValue(table: string, column: string, lookupColumn: string, value: string): SqlStatement {
    return {
      sql: `SELECT ${assertIdentifier(column, 'column')} AS value FROM ${assertIdentifier(table, 'table')} WHERE ${assertIdentifier(lookupColumn, 'column')}=?`,
      params: [value],
    };
  },
};

/**
 * Check every identifier a header field contributes to SQL text, and that a
 * lookup field names its table, before any row is written.
 */
export function assertFieldIdentifiers(field: FieldSpec): void {
  if (field.lookupColumn !== null && field.lookupTable === null) {
    throw new ConfigurationError(
      `Column ${String(field.columnIndex)} (${field.original}): cannot derive the lookup table from column ${field.targetColumn}`,
      { columnIndex: field.columnIndex, token: field.original },
    );
  }
  const names = [field.targetColumn, field.lookupColumn, field.lookupTable].filter((n): n is string => n !== null);
  for (const name of names) {
    if (!IDENTIFIER.test(name)) {
      throw new ConfigurationError(
        `Column ${String(field.columnIndex)} (${field.original}): invalid identifier '${name}'`,
        { columnIndex: field.columnIndex, token: field.original, name },
      );
    }
  }
}
