import type { SqlStatement } from '../model/SqlStatement.js';

/** A result row keyed by column alias. */
export type SqlRow = Readonly<Record<string, unknown>>;

/**
 * Port for running the statements the engine builds.
 *
 * Implementations bind every call to the caller's ambient transaction; the
 * engine never begins, commits or rolls back.
 */
export interface SqlExecutor {
  /** Run a query and return its rows. */
  select(statement: SqlStatement): Promise<readonly SqlRow[]>;
  /** Run an INSERT and return the number of affected rows. */
  insert(statement: SqlStatement): Promise<number>;
  /** Run an UPDATE and return the number of affected rows. */
  update(statement: SqlStatement): Promise<number>;
}
