import { QueryTypes } from 'sequelize';
import type { Sequelize } from 'sequelize';
import type { SqlExecutor, SqlRow, SqlStatement } from '@tableimport/core';
import type { SequelizeAdapterOptions } from './SequelizeAdapterOptions.js';

/**
 * `SqlExecutor` that runs statements through `sequelize.query()` with
 * positional replacements. Statement logging follows the `logging` option of
 * the `Sequelize` instance.
 */
export class SequelizeSqlExecutor implements SqlExecutor {
  constructor(
    private readonly sequelize: Sequelize,
    private readonly options: SequelizeAdapterOptions = {},
  ) {}

  async select(statement: SqlStatement): Promise<readonly SqlRow[]> {
    return this.sequelize.query<SqlRow>(statement.sql, {
      replacements: [...statement.params],
      type: QueryTypes.SELECT,
      transaction: this.options.transaction,
    });
  }

  async insert(statement: SqlStatement): Promise<number> {
    const [, affectedRows] = await this.sequelize.query(statement.sql, {
      replacements: [...statement.params],
      type: QueryTypes.INSERT,
      transaction: this.options.transaction,
    });
    return affectedRows;
  }

  async update(statement: SqlStatement): Promise<number> {
    return this.sequelize.query(statement.sql, {
      replacements: [...statement.params],
      type: QueryTypes.BULKUPDATE,
      transaction: this.options.transaction,
    });
  }
}
