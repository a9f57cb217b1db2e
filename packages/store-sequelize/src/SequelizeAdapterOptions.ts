import type { Transaction } from 'sequelize';

export interface SequelizeAdapterOptions {
  /**
   * Transaction every query runs on. The adapters never begin, commit or
   * roll back; the caller owns the transaction. Default: none (autocommit).
   */
  readonly transaction?: Transaction;
}
