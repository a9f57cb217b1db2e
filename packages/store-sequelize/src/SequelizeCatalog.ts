import type { Sequelize } from 'sequelize';
import type { CatalogService, ColumnConstraints, ColumnKind } from '@tableimport/core';
import { SequenceExhaustionError } from '@tableimport/core';
import { defineDictionaryModels } from './models/index.js';
import type { DictionaryModels } from './models/index.js';
import type { ColumnRow } from './models/ColumnModel.js';
import type { SequelizeAdapterOptions } from './SequelizeAdapterOptions.js';
import { toColumnKind } from './mappers/DisplayTypeMapper.js';
import { toNumber } from './utils/toNumber.js';

const UNBOUNDED: ColumnConstraints = { maxLength: 0 };

/**
 * `CatalogService` over the application dictionary (`AD_Tab`, `AD_Table`,
 * `AD_Column`, `AD_Sequence`).
 *
 * Table and column metadata are cached for the lifetime of the instance;
 * create one catalog per import. Primary keys are reserved from the table's
 * `AD_Sequence` row, locked for update when a transaction is given.
 *
 * On PostgreSQL, create the `Sequelize` instance with `quoteIdentifiers: false`
 * so the mixed-case dictionary names match the folded table names.
 */
export class SequelizeCatalog implements CatalogService {
  private readonly models: DictionaryModels;
  private readonly tableNames = new Map<number, string | null>();
  private readonly columnsByTable = new Map<string, ReadonlyMap<string, ColumnRow>>();

  constructor(
    sequelize: Sequelize,
    private readonly options: SequelizeAdapterOptions = {},
  ) {
    this.models = defineDictionaryModels(sequelize);
  }

  async resolveTableName(tabId: number): Promise<string | null> {
    const cached = this.tableNames.get(tabId);
    if (cached !== undefined) return cached;

    const transaction = this.options.transaction;
    const tab = await this.models.Tab.findByPk(tabId, { transaction });
    const table = tab ? await this.models.Table.findByPk(tab.getDataValue('AD_Table_ID'), { transaction }) : null;
    const name = table?.getDataValue('TableName') ?? null;
    this.tableNames.set(tabId, name);
    return name;
  }

  async columnType(table: string, column: string): Promise<ColumnKind> {
    const row = await this.findColumn(table, column);
    return row ? toColumnKind(toNumber(row.AD_Reference_ID)) : 'text';
  }

  async columnConstraints(table: string, column: string): Promise<ColumnConstraints> {
    const row = await this.findColumn(table, column);
    if (!row) return UNBOUNDED;
    return { maxLength: Math.max(0, toNumber(row.FieldLength) ?? 0) };
  }

  async tableHasColumn(table: string, column: string): Promise<boolean> {
    return (await this.findColumn(table, column)) !== undefined;
  }

  /** @throws SequenceExhaustionError when `table` has no table-ID sequence. */
  async nextPrimaryKey(table: string): Promise<number> {
    const transaction = this.options.transaction;
    const sequence = await this.models.Sequence.findOne({
      where: { Name: table, IsTableID: 'Y' },
      ...(transaction ? { transaction, lock: true } : {}),
    });
    const current = sequence ? toNumber(sequence.get('CurrentNext')) : null;
    if (!sequence || current === null) {
      throw new SequenceExhaustionError(table);
    }

    const by = toNumber(sequence.get('IncrementNo')) ?? 1;
    await sequence.increment('CurrentNext', { by: by > 0 ? by : 1, transaction });
    return current;
  }

  private async findColumn(table: string, column: string): Promise<ColumnRow | undefined> {
    const columns = await this.columnsOf(table);
    return columns.get(column.toLowerCase());
  }

  private async columnsOf(table: string): Promise<ReadonlyMap<string, ColumnRow>> {
    const key = table.toLowerCase();
    const cached = this.columnsByTable.get(key);
    if (cached) return cached;

    const transaction = this.options.transaction;
    const tableRow = await this.models.Table.findOne({ where: { TableName: table }, transaction });
    const columns = new Map<string, ColumnRow>();
    if (tableRow) {
      const rows = await this.models.Column.findAll({
        where: { AD_Table_ID: tableRow.getDataValue('AD_Table_ID') },
        transaction,
      });
      for (const row of rows) {
        const plain = row.get({ plain: true });
        columns.set(plain.ColumnName.toLowerCase(), plain);
      }
    }
    this.columnsByTable.set(key, columns);
    return columns;
  }
}
