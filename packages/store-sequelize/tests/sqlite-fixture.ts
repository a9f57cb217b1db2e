import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { Sequelize } from 'sequelize';
import { SQLite3Wrapper } from './better-sqlite3-adapter.js';
import { defineDictionaryModels } from '../src/models/index.js';
import type { DictionaryModels } from '../src/models/index.js';
import { DisplayType } from '../src/mappers/DisplayTypeMapper.js';

export interface TestDatabase {
  readonly sequelize: Sequelize;
  readonly models: DictionaryModels;
  close(): Promise<void>;
}

export const USER_TAB_ID = 220;
const USER_TABLE_ID = 114;
const PARTNER_TABLE_ID = 291;

/**
 * SQLite database in a temporary file holding a small dictionary: an `AD_User`
 * table reachable from tab 220, its columns and ID sequence, and a
 * `C_BPartner` table used as lookup target.
 */
export async function createTestDatabase(): Promise<TestDatabase> {
  const dbPath = path.join(os.tmpdir(), `tableimport-${String(Date.now())}-${String(Math.random())}.sqlite`);
  const sequelize = new Sequelize({
    dialect: 'sqlite',
    storage: dbPath,
    logging: false,
    dialectModule: { Database: SQLite3Wrapper },
  });

  const models = defineDictionaryModels(sequelize);
  await sequelize.sync();

  await models.Table.bulkCreate([
    { AD_Table_ID: USER_TABLE_ID, TableName: 'AD_User' },
    { AD_Table_ID: PARTNER_TABLE_ID, TableName: 'C_BPartner' },
  ]);
  await models.Tab.bulkCreate([{ AD_Tab_ID: USER_TAB_ID, AD_Table_ID: USER_TABLE_ID, Name: 'Contact' }]);
  await models.Column.bulkCreate([
    { AD_Column_ID: 1, AD_Table_ID: USER_TABLE_ID, ColumnName: 'AD_User_ID', AD_Reference_ID: DisplayType.ID, FieldLength: 10 },
    { AD_Column_ID: 2, AD_Table_ID: USER_TABLE_ID, ColumnName: 'Value', AD_Reference_ID: 10, FieldLength: 40 },
    { AD_Column_ID: 3, AD_Table_ID: USER_TABLE_ID, ColumnName: 'Name', AD_Reference_ID: 10, FieldLength: 60 },
    { AD_Column_ID: 4, AD_Table_ID: USER_TABLE_ID, ColumnName: 'C_BPartner_ID', AD_Reference_ID: DisplayType.Search, FieldLength: 10 },
    { AD_Column_ID: 5, AD_Table_ID: USER_TABLE_ID, ColumnName: 'IsActive', AD_Reference_ID: DisplayType.YesNo, FieldLength: 1 },
    { AD_Column_ID: 6, AD_Table_ID: USER_TABLE_ID, ColumnName: 'Birthday', AD_Reference_ID: DisplayType.Date, FieldLength: 7 },
    { AD_Column_ID: 7, AD_Table_ID: USER_TABLE_ID, ColumnName: 'Comments', AD_Reference_ID: 14, FieldLength: null },
  ]);
  await models.Sequence.bulkCreate([
    { AD_Sequence_ID: 1, Name: 'AD_User', IsTableID: 'Y', CurrentNext: 1000000, IncrementNo: 1 },
    { AD_Sequence_ID: 2, Name: 'DocumentNo_AD_User', IsTableID: 'N', CurrentNext: 100, IncrementNo: 1 },
  ]);

  await sequelize.query(
    `CREATE TABLE AD_User (
      AD_User_ID INTEGER PRIMARY KEY,
      AD_Client_ID INTEGER NOT NULL,
      AD_Org_ID INTEGER NOT NULL,
      IsActive CHAR(1) NOT NULL DEFAULT 'Y',
      Created TEXT NOT NULL,
      CreatedBy INTEGER NOT NULL,
      Updated TEXT NOT NULL,
      UpdatedBy INTEGER NOT NULL,
      UUID VARCHAR(36),
      Value VARCHAR(40),
      Name VARCHAR(60) NOT NULL,
      C_BPartner_ID INTEGER,
      Birthday TEXT,
      Comments TEXT
    )`,
  );
  await sequelize.query(
    'CREATE TABLE C_BPartner (C_BPartner_ID INTEGER PRIMARY KEY, Value VARCHAR(40) NOT NULL, Name VARCHAR(60) NOT NULL)',
  );
  await sequelize.query(
    "INSERT INTO C_BPartner (C_BPartner_ID, Value, Name) VALUES (1000001, 'ACME01', 'Acme'), (1000002, 'TWIN', 'Twin A'), (1000003, 'TWIN', 'Twin B')",
  );

  return {
    sequelize,
    models,
    async close() {
      await sequelize.close();
      if (fs.existsSync(dbPath)) fs.unlinkSync(dbPath);
    },
  };
}
