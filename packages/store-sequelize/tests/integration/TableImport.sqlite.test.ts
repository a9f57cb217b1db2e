import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { QueryTypes } from 'sequelize';
import {
  BufferSource,
  DuplicateKeyError,
  LookupAmbiguousError,
  RecordNotFoundError,
  TableImport,
  parseImportMode,
} from '@tableimport/core';
import type { ExecutionContext, ImportResult } from '@tableimport/core';
import { createSequelizeAdapters } from '../../src/createSequelizeAdapters.js';
import { createTestDatabase, USER_TAB_ID } from '../sqlite-fixture.js';
import type { TestDatabase } from '../sqlite-fixture.js';

const CONTEXT: ExecutionContext = { clientId: 11, orgId: 50000, userId: 100 };
const TEMPLATE_ID = 1000001;

describe('TableImport over SQLite', () => {
  let db: TestDatabase;

  beforeEach(async () => {
    db = await createTestDatabase();
    await db.models.ImportTemplate.create({
      AIT_ImportTemplate_ID: TEMPLATE_ID,
      Name: 'Contacts',
      AD_Tab_ID: USER_TAB_ID,
      AIT_HeaderCSV: null,
      AD_Client_ID: 11,
      AD_Org_ID: 0,
      IsActive: 'Y',
    });
  });

  afterEach(async () => {
    await db.close();
  });

  function runImport(content: string, flags = ''): Promise<ImportResult> {
    return db.sequelize.transaction(async (transaction) => {
      const { catalog, executor, templates } = createSequelizeAdapters(db.sequelize, { transaction });
      const importer = await TableImport.load(TEMPLATE_ID, templates, {
        catalog,
        executor,
        context: CONTEXT,
        mode: parseImportMode(flags),
        uuid: () => 'uuid-test-1',
      });
      return importer.from(new BufferSource(content)).run();
    });
  }

  function users(): Promise<Record<string, unknown>[]> {
    return db.sequelize.query<Record<string, unknown>>('SELECT * FROM AD_User ORDER BY AD_User_ID', {
      type: QueryTypes.SELECT,
    });
  }

  it('should insert rows with resolved lookups and system columns', async () => {
    const result = await runImport('Name,C_BPartner_ID[Value]/K,Birthday\nAcme,ACME01,1990-05-17\n');

    expect(result.summary).toBe('Import finished. Inserted=1, Updated=0');
    const rows = await users();
    expect(rows).toHaveLength(1);
    expect(rows[0]).toMatchObject({
      AD_User_ID: 1000000,
      AD_Client_ID: 11,
      AD_Org_ID: 50000,
      IsActive: 'Y',
      CreatedBy: 100,
      UpdatedBy: 100,
      UUID: 'uuid-test-1',
      Name: 'Acme',
      C_BPartner_ID: 1000001,
    });
    expect(rows[0]?.['Birthday']).toMatch(/^1990-05-17 00:00:00/);
  });

  it('should keep a primary key supplied by the file and leave the sequence alone', async () => {
    await runImport('AD_User_ID,Name\n500,Ann\n');

    expect((await users()).map((r) => r['AD_User_ID'])).toEqual([500]);
    const sequence = await db.models.Sequence.findOne({ where: { Name: 'AD_User' } });
    expect(Number(sequence?.get('CurrentNext'))).toBe(1000000);
  });

  it('should write nothing when the file repeats a key', async () => {
    await expect(runImport('Name,C_BPartner_ID[Value]/K\nAcme,ACME01\nBeta,ACME01\n')).rejects.toThrow(
      DuplicateKeyError,
    );

    expect(await users()).toEqual([]);
  });

  it('should roll back earlier rows when a lookup is ambiguous', async () => {
    await expect(runImport('Name,C_BPartner_ID[Value]\nAcme,ACME01\nTwin,TWIN\n')).rejects.toThrow(
      LookupAmbiguousError,
    );

    expect(await users()).toEqual([]);
  });

  it('should update matching records in update mode', async () => {
    await runImport('Value,Name\nA1,Ann\nB2,Bob\n');

    const result = await runImport('Value/K,Name\nB2,Robert\n', 'U');

    expect(result.summary).toBe('Import finished. Inserted=0, Updated=1');
    expect((await users()).map((r) => r['Name'])).toEqual(['Ann', 'Robert']);
  });

  it('should roll back the whole update when a record is missing', async () => {
    await runImport('Value,Name\nA1,Ann\n');

    await expect(runImport('Value/K,Name\nA1,Annie\nZ9,Nobody\n', 'U')).rejects.toThrow(RecordNotFoundError);

    expect((await users()).map((r) => r['Name'])).toEqual(['Ann']);
  });
});
