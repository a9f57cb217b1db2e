import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { SequelizeSqlExecutor } from '../../src/SequelizeSqlExecutor.js';
import { createTestDatabase } from '../sqlite-fixture.js';
import type { TestDatabase } from '../sqlite-fixture.js';

describe('SequelizeSqlExecutor', () => {
  let db: TestDatabase;
  let executor: SequelizeSqlExecutor;

  beforeEach(async () => {
    db = await createTestDatabase();
    executor = new SequelizeSqlExecutor(db.sequelize);
  });

  afterEach(async () => {
    await db.close();
  });

  it('should return the rows of a select', async () => {
    const rows = await executor.select({
      sql: 'SELECT COUNT(*) AS total FROM C_BPartner WHERE Value=?',
      params: ['TWIN'],
    });

    expect(rows).toEqual([{ total: 2 }]);
  });

  it('should insert with positional parameters and report one affected row', async () => {
    const affected = await executor.insert({
      sql: 'INSERT INTO C_BPartner (C_BPartner_ID,Value,Name) VALUES (?,?,?)',
      params: [1000010, 'OBR', "O'Brien"],
    });

    expect(affected).toBe(1);
    const rows = await executor.select({ sql: 'SELECT Name AS value FROM C_BPartner WHERE Value=?', params: ['OBR'] });
    expect(rows).toEqual([{ value: "O'Brien" }]);
  });

  it('should report the number of updated rows', async () => {
    const affected = await executor.update({
      sql: 'UPDATE C_BPartner SET Name=? WHERE Value=?',
      params: ['Twin', 'TWIN'],
    });

    expect(affected).toBe(2);
  });

  it('should report zero when an update matches nothing', async () => {
    const affected = await executor.update({
      sql: 'UPDATE C_BPartner SET Name=? WHERE Value=?',
      params: ['Nobody', 'MISSING'],
    });

    expect(affected).toBe(0);
  });

  it('should run inside the given transaction', async () => {
    await expect(
      db.sequelize.transaction(async (transaction) => {
        await new SequelizeSqlExecutor(db.sequelize, { transaction }).update({
          sql: 'UPDATE C_BPartner SET Name=? WHERE Value=?',
          params: ['Renamed', 'ACME01'],
        });
        throw new Error('abort');
      }),
    ).rejects.toThrow('abort');

    const rows = await executor.select({ sql: 'SELECT Name AS value FROM C_BPartner WHERE Value=?', params: ['ACME01'] });
    expect(rows).toEqual([{ value: 'Acme' }]);
  });
});
