import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { SequenceExhaustionError } from '@tableimport/core';
import { SequelizeCatalog } from '../../src/SequelizeCatalog.js';
import { createTestDatabase, USER_TAB_ID } from '../sqlite-fixture.js';
import type { TestDatabase } from '../sqlite-fixture.js';

describe('SequelizeCatalog', () => {
  let db: TestDatabase;
  let catalog: SequelizeCatalog;

  beforeEach(async () => {
    db = await createTestDatabase();
    catalog = new SequelizeCatalog(db.sequelize);
  });

  afterEach(async () => {
    await db.close();
  });

  describe('resolveTableName', () => {
    it('should resolve the table behind a tab', async () => {
      expect(await catalog.resolveTableName(USER_TAB_ID)).toBe('AD_User');
    });

    it('should return null for an unknown tab', async () => {
      expect(await catalog.resolveTableName(999)).toBeNull();
    });
  });

  describe('columnType', () => {
    it('should map display types to column kinds', async () => {
      expect(await catalog.columnType('AD_User', 'C_BPartner_ID')).toBe('integer');
      expect(await catalog.columnType('AD_User', 'IsActive')).toBe('boolean');
      expect(await catalog.columnType('AD_User', 'Birthday')).toBe('temporal');
      expect(await catalog.columnType('AD_User', 'Name')).toBe('text');
    });

    it('should match table and column names case-insensitively', async () => {
      expect(await catalog.columnType('AD_User', 'c_bpartner_id')).toBe('integer');
    });

    it('should treat unknown columns as text', async () => {
      expect(await catalog.columnType('AD_User', 'Nickname')).toBe('text');
      expect(await catalog.columnType('C_Unknown', 'Name')).toBe('text');
    });
  });

  describe('columnConstraints', () => {
    it('should return the field length', async () => {
      expect(await catalog.columnConstraints('AD_User', 'Name')).toEqual({ maxLength: 60 });
    });

    it('should treat a missing length or an unknown column as unbounded', async () => {
      expect(await catalog.columnConstraints('AD_User', 'Comments')).toEqual({ maxLength: 0 });
      expect(await catalog.columnConstraints('AD_User', 'Nickname')).toEqual({ maxLength: 0 });
    });
  });

  describe('tableHasColumn', () => {
    it('should report dictionary columns only', async () => {
      expect(await catalog.tableHasColumn('AD_User', 'IsActive')).toBe(true);
      expect(await catalog.tableHasColumn('AD_User', 'Nickname')).toBe(false);
    });
  });

  describe('nextPrimaryKey', () => {
    it('should return the current value and advance the sequence', async () => {
      expect(await catalog.nextPrimaryKey('AD_User')).toBe(1000000);
      expect(await catalog.nextPrimaryKey('AD_User')).toBe(1000001);

      const sequence = await db.models.Sequence.findOne({ where: { Name: 'AD_User' } });
      expect(Number(sequence?.get('CurrentNext'))).toBe(1000002);
    });

    it('should reserve keys inside a transaction', async () => {
      const key = await db.sequelize.transaction(async (transaction) =>
        new SequelizeCatalog(db.sequelize, { transaction }).nextPrimaryKey('AD_User'),
      );

      expect(key).toBe(1000000);
      expect(await catalog.nextPrimaryKey('AD_User')).toBe(1000001);
    });

    it('should reject a table without a table-ID sequence', async () => {
      await expect(catalog.nextPrimaryKey('C_BPartner')).rejects.toThrow(SequenceExhaustionError);
    });
  });
});
