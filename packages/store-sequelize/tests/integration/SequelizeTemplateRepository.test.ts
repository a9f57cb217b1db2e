import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { SequelizeTemplateRepository } from '../../src/SequelizeTemplateRepository.js';
import { createTestDatabase, USER_TAB_ID } from '../sqlite-fixture.js';
import type { TestDatabase } from '../sqlite-fixture.js';

describe('SequelizeTemplateRepository', () => {
  let db: TestDatabase;
  let repository: SequelizeTemplateRepository;

  beforeEach(async () => {
    db = await createTestDatabase();
    repository = new SequelizeTemplateRepository(db.sequelize);
  });

  afterEach(async () => {
    await db.close();
  });

  it('should load an active template', async () => {
    await db.models.ImportTemplate.create({
      AIT_ImportTemplate_ID: 1000001,
      Name: 'Contacts',
      AD_Tab_ID: USER_TAB_ID,
      AIT_HeaderCSV: 'Value/K,Name',
      AD_Client_ID: 11,
      AD_Org_ID: 0,
      IsActive: 'Y',
    });

    expect(await repository.findById(1000001)).toEqual({
      id: 1000001,
      name: 'Contacts',
      tabId: USER_TAB_ID,
      headerCsv: 'Value/K,Name',
      clientId: 11,
      orgId: 0,
    });
  });

  it('should not find an inactive template', async () => {
    await db.models.ImportTemplate.create({
      AIT_ImportTemplate_ID: 1000002,
      Name: 'Retired',
      AD_Tab_ID: USER_TAB_ID,
      AIT_HeaderCSV: null,
      AD_Client_ID: 11,
      AD_Org_ID: 0,
      IsActive: 'N',
    });

    expect(await repository.findById(1000002)).toBeNull();
  });

  it('should return null for an unknown id', async () => {
    expect(await repository.findById(42)).toBeNull();
  });

  it('should save and replace a template', async () => {
    const template = { id: 1000003, name: 'Users', tabId: USER_TAB_ID, headerCsv: null, clientId: 11, orgId: 0 };

    await repository.save(template);
    await repository.save({ ...template, headerCsv: 'Name,C_BPartner_ID[Value]/K' });

    expect(await repository.findById(1000003)).toEqual({ ...template, headerCsv: 'Name,C_BPartner_ID[Value]/K' });
    expect(await db.models.ImportTemplate.count()).toBe(1);
  });
});
