import type { Sequelize } from 'sequelize';
import type { ImportTemplate, TemplateRepository } from '@tableimport/core';
import { defineImportTemplateModel } from './models/ImportTemplateModel.js';
import type { ImportTemplateModel } from './models/ImportTemplateModel.js';
import type { SequelizeAdapterOptions } from './SequelizeAdapterOptions.js';
import * as ImportTemplateMapper from './mappers/ImportTemplateMapper.js';

/** `TemplateRepository` over the `AIT_ImportTemplate` table. Inactive templates are not found. */
export class SequelizeTemplateRepository implements TemplateRepository {
  private readonly Template: ImportTemplateModel;

  constructor(
    sequelize: Sequelize,
    private readonly options: SequelizeAdapterOptions = {},
  ) {
    this.Template = defineImportTemplateModel(sequelize);
  }

  async findById(id: number): Promise<ImportTemplate | null> {
    const row = await this.Template.findOne({
      where: { AIT_ImportTemplate_ID: id, IsActive: 'Y' },
      transaction: this.options.transaction,
    });
    return row ? ImportTemplateMapper.toDomain(row.get({ plain: true })) : null;
  }

  /** Insert or replace a template, e.g. after rebuilding its header with `formatHeaderToken`. */
  async save(template: ImportTemplate): Promise<void> {
    await this.Template.upsert(ImportTemplateMapper.toRow(template), {
      transaction: this.options.transaction,
    });
  }
}
