import type { Sequelize } from 'sequelize';
import { defineTabModel } from './TabModel.js';
import type { TabModel } from './TabModel.js';
import { defineTableModel } from './TableModel.js';
import type { TableModel } from './TableModel.js';
import { defineColumnModel } from './ColumnModel.js';
import type { ColumnModel } from './ColumnModel.js';
import { defineSequenceModel } from './SequenceModel.js';
import type { SequenceModel } from './SequenceModel.js';
import { defineImportTemplateModel } from './ImportTemplateModel.js';
import type { ImportTemplateModel } from './ImportTemplateModel.js';

/** Dictionary tables read by the adapters. */
export interface DictionaryModels {
  readonly Tab: TabModel;
  readonly Table: TableModel;
  readonly Column: ColumnModel;
  readonly Sequence: SequenceModel;
  readonly ImportTemplate: ImportTemplateModel;
}

/**
 * Define the dictionary models on `sequelize`. The tables belong to the host
 * application; call `sync()` on them only for a throwaway database.
 */
export function defineDictionaryModels(sequelize: Sequelize): DictionaryModels {
  return {
    Tab: defineTabModel(sequelize),
    Table: defineTableModel(sequelize),
    Column: defineColumnModel(sequelize),
    Sequence: defineSequenceModel(sequelize),
    ImportTemplate: defineImportTemplateModel(sequelize),
  };
}
