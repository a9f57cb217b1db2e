import type { Sequelize } from 'sequelize';
import { SequelizeCatalog } from './SequelizeCatalog.js';
import { SequelizeSqlExecutor } from './SequelizeSqlExecutor.js';
import { SequelizeTemplateRepository } from './SequelizeTemplateRepository.js';
import type { SequelizeAdapterOptions } from './SequelizeAdapterOptions.js';

export interface SequelizeAdapters {
  readonly catalog: SequelizeCatalog;
  readonly executor: SequelizeSqlExecutor;
  readonly templates: SequelizeTemplateRepository;
}

/**
 * Build the three adapters an import needs, all bound to the same transaction.
 *
 * @example
 * ```typescript
 * await sequelize.transaction(async (transaction) => {
 *   const { catalog, executor, templates } = createSequelizeAdapters(sequelize, { transaction });
 *   const importer = await TableImport.load(templateId, templates, { catalog, executor, context });
 *   await importer.from(new FilePathSource(path)).run();
 * });
 * ```
 */
export function createSequelizeAdapters(sequelize: Sequelize, options: SequelizeAdapterOptions = {}): SequelizeAdapters {
  return {
    catalog: new SequelizeCatalog(sequelize, options),
    executor: new SequelizeSqlExecutor(sequelize, options),
    templates: new SequelizeTemplateRepository(sequelize, options),
  };
}
