export { SequelizeCatalog } from './SequelizeCatalog.js';
export { SequelizeSqlExecutor } from './SequelizeSqlExecutor.js';
export { SequelizeTemplateRepository } from './SequelizeTemplateRepository.js';
export { createSequelizeAdapters } from './createSequelizeAdapters.js';
export type { SequelizeAdapters } from './createSequelizeAdapters.js';
export type { SequelizeAdapterOptions } from './SequelizeAdapterOptions.js';
export { DisplayType, toColumnKind } from './mappers/DisplayTypeMapper.js';
export { defineDictionaryModels } from './models/index.js';
export type { DictionaryModels } from './models/index.js';
export type { TabRow } from './models/TabModel.js';
export type { TableRow } from './models/TableModel.js';
export type { ColumnRow } from './models/ColumnModel.js';
export type { SequenceRow } from './models/SequenceModel.js';
export type { ImportTemplateRow } from './models/ImportTemplateModel.js';
