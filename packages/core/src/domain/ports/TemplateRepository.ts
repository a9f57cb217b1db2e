import type { ImportTemplate } from '../model/ImportTemplate.js';

/** Port for loading stored import templates. */
export interface TemplateRepository {
  findById(id: number): Promise<ImportTemplate | null>;
}
