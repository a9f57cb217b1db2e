import type { ImportMode } from '../domain/model/ImportMode.js';
import type { ImportTemplate } from '../domain/model/ImportTemplate.js';
import type { CatalogService } from '../domain/ports/CatalogService.js';
import type { DataSource } from '../domain/ports/DataSource.js';
import type { ExecutionContext } from '../domain/ports/ExecutionContext.js';
import type { SqlExecutor } from '../domain/ports/SqlExecutor.js';
import type { LineSplitter } from '../domain/services/RowIngestor.js';
import { ConfigurationError } from '../domain/errors/ImportErrors.js';
import { EventBus } from './EventBus.js';

/**
 * State shared by the use cases of one `TableImport` instance: the
 * collaborators, the resolved settings and the event bus.
 *
 * Internal class, not exported from the public API.
 */
export class ImportContext {
  readonly eventBus = new EventBus();
  readonly importId: string;

  source: DataSource | null = null;
  started = false;

  constructor(
    readonly template: ImportTemplate,
    readonly catalog: CatalogService,
    readonly executor: SqlExecutor,
    readonly session: ExecutionContext,
    readonly mode: ImportMode,
    readonly split: LineSplitter,
    readonly clock: () => Date,
    readonly uuid: () => string,
  ) {
    this.importId = crypto.randomUUID();
  }

  requireSource(): DataSource {
    if (!this.source) {
      throw new ConfigurationError('Source must be configured. Call .from(source) first.');
    }
    return this.source;
  }
}
