import type { ImportMode } from './domain/model/ImportMode.js';
import type { ImportResult } from './domain/model/ImportResult.js';
import type { ImportTemplate } from './domain/model/ImportTemplate.js';
import type { PreviewResult } from './domain/model/PreviewResult.js';
import type { CatalogService } from './domain/ports/CatalogService.js';
import type { DataSource } from './domain/ports/DataSource.js';
import type { ExecutionContext } from './domain/ports/ExecutionContext.js';
import type { SqlExecutor } from './domain/ports/SqlExecutor.js';
import type { TemplateRepository } from './domain/ports/TemplateRepository.js';
import type { EventType, EventPayload, DomainEvent } from './domain/events/DomainEvents.js';
import type { LineSplitter } from './domain/services/RowIngestor.js';
import { ConfigurationError } from './domain/errors/ImportErrors.js';
import { ImportContext } from './application/ImportContext.js';
import { RunImport } from './application/usecases/RunImport.js';
import { PreviewImport } from './application/usecases/PreviewImport.js';
import { splitDelimitedLine } from './infrastructure/parsers/DelimitedLineSplitter.js';

/** Configuration for a table import. */
export interface TableImportConfig {
  /** Import definition: destination tab, optional header and default client/org. */
  readonly template: ImportTemplate;
  /** Metadata catalog of the destination store. */
  readonly catalog: CatalogService;
  /** Runs the lookups and writes, bound to the caller's transaction. */
  readonly executor: SqlExecutor;
  /** Caller's client, organization and user. */
  readonly context: ExecutionContext;
  /** Default: `'insert'`. Use `parseImportMode()` to read the `"U"` option flag. */
  readonly mode?: ImportMode;
  /** Clock used for `Created`/`Updated`. Default: `() => new Date()`. */
  readonly clock?: () => Date;
  /** Generator for the `UUID` column. Default: `crypto.randomUUID`. */
  readonly uuid?: () => string;
  /** Splits one line into trimmed cells. Default: quote-aware delimited splitting. */
  readonly splitLine?: LineSplitter;
}

/**
 * Facade over one import run: read → parse header → validate → resolve → write.
 *
 * Delegates each operation to a use case in `application/usecases/`.
 * Holds the shared `ImportContext` that all use cases operate on.
 *
 * @example
 * ```typescript
 * const importer = await TableImport.load(1000001, templates, { catalog, executor, context });
 * importer.from(new FilePathSource('/data/partners.csv'));
 * importer.on('row:inserted', (e) => console.log(e.rowNumber));
 * const result = await importer.run();
 * console.log(result.summary);
 * ```
 */
export class TableImport {
  private readonly ctx: ImportContext;

  constructor(config: TableImportConfig) {
    this.ctx = new ImportContext(
      config.template,
      config.catalog,
      config.executor,
      config.context,
      config.mode ?? 'insert',
      config.splitLine ?? splitDelimitedLine,
      config.clock ?? (() => new Date()),
      config.uuid ?? (() => crypto.randomUUID()),
    );
  }

  /**
   * Create an import from a stored template.
   *
   * @throws ConfigurationError when `templateId` is not positive or no template has that id.
   */
  static async load(
    templateId: number,
    repository: TemplateRepository,
    config: Omit<TableImportConfig, 'template'>,
  ): Promise<TableImport> {
    if (!Number.isInteger(templateId) || templateId <= 0) {
      throw new ConfigurationError(`Invalid import template id: ${String(templateId)}`, { templateId });
    }
    const template = await repository.findById(templateId);
    if (!template) {
      throw new ConfigurationError(`Import template ${String(templateId)} not found`, { templateId });
    }
    return new TableImport({ ...config, template });
  }

  /** Identifier carried by every event of this import. */
  get importId(): string {
    return this.ctx.importId;
  }

  /** Set the file to import. Returns `this` for chaining. */
  from(source: DataSource): this {
    this.ctx.source = source;
    return this;
  }

  /** Subscribe to an import event. Returns `this` for chaining. */
  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.eventBus.on(type, handler);
    return this;
  }

  off<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.eventBus.off(type, handler);
    return this;
  }

  /** Subscribe to every event. Returns `this` for chaining. */
  onAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.onAny(handler);
    return this;
  }

  offAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.offAny(handler);
    return this;
  }

  /** Validate the file and resolve its first `maxRows` rows without writing. Emits no events. */
  async preview(maxRows = 10): Promise<PreviewResult> {
    return new PreviewImport(this.ctx).execute(maxRows);
  }

  /**
   * Run the import. Every error aborts the run, is reported through
   * `import:failed` and rethrown. Can be called once per instance.
   */
  async run(): Promise<ImportResult> {
    return new RunImport(this.ctx).execute();
  }
}
