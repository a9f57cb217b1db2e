// Main entry point
export { TableImport } from './TableImport.js';
export type { TableImportConfig } from './TableImport.js';

// Domain model
export type { FieldSpec } from './domain/model/FieldSpec.js';
export { describeField, hasLookup } from './domain/model/FieldSpec.js';
export type { ColumnKind, ColumnConstraints } from './domain/model/ColumnKind.js';
export { isNumericKind } from './domain/model/ColumnKind.js';
export type { RawRow } from './domain/model/RawRow.js';
export type { ResolvedValue, ResolvedColumns } from './domain/model/ResolvedColumns.js';
export type { ImportTemplate } from './domain/model/ImportTemplate.js';
export { templateHeader } from './domain/model/ImportTemplate.js';
export type { ImportMode } from './domain/model/ImportMode.js';
export { parseImportMode } from './domain/model/ImportMode.js';
export type { SqlStatement, Predicate } from './domain/model/SqlStatement.js';
export { describePredicates } from './domain/model/SqlStatement.js';
export type { ImportResult, RowOutcome, RowAction } from './domain/model/ImportResult.js';
export { formatSummary } from './domain/model/ImportResult.js';
export type { PreviewResult, PreviewRow } from './domain/model/PreviewResult.js';

// Errors
export {
  ImportError,
  isImportError,
  ConfigurationError,
  SourceNotFoundError,
  EmptySourceError,
  SequenceExhaustionError,
  RowError,
  RowValidationError,
  MalformedRowError,
  DuplicateKeyError,
  LookupNotFoundError,
  LookupAmbiguousError,
  TypeCastError,
  RecordNotFoundError,
} from './domain/errors/ImportErrors.js';
export type { ImportErrorCode, ImportErrorDetails } from './domain/errors/ImportErrors.js';

// Domain services (for building custom pipelines)
export { parseHeaderToken, parseHeaderTokens, formatHeaderToken } from './domain/services/HeaderTokenParser.js';
export { RowIngestor, detectSeparator, nonBlankLines, TEMPLATE_HEADER_SEPARATOR } from './domain/services/RowIngestor.js';
export type { LineSplitter } from './domain/services/RowIngestor.js';
export { castLiteral, castInteger, castDecimal, castBoolean, castTemporal } from './domain/services/ValueCaster.js';
export type { CastResult } from './domain/services/ValueCaster.js';
export { ValueResolver, isNullCell, normalizeLookupValue } from './domain/services/ValueResolver.js';
export { StatementBuilder, assertIdentifier, assertFieldIdentifiers } from './domain/services/StatementBuilder.js';
export {
  CLIENT_COLUMN,
  ORG_COLUMN,
  ACTIVE_COLUMN,
  UUID_COLUMN,
  firstNonZero,
  firstNonNull,
  primaryKeyColumn,
  applyInsertDefaults,
} from './domain/services/SystemColumns.js';
export type { InsertDefaults } from './domain/services/SystemColumns.js';
export { RowWriter } from './domain/services/RowWriter.js';
export type { RowWriterOptions } from './domain/services/RowWriter.js';

// Application internals
export { EventBus } from './application/EventBus.js';

// Ports (for custom implementations)
export type { DataSource, SourceMetadata } from './domain/ports/DataSource.js';
export type { CatalogService } from './domain/ports/CatalogService.js';
export type { SqlExecutor, SqlRow } from './domain/ports/SqlExecutor.js';
export type { TemplateRepository } from './domain/ports/TemplateRepository.js';
export type { ExecutionContext } from './domain/ports/ExecutionContext.js';

// Domain events
export type {
  DomainEvent,
  EventType,
  EventPayload,
  ImportStartedEvent,
  ImportValidatedEvent,
  RowInsertedEvent,
  RowUpdatedEvent,
  RowSkippedEvent,
  ImportCompletedEvent,
  ImportFailedEvent,
} from './domain/events/DomainEvents.js';

// Infrastructure adapters
export { BufferSource } from './infrastructure/sources/BufferSource.js';
export { FilePathSource } from './infrastructure/sources/FilePathSource.js';
export type { FilePathSourceOptions } from './infrastructure/sources/FilePathSource.js';
export { splitDelimitedLine } from './infrastructure/parsers/DelimitedLineSplitter.js';
