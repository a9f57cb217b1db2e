import type { ImportMode } from '../model/ImportMode.js';
import type { ImportResult } from '../model/ImportResult.js';

/** Emitted once the header is parsed and the destination table is known. */
export interface ImportStartedEvent {
  readonly type: 'import:started';
  readonly importId: string;
  readonly templateId: number;
  readonly table: string;
  readonly mode: ImportMode;
  readonly fileName?: string;
  readonly timestamp: number;
}

/** Emitted when every row passed shape and key validation, before the first write. */
export interface ImportValidatedEvent {
  readonly type: 'import:validated';
  readonly importId: string;
  readonly totalRows: number;
  readonly keyColumns: readonly string[];
  readonly timestamp: number;
}

/** Emitted after a row was inserted. */
export interface RowInsertedEvent {
  readonly type: 'row:inserted';
  readonly importId: string;
  readonly rowNumber: number;
  readonly affectedRows: number;
  readonly timestamp: number;
}

/** Emitted after a row's UPDATE ran. `where` is the rendered predicate. */
export interface RowUpdatedEvent {
  readonly type: 'row:updated';
  readonly importId: string;
  readonly rowNumber: number;
  readonly affectedRows: number;
  readonly where: string;
  readonly timestamp: number;
}

/** Emitted when an update row carries nothing to set. */
export interface RowSkippedEvent {
  readonly type: 'row:skipped';
  readonly importId: string;
  readonly rowNumber: number;
  readonly reason: string;
  readonly timestamp: number;
}

/** Emitted when all rows have been written. */
export interface ImportCompletedEvent {
  readonly type: 'import:completed';
  readonly importId: string;
  readonly result: ImportResult;
  readonly timestamp: number;
}

/** Emitted when the run aborts. The error is rethrown to the caller afterwards. */
export interface ImportFailedEvent {
  readonly type: 'import:failed';
  readonly importId: string;
  readonly error: string;
  /** Error code when the failure is an `ImportError`. */
  readonly code?: string;
  /** Rows written before the failure. The caller's transaction decides whether they stay. */
  readonly inserted: number;
  readonly updated: number;
  readonly timestamp: number;
}

/** Union of all import events. */
export type DomainEvent =
  | ImportStartedEvent
  | ImportValidatedEvent
  | RowInsertedEvent
  | RowUpdatedEvent
  | RowSkippedEvent
  | ImportCompletedEvent
  | ImportFailedEvent;

/** String literal union of all event type names. */
export type EventType = DomainEvent['type'];

/** Extract the event payload type for a given event type string. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;
