/**
 * Ambient session of the caller: who is importing and for which client and
 * organization. Identifiers are `0` when unset.
 *
 * The active transaction is not part of this object; it is bound to the
 * `SqlExecutor` and `CatalogService` adapters when they are created.
 */
export interface ExecutionContext {
  readonly clientId: number;
  readonly orgId: number;
  readonly userId: number;
}
