import type { QuerySpec } from './query/types.js';

export interface EntityKey {
  kind: string;
  /** String ID. */
  name?: string;
  /** Backend-allocated numeric ID, as a decimal string. */
  id?: string;
  parent?: EntityKey;
}

export interface StoredEntity {
  key: EntityKey;
  data: Record<string, unknown>;
}

export interface ErrorContext {
  store: 'datastore';
  kind: string;
  operation: string;
}

/** A running query: entities one at a time, then the position it stopped at. */
export interface QueryRun extends AsyncIterable<StoredEntity> {
  /** Only meaningful once iteration has finished. */
  endCursor(): string;
}

/**
 * Backend capability the builder drives. `DatastoreConnection` implements
 * it over the Cloud Datastore client.
 */
export interface DatastoreGateway {
  runQuery(spec: QuerySpec): Promise<StoredEntity[]>;
  /** Aborting `signal` stops the underlying read. */
  iterateQuery(spec: QuerySpec, signal?: AbortSignal): QueryRun;
  /** Raw aggregation result row, keyed by alias. */
  runCount(spec: QuerySpec, alias: string): Promise<Record<string, unknown>>;
  /** Found entities only, in no particular order. */
  lookup(keys: EntityKey[]): Promise<StoredEntity[]>;
  upsert(entities: StoredEntity[]): Promise<void>;
  /** `key` is incomplete; resolves with the allocated key. */
  insert(entity: StoredEntity): Promise<EntityKey>;
  delete(keys: EntityKey[]): Promise<void>;
  reportError(context: ErrorContext, error: unknown): void;
}
