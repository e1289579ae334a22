export { query } from './query/query-object.js';
export type { QueryOptions, TypedQueryOptions } from './query/query-object.js';
export type { QueryBuilder } from './query/builder.js';
export type { CursorPage } from './query/execution.js';
export { FilterOperator, FIELD_KEY } from './query/types.js';
export type { ApplyOutcome, FilterPredicate, QuerySpec, SortOrder } from './query/types.js';
export type { DatastoreGateway, EntityKey, ErrorContext, QueryRun, StoredEntity } from './types.js';
export { connect, DatastoreConnection } from './store/connection.js';
export type { DatastoreConnectionConfig } from './store/connection.js';
export { MAX_BATCH_SIZE } from './store/mutations.js';
export { loadConnectionOptions, parseCredentials } from './config.js';
export type { ConnectionOptions, Credentials } from './config.js';
export { plainCodec, schemaCodec } from './codec.js';
export type { EntityCodec } from './codec.js';
export {
  AggregationError,
  BackendError,
  BatchError,
  CancelledError,
  ConnectionError,
  InvalidQueryError,
  PaginationConflictError,
} from './errors.js';
