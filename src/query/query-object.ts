import { plainCodec } from '../codec.js';
import type { EntityCodec } from '../codec.js';
import type { DatastoreGateway } from '../types.js';
import { QueryBuilder } from './builder.js';

export interface QueryOptions {
  /** Governs every backend round trip the builder makes. */
  signal?: AbortSignal;
}

export interface TypedQueryOptions<T> extends QueryOptions {
  codec: EntityCodec<T>;
}

/**
 * Entry point for the query DSL.
 *
 * @example
 * const users = await query(db, 'User', { codec: schemaCodec(User) })
 *   .withFilter('status', FilterOperator.Equal, 'active')
 *   .withOrderDesc('createdAt')
 *   .withLimit(50)
 *   .select();
 */
export function query(gateway: DatastoreGateway, kind: string, options?: QueryOptions): QueryBuilder<Record<string, unknown>>;
export function query<T>(gateway: DatastoreGateway, kind: string, options: TypedQueryOptions<T>): QueryBuilder<T>;
export function query<T>(
  gateway: DatastoreGateway,
  kind: string,
  options?: QueryOptions | TypedQueryOptions<T>,
): QueryBuilder<T> | QueryBuilder<Record<string, unknown>> {
  if (options !== undefined && 'codec' in options) {
    return QueryBuilder.create(gateway, kind, options.codec, options.signal);
  }
  return QueryBuilder.create(gateway, kind, plainCodec, options?.signal);
}
