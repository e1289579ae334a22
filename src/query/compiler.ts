import { PropertyFilter } from '@google-cloud/datastore';
import type { Datastore } from '@google-cloud/datastore';
import type { EntityKey } from '../types.js';
import { FIELD_KEY } from './types.js';
import type { FilterOperator, FilterPredicate, QuerySpec } from './types.js';

export type NativeQuery = ReturnType<Datastore['createQuery']>;
export type NativeKey = ReturnType<Datastore['key']>;
export type NativeAggregateQuery = ReturnType<Datastore['createAggregationQuery']>;

const NATIVE_OPERATORS = {
  '=': '=',
  '>=': '>=',
  '>': '>',
  '<=': '<=',
  '<': '<',
  'in': 'IN',
  'not in': 'NOT_IN',
} as const satisfies Record<FilterOperator, string>;

/**
 * Builds a native key. Given a bare path the client applies its own
 * namespace, so keys and queries from one client share a partition.
 */
export function toNativeKey(client: Datastore, key: EntityKey): NativeKey {
  return client.key(keyPath(client, key));
}

function keyPath(client: Datastore, key: EntityKey): Array<string | ReturnType<Datastore['int']>> {
  const own: Array<string | ReturnType<Datastore['int']>> = [key.kind];
  if (key.name !== undefined) {
    own.push(key.name);
  } else if (key.id !== undefined) {
    own.push(client.int(key.id));
  }
  return key.parent === undefined ? own : [...keyPath(client, key.parent), ...own];
}

export function fromNativeKey(key: NativeKey): EntityKey {
  const result: EntityKey = { kind: key.kind };
  if (key.name !== undefined) result.name = key.name;
  if (key.id !== undefined) result.id = String(key.id);
  if (key.parent !== undefined) result.parent = fromNativeKey(key.parent);
  return result;
}

function compileFilter(client: Datastore, predicate: FilterPredicate): PropertyFilter<string> {
  const op = NATIVE_OPERATORS[predicate.operator];
  if (predicate.kind === 'key') {
    return new PropertyFilter(FIELD_KEY, op, toNativeKey(client, predicate.key));
  }
  return new PropertyFilter(predicate.field, op, predicate.value);
}

/**
 * Translates a QuerySpec into a native query. Offset, limit and cursor are only
 * set when the query carries them.
 */
export function compileQuery(client: Datastore, spec: QuerySpec): NativeQuery {
  const q = client.createQuery(spec.kind);

  for (const predicate of spec.filters) {
    q.filter(compileFilter(client, predicate));
  }
  if (spec.ancestor !== null) {
    q.hasAncestor(toNativeKey(client, spec.ancestor));
  }
  for (const order of spec.orders) {
    q.order(order.field, { descending: order.direction === 'desc' });
  }

  if (spec.keysOnly) {
    q.select(FIELD_KEY);
  } else if (spec.projection.length > 0) {
    q.select([...spec.projection]);
    if (spec.distinct) q.groupBy([...spec.projection]);
  }

  if (spec.limit > 0) q.limit(spec.limit);
  if (spec.offset > 0) q.offset(spec.offset);
  if (spec.cursor !== null) q.start(spec.cursor);

  return q;
}

export function compileCountQuery(client: Datastore, spec: QuerySpec, alias: string): NativeAggregateQuery {
  return client.createAggregationQuery(compileQuery(client, spec)).count(alias);
}
