import type { EntityKey } from '../types.js';

/** Comparison operators accepted by `withFilter`. */
export const FilterOperator = {
  Equal: '=',
  GreaterEqual: '>=',
  Greater: '>',
  LessEqual: '<=',
  Less: '<',
  /** Value must be an array. */
  In: 'in',
  /** Value must be an array. */
  NotIn: 'not in',
} as const;

export type FilterOperator = (typeof FilterOperator)[keyof typeof FilterOperator];

/**
 * Pseudo-field matching on entity identity. Filter values are string IDs
 * and are turned into keys of the builder's kind.
 */
export const FIELD_KEY = '__key__';

export type FilterPredicate =
  | { kind: 'property'; field: string; operator: FilterOperator; value: unknown }
  | { kind: 'key'; operator: FilterOperator; key: EntityKey };

export interface SortOrder {
  field: string;
  direction: 'asc' | 'desc';
}

/**
 * Snapshot of everything a builder has accumulated. Never mutated; each
 * builder step produces a new one.
 */
export interface QuerySpec {
  readonly kind: string;
  readonly filters: readonly FilterPredicate[];
  readonly orders: readonly SortOrder[];
  /** 0 means unbounded. */
  readonly limit: number;
  readonly offset: number;
  readonly cursor: string | null;
  readonly ancestor: EntityKey | null;
  readonly projection: readonly string[];
  readonly distinct: boolean;
  readonly keysOnly: boolean;
  readonly usingOffset: boolean;
  readonly usingCursor: boolean;
}

/** What happened to the input of the builder call that produced a builder. */
export type ApplyOutcome =
  | 'applied'
  | 'ignored-empty'
  | 'ignored-invalid'
  | 'ignored-non-positive';

export function emptySpec(kind: string): QuerySpec {
  return {
    kind,
    filters: [],
    orders: [],
    limit: 0,
    offset: 0,
    cursor: null,
    ancestor: null,
    projection: [],
    distinct: false,
    keysOnly: false,
    usingOffset: false,
    usingCursor: false,
  };
}

/** Filters and ancestor only: the shape an aggregation count runs over. */
export function countSpec(spec: QuerySpec): QuerySpec {
  return { ...emptySpec(spec.kind), filters: spec.filters, ancestor: spec.ancestor };
}
