import type { EntityCodec } from '../codec.js';
import type { DatastoreGateway, EntityKey } from '../types.js';
import { deleteMatching, getMulti, insertWithAutoId, upsert, upsertMulti } from '../store/mutations.js';
import { decodeCursor } from './cursor.js';
import { get, select, selectKeys, selectWithCursor, total } from './execution.js';
import type { CursorPage, ExecutionContext } from './execution.js';
import { emptySpec, FIELD_KEY } from './types.js';
import type { ApplyOutcome, FilterOperator, FilterPredicate, QuerySpec, SortOrder } from './types.js';

/**
 * Fluent immutable query builder for one entity kind. Every `with*` call
 * returns a new QueryBuilder; existing instances are never mutated, so a
 * partly configured builder can be branched freely.
 *
 * Inputs that cannot apply (empty cursor, non-positive limit, ...) are
 * ignored rather than thrown; `lastOutcome` tells which happened.
 *
 * Offset and cursor pagination are checked against each other only when
 * the query runs: `select`, `get` and `selectKeys` reject a cursor, and
 * `selectWithCursor` rejects an offset.
 */
export class QueryBuilder<T> {
  private constructor(
    readonly gateway: DatastoreGateway,
    private readonly codec: EntityCodec<T>,
    private readonly signal: AbortSignal | undefined,
    readonly spec: QuerySpec,
    readonly lastOutcome: ApplyOutcome,
  ) {}

  static create<T>(
    gateway: DatastoreGateway,
    kind: string,
    codec: EntityCodec<T>,
    signal?: AbortSignal,
  ): QueryBuilder<T> {
    return new QueryBuilder(gateway, codec, signal, emptySpec(kind), 'applied');
  }

  get kind(): string {
    return this.spec.kind;
  }

  get usingOffset(): boolean {
    return this.spec.usingOffset;
  }

  get usingCursor(): boolean {
    return this.spec.usingCursor;
  }

  private next(changes: Partial<QuerySpec>, outcome: ApplyOutcome = 'applied'): QueryBuilder<T> {
    return new QueryBuilder(this.gateway, this.codec, this.signal, { ...this.spec, ...changes }, outcome);
  }

  private ignored(outcome: Exclude<ApplyOutcome, 'applied'>): QueryBuilder<T> {
    return this.next({}, outcome);
  }

  /**
   * Adds a filter; filters combine with AND. For `FIELD_KEY` pass the
   * string ID, which becomes a key of this builder's kind. Any other value
   * type on `FIELD_KEY` adds nothing.
   *
   * @example
   * builder.withFilter('status', FilterOperator.In, ['active', 'pending'])
   */
  withFilter(field: string, operator: FilterOperator, value: unknown): QueryBuilder<T> {
    let predicate: FilterPredicate;
    if (field === FIELD_KEY) {
      if (typeof value !== 'string') return this.ignored('ignored-invalid');
      predicate = { kind: 'key', operator, key: { kind: this.spec.kind, name: value } };
    } else {
      predicate = { kind: 'property', field, operator, value };
    }
    return this.next({ filters: [...this.spec.filters, predicate] });
  }

  withOrder(field: string): QueryBuilder<T> {
    return this.addOrder({ field, direction: 'asc' });
  }

  withOrderDesc(field: string): QueryBuilder<T> {
    return this.addOrder({ field, direction: 'desc' });
  }

  private addOrder(order: SortOrder): QueryBuilder<T> {
    return this.next({ orders: [...this.spec.orders, order] });
  }

  withLimit(limit: number): QueryBuilder<T> {
    if (!Number.isInteger(limit)) return this.ignored('ignored-invalid');
    if (limit <= 0) return this.ignored('ignored-non-positive');
    return this.next({ limit });
  }

  /**
   * Skips `offset` results. Marks the query as offset-paginated, which
   * `selectWithCursor` refuses. The backend caps offsets at 1000; page
   * deeper with cursors.
   */
  withOffset(offset: number): QueryBuilder<T> {
    if (!Number.isInteger(offset)) return this.ignored('ignored-invalid');
    if (offset <= 0) return this.ignored('ignored-non-positive');
    return this.next({ offset, usingOffset: true });
  }

  /** Resumes from a cursor returned by `selectWithCursor`. */
  withCursor(cursor: string): QueryBuilder<T> {
    if (cursor === '') return this.ignored('ignored-empty');
    const decoded = decodeCursor(cursor);
    if (decoded === null) return this.ignored('ignored-invalid');
    return this.next({ cursor: decoded, usingCursor: true });
  }

  /** Restricts results to descendants of `ancestor`; strongly consistent. */
  withAncestorKey(ancestor: EntityKey | null | undefined): QueryBuilder<T> {
    if (ancestor === null || ancestor === undefined) return this.ignored('ignored-empty');
    return this.next({ ancestor });
  }

  withProjection(...fields: string[]): QueryBuilder<T> {
    return this.next({ projection: [...this.spec.projection, ...fields] });
  }

  /** Distinct over the projected fields; needs `withProjection`. */
  withDistinct(): QueryBuilder<T> {
    return this.next({ distinct: true });
  }

  keysOnly(): QueryBuilder<T> {
    return this.next({ keysOnly: true });
  }

  private context(): ExecutionContext<T> {
    return { gateway: this.gateway, kind: this.spec.kind, signal: this.signal, spec: this.spec, codec: this.codec };
  }

  select(): Promise<T[]> {
    return select(this.context());
  }

  /**
   * @example
   * let cursor = '';
   * do {
   *   const page = await query(db, 'User').withLimit(100).withCursor(cursor).selectWithCursor();
   *   handle(page.items);
   *   cursor = page.items.length < 100 ? '' : page.cursor;
   * } while (cursor !== '');
   */
  selectWithCursor(): Promise<CursorPage<T>> {
    return selectWithCursor(this.context());
  }

  /** First match, or null. Add `withLimit(1)` to avoid fetching the rest. */
  get(): Promise<T | null> {
    return get(this.context());
  }

  selectKeys(): Promise<EntityKey[]> {
    return selectKeys(this.context());
  }

  total(): Promise<number> {
    return total(this.context());
  }

  upsert(id: string, record: T): Promise<void> {
    return upsert(this.context(), id, record);
  }

  /** Writes in sequential batches of 500; see `BatchError` for partial failure. */
  upsertMulti(items: Map<string, T> | Record<string, T>): Promise<void> {
    return upsertMulti(this.context(), items);
  }

  getMulti(ids: readonly string[]): Promise<Array<T | null>> {
    return getMulti(this.context(), ids);
  }

  insertWithAutoId(record: T): Promise<EntityKey> {
    return insertWithAutoId(this.context(), record);
  }

  delete(): Promise<number> {
    return deleteMatching(this.context());
  }
}
