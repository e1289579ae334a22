import type { EntityCodec } from '../codec.js';
import type { EntityKey, StoredEntity } from '../types.js';
import { AggregationError, BackendError, CancelledError, InvalidQueryError, PaginationConflictError } from '../errors.js';
import { callBackend, raceSignal, throwIfCancelled } from '../store/backend-call.js';
import type { CallContext } from '../store/backend-call.js';
import { countSpec } from './types.js';
import type { QuerySpec } from './types.js';

export const COUNT_ALIAS = 'total';

export interface ExecutionContext<T> extends CallContext {
  spec: QuerySpec;
  codec: EntityCodec<T>;
}

export interface CursorPage<T> {
  items: T[];
  /** Pass to `withCursor` on an identically shaped query to resume. */
  cursor: string;
}

function assertExecutable(spec: QuerySpec): void {
  if (spec.distinct && spec.projection.length === 0 && !spec.keysOnly) {
    throw new InvalidQueryError(spec.kind, `Distinct query for kind "${spec.kind}" requires a projection`);
  }
}

function assertOffsetMode(spec: QuerySpec): void {
  if (spec.usingCursor) throw new PaginationConflictError(spec.kind, 'cursor');
}

function decodeAll<T>(codec: EntityCodec<T>, entities: StoredEntity[]): T[] {
  return entities.map((entity) => codec.decode(entity.data));
}

export async function select<T>(ctx: ExecutionContext<T>): Promise<T[]> {
  assertOffsetMode(ctx.spec);
  assertExecutable(ctx.spec);
  const entities = await callBackend(ctx, 'select', () => ctx.gateway.runQuery(ctx.spec));
  return decodeAll(ctx.codec, entities);
}

export async function selectKeys<T>(ctx: ExecutionContext<T>): Promise<EntityKey[]> {
  assertOffsetMode(ctx.spec);
  const spec: QuerySpec = { ...ctx.spec, keysOnly: true };
  const entities = await callBackend(ctx, 'select', () => ctx.gateway.runQuery(spec));
  return entities.map((entity) => entity.key);
}

export async function get<T>(ctx: ExecutionContext<T>): Promise<T | null> {
  assertOffsetMode(ctx.spec);
  const [first] = await select(ctx);
  return first ?? null;
}

/**
 * Streams the query one entity at a time, then reads the end cursor of the
 * same run. Each read is raced against the signal. Any failure mid-stream
 * discards what was collected; decoding happens once the run is complete.
 */
export async function selectWithCursor<T>(ctx: ExecutionContext<T>): Promise<CursorPage<T>> {
  const { spec, gateway, signal } = ctx;
  if (spec.usingOffset) throw new PaginationConflictError(spec.kind, 'offset');
  assertExecutable(spec);
  throwIfCancelled(signal, 'select-cursor');

  const entities: StoredEntity[] = [];
  let cursor: string;
  try {
    const run = gateway.iterateQuery(spec, signal);
    const iterator = run[Symbol.asyncIterator]();
    for (;;) {
      if (signal?.aborted) {
        await iterator.return?.();
        throwIfCancelled(signal, 'select-cursor');
      }
      const step = await raceSignal(iterator.next(), signal, 'select-cursor');
      if (step.done === true) break;
      entities.push(step.value);
    }
    cursor = run.endCursor();
  } catch (err) {
    if (err instanceof CancelledError) throw err;
    gateway.reportError({ store: 'datastore', kind: spec.kind, operation: 'select-cursor' }, err);
    throw new BackendError(spec.kind, 'select-cursor', err);
  }
  return { items: decodeAll(ctx.codec, entities), cursor };
}

/** Aggregation count over the current filters; paging and ordering are ignored. */
export async function total<T>(ctx: ExecutionContext<T>): Promise<number> {
  const row = await callBackend(ctx, 'total', () => ctx.gateway.runCount(countSpec(ctx.spec), COUNT_ALIAS));
  if (!(COUNT_ALIAS in row)) {
    throw new AggregationError(ctx.spec.kind, 'count result not found');
  }
  const value = row[COUNT_ALIAS];
  if (typeof value === 'bigint') {
    if (value > BigInt(Number.MAX_SAFE_INTEGER)) {
      throw new AggregationError(ctx.spec.kind, `count ${value} exceeds Number.MAX_SAFE_INTEGER`);
    }
    return Number(value);
  }
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new AggregationError(ctx.spec.kind, `unexpected count type: ${typeof value}`);
  }
  return value;
}
