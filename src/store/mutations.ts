import type { EntityCodec } from '../codec.js';
import type { EntityKey, StoredEntity } from '../types.js';
import type { QuerySpec } from '../query/types.js';
import { BackendError, BatchError, CancelledError } from '../errors.js';
import { callBackend, chunk, throwIfCancelled } from './backend-call.js';
import type { CallContext } from './backend-call.js';

/** Per-call entity ceiling of the backend's batch operations. */
export const MAX_BATCH_SIZE = 500;

export interface MutationContext<T> extends CallContext {
  spec: QuerySpec;
  codec: EntityCodec<T>;
}

function nameKey(kind: string, id: string): EntityKey {
  return { kind, name: id };
}

/**
 * Runs `apply` over `items` in sequential chunks. Stops at the first
 * failing chunk; earlier chunks stay committed.
 */
async function runChunked<V>(
  ctx: CallContext,
  operation: string,
  items: readonly V[],
  apply: (batch: V[]) => Promise<void>,
): Promise<void> {
  const batches = chunk(items, MAX_BATCH_SIZE);
  for (const [index, batch] of batches.entries()) {
    try {
      await callBackend(ctx, operation, () => apply(batch));
    } catch (err) {
      if (err instanceof CancelledError) throw err;
      throw new BatchError(ctx.kind, operation, index, batches.length, err instanceof BackendError ? err.cause : err);
    }
  }
}

/** Writes one entity under (kind, id), overwriting whatever is there. */
export async function upsert<T>(ctx: MutationContext<T>, id: string, record: T): Promise<void> {
  const entity: StoredEntity = { key: nameKey(ctx.kind, id), data: ctx.codec.encode(record) };
  await callBackend(ctx, 'upsert', () => ctx.gateway.upsert([entity]));
}

export async function upsertMulti<T>(ctx: MutationContext<T>, items: Map<string, T> | Record<string, T>): Promise<void> {
  const pairs = items instanceof Map ? [...items] : Object.entries(items);
  const entities = pairs.map(([id, record]): StoredEntity => ({
    key: nameKey(ctx.kind, id),
    data: ctx.codec.encode(record),
  }));
  await runChunked(ctx, 'upsert-multi', entities, (batch) => ctx.gateway.upsert(batch));
}

/**
 * Fetches by id in one lookup. The result lines up with `ids`; ids with no
 * entity get `null`.
 */
export async function getMulti<T>(ctx: MutationContext<T>, ids: readonly string[]): Promise<Array<T | null>> {
  if (ids.length === 0) return [];
  const keys = ids.map((id) => nameKey(ctx.kind, id));
  const found = await callBackend(ctx, 'get-multi', () => ctx.gateway.lookup(keys));

  const byName = new Map<string, StoredEntity>();
  for (const entity of found) {
    if (entity.key.name !== undefined) byName.set(entity.key.name, entity);
  }
  return ids.map((id) => {
    const entity = byName.get(id);
    return entity === undefined ? null : ctx.codec.decode(entity.data);
  });
}

export async function insertWithAutoId<T>(ctx: MutationContext<T>, record: T): Promise<EntityKey> {
  const entity: StoredEntity = { key: { kind: ctx.kind }, data: ctx.codec.encode(record) };
  return callBackend(ctx, 'insert', () => ctx.gateway.insert(entity));
}

/**
 * Deletes everything the current filters match, in chunks of
 * MAX_BATCH_SIZE keys. Resolves with the number of entities deleted.
 *
 * Without filters this deletes every entity of the kind.
 */
export async function deleteMatching<T>(ctx: MutationContext<T>): Promise<number> {
  const keysSpec: QuerySpec = { ...ctx.spec, keysOnly: true };
  const matches = await callBackend(ctx, 'delete-keys', () => ctx.gateway.runQuery(keysSpec));
  const keys = matches.map((entity) => entity.key);
  throwIfCancelled(ctx.signal, 'delete-multi');
  await runChunked(ctx, 'delete-multi', keys, (batch) => ctx.gateway.delete(batch));
  return keys.length;
}
