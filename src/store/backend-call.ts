import type { DatastoreGateway } from '../types.js';
import { BackendError, CancelledError } from '../errors.js';

export interface CallContext {
  gateway: DatastoreGateway;
  kind: string;
  signal: AbortSignal | undefined;
}

export function throwIfCancelled(signal: AbortSignal | undefined, operation: string): void {
  if (signal?.aborted) throw new CancelledError(operation, signal.reason);
}

/** Rejects with CancelledError once `signal` aborts. An already-aborted signal never fires; check it first. */
export function raceSignal<R>(promise: Promise<R>, signal: AbortSignal | undefined, operation: string): Promise<R> {
  if (signal === undefined) return promise;
  let onAbort: (() => void) | undefined;
  const aborted = new Promise<never>((_, reject) => {
    onAbort = () => reject(new CancelledError(operation, signal.reason));
    signal.addEventListener('abort', onAbort, { once: true });
  });
  return Promise.race([promise, aborted]).finally(() => {
    if (onAbort !== undefined) signal.removeEventListener('abort', onAbort);
  });
}

/**
 * One round trip to the backend. Failures are reported through the
 * gateway's error sink and rethrown as BackendError; no retry.
 */
export async function callBackend<R>(
  ctx: CallContext,
  operation: string,
  call: () => Promise<R>,
): Promise<R> {
  throwIfCancelled(ctx.signal, operation);
  try {
    return await raceSignal(call(), ctx.signal, operation);
  } catch (err) {
    if (err instanceof CancelledError) throw err;
    ctx.gateway.reportError({ store: 'datastore', kind: ctx.kind, operation }, err);
    throw new BackendError(ctx.kind, operation, err);
  }
}

export function chunk<V>(items: readonly V[], size: number): V[][] {
  const chunks: V[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}
