import type { StoredEntity } from '../types.js';
import { fromNativeKey } from '../query/compiler.js';
import type { NativeKey } from '../query/compiler.js';

function isNativeKey(value: unknown): value is NativeKey {
  return typeof value === 'object' && value !== null && 'kind' in value && typeof value.kind === 'string';
}

/**
 * Maps an entity as returned by the client (properties plus the key under
 * the client's KEY symbol) to a StoredEntity.
 */
export function mapEntity(keySymbol: symbol, raw: unknown): StoredEntity {
  if (typeof raw !== 'object' || raw === null) {
    throw new Error(`Expected an entity object, got ${typeof raw}`);
  }
  const key: unknown = Reflect.get(raw, keySymbol);
  if (!isNativeKey(key)) {
    throw new Error('Entity returned by Datastore has no key');
  }
  return { key: fromNativeKey(key), data: Object.fromEntries(Object.entries(raw)) };
}
