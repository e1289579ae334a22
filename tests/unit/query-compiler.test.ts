import { describe, it, expect } from 'vitest';
import { Datastore, PropertyFilter } from '@google-cloud/datastore';
import { compileQuery, fromNativeKey, toNativeKey } from '../../src/query/compiler.js';
import { emptySpec } from '../../src/query/types.js';
import type { QuerySpec } from '../../src/query/types.js';

const client = new Datastore({ projectId: 'test-project' });

function spec(overrides: Partial<QuerySpec> = {}): QuerySpec {
  return { ...emptySpec('User'), ...overrides };
}

describe('compileQuery', () => {
  it('targets the query kind with no limit or offset by default', () => {
    const q = compileQuery(client, spec());
    expect(q.kinds).toEqual(['User']);
    expect(q.limitVal).toBe(-1);
    expect(q.offsetVal).toBe(-1);
    expect(q.startVal).toBeNull();
    expect(q.entityFilters).toEqual([]);
  });

  it('compiles property filters with native operators', () => {
    const q = compileQuery(client, spec({
      filters: [
        { kind: 'property', field: 'status', operator: '=', value: 'active' },
        { kind: 'property', field: 'tier', operator: 'in', value: ['gold', 'silver'] },
        { kind: 'property', field: 'region', operator: 'not in', value: ['eu'] },
      ],
    }));
    expect(q.entityFilters).toEqual([
      new PropertyFilter('status', '=', 'active'),
      new PropertyFilter('tier', 'IN', ['gold', 'silver']),
      new PropertyFilter('region', 'NOT_IN', ['eu']),
    ]);
  });

  it('compiles identity filters to native keys', () => {
    const q = compileQuery(client, spec({
      filters: [{ kind: 'key', operator: '>', key: { kind: 'User', name: 'u-100' } }],
    }));
    expect(q.entityFilters).toEqual([new PropertyFilter('__key__', '>', client.key(['User', 'u-100']))]);
  });

  it('keeps order sequence and direction', () => {
    const q = compileQuery(client, spec({
      orders: [
        { field: 'createdAt', direction: 'desc' },
        { field: 'name', direction: 'asc' },
      ],
    }));
    expect(q.orders).toEqual([
      { name: 'createdAt', sign: '-' },
      { name: 'name', sign: '+' },
    ]);
  });

  it('sets limit, offset and start cursor', () => {
    const q = compileQuery(client, spec({ limit: 10, offset: 20, cursor: 'Y3Vyc29yLTE=' }));
    expect(q.limitVal).toBe(10);
    expect(q.offsetVal).toBe(20);
    expect(q.startVal).toBe('Y3Vyc29yLTE=');
  });

  it('selects only the key for keys-only queries', () => {
    const q = compileQuery(client, spec({ keysOnly: true, projection: ['status'] }));
    expect(q.selectVal).toEqual(['__key__']);
  });

  it('groups by the projection for distinct queries', () => {
    const q = compileQuery(client, spec({ projection: ['status', 'country'], distinct: true }));
    expect(q.selectVal).toEqual(['status', 'country']);
    expect(q.groupByVal).toEqual(['status', 'country']);
  });

  it('uses the client namespace', () => {
    const tenant = new Datastore({ projectId: 'test-project', namespace: 'tenant-a' });
    expect(compileQuery(tenant, spec()).namespace).toBe('tenant-a');
  });
});

describe('key conversion', () => {
  it('builds the full ancestor path', () => {
    const key = toNativeKey(client, { kind: 'Employee', name: 'e1', parent: { kind: 'Company', name: 'acme' } });
    expect(key.path).toEqual(['Company', 'acme', 'Employee', 'e1']);
    expect(key.kind).toBe('Employee');
    expect(key.name).toBe('e1');
  });

  it('reads a native key back, parents included', () => {
    const key = client.key(['Company', 'acme', 'Employee', 'e1']);
    expect(fromNativeKey(key)).toEqual({
      kind: 'Employee',
      name: 'e1',
      parent: { kind: 'Company', name: 'acme' },
    });
  });

  it('leaves a key without name or id incomplete', () => {
    const key = toNativeKey(client, { kind: 'Order' });
    expect(key.kind).toBe('Order');
    expect(key.id).toBeUndefined();
    expect(key.name).toBeUndefined();
    expect(fromNativeKey(key)).toEqual({ kind: 'Order' });
  });
});
