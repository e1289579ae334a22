import { describe, it, expect } from 'vitest';
import { z, ZodError } from 'zod';
import { plainCodec, schemaCodec } from '../../src/codec.js';

describe('plainCodec', () => {
  it('copies records both ways', () => {
    const record = { name: 'Ann', tags: ['a'] };
    const encoded = plainCodec.encode(record);
    expect(encoded).toEqual(record);
    expect(encoded).not.toBe(record);
    expect(plainCodec.decode(encoded)).toEqual(record);
  });
});

describe('schemaCodec', () => {
  const User = z.object({ name: z.string(), age: z.number().int() });
  const codec = schemaCodec(User);

  it('encodes the record properties', () => {
    expect(codec.encode({ name: 'Ann', age: 40 })).toEqual({ name: 'Ann', age: 40 });
  });

  it('parses stored data', () => {
    expect(codec.decode({ name: 'Ann', age: 40, legacy: true })).toEqual({ name: 'Ann', age: 40 });
  });

  it('throws a ZodError for data that does not match', () => {
    expect(() => codec.decode({ name: 'Ann', age: 'forty' })).toThrow(ZodError);
  });
});
