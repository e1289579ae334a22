import type { z } from 'zod';

/** Converts between a record type and the backend's property map. */
export interface EntityCodec<T> {
  encode(record: T): Record<string, unknown>;
  decode(data: Record<string, unknown>): T;
}

export const plainCodec: EntityCodec<Record<string, unknown>> = {
  encode: (record) => ({ ...record }),
  decode: (data) => ({ ...data }),
};

/**
 * Codec backed by a zod schema; entities read from the store are parsed,
 * so a mismatching entity throws a ZodError.
 */
export function schemaCodec<T extends object>(schema: z.ZodType<T, z.ZodTypeDef, unknown>): EntityCodec<T> {
  return {
    encode: (record) => Object.fromEntries(Object.entries(record)),
    decode: (data) => schema.parse(data),
  };
}
