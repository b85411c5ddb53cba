import { z } from 'zod';
import { dbToBigint } from '../utils/bigint.js';

// Row shapes coming back from better-sqlite3 are untyped; these schemas are the boundary.

export const bigintText = z.union([z.string(), z.number(), z.bigint()]).transform((v) => dbToBigint(v));
export const intCol = z.number().int();
export const boolCol = z.union([z.literal(0), z.literal(1)]).transform((v) => v === 1);

export function parseRows<T extends z.ZodTypeAny>(schema: T, rows: unknown[]): Array<z.output<T>> {
  return rows.map((r) => schema.parse(r));
}
