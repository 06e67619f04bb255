/**
 * Argument schemas for template calls into a scratch store
 */

import { z } from 'zod';
import type { PlainValue } from '../core/types/value.js';

function hasOwnProtoKey(value: unknown): boolean {
  return (
    typeof value === 'object' &&
    value !== null &&
    Object.prototype.hasOwnProperty.call(value, '__proto__')
  );
}

// z.record skips an own '__proto__' key, so it is rejected before parsing.
export const PlainValueSchema: z.ZodType<PlainValue, z.ZodTypeDef, unknown> = z.lazy(() =>
  z
    .unknown()
    .superRefine((value, ctx) => {
      if (hasOwnProtoKey(value)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Key '__proto__' is not allowed" });
      }
    })
    .pipe(
      z.union([
        z.number(),
        z.bigint(),
        z.string(),
        z.array(PlainValueSchema),
        z.record(z.string(), PlainValueSchema),
      ])
    )
);

export const KeySchema = z.string();

export const ScratchArgs = {
  add: z.tuple([KeySchema, PlainValueSchema]),
  set: z.tuple([KeySchema, PlainValueSchema]),
  get: z.tuple([KeySchema]),
  setInMap: z.tuple([KeySchema, KeySchema, PlainValueSchema]),
  getSortedMapValues: z.tuple([KeySchema]),
  delete: z.tuple([KeySchema]),
  deleteInMap: z.tuple([KeySchema, KeySchema]),
  values: z.tuple([]),
} as const;

export type ScratchMethodName = keyof typeof ScratchArgs;
