import { z } from 'zod';
import type { PriceLevel } from './types.js';

const numeric = z.union([z.string(), z.number()]).transform((value, ctx) => {
  const parsed = typeof value === 'number' ? value : Number(value.trim());
  if (typeof value === 'string' && value.trim().length === 0) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'empty number' });
    return z.NEVER;
  }
  if (!Number.isFinite(parsed) || parsed < 0) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `not a non-negative number: ${String(value)}`,
    });
    return z.NEVER;
  }
  return parsed;
});

// Exchanges append extra columns (order count, liquidated size); only the
// first two are read.
const levelTuple = z
  .tuple([numeric, numeric])
  .rest(z.unknown())
  .transform(([price, size]): PriceLevel => ({ price, size }));

const BookMessageSchema = z
  .object({
    asks: z.array(levelTuple),
    bids: z.array(levelTuple),
  })
  .passthrough();

export interface BookMessage {
  asks: PriceLevel[];
  bids: PriceLevel[];
}

export type BookMessageResult =
  | { ok: true; message: BookMessage }
  | { ok: false; reason: 'missing_fields' | 'invalid_levels'; detail: string };

function hasBookFields(value: unknown): boolean {
  return (
    typeof value === 'object' &&
    value !== null &&
    'asks' in value &&
    'bids' in value
  );
}

export function parseBookMessage(value: unknown): BookMessageResult {
  if (!hasBookFields(value)) {
    return { ok: false, reason: 'missing_fields', detail: 'asks/bids missing' };
  }
  const result = BookMessageSchema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const detail = issue
      ? `${issue.path.join('.')}: ${issue.message}`
      : result.error.message;
    return { ok: false, reason: 'invalid_levels', detail };
  }
  return {
    ok: true,
    message: { asks: result.data.asks, bids: result.data.bids },
  };
}
