import { z } from 'zod';
import { ValidationError } from '@depthcost/core';
import { DEFAULT_FEE_TIER } from './fees.js';
import { ORDER_TYPES, TRADE_SIDES, type TradeRequest } from './types.js';

const text = (field: string, fallback: string) =>
  z
    .string({ invalid_type_error: `${field} must be a string` })
    .trim()
    .min(1, `${field} must not be empty`)
    .default(fallback);

const nonNegative = (field: string, fallback: number) =>
  z.coerce
    .number({ invalid_type_error: `${field} must be a number` })
    .finite(`${field} must be finite`)
    .min(0, `${field} must be non-negative`)
    .default(fallback);

const TradeRequestSchema = z.object({
  exchange: text('exchange', 'OKX'),
  asset: text('asset', 'BTC-USDT-SWAP'),
  orderType: z
    .enum(ORDER_TYPES, {
      errorMap: () => ({
        message: `orderType must be one of ${ORDER_TYPES.join(', ')}`,
      }),
    })
    .default('Market'),
  side: z
    .enum(TRADE_SIDES, {
      errorMap: () => ({ message: 'side must be buy or sell' }),
    })
    .default('buy'),
  quantity: z.coerce
    .number({ invalid_type_error: 'quantity must be a number' })
    .finite('quantity must be finite')
    .positive('quantity must be greater than 0'),
  feeTier: text('feeTier', DEFAULT_FEE_TIER),
  slippageTolerancePct: nonNegative('slippageTolerancePct', 0.5),
  volatility: nonNegative('volatility', 0.05),
});

export type TradeRequestResult =
  | { success: true; request: TradeRequest }
  | { success: false; errors: Record<string, string> };

/**
 * Validates raw caller input (form fields, a JSON body). Numbers may arrive
 * as strings. Failures carry the first message per field.
 */
export function parseTradeRequest(input: unknown): TradeRequestResult {
  const result = TradeRequestSchema.safeParse(input);
  if (result.success) {
    return { success: true, request: Object.freeze(result.data) };
  }
  const errors: Record<string, string> = {};
  for (const issue of result.error.issues) {
    const field = issue.path.join('.') || 'request';
    if (!(field in errors)) {
      errors[field] = issue.message;
    }
  }
  return { success: false, errors };
}

/** Like `parseTradeRequest`, but throws `ValidationError` on bad input. */
export function toTradeRequest(input: unknown): TradeRequest {
  const result = parseTradeRequest(input);
  if (!result.success) {
    throw new ValidationError('invalid trade request', result.errors);
  }
  return result.request;
}
