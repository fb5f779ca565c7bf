import { z } from 'zod';

export const OrderSideSchema = z.enum(['BUY', 'SELL']);
export type OrderSide = z.infer<typeof OrderSideSchema>;

export const OrderTypeSchema = z.enum(['MARKET', 'LIMIT']);
export type OrderType = z.infer<typeof OrderTypeSchema>;

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function fail<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

/**
 * Validated order intent. `price` is set for LIMIT orders only.
 */
export type OrderRequest =
  | { symbol: string; side: OrderSide; orderType: 'MARKET'; quantity: number }
  | { symbol: string; side: OrderSide; orderType: 'LIMIT'; quantity: number; price: number };

/**
 * Order record as reported by the exchange. Display only.
 */
export interface OrderResult {
  orderId: string;
  status: string;
  executedQty: string;
  avgPrice: string | null;
  type: string;
}
