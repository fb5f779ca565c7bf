import type { OrderSide, OrderType } from '../types.js';

export interface CreateOrderParams {
  symbol: string;
  side: OrderSide;
  type: OrderType;
  /** Plain decimal notation, never exponent form. */
  quantity: string;
  price?: string;
  timeInForce?: 'GTC';
}

export interface ExchangeOrderRecord {
  orderId: number | string;
  status: string;
  executedQty?: number | string;
  avgPrice?: number | string;
  type: string;
}

/**
 * What the gateway needs from an exchange client. Implementations throw
 * `ExchangeApiError` for structured API rejections.
 */
export interface ExchangeClient {
  createOrder(params: CreateOrderParams): Promise<ExchangeOrderRecord>;
  getOrder(params: { symbol: string; orderId: number }): Promise<ExchangeOrderRecord>;
}

export interface ExchangeCredentials {
  apiKey: string;
  apiSecret: string;
}
