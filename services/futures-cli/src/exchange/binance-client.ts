import { USDMClient } from 'binance';
import { ExchangeApiError } from './errors.js';
import type {
  CreateOrderParams,
  ExchangeClient,
  ExchangeCredentials,
  ExchangeOrderRecord,
} from './types.js';

export interface BinanceClientOptions {
  testnet: boolean;
}

/**
 * The binance REST client rejects with a plain object carrying the
 * exchange's numeric `code` and `msg` (as `message`) for API errors.
 */
function isApiRejection(error: unknown): error is { code: number; message: string } {
  if (typeof error !== 'object' || error === null) return false;
  if (!('code' in error) || !('message' in error)) return false;
  return typeof error.code === 'number' && typeof error.message === 'string';
}

export function normalizeRejection(error: unknown): unknown {
  if (error instanceof ExchangeApiError) return error;
  if (isApiRejection(error)) return new ExchangeApiError(error.code, error.message);
  return error;
}

function toRecord(order: {
  orderId: number;
  status: string;
  executedQty: number | string;
  avgPrice: number | string;
  type: string;
}): ExchangeOrderRecord {
  return {
    orderId: order.orderId,
    status: order.status,
    executedQty: order.executedQty,
    avgPrice: order.avgPrice,
    type: order.type,
  };
}

/**
 * USD-M futures client. Signing, clock sync and transport belong to the
 * `binance` package; this only maps parameters and errors.
 */
export function createBinanceClient(
  credentials: ExchangeCredentials,
  options: BinanceClientOptions,
): ExchangeClient {
  const client = new USDMClient(
    {
      api_key: credentials.apiKey,
      api_secret: credentials.apiSecret,
    },
    {},
    options.testnet,
  );

  return {
    async createOrder(params: CreateOrderParams) {
      try {
        const order = await client.submitNewOrder({
          symbol: params.symbol,
          side: params.side,
          type: params.type,
          quantity: params.quantity,
          ...(params.price !== undefined ? { price: params.price } : {}),
          ...(params.timeInForce !== undefined ? { timeInForce: params.timeInForce } : {}),
        });
        return toRecord(order);
      } catch (error) {
        throw normalizeRejection(error);
      }
    },

    async getOrder(params) {
      try {
        const order = await client.getOrder({ symbol: params.symbol, orderId: params.orderId });
        return toRecord(order);
      } catch (error) {
        throw normalizeRejection(error);
      }
    },
  };
}
