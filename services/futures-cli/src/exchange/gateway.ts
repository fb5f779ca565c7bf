import Big from 'big.js';
import type { Logger } from '@workspace/shared-utils';
import { fail, ok } from '../types.js';
import type { OrderRequest, OrderResult, OrderSide, OrderType, Result } from '../types.js';
import { ExchangeApiError, describeError } from './errors.js';
import type { GatewayError } from './errors.js';
import type { CreateOrderParams, ExchangeClient, ExchangeOrderRecord } from './types.js';

export type GatewayResult = Result<OrderResult, GatewayError>;

export interface OrderGateway {
  placeMarketOrder(symbol: string, side: OrderSide, quantity: number): Promise<GatewayResult>;
  placeLimitOrder(
    symbol: string,
    side: OrderSide,
    quantity: number,
    price: number,
  ): Promise<GatewayResult>;
  getOrderStatus(symbol: string, orderId: number): Promise<OrderResult | null>;
}

// 1e-7 must reach the exchange as 0.0000001.
function toWireDecimal(value: number): string {
  return new Big(value).toFixed();
}

function toOrderResult(record: ExchangeOrderRecord): OrderResult {
  const avgPrice = record.avgPrice === undefined ? null : String(record.avgPrice);

  return {
    orderId: String(record.orderId),
    status: record.status,
    executedQty: record.executedQty === undefined ? '0' : String(record.executedQty),
    avgPrice,
    type: record.type,
  };
}

/**
 * Maps validated order intents onto single exchange calls. Nothing is retried.
 */
export class ExchangeGateway implements OrderGateway {
  constructor(
    private readonly client: ExchangeClient,
    private readonly logger: Logger,
  ) {}

  async placeMarketOrder(symbol: string, side: OrderSide, quantity: number): Promise<GatewayResult> {
    this.logger.info(`Placing MARKET order: ${side} ${quantity} ${symbol}`);
    return this.submit({ symbol, side, type: 'MARKET', quantity: toWireDecimal(quantity) });
  }

  async placeLimitOrder(
    symbol: string,
    side: OrderSide,
    quantity: number,
    price: number,
  ): Promise<GatewayResult> {
    this.logger.info(`Placing LIMIT order: ${side} ${quantity} ${symbol} @ ${price}`);
    return this.submit({
      symbol,
      side,
      type: 'LIMIT',
      quantity: toWireDecimal(quantity),
      price: toWireDecimal(price),
      timeInForce: 'GTC',
    });
  }

  /**
   * Best-effort lookup: failures are logged and reported as null.
   */
  async getOrderStatus(symbol: string, orderId: number): Promise<OrderResult | null> {
    this.logger.info(`Checking order status for ID: ${orderId}`, { symbol });

    try {
      const record = await this.client.getOrder({ symbol, orderId });
      const result = toOrderResult(record);
      this.logger.info(`Order status: ${result.status}`, { orderId: result.orderId });
      return result;
    } catch (error) {
      this.logger.error(`Failed to check order status: ${describeError(error)}`, {
        symbol,
        orderId,
      });
      return null;
    }
  }

  private async submit(params: CreateOrderParams): Promise<GatewayResult> {
    const label = orderLabel(params.type);
    this.logger.debug('Order request', params);

    try {
      const record = await this.client.createOrder(params);
      const result = toOrderResult(record);
      this.logger.info(`${label} order placed! Order ID: ${result.orderId}`, result);
      return ok(result);
    } catch (error) {
      if (error instanceof ExchangeApiError) {
        const message = `Binance API error: ${error.message} (code ${error.code})`;
        this.logger.error(message, { symbol: params.symbol, code: error.code });
        return fail({ kind: 'EXCHANGE_API', code: error.code, message });
      }

      const message = `Unexpected error placing ${label.toLowerCase()} order: ${describeError(error)}`;
      this.logger.error(message, error);
      return fail({ kind: 'TRANSPORT', message });
    }
  }
}

/**
 * Routes a validated request to the market or limit call.
 */
export function dispatchOrder(gateway: OrderGateway, request: OrderRequest): Promise<GatewayResult> {
  switch (request.orderType) {
    case 'MARKET':
      return gateway.placeMarketOrder(request.symbol, request.side, request.quantity);
    case 'LIMIT':
      return gateway.placeLimitOrder(request.symbol, request.side, request.quantity, request.price);
  }
}

function orderLabel(type: OrderType): 'Market' | 'Limit' {
  return type === 'MARKET' ? 'Market' : 'Limit';
}
