import Big from 'big.js';
import { OrderSideSchema, OrderTypeSchema } from '../types.js';
import type { OrderRequest, OrderSide, OrderType } from '../types.js';

/** Below this a quantity is accepted with an advisory warning. */
export const MIN_QUANTITY_ADVISORY = '0.001';

const SYMBOL_PATTERN = /^[A-Z0-9]{5,12}$/;

export type ValidatedField = 'symbol' | 'side' | 'orderType' | 'quantity' | 'price' | 'orderId';

export type ValidationError =
  | {
      kind: 'VALIDATION';
      field: ValidatedField;
      rawValue: string;
      reason: string;
      message: string;
    }
  | { kind: 'MISSING_PRICE'; field: 'price'; message: string };

export type Validation<T> =
  | { ok: true; value: T; warnings: string[] }
  | { ok: false; error: ValidationError };

export interface RawOrderInput {
  symbol: string;
  side: string;
  orderType: string;
  quantity: string;
  price?: string;
}

function accept<T>(value: T, warnings: string[] = []): Validation<T> {
  return { ok: true, value, warnings };
}

function reject<T>(
  field: ValidatedField,
  rawValue: string,
  reason: string,
  message: string,
): Validation<T> {
  return { ok: false, error: { kind: 'VALIDATION', field, rawValue, reason, message } };
}

function normalizeToken(raw: string): string {
  return raw.trim().toUpperCase();
}

function parseDecimal(raw: string): Big | null {
  try {
    return new Big(raw.trim());
  } catch {
    return null;
  }
}

export function validateSymbol(raw: string): Validation<string> {
  const symbol = normalizeToken(raw);

  if (!SYMBOL_PATTERN.test(symbol)) {
    return reject(
      'symbol',
      raw,
      'must be 5-12 letters or digits',
      `Invalid symbol: "${raw}". Must be 5-12 letters or digits, like 'BTCUSDT' or 'ETHUSDT'`,
    );
  }

  return accept(symbol);
}

export function validateSide(raw: string): Validation<OrderSide> {
  const parsed = OrderSideSchema.safeParse(normalizeToken(raw));

  if (!parsed.success) {
    return reject('side', raw, 'must be BUY or SELL', `Invalid side: "${raw}". Must be 'BUY' or 'SELL'`);
  }

  return accept(parsed.data);
}

export function validateOrderType(raw: string): Validation<OrderType> {
  const parsed = OrderTypeSchema.safeParse(normalizeToken(raw));

  if (!parsed.success) {
    return reject(
      'orderType',
      raw,
      'must be MARKET or LIMIT',
      `Invalid order type: "${raw}". Must be 'MARKET' or 'LIMIT'`,
    );
  }

  return accept(parsed.data);
}

export function validateQuantity(raw: string): Validation<number> {
  const qty = parseDecimal(raw);

  if (qty === null) {
    return reject('quantity', raw, 'not a number', `Invalid quantity: "${raw}". Must be a positive number`);
  }
  const value = qty.toNumber();
  if (!Number.isFinite(value) || value <= 0) {
    return reject(
      'quantity',
      raw,
      Number.isFinite(value) ? 'must be greater than 0' : 'out of range',
      `Invalid quantity: "${raw}". Must be a positive number`,
    );
  }

  // Exchange minimums differ per symbol and are not enforced here.
  const warnings = qty.lt(MIN_QUANTITY_ADVISORY)
    ? [`Quantity ${qty.toString()} might be too small for some symbols`]
    : [];

  return accept(value, warnings);
}

export function validatePrice(raw: string): Validation<number> {
  const price = parseDecimal(raw);

  if (price === null) {
    return reject('price', raw, 'not a number', `Invalid price: "${raw}". Must be a positive number`);
  }
  const value = price.toNumber();
  if (!Number.isFinite(value) || value <= 0) {
    return reject(
      'price',
      raw,
      Number.isFinite(value) ? 'must be greater than 0' : 'out of range',
      `Invalid price: "${raw}". Must be a positive number`,
    );
  }

  return accept(value);
}

export function validateOrderId(raw: string): Validation<number> {
  const trimmed = raw.trim();
  const orderId = /^\d+$/.test(trimmed) ? Number(trimmed) : NaN;

  if (!Number.isSafeInteger(orderId) || orderId <= 0) {
    return reject(
      'orderId',
      raw,
      'must be a positive integer',
      `Invalid order ID: "${raw}". Must be a positive integer`,
    );
  }

  return accept(orderId);
}

/**
 * Validates the raw CLI tokens in argument order and stops at the first failure.
 */
export function validateOrderInput(input: RawOrderInput): Validation<OrderRequest> {
  const symbol = validateSymbol(input.symbol);
  if (!symbol.ok) return symbol;

  const side = validateSide(input.side);
  if (!side.ok) return side;

  const orderType = validateOrderType(input.orderType);
  if (!orderType.ok) return orderType;

  const quantity = validateQuantity(input.quantity);
  if (!quantity.ok) return quantity;

  const warnings = [...quantity.warnings];
  const rawPrice = input.price?.trim() ? input.price : undefined;

  if (orderType.value === 'MARKET') {
    if (rawPrice !== undefined) {
      warnings.push(`Price ${rawPrice.trim()} is ignored for MARKET orders`);
    }
    return accept(
      { symbol: symbol.value, side: side.value, orderType: 'MARKET', quantity: quantity.value },
      warnings,
    );
  }

  if (rawPrice === undefined) {
    return {
      ok: false,
      error: {
        kind: 'MISSING_PRICE',
        field: 'price',
        message: 'Price is required for LIMIT orders (use --price <value>)',
      },
    };
  }

  const price = validatePrice(rawPrice);
  if (!price.ok) return price;

  return accept(
    {
      symbol: symbol.value,
      side: side.value,
      orderType: 'LIMIT',
      quantity: quantity.value,
      price: price.value,
    },
    warnings,
  );
}
