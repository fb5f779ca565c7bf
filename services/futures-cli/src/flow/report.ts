import type { OrderRequest, OrderResult } from '../types.js';

const THIN_RULE = '-'.repeat(40);
const THICK_RULE = '='.repeat(50);

function row(label: string, value: string | number): string {
  return `   ${`${label}:`.padEnd(14)}${value}`;
}

export function formatBanner(testnet: boolean): string[] {
  const title = 'BINANCE FUTURES ORDER CLI';
  const mode = testnet ? '(TESTNET MODE)' : '(LIVE MODE)';
  const width = 60;
  const center = (text: string) => text.padStart(Math.floor((width + text.length) / 2));

  return ['='.repeat(width), center(title), center(mode), '='.repeat(width)];
}

export function formatOrderSummary(request: OrderRequest): string[] {
  const lines = [
    'ORDER SUMMARY:',
    THIN_RULE,
    row('Symbol', request.symbol),
    row('Side', request.side),
    row('Order Type', request.orderType),
    row('Quantity', request.quantity),
  ];

  if (request.orderType === 'LIMIT') {
    lines.push(row('Price', request.price));
  }

  lines.push(THIN_RULE);
  return lines;
}

export function formatOrderRecord(result: OrderResult): string[] {
  return [
    row('Order ID', result.orderId),
    row('Status', result.status),
    row('Type', result.type),
    row('Executed Qty', result.executedQty),
    row('Avg Price', result.avgPrice ?? 'N/A'),
  ];
}

export function formatOrderResult(request: OrderRequest, result: OrderResult): string[] {
  const lines = [
    '✅ ORDER PLACED SUCCESSFULLY!',
    THICK_RULE,
    ...formatOrderRecord(result),
    THICK_RULE,
    '',
  ];

  if (request.orderType === 'LIMIT') {
    lines.push('Your limit order is now active!');
    lines.push('   It will execute when the market reaches your price.');
  } else {
    lines.push('Market order executed immediately!');
  }

  return lines;
}
