import { validateOrderId, validateSymbol } from '../validation/validators.js';
import {
  EXIT_FAILURE,
  EXIT_SUCCESS,
  connectGateway,
  reportConfigurationError,
  reportValidationError,
} from './place-order.js';
import type { FlowDeps } from './place-order.js';
import { formatOrderRecord } from './report.js';

export interface OrderStatusInput {
  symbol: string;
  orderId: string;
}

export async function runOrderStatus(input: OrderStatusInput, deps: FlowDeps): Promise<number> {
  const { logger, print } = deps;

  const symbol = validateSymbol(input.symbol);
  if (!symbol.ok) {
    reportValidationError(symbol.error, deps);
    return EXIT_FAILURE;
  }

  const orderId = validateOrderId(input.orderId);
  if (!orderId.ok) {
    reportValidationError(orderId.error, deps);
    return EXIT_FAILURE;
  }

  const credentials = deps.loadCredentials();
  if (!credentials.ok) {
    reportConfigurationError(credentials.error, deps);
    return EXIT_FAILURE;
  }

  const gateway = connectGateway(credentials.value, deps);
  if (!gateway) return EXIT_FAILURE;

  const status = await gateway.getOrderStatus(symbol.value, orderId.value);
  if (!status) {
    print('');
    print(`❌ Order ${orderId.value} not found or status unavailable`);
    return EXIT_FAILURE;
  }

  logger.debug('Order status fetched', status);
  print('');
  print(`ORDER STATUS (${symbol.value}):`);
  formatOrderRecord(status).forEach((line) => print(line));
  return EXIT_SUCCESS;
}
