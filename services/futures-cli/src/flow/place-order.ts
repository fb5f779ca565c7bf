import type { Logger } from '@workspace/shared-utils';
import { API_KEY_VAR, API_SECRET_VAR } from '../config/env.js';
import type { ConfigurationError } from '../config/env.js';
import { describeError } from '../exchange/errors.js';
import { dispatchOrder } from '../exchange/gateway.js';
import type { OrderGateway } from '../exchange/gateway.js';
import type { ExchangeCredentials } from '../exchange/types.js';
import type { Result } from '../types.js';
import { validateOrderInput } from '../validation/validators.js';
import type { RawOrderInput, ValidationError } from '../validation/validators.js';
import { UserInterruptError, isAffirmative } from './confirm.js';
import type { ConfirmationProvider } from './confirm.js';
import { formatOrderResult, formatOrderSummary } from './report.js';

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;

export const CONFIRM_QUESTION = 'Confirm this order? (yes/no): ';

export interface FlowDeps {
  logger: Logger;
  print: (line: string) => void;
  loadCredentials: () => Result<ExchangeCredentials, ConfigurationError>;
  connect: (credentials: ExchangeCredentials) => OrderGateway;
}

export interface PlaceOrderDeps extends FlowDeps {
  prompt: ConfirmationProvider;
}

export function reportValidationError(
  error: ValidationError,
  deps: Pick<FlowDeps, 'logger' | 'print'>,
): void {
  switch (error.kind) {
    case 'MISSING_PRICE':
      deps.logger.error(`Input validation failed: ${error.message}`, { field: error.field });
      break;
    case 'VALIDATION':
      deps.logger.error(`Input validation failed: ${error.message}`, {
        field: error.field,
        rawValue: error.rawValue,
        reason: error.reason,
      });
      break;
  }

  deps.print('');
  deps.print(`❌ Error: ${error.message}`);
  deps.print('');
  deps.print('Tip: Use --help to see examples');
}

export function reportConfigurationError(
  error: ConfigurationError,
  deps: Pick<FlowDeps, 'logger' | 'print'>,
): void {
  deps.logger.error(error.message, { missing: error.missing });

  deps.print('');
  deps.print('❌ API credentials not found!');
  deps.print("   Please create a '.env' file with:");
  deps.print(`   ${API_KEY_VAR}=your_key_here`);
  deps.print(`   ${API_SECRET_VAR}=your_secret_here`);
  deps.print('');
  deps.print("   See '.env.example' for an example.");
}

/**
 * Builds the gateway, printing guidance when the client cannot be created.
 */
export function connectGateway(
  credentials: ExchangeCredentials,
  deps: Pick<FlowDeps, 'logger' | 'print' | 'connect'>,
): OrderGateway | null {
  deps.print('');
  deps.print('Connecting to Binance...');

  try {
    const gateway = deps.connect(credentials);
    deps.print('Connected to Binance.');
    return gateway;
  } catch (error) {
    deps.logger.error('Failed to create exchange client', error);
    deps.print('');
    deps.print(`❌ Failed to connect to Binance: ${describeError(error)}`);
    deps.print('');
    deps.print('Check your API credentials and internet connection');
    return null;
  }
}

/**
 * validate → credentials → confirm → submit → report. Resolves to the exit code.
 */
export async function runPlaceOrder(input: RawOrderInput, deps: PlaceOrderDeps): Promise<number> {
  const { logger, print } = deps;

  try {
    logger.info('Starting order placement process...');

    print('');
    print('Validating inputs...');
    const validation = validateOrderInput(input);
    if (!validation.ok) {
      reportValidationError(validation.error, deps);
      return EXIT_FAILURE;
    }

    for (const warning of validation.warnings) {
      logger.warn(warning);
      print(`⚠️  Warning: ${warning}`);
    }
    print('✅ All inputs validated successfully!');
    const request = validation.value;

    const credentials = deps.loadCredentials();
    if (!credentials.ok) {
      reportConfigurationError(credentials.error, deps);
      return EXIT_FAILURE;
    }

    print('');
    formatOrderSummary(request).forEach((line) => print(line));

    print('');
    const answer = await deps.prompt.ask(CONFIRM_QUESTION);
    if (!isAffirmative(answer)) {
      logger.info('Order cancelled by user', { answer });
      print('');
      print('Order cancelled by user.');
      return EXIT_SUCCESS;
    }

    const gateway = connectGateway(credentials.value, deps);
    if (!gateway) return EXIT_FAILURE;

    print('');
    print(`Placing ${request.orderType} order...`);
    const result = await dispatchOrder(gateway, request);

    if (!result.ok) {
      logger.error(`Order placement failed: ${result.error.message}`, { kind: result.error.kind });
      print('');
      print(`❌ Failed to place order: ${result.error.message}`);
      return EXIT_FAILURE;
    }

    print('');
    formatOrderResult(request, result.value).forEach((line) => print(line));

    logger.info(`Order ${result.value.orderId} placed successfully`, {
      symbol: request.symbol,
      status: result.value.status,
    });
    return EXIT_SUCCESS;
  } catch (error) {
    if (error instanceof UserInterruptError) {
      logger.info('Operation cancelled by user (interrupt)');
      print('');
      print('Operation cancelled by user.');
      return EXIT_SUCCESS;
    }

    logger.error('Unexpected error in order flow', error);
    print('');
    print(`❌ Unexpected error: ${describeError(error)}`);
    return EXIT_FAILURE;
  }
}
