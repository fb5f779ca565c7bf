import { Command, CommanderError } from 'commander';
import type { OutputConfiguration } from 'commander';
import { autoConfirm } from './flow/confirm.js';
import type { ConfirmationProvider } from './flow/confirm.js';
import { runOrderStatus } from './flow/order-status.js';
import { EXIT_FAILURE, EXIT_SUCCESS, runPlaceOrder } from './flow/place-order.js';
import type { FlowDeps } from './flow/place-order.js';

export interface CliDeps extends FlowDeps {
  prompt: ConfirmationProvider;
  output?: Pick<OutputConfiguration, 'writeOut' | 'writeErr'>;
}

interface PlaceOrderOptions {
  price?: string;
  yes?: boolean;
}

const EXAMPLES = `
Examples:
  # Market order (buy immediately)
  $ futures-cli BTCUSDT BUY MARKET 0.001

  # Limit order (sell at a specific price, good till cancelled)
  $ futures-cli ETHUSDT SELL LIMIT 0.1 --price 2500

  # Check an existing order
  $ futures-cli status ETHUSDT 4051234568

Environment:
  BINANCE_API_KEY, BINANCE_API_SECRET   API credentials (required)
  BINANCE_TESTNET                       false to trade on the live exchange (default: true)
  LOG_DIR, LOG_LEVEL                    log file directory and console log level
`;

/**
 * Parses argv (without the node/script prefix), runs the matching flow and
 * resolves to the process exit code.
 */
export async function runCli(argv: string[], deps: CliDeps): Promise<number> {
  let exitCode = EXIT_SUCCESS;

  const program = new Command()
    .name('futures-cli')
    .description('Validate and place Binance USD-M futures orders')
    .version('1.0.0')
    .argument('<symbol>', 'trading pair symbol (e.g. BTCUSDT, ETHUSDT)')
    .argument('<side>', 'BUY or SELL')
    .argument('<orderType>', 'MARKET or LIMIT')
    .argument('<quantity>', 'amount to trade (e.g. 0.001 for BTC)')
    .option('--price <price>', 'limit price (required for LIMIT orders)')
    .option('-y, --yes', 'skip the confirmation prompt')
    .addHelpText('after', EXAMPLES)
    .exitOverride();

  if (deps.output) {
    program.configureOutput(deps.output);
  }

  program.action(
    async (
      symbol: string,
      side: string,
      orderType: string,
      quantity: string,
      options: PlaceOrderOptions,
    ) => {
      exitCode = await runPlaceOrder(
        { symbol, side, orderType, quantity, price: options.price },
        { ...deps, prompt: options.yes ? autoConfirm : deps.prompt },
      );
    },
  );

  program
    .command('status')
    .description('show the status of an existing order')
    .argument('<symbol>', 'trading pair symbol')
    .argument('<orderId>', 'exchange order ID')
    .action(async (symbol: string, orderId: string) => {
      exitCode = await runOrderStatus({ symbol, orderId }, deps);
    });

  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? EXIT_SUCCESS : EXIT_FAILURE;
    }
    throw error;
  }

  return exitCode;
}
