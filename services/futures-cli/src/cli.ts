#!/usr/bin/env node
import '@workspace/shared-utils/env-loader';
import { consoleSink, createLogger, dailyLogPath, fileSink } from '@workspace/shared-utils';
import { loadCredentials, loadRuntimeConfig } from './config/env.js';
import { createBinanceClient } from './exchange/binance-client.js';
import { ExchangeGateway } from './exchange/gateway.js';
import { createTerminalPrompt } from './flow/confirm.js';
import { formatBanner } from './flow/report.js';
import { runCli } from './program.js';

const config = loadRuntimeConfig();
const logFile = dailyLogPath(config.logDir, 'futures-cli');
const logger = createLogger('futures-cli', {
  sinks: [consoleSink(config.logLevel), fileSink(logFile, 'DEBUG')],
});

// Ctrl+C outside a prompt; the prompt itself reports interrupts to the flow.
process.once('SIGINT', () => {
  console.log('\n\nOperation cancelled by user.');
  process.exit(0);
});

formatBanner(config.testnet).forEach((line) => console.log(line));
logger.info(`Logging system started. Writing logs to: ${logFile}`);

process.exitCode = await runCli(process.argv.slice(2), {
  logger,
  print: (line) => console.log(line),
  prompt: createTerminalPrompt(),
  loadCredentials: () => loadCredentials(),
  connect: (credentials) =>
    new ExchangeGateway(
      createBinanceClient(credentials, { testnet: config.testnet }),
      logger.child('gateway'),
    ),
});
