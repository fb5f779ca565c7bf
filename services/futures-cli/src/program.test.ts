import { describe, it, expect, vi, beforeEach } from 'vitest';
import { createLogger } from '@workspace/shared-utils';
import type { OrderGateway } from './exchange/gateway.js';
import { runCli } from './program.js';
import type { CliDeps } from './program.js';

describe('runCli', () => {
  let printed: string[];
  let stdout: string[];
  let stderr: string[];
  let gateway: OrderGateway;
  let deps: CliDeps;

  beforeEach(() => {
    printed = [];
    stdout = [];
    stderr = [];
    gateway = {
      placeMarketOrder: vi.fn().mockResolvedValue({
        ok: true,
        value: {
          orderId: '4051234567',
          status: 'FILLED',
          executedQty: '0.001',
          avgPrice: '65000.10',
          type: 'MARKET',
        },
      }),
      placeLimitOrder: vi.fn().mockResolvedValue({
        ok: true,
        value: { orderId: '4051234568', status: 'NEW', executedQty: '0', avgPrice: null, type: 'LIMIT' },
      }),
      getOrderStatus: vi.fn().mockResolvedValue(null),
    };
    deps = {
      logger: createLogger('cli-test', { sinks: [] }),
      print: (line) => printed.push(line),
      prompt: { ask: vi.fn().mockResolvedValue('yes') },
      loadCredentials: vi
        .fn()
        .mockReturnValue({ ok: true, value: { apiKey: 'test-key', apiSecret: 'test-secret' } }),
      connect: vi.fn().mockReturnValue(gateway),
      output: {
        writeOut: (str) => stdout.push(str),
        writeErr: (str) => stderr.push(str),
      },
    };
  });

  it('places a MARKET order from positional arguments', async () => {
    const code = await runCli(['BTCUSDT', 'BUY', 'MARKET', '0.001'], deps);

    expect(code).toBe(0);
    expect(gateway.placeMarketOrder).toHaveBeenCalledTimes(1);
    expect(gateway.placeMarketOrder).toHaveBeenCalledWith('BTCUSDT', 'BUY', 0.001);
  });

  it('passes --price through for LIMIT orders', async () => {
    const code = await runCli(['ETHUSDT', 'SELL', 'LIMIT', '0.1', '--price', '2500'], deps);

    expect(code).toBe(0);
    expect(gateway.placeLimitOrder).toHaveBeenCalledWith('ETHUSDT', 'SELL', 0.1, 2500);
  });

  it('fails a LIMIT order without --price', async () => {
    const code = await runCli(['ETHUSDT', 'SELL', 'LIMIT', '0.1'], deps);

    expect(code).toBe(1);
    expect(printed).toContain('❌ Error: Price is required for LIMIT orders (use --price <value>)');
    expect(gateway.placeLimitOrder).not.toHaveBeenCalled();
  });

  it('skips the prompt with --yes', async () => {
    const code = await runCli(['BTCUSDT', 'BUY', 'MARKET', '0.001', '--yes'], deps);

    expect(code).toBe(0);
    expect(deps.prompt.ask).not.toHaveBeenCalled();
    expect(gateway.placeMarketOrder).toHaveBeenCalledTimes(1);
  });

  it('runs the status subcommand', async () => {
    const code = await runCli(['status', 'ETHUSDT', '4051234568'], deps);

    expect(code).toBe(1);
    expect(gateway.getOrderStatus).toHaveBeenCalledWith('ETHUSDT', 4051234568);
    expect(gateway.placeMarketOrder).not.toHaveBeenCalled();
  });

  it('exits 1 on missing arguments', async () => {
    const code = await runCli(['BTCUSDT', 'BUY'], deps);

    expect(code).toBe(1);
    expect(stderr.join('')).toContain("missing required argument 'orderType'");
    expect(deps.connect).not.toHaveBeenCalled();
  });

  it('prints help with examples and exits 0', async () => {
    const code = await runCli(['--help'], deps);

    expect(code).toBe(0);
    expect(stdout.join('')).toContain('$ futures-cli ETHUSDT SELL LIMIT 0.1 --price 2500');
  });
});
