import { describe, it, expect, vi } from 'vitest';
import { createLogger } from '@workspace/shared-utils';
import type { OrderGateway } from '../exchange/gateway.js';
import { runOrderStatus } from './order-status.js';
import type { FlowDeps } from './place-order.js';

function setup(status: Awaited<ReturnType<OrderGateway['getOrderStatus']>>) {
  const output: string[] = [];
  const gateway: OrderGateway = {
    placeMarketOrder: vi.fn(),
    placeLimitOrder: vi.fn(),
    getOrderStatus: vi.fn().mockResolvedValue(status),
  };
  const deps: FlowDeps = {
    logger: createLogger('order-status-test', { sinks: [] }),
    print: (line) => output.push(line),
    loadCredentials: vi
      .fn()
      .mockReturnValue({ ok: true, value: { apiKey: 'test-key', apiSecret: 'test-secret' } }),
    connect: vi.fn().mockReturnValue(gateway),
  };
  return { output, gateway, deps };
}

describe('runOrderStatus', () => {
  it('prints the order record', async () => {
    const { output, gateway, deps } = setup({
      orderId: '4051234568',
      status: 'PARTIALLY_FILLED',
      executedQty: '0.05',
      avgPrice: '2500.00',
      type: 'LIMIT',
    });

    const code = await runOrderStatus({ symbol: 'ethusdt', orderId: '4051234568' }, deps);

    expect(code).toBe(0);
    expect(gateway.getOrderStatus).toHaveBeenCalledWith('ETHUSDT', 4051234568);
    expect(output.slice(-6)).toEqual([
      'ORDER STATUS (ETHUSDT):',
      '   Order ID:     4051234568',
      '   Status:       PARTIALLY_FILLED',
      '   Type:         LIMIT',
      '   Executed Qty: 0.05',
      '   Avg Price:    2500.00',
    ]);
  });

  it('exits 1 when the status is unavailable', async () => {
    const { output, deps } = setup(null);

    const code = await runOrderStatus({ symbol: 'ETHUSDT', orderId: '42' }, deps);

    expect(code).toBe(1);
    expect(output[output.length - 1]).toBe('❌ Order 42 not found or status unavailable');
  });

  it('rejects a malformed order id before connecting', async () => {
    const { output, deps } = setup(null);

    const code = await runOrderStatus({ symbol: 'ETHUSDT', orderId: 'abc' }, deps);

    expect(code).toBe(1);
    expect(output).toContain('❌ Error: Invalid order ID: "abc". Must be a positive integer');
    expect(deps.connect).not.toHaveBeenCalled();
  });
});
