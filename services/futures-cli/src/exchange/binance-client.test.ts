import { describe, it, expect } from 'vitest';
import { normalizeRejection } from './binance-client.js';
import { ExchangeApiError } from './errors.js';

describe('normalizeRejection', () => {
  it('maps a structured API rejection to ExchangeApiError', () => {
    const mapped = normalizeRejection({
      code: -2019,
      message: 'Margin is insufficient.',
      body: { code: -2019, msg: 'Margin is insufficient.' },
    });

    expect(mapped).toBeInstanceOf(ExchangeApiError);
    expect(mapped).toMatchObject({ code: -2019, message: 'Margin is insufficient.' });
  });

  it('passes transport errors through unchanged', () => {
    const socketError = Object.assign(new Error('connect ECONNREFUSED'), { code: 'ECONNREFUSED' });
    expect(normalizeRejection(socketError)).toBe(socketError);
  });

  it('keeps an existing ExchangeApiError', () => {
    const error = new ExchangeApiError(-1121, 'Invalid symbol.');
    expect(normalizeRejection(error)).toBe(error);
  });
});
