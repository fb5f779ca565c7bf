/**
 * Structured rejection reported by the exchange (insufficient margin, unknown
 * symbol, filter violations, ...). Anything else thrown by a client is treated
 * as a transport failure.
 */
export class ExchangeApiError extends Error {
  code: number;

  constructor(code: number, message: string) {
    super(message);
    this.name = 'ExchangeApiError';
    this.code = code;
  }
}

export type GatewayError =
  | { kind: 'EXCHANGE_API'; code: number; message: string }
  | { kind: 'TRANSPORT'; message: string };

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'object' && error !== null && 'message' in error) {
    const { message } = error;
    if (typeof message === 'string') return message;
  }
  return String(error);
}
