import { z } from 'zod';
import { env, isLogLevel, parseBoolean } from '@workspace/shared-utils';
import type { EnvSource, LogLevel } from '@workspace/shared-utils';
import { fail, ok } from '../types.js';
import type { Result } from '../types.js';
import type { ExchangeCredentials } from '../exchange/types.js';

export const API_KEY_VAR = 'BINANCE_API_KEY';
export const API_SECRET_VAR = 'BINANCE_API_SECRET';

const CredentialsSchema = z.object({
  [API_KEY_VAR]: z.string().min(1),
  [API_SECRET_VAR]: z.string().min(1),
});

export interface ConfigurationError {
  kind: 'CONFIGURATION';
  missing: string[];
  message: string;
}

export interface RuntimeConfig {
  testnet: boolean;
  logDir: string;
  logLevel: LogLevel;
}

/**
 * Settings needed before credentials are checked: environment and logging.
 */
export function loadRuntimeConfig(source: EnvSource = process.env): RuntimeConfig {
  const level = env('LOG_LEVEL', source)?.toUpperCase();

  return {
    testnet: parseBoolean(env('BINANCE_TESTNET', source), true),
    logDir: env('LOG_DIR', source) ?? 'logs',
    logLevel: level !== undefined && isLogLevel(level) ? level : 'INFO',
  };
}

export function loadCredentials(
  source: EnvSource = process.env,
): Result<ExchangeCredentials, ConfigurationError> {
  const parsed = CredentialsSchema.safeParse({
    [API_KEY_VAR]: env(API_KEY_VAR, source) ?? '',
    [API_SECRET_VAR]: env(API_SECRET_VAR, source) ?? '',
  });

  if (!parsed.success) {
    const missing = parsed.error.issues.map((issue) => issue.path.join('.'));
    return fail({
      kind: 'CONFIGURATION',
      missing,
      message: `API credentials not found: ${missing.join(', ')}`,
    });
  }

  return ok({
    apiKey: parsed.data[API_KEY_VAR],
    apiSecret: parsed.data[API_SECRET_VAR],
  });
}
