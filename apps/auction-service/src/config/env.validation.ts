export const PLACEHOLDER_JWT_SECRET = 'change_me_in_production_min_32_chars!!';

const REQUIRED = ['DATABASE_URL', 'JWT_SECRET', 'JWT_ISSUER', 'JWT_AUDIENCE'] as const;

export interface NumericSettings {
  PORT: number;
  GATEWAY_TIMEOUT_MS: number;
  BID_RETRY_ATTEMPTS: number;
  BCRYPT_ROUNDS: number;
}

export type AppEnv = Record<string, unknown> & NumericSettings;

function positiveInt(config: Record<string, unknown>, key: keyof NumericSettings, fallback: number): number {
  const raw = config[key];
  if (raw === undefined || raw === '') {
    return fallback;
  }
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`${key} must be a positive integer (got ${String(raw)})`);
  }
  return parsed;
}

/**
 * `ConfigModule.forRoot({ validate })` hook. Fails fast on missing keys and
 * coerces the numeric settings so `config.get<number>()` is truthful.
 */
export function validateEnv(config: Record<string, unknown>): AppEnv {
  for (const key of REQUIRED) {
    if (!config[key]) {
      throw new Error(`Missing required environment variable: ${key}`);
    }
  }

  if (String(config['JWT_SECRET']).length < 32) {
    throw new Error('JWT_SECRET must be at least 32 characters long');
  }

  return {
    ...config,
    PORT: positiveInt(config, 'PORT', 3000),
    GATEWAY_TIMEOUT_MS: positiveInt(config, 'GATEWAY_TIMEOUT_MS', 5000),
    BID_RETRY_ATTEMPTS: positiveInt(config, 'BID_RETRY_ATTEMPTS', 3),
    BCRYPT_ROUNDS: positiveInt(config, 'BCRYPT_ROUNDS', 12),
  };
}
