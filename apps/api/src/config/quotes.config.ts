/**
 * Quote service configuration, read once at startup.
 *
 * @example
 * ```typescript
 * constructor(
 *   @Inject(quotesConfig.KEY)
 *   private readonly config: ConfigType<typeof quotesConfig>,
 * ) {}
 * ```
 */
import { registerAs } from '@nestjs/config';
import { validate } from './env-validation';

export interface QuotesConfig {
  /** Currency Registry contents, in configured order */
  currencies: readonly string[];
  cache: {
    /** Absent means the in-memory store */
    redis?: { host: string; port: number };
    /** Entry lifetime in milliseconds */
    ttlMs: number;
  };
  upstream: {
    timeoutMs: number;
    frankfurterUrl: string;
    exchangeRateUrl: string;
  };
}

export function buildQuotesConfig(env: Record<string, unknown>): QuotesConfig {
  const v = validate(env);
  return Object.freeze({
    currencies: Object.freeze(v.SUPPORTED_CURRENCIES.split(',')),
    cache: Object.freeze({
      redis: v.REDIS_HOST ? { host: v.REDIS_HOST, port: v.REDIS_PORT } : undefined,
      ttlMs: v.CACHE_LIFE_TIME * 1000,
    }),
    upstream: Object.freeze({
      timeoutMs: v.FX_TIMEOUT_MS,
      frankfurterUrl: v.FRANKFURTER_URL,
      exchangeRateUrl: v.EXCHANGE_RATE_URL,
    }),
  });
}

export default registerAs('quotes', (): QuotesConfig => buildQuotesConfig(process.env));
