import { z } from "zod";

const DEFAULT_CACHE_TTL_MS = 24 * 60 * 60 * 1000;
const DEFAULT_RETRY_DELAYS_MS = [250, 600, 1200];
const DEFAULT_USER_AGENT = "PortfolioBacktester/1.0";

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const delayListSchema = z
  .string()
  .transform((value) =>
    value
      .split(",")
      .map((part) => part.trim())
      .filter((part) => part.length > 0)
      .map((part) => Number(part))
  )
  .pipe(z.array(z.number().int().nonnegative()).min(1));

const envSchema = z.object({
  MARKET_DATA_CACHE_TTL_MS: z.coerce.number().int().positive().catch(DEFAULT_CACHE_TTL_MS),
  MARKET_DATA_RETRY_DELAYS_MS: delayListSchema.catch(DEFAULT_RETRY_DELAYS_MS),
  MARKET_DATA_USER_AGENT: z.string().trim().min(1).catch(DEFAULT_USER_AGENT),
  LOG_LEVEL: z.enum(LOG_LEVELS).catch("info")
});

export interface AppConfig {
  marketData: {
    cacheTtlMs: number;
    retryDelaysMs: number[];
    userAgent: string;
  };
  logLevel: LogLevel;
}

/** Unset or malformed variables fall back to their defaults. */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  return {
    marketData: {
      cacheTtlMs: parsed.MARKET_DATA_CACHE_TTL_MS,
      retryDelaysMs: parsed.MARKET_DATA_RETRY_DELAYS_MS,
      userAgent: parsed.MARKET_DATA_USER_AGENT
    },
    logLevel: parsed.LOG_LEVEL
  };
}

let cachedConfig: AppConfig | undefined;

export function getConfig(): AppConfig {
  cachedConfig ??= loadConfig();
  return cachedConfig;
}
