import { getCached, getOrLoad, setCached } from "@/lib/cache";
import { getConfig } from "@/lib/config";
import { createLogger } from "@/lib/logger";
import { buildPriceTable } from "@/lib/price-table";
import type { PriceBar, PriceTable } from "@/lib/types";
import { z } from "zod";

const YAHOO_CHART_ENDPOINT = "https://query1.finance.yahoo.com/v8/finance/chart";

const logger = createLogger("MarketData");

export class MarketDataError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MarketDataError";
  }
}

/** Upstream answered, but has no usable history for the symbol. */
export class NoPriceDataError extends MarketDataError {
  constructor(message: string) {
    super(message);
    this.name = "NoPriceDataError";
  }
}

const nullableNumbers = z.array(z.number().nullable());

const chartResponseSchema = z.object({
  chart: z.object({
    result: z
      .array(
        z.object({
          timestamp: z.array(z.number()).optional(),
          indicators: z
            .object({
              quote: z
                .array(
                  z.object({
                    open: nullableNumbers.optional(),
                    close: nullableNumbers.optional()
                  })
                )
                .optional(),
              adjclose: z.array(z.object({ adjclose: nullableNumbers.optional() })).optional()
            })
            .optional()
        })
      )
      .nullable()
      .optional(),
    error: z.object({ description: z.string().optional() }).nullable().optional()
  })
});

function toUnixTimestamp(dateIso: string, inclusiveEnd = false): number {
  const date = new Date(`${dateIso}T00:00:00Z`);
  if (Number.isNaN(date.getTime())) {
    throw new MarketDataError(`Invalid date format: ${dateIso}`);
  }

  if (inclusiveEnd) {
    return Math.floor(date.getTime() / 1000) + 24 * 60 * 60;
  }
  return Math.floor(date.getTime() / 1000);
}

function toIsoDateFromUnix(seconds: number): string {
  return new Date(seconds * 1000).toISOString().slice(0, 10);
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

async function fetchWithRetry(url: string): Promise<Response> {
  const { retryDelaysMs, userAgent } = getConfig().marketData;
  let lastError: unknown;

  for (let attempt = 0; attempt <= retryDelaysMs.length; attempt += 1) {
    try {
      const response = await fetch(url, {
        method: "GET",
        headers: {
          "User-Agent": userAgent
        },
        cache: "no-store"
      });

      if (response.status === 404) {
        throw new NoPriceDataError(`Market data request failed with status ${response.status}`);
      }

      if (!response.ok) {
        throw new MarketDataError(`Market data request failed with status ${response.status}`);
      }

      return response;
    } catch (error) {
      if (error instanceof NoPriceDataError) {
        throw error;
      }
      lastError = error;

      if (attempt < retryDelaysMs.length) {
        logger.warn("Retrying market data request", {
          attempt: attempt + 1,
          reason: error instanceof Error ? error.message : String(error)
        });
        await delay(retryDelaysMs[attempt]);
      }
    }
  }

  throw new MarketDataError(
    lastError instanceof Error ? lastError.message : "Failed to request market data"
  );
}

function buildSeriesCacheKey(symbol: string, startDate: string, endDate: string): string {
  return `yahoo:${symbol}:${startDate}:${endDate}`;
}

function buildTableCacheKey(symbols: string[], startDate: string, endDate: string): string {
  return `prices:${symbols.join(",")}:${startDate}:${endDate}`;
}

function valueAt(values: (number | null)[] | undefined, index: number): number | null {
  const value = values?.[index];
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

export async function getHistoricalSeries(
  symbol: string,
  startDate: string,
  endDate: string
): Promise<PriceBar[]> {
  const normalizedSymbol = symbol.trim().toUpperCase();
  if (!normalizedSymbol) {
    throw new MarketDataError("Symbol is required");
  }

  const cacheKey = buildSeriesCacheKey(normalizedSymbol, startDate, endDate);
  const cached = getCached<PriceBar[]>(cacheKey);
  if (cached) {
    logger.debug("Serving cached history", { symbol: normalizedSymbol });
    return cached;
  }

  const period1 = toUnixTimestamp(startDate);
  const period2 = toUnixTimestamp(endDate, true);
  const url = `${YAHOO_CHART_ENDPOINT}/${encodeURIComponent(normalizedSymbol)}?period1=${period1}&period2=${period2}&interval=1d&includeAdjustedClose=true`;

  const startedAt = Date.now();
  const response = await fetchWithRetry(url);
  const parsed = chartResponseSchema.safeParse(await response.json());

  if (!parsed.success) {
    throw new MarketDataError(`Unexpected market data payload for ${normalizedSymbol}`);
  }

  const { chart } = parsed.data;
  if (chart.error) {
    throw new NoPriceDataError(
      `Market data error for ${normalizedSymbol}: ${chart.error.description ?? "unknown error"}`
    );
  }

  const result = chart.result?.[0];
  const timestamps = result?.timestamp ?? [];
  if (timestamps.length === 0) {
    throw new NoPriceDataError(`No price history available for ${normalizedSymbol}`);
  }

  const quote = result?.indicators?.quote?.[0];
  const adjustedCloses = result?.indicators?.adjclose?.[0]?.adjclose;

  const byDate = new Map<string, PriceBar>();
  timestamps.forEach((timestamp, index) => {
    const bar: PriceBar = {
      date: toIsoDateFromUnix(timestamp),
      open: valueAt(quote?.open, index),
      close: valueAt(quote?.close, index),
      adjustedClose: valueAt(adjustedCloses, index)
    };
    if (bar.open === null && bar.close === null && bar.adjustedClose === null) {
      return;
    }
    if (bar.date >= startDate && bar.date <= endDate) {
      byDate.set(bar.date, bar);
    }
  });

  const bars = [...byDate.values()].sort((a, b) => a.date.localeCompare(b.date));

  if (bars.length === 0) {
    throw new NoPriceDataError(`No price values found for ${normalizedSymbol}`);
  }

  logger.info("Fetched history", {
    symbol: normalizedSymbol,
    bars: bars.length,
    latencyMs: Date.now() - startedAt
  });

  setCached(cacheKey, bars, getConfig().marketData.cacheTtlMs);
  return bars;
}

async function loadSymbolHistory(
  symbol: string,
  startDate: string,
  endDate: string
): Promise<[string, PriceBar[]]> {
  try {
    return [symbol, await getHistoricalSeries(symbol, startDate, endDate)];
  } catch (error) {
    if (error instanceof NoPriceDataError) {
      logger.warn("No price history for symbol", { symbol, reason: error.message });
      return [symbol, []];
    }
    throw error;
  }
}

/**
 * Fetches every symbol and merges them into one forward-filled table.
 * A symbol without history gets an empty series; transport failures reject.
 * Identical (symbol set, start, end) requests are served from memory.
 */
export async function loadPriceTable(
  symbols: Iterable<string>,
  startDate: string,
  endDate: string
): Promise<PriceTable> {
  const normalized = [...new Set([...symbols].map((symbol) => symbol.trim().toUpperCase()))]
    .filter((symbol) => symbol.length > 0)
    .sort();

  if (normalized.length === 0) {
    return buildPriceTable({});
  }

  return getOrLoad(
    buildTableCacheKey(normalized, startDate, endDate),
    getConfig().marketData.cacheTtlMs,
    async () => {
      const histories = await Promise.all(
        normalized.map((symbol) => loadSymbolHistory(symbol, startDate, endDate))
      );
      return buildPriceTable(Object.fromEntries(histories));
    }
  );
}
