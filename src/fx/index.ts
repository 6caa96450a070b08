import type Decimal from "decimal.js";
import type { Dispatcher } from "undici";
import { env } from "../config/env.js";
import { logger as rootLogger, type Logger } from "../config/logger.js";
import { FxHttpClient } from "./http-client.js";
import { createMonthlySeriesBuilder } from "./monthly-series.js";
import { createRateService } from "./rate-service.js";
import { classifyTrend } from "./trend.js";
import {
  normalizeCurrencyCode,
  type CallOptions,
  type Conversion,
  type CurrencyCode,
  type Rate,
  type RateSeries,
  type Trend,
  type TrendReport,
} from "./types.js";

export interface FxCoreOptions {
  baseUrl?: string;
  connectTimeoutMs?: number;
  readTimeoutMs?: number;
  maxAttempts?: number;
  backoffMs?: number;
  dispatcher?: Dispatcher;
  logger?: Logger;
  now?: () => Date;
}

export interface FxCore {
  currentRate(base: string, target: string, options?: CallOptions): Promise<Rate>;
  convert(base: string, target: string, amount: unknown, options?: CallOptions): Promise<Conversion>;
  supportedCurrencies(options?: CallOptions): Promise<CurrencyCode[]>;
  monthlySeries(base: string, target: string, options?: CallOptions): Promise<RateSeries>;
  trend(series: readonly Decimal[]): Trend;
  trendReport(base: string, target: string, options?: CallOptions): Promise<TrendReport>;
  close(): Promise<void>;
}

/**
 * Builds the FX core around a single pooled HTTP client. Create one per
 * process and call `close()` on shutdown.
 */
export function createFxCore(options: FxCoreOptions = {}): FxCore {
  const logger = (options.logger ?? rootLogger).child({ module: "fx" });
  const now = options.now ?? (() => new Date());

  const http = new FxHttpClient({
    baseUrl: options.baseUrl ?? env.FX_API_BASE_URL,
    connectTimeoutMs: options.connectTimeoutMs ?? env.FX_CONNECT_TIMEOUT_MS,
    readTimeoutMs: options.readTimeoutMs ?? env.FX_READ_TIMEOUT_MS,
    maxAttempts: options.maxAttempts ?? env.FX_MAX_ATTEMPTS,
    backoffMs: options.backoffMs ?? env.FX_BACKOFF_MS,
    dispatcher: options.dispatcher,
    logger,
  });
  const rates = createRateService(http, now);
  const monthly = createMonthlySeriesBuilder(http, rates, now);

  return {
    currentRate: (base, target, callOptions) => rates.getCurrentRate(base, target, callOptions),
    convert: (base, target, amount, callOptions) => rates.convert(base, target, amount, callOptions),
    supportedCurrencies: (callOptions) => rates.getSupportedCurrencies(callOptions),
    monthlySeries: (base, target, callOptions) => monthly.getMonthlySeries(base, target, callOptions),
    trend: classifyTrend,

    async trendReport(base, target, callOptions) {
      const series = await monthly.getMonthlySeries(base, target, callOptions);
      return {
        base: normalizeCurrencyCode(base),
        target: normalizeCurrencyCode(target),
        trend: classifyTrend(series),
        rates: series,
      };
    },

    async close() {
      await http.close();
      logger.debug("FX client closed");
    },
  };
}

export { FxHttpClient, RETRY_STATUSES, type FxHttpClientOptions } from "./http-client.js";
export { createRateService, formatConversion, type RateService } from "./rate-service.js";
export { createMonthlySeriesBuilder, seriesWindow, SERIES_LENGTH, type MonthlySeriesBuilder } from "./monthly-series.js";
export { classifyTrend, FLAT_THRESHOLD_PERCENT } from "./trend.js";
export { classifyNumeric, fromNumericInput, toExactDecimal, FxDecimal, type NumericInput } from "./decimal.js";
export * from "./errors.js";
export * from "./types.js";
