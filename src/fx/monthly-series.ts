// Monthly Series Builder
import { ONE } from "./decimal.js";
import type { FxHttpClient } from "./http-client.js";
import type { RateService } from "./rate-service.js";
import { parseUpstream, parseUpstreamRate, timeSeriesResponseSchema } from "./schemas.js";
import { normalizeCurrencyCode, type CallOptions, type IsoDate, type Rate, type RateSeries } from "./types.js";

export const SERIES_LENGTH = 30;

const DAY_MS = 24 * 60 * 60 * 1000;

function toIsoDate(date: Date): IsoDate {
  return date.toISOString().slice(0, 10);
}

/** The 30 UTC calendar days ending on `now`, oldest first. */
export function seriesWindow(now: Date): IsoDate[] {
  const today = Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate());
  const days: IsoDate[] = [];
  for (let offset = SERIES_LENGTH - 1; offset >= 0; offset--) {
    days.push(toIsoDate(new Date(today - offset * DAY_MS)));
  }
  return days;
}

export function createMonthlySeriesBuilder(
  http: FxHttpClient,
  rates: RateService,
  now: () => Date = () => new Date(),
) {
  return {
    async getMonthlySeries(base: string, target: string, options: CallOptions = {}): Promise<RateSeries> {
      const from = normalizeCurrencyCode(base);
      const to = normalizeCurrencyCode(target);
      if (from === to) return Array.from({ length: SERIES_LENGTH }, () => ONE);

      const days = seriesWindow(now());
      const path = `/${days[0]}..${days[days.length - 1]}`;
      const query = { base: from, symbols: to };
      const payload = await http.getJson(path, query, options);
      const url = http.buildUrl(path, query);
      const data = parseUpstream(timeSeriesResponseSchema, payload, url);

      const reported = new Map<IsoDate, Rate>();
      for (const [day, dayRates] of Object.entries(data.rates ?? {})) {
        const value = dayRates[to];
        if (value !== undefined && value !== null) reported.set(day, parseUpstreamRate(value, url));
      }

      const series: RateSeries = [];
      let last: Rate | undefined;
      for (const day of days) {
        const value = reported.get(day);
        if (value) {
          last = value;
        } else if (!last) {
          // nothing reported yet in the window: seed once from the live rate
          last = await rates.getCurrentRate(from, to, options);
        }
        series.push(last);
      }
      return series;
    },
  };
}

export type MonthlySeriesBuilder = ReturnType<typeof createMonthlySeriesBuilder>;
