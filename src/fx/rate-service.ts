// Rate Service
import type Decimal from "decimal.js";
import { RateNotFoundError } from "./errors.js";
import { CONVERSION_SCALE, ONE, roundConversion, toExactDecimal } from "./decimal.js";
import type { FxHttpClient } from "./http-client.js";
import { currenciesResponseSchema, latestResponseSchema, parseUpstream, parseUpstreamRate } from "./schemas.js";
import {
  normalizeCurrencyCode,
  type CallOptions,
  type Conversion,
  type CurrencyCode,
  type FormattedConversion,
  type Rate,
} from "./types.js";

export function createRateService(http: FxHttpClient, now: () => Date = () => new Date()) {
  return {
    async getCurrentRate(base: string, target: string, options: CallOptions = {}): Promise<Rate> {
      const from = normalizeCurrencyCode(base);
      const to = normalizeCurrencyCode(target);
      if (from === to) return ONE;

      const query = { base: from, symbols: to };
      const payload = await http.getJson("/latest", query, options);
      const url = http.buildUrl("/latest", query);
      const data = parseUpstream(latestResponseSchema, payload, url);
      const rate = data.rates?.[to];
      if (rate === undefined || rate === null) throw new RateNotFoundError(from, to);
      return parseUpstreamRate(rate, url);
    },

    async getSupportedCurrencies(options: CallOptions = {}): Promise<CurrencyCode[]> {
      const payload = await http.getJson("/currencies", {}, options);
      const data = parseUpstream(currenciesResponseSchema, payload, http.buildUrl("/currencies"));
      const codes = new Set(Object.keys(data).map(normalizeCurrencyCode));
      return Array.from(codes).sort();
    },

    async convert(base: string, target: string, amount: unknown, options: CallOptions = {}): Promise<Conversion> {
      const exactAmount: Decimal = toExactDecimal(amount);
      const rate = await this.getCurrentRate(base, target, options);
      return {
        base: normalizeCurrencyCode(base),
        target: normalizeCurrencyCode(target),
        amount: exactAmount,
        rate,
        result: roundConversion(exactAmount.times(rate)),
        timestamp: now(),
      };
    },
  };
}

export type RateService = ReturnType<typeof createRateService>;

export function formatConversion(conversion: Conversion): FormattedConversion {
  return {
    base: conversion.base,
    target: conversion.target,
    amount: conversion.amount.toString(),
    rate: conversion.rate.toString(),
    result: conversion.result.toFixed(CONVERSION_SCALE),
    timestamp: conversion.timestamp.toISOString(),
  };
}
