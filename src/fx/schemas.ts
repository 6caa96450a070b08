// Upstream response shapes
import { z } from "zod";
import type Decimal from "decimal.js";
import { toExactDecimal } from "./decimal.js";
import { TypeConversionError, UpstreamFormatError } from "./errors.js";

// GET /currencies: { "AUD": "Australian Dollar", ... }
export const currenciesResponseSchema = z.record(z.string(), z.unknown());

// GET /latest: { "base": "EUR", "date": "...", "rates": { "USD": 1.08 } }
export const latestResponseSchema = z.object({
  rates: z.record(z.string(), z.unknown()).optional(),
});

// GET /{start}..{end}: { "rates": { "2024-01-02": { "USD": 1.09 }, ... } }
export const timeSeriesResponseSchema = z.object({
  rates: z.record(z.string(), z.record(z.string(), z.unknown())).optional(),
});

export function parseUpstream<T extends z.ZodTypeAny>(schema: T, payload: unknown, url: string): z.output<T> {
  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    throw new UpstreamFormatError(url, "Invalid response format", { cause: parsed.error });
  }
  return parsed.data;
}

// A rate the provider sent that is not a number is a malformed response, not a caller error.
export function parseUpstreamRate(value: unknown, url: string): Decimal {
  try {
    return toExactDecimal(value);
  } catch (error) {
    if (error instanceof TypeConversionError) {
      throw new UpstreamFormatError(url, "Invalid rate value", { cause: error });
    }
    throw error;
  }
}
