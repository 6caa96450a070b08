// FX Types
// src/fx/types.ts
import type Decimal from "decimal.js";

export type CurrencyCode = string;  // ISO 4217, always upper-case once normalized

export type Rate = Decimal;         // target units per one base unit

export type RateSeries = Rate[];    // 30 daily rates, oldest first

export type Trend = "up" | "down" | "flat";

export type IsoDate = string;       // YYYY-MM-DD

export interface Conversion {
  base: CurrencyCode;
  target: CurrencyCode;
  amount: Decimal;
  rate: Rate;
  result: Decimal;  // amount * rate, 4 places, half-even
  timestamp: Date;
}

export interface FormattedConversion {
  base: CurrencyCode;
  target: CurrencyCode;
  amount: string;
  rate: string;
  result: string;
  timestamp: string;
}

export interface TrendReport {
  base: CurrencyCode;
  target: CurrencyCode;
  trend: Trend;
  rates: RateSeries;
}

export interface CallOptions {
  signal?: AbortSignal;
}

export type QueryParams = Record<string, string>;

export function normalizeCurrencyCode(code: string): CurrencyCode {
  return code.trim().toUpperCase();
}
