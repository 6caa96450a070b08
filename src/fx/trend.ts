// Trend Classifier
import type Decimal from "decimal.js";
import { FxDecimal } from "./decimal.js";
import type { Trend } from "./types.js";

// Relative change, in percent, below which a series counts as flat.
export const FLAT_THRESHOLD_PERCENT = new FxDecimal("0.1");

/**
 * Compares only the first and last rates of the series; the values in
 * between do not move the result.
 */
export function classifyTrend(series: readonly Decimal[]): Trend {
  if (series.length < 2) return "flat";

  const first = new FxDecimal(series[0]);
  const last = new FxDecimal(series[series.length - 1]);
  if (first.isZero()) return "flat";

  const change = last.minus(first).div(first).times(100);
  if (change.abs().lessThan(FLAT_THRESHOLD_PERCENT)) return "flat";
  return change.isPositive() ? "up" : "down";
}
