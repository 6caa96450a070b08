// Decimal Normalizer
import Decimal from "decimal.js";
import { TypeConversionError } from "./errors.js";

export const FX_PRECISION = 28;

// Every rate and amount in the core lives in this context.
export const FxDecimal = Decimal.clone({
  precision: FX_PRECISION,
  rounding: Decimal.ROUND_HALF_EVEN,
});

export const CONVERSION_SCALE = 4;

export type NumericInput =
  | { kind: "integral"; value: number | bigint }
  | { kind: "textual"; value: string }
  | { kind: "floating"; value: number };

const DECIMAL_LITERAL = /^[+-]?(\d+(\.\d*)?|\.\d+)(e[+-]?\d+)?$/i;

function describe(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

/**
 * Sorts a raw value into one of the accepted numeric representations.
 * Throws TypeConversionError for anything else, including NaN and the infinities.
 */
export function classifyNumeric(value: unknown): NumericInput {
  if (typeof value === "bigint") return { kind: "integral", value };
  if (typeof value === "string") return { kind: "textual", value };
  if (typeof value === "number") {
    if (!Number.isFinite(value)) throw new TypeConversionError(String(value));
    return Number.isSafeInteger(value) ? { kind: "integral", value } : { kind: "floating", value };
  }
  throw new TypeConversionError(describe(value));
}

export function fromNumericInput(input: NumericInput): Decimal {
  switch (input.kind) {
    case "integral":
      return new FxDecimal(input.value.toString());
    case "textual": {
      const text = input.value.trim();
      if (!DECIMAL_LITERAL.test(text)) throw new TypeConversionError(`string "${input.value}"`);
      return new FxDecimal(text);
    }
    case "floating":
      // String() yields the shortest text that round-trips, so 0.1 stays 0.1
      return new FxDecimal(String(input.value));
  }
}

export function toExactDecimal(value: unknown): Decimal {
  if (Decimal.isDecimal(value)) {
    if (!value.isFinite()) throw new TypeConversionError(value.toString());
    return new FxDecimal(value);
  }
  return fromNumericInput(classifyNumeric(value));
}

export function roundConversion(value: Decimal): Decimal {
  return value.toDecimalPlaces(CONVERSION_SCALE, FxDecimal.ROUND_HALF_EVEN);
}

export const ONE = new FxDecimal(1);
