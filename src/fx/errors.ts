// FX Errors
// src/fx/errors.ts
import type { CurrencyCode } from "./types.js";

export const BODY_EXCERPT_LIMIT = 300;

export type FxErrorCode =
  | "UPSTREAM_HTTP"
  | "UPSTREAM_FORMAT"
  | "UPSTREAM_CONNECTION"
  | "RATE_NOT_FOUND"
  | "TYPE_CONVERSION";

export abstract class FxError extends Error {
  abstract readonly code: FxErrorCode;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }

  toJSON(): { code: FxErrorCode; message: string } {
    return { code: this.code, message: this.message };
  }
}

export class UpstreamHttpError extends FxError {
  readonly code = "UPSTREAM_HTTP";
  readonly bodyExcerpt: string;

  constructor(readonly status: number, readonly url: string, body: string) {
    const excerpt = body.slice(0, BODY_EXCERPT_LIMIT);
    super(`HTTP ${status} Error for ${url}: ${excerpt}`);
    this.bodyExcerpt = excerpt;
  }
}

export class UpstreamFormatError extends FxError {
  readonly code = "UPSTREAM_FORMAT";

  constructor(readonly url: string, detail = "Invalid JSON returned", options?: ErrorOptions) {
    super(`${detail} from ${url}`, options);
  }
}

export class UpstreamConnectionError extends FxError {
  readonly code = "UPSTREAM_CONNECTION";

  constructor(readonly url: string, options?: ErrorOptions) {
    super(`Could not reach ${url}`, options);
  }
}

export class RateNotFoundError extends FxError {
  readonly code = "RATE_NOT_FOUND";

  constructor(readonly base: CurrencyCode, readonly target: CurrencyCode) {
    super(`No rate found for ${base}->${target}`);
  }
}

export class TypeConversionError extends FxError {
  readonly code = "TYPE_CONVERSION";

  constructor(readonly received: string, options?: ErrorOptions) {
    super(`Cannot convert ${received} to Decimal`, options);
  }
}
