// Resilient Fetcher
import { setTimeout as sleep } from "node:timers/promises";
import { Agent, fetch, type Dispatcher } from "undici";
import type { Logger } from "pino";
import { UpstreamConnectionError, UpstreamFormatError, UpstreamHttpError } from "./errors.js";
import type { CallOptions, QueryParams } from "./types.js";

export const RETRY_STATUSES: ReadonlySet<number> = new Set([429, 500, 502, 503, 504]);

export interface FxHttpClientOptions {
  baseUrl: string;
  connectTimeoutMs?: number;
  readTimeoutMs?: number;
  maxAttempts?: number;    // total, first try included
  backoffMs?: number;      // delay before the first retry, doubled after each
  dispatcher?: Dispatcher; // replaces the pooled Agent, e.g. a MockAgent
  logger?: Logger;
}

type UpstreamResponse = Awaited<ReturnType<typeof fetch>>;

export class FxHttpClient {
  private readonly baseUrl: string;
  private readonly dispatcher: Dispatcher;
  private readonly maxAttempts: number;
  private readonly backoffMs: number;
  private readonly log?: Logger;

  constructor(options: FxHttpClientOptions) {
    const readTimeout = options.readTimeoutMs ?? 10_000;
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 3);
    this.backoffMs = options.backoffMs ?? 300;
    this.log = options.logger?.child({ component: "fx-http" });
    this.dispatcher =
      options.dispatcher ??
      new Agent({
        connect: { timeout: options.connectTimeoutMs ?? 5_000 },
        headersTimeout: readTimeout,
        bodyTimeout: readTimeout,
      });
  }

  buildUrl(path: string, query: QueryParams = {}): string {
    const url = new URL(`${this.baseUrl}/${path.replace(/^\/+/, "")}`);
    for (const [key, value] of Object.entries(query)) {
      url.searchParams.set(key, value);
    }
    return url.toString();
  }

  /**
   * GET a JSON document from the upstream provider.
   *
   * Retries on {@link RETRY_STATUSES} and on connection failures until
   * `maxAttempts` is spent. An aborted `signal` rejects with its reason
   * straight away and is never retried.
   */
  async getJson(path: string, query: QueryParams = {}, options: CallOptions = {}): Promise<unknown> {
    const url = this.buildUrl(path, query);
    const { signal } = options;

    for (let attempt = 1; ; attempt++) {
      let response: UpstreamResponse;
      try {
        response = await fetch(url, {
          method: "GET",
          headers: { accept: "application/json" },
          dispatcher: this.dispatcher,
          signal,
        });
      } catch (error) {
        if (signal?.aborted) throw error;
        if (attempt >= this.maxAttempts) throw new UpstreamConnectionError(url, { cause: error });
        await this.backoff(attempt, signal, { url, error: error instanceof Error ? error.message : String(error) });
        continue;
      }

      if (RETRY_STATUSES.has(response.status) && attempt < this.maxAttempts) {
        await response.body?.cancel();
        await this.backoff(attempt, signal, { url, status: response.status });
        continue;
      }

      const body = await this.readBody(response, url, signal);
      if (response.status >= 400) {
        throw new UpstreamHttpError(response.status, url, body);
      }

      try {
        const payload: unknown = JSON.parse(body);
        return payload;
      } catch (error) {
        throw new UpstreamFormatError(url, "Invalid JSON returned", { cause: error });
      }
    }
  }

  async close(): Promise<void> {
    await this.dispatcher.close();
  }

  private async readBody(response: UpstreamResponse, url: string, signal?: AbortSignal): Promise<string> {
    try {
      return await response.text();
    } catch (error) {
      if (signal?.aborted) throw error;
      throw new UpstreamConnectionError(url, { cause: error });
    }
  }

  private async backoff(attempt: number, signal: AbortSignal | undefined, context: Record<string, unknown>) {
    const delay = this.backoffMs * 2 ** (attempt - 1);
    this.log?.debug({ ...context, attempt, delay }, "Retrying upstream request");
    try {
      await sleep(delay, undefined, { signal });
    } catch (error) {
      // timers/promises wraps the reason in its own AbortError
      if (signal?.aborted) throw signal.reason;
      throw error;
    }
  }
}
