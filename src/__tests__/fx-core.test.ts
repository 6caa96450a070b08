// FX Core Facade Tests
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type { MockAgent } from "undici";
import { createFxCore, RateNotFoundError, type FxCore } from "../fx/index.js";
import { createUpstream, FIXED_NOW, UPSTREAM_BASE_URL, WINDOW_PATH } from "./helpers/upstream.js";

describe("createFxCore", () => {
  let agent: MockAgent;
  let pool: ReturnType<typeof createUpstream>["pool"];
  let fx: FxCore;

  beforeEach(() => {
    ({ agent, pool } = createUpstream());
    fx = createFxCore({ baseUrl: UPSTREAM_BASE_URL, backoffMs: 0, dispatcher: agent, now: () => FIXED_NOW });
  });

  afterEach(async () => {
    await fx.close();
  });

  it("should answer identity requests without calling upstream", async () => {
    for (const code of ["USD", "eur", "Jpy"]) {
      expect((await fx.currentRate(code, code.toUpperCase())).toString()).toBe("1");
    }
    expect((await fx.monthlySeries("CHF", "chf")).length).toBe(30);
    expect(agent.pendingInterceptors()).toHaveLength(0);
  });

  it("should convert through the shared client", async () => {
    pool
      .intercept({ path: "/v1/latest", method: "GET", query: { base: "EUR", symbols: "USD" } })
      .reply(200, { rates: { USD: 1.0842 } });

    const conversion = await fx.convert("EUR", "USD", "19.99");
    expect(conversion.result.toFixed(4)).toBe("21.6732");
  });

  it("should build a trend report", async () => {
    pool
      .intercept({ path: WINDOW_PATH, method: "GET", query: { base: "EUR", symbols: "USD" } })
      .reply(200, { rates: { "2026-03-02": { USD: 1.05 }, "2026-03-31": { USD: 1.1 } } });

    const report = await fx.trendReport("eur", "usd");
    expect(report.base).toBe("EUR");
    expect(report.target).toBe("USD");
    expect(report.trend).toBe("up");
    expect(report.rates).toHaveLength(30);
    expect(report.rates[28].toString()).toBe("1.05");
    expect(report.rates[29].toString()).toBe("1.1");
    expect(fx.trend(report.rates)).toBe("up");
  });

  it("should surface typed errors unchanged", async () => {
    pool
      .intercept({ path: "/v1/latest", method: "GET", query: { base: "EUR", symbols: "ABC" } })
      .reply(200, { rates: {} });

    const error = await fx.currentRate("EUR", "ABC").catch((e: unknown) => e);
    expect(error).toBeInstanceOf(RateNotFoundError);
    expect(error).toHaveProperty("code", "RATE_NOT_FOUND");
    expect(JSON.parse(JSON.stringify(error))).toEqual({ code: "RATE_NOT_FOUND", message: "No rate found for EUR->ABC" });
  });

  it("should list supported currencies", async () => {
    pool.intercept({ path: "/v1/currencies", method: "GET" }).reply(200, { EUR: "Euro", CHF: "Swiss Franc" });

    expect(await fx.supportedCurrencies()).toEqual(["CHF", "EUR"]);
  });
});
