import { createEnv } from "@t3-oss/env-core";
import { z } from "zod";

export const env = createEnv({
  server: {
    NODE_ENV: z.enum(["development", "production", "test"]).default("development"),

    // Upstream FX provider
    FX_API_BASE_URL: z.string().url().default("https://api.frankfurter.dev/v1"),
    FX_CONNECT_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
    FX_READ_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
    FX_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
    FX_BACKOFF_MS: z.coerce.number().int().min(0).default(300),

    // Logging
    LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("info"),
  },
  runtimeEnv: process.env,
  emptyStringAsUndefined: true,
});

export type Env = typeof env;
