import pino from "pino";
import { env } from "./env.js";

export const logger = pino({
  name: "fx-core",
  level: env.NODE_ENV === "test" ? "silent" : env.LOG_LEVEL,
}, pino.destination(2)); // stdout is reserved for command output

export type { Logger } from "pino";
