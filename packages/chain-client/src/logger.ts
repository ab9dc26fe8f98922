/**
 * Root logger. JSON in production, pretty-printed in development.
 */

import pino from "pino";
import type { Logger } from "pino";
import type { ClientConfig } from "./config.js";

export function createLogger(
  config: Pick<ClientConfig, "LOG_LEVEL" | "NODE_ENV">,
): Logger {
  return pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });
}
