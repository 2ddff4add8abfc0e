/** Structured logging: one root pino logger, one child per module. */

import { pino, type Logger } from "pino";

export type { Logger };

const rootLogger: Logger = pino({
  name: "shipping-assistant",
  level: process.env.LOG_LEVEL ?? "info",
});

/** Child logger tagged with the module it belongs to, e.g. createLogger("ship360.auth") */
export function createLogger(module: string, parent: Logger = rootLogger): Logger {
  return parent.child({ module });
}

export function setLogLevel(level: string): void {
  rootLogger.level = level;
}
