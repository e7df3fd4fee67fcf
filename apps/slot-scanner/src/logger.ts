import { pino, type Logger } from "pino";
import type { ScannerConfig } from "./config.js";
import { ConfigError } from "./errors.js";

export type { Logger };

export function createLogger(
  config: Pick<ScannerConfig, "logLevel" | "pretty">,
): Logger {
  return pino({
    level: config.logLevel,
    transport: config.pretty
      ? { target: "pino-pretty", options: { singleLine: true } }
      : undefined,
  });
}

/** Boot failures happen before config (and so the real logger) exists. */
export function logBootFailure(logger: Logger, err: unknown): void {
  if (err instanceof ConfigError) {
    logger.fatal({ code: err.code, issues: err.issues }, "invalid configuration");
    return;
  }
  logger.fatal({ err }, "fatal boot error");
}
