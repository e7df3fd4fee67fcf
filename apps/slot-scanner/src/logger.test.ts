import { describe, it, expect } from "vitest";
import { pino } from "pino";
import { ConfigError } from "./errors.js";
import { createLogger, logBootFailure } from "./logger.js";

function captured() {
  const lines: string[] = [];
  const log = pino({ level: "info" }, { write: (msg: string) => void lines.push(msg) });
  const parsed = (): unknown[] => lines.map((l) => JSON.parse(l));
  return { log, parsed };
}

describe("createLogger", () => {
  it("uses the configured level", () => {
    const logger = createLogger({ logLevel: "warn", pretty: false });
    expect(logger.level).toBe("warn");
    expect(logger.isLevelEnabled("info")).toBe(false);
    expect(logger.isLevelEnabled("error")).toBe(true);
  });
});

describe("logBootFailure", () => {
  it("logs configuration issues as structured fields", () => {
    const { log, parsed } = captured();

    logBootFailure(log, new ConfigError(["LOCATION_ID: Required", "EARLIER_THAN: Required"]));

    expect(parsed()).toMatchObject([
      {
        level: 60,
        msg: "invalid configuration",
        code: "config_invalid",
        issues: ["LOCATION_ID: Required", "EARLIER_THAN: Required"],
      },
    ]);
  });

  it("logs any other boot error with its stack", () => {
    const { log, parsed } = captured();

    logBootFailure(log, new Error("listen EADDRINUSE: address already in use :::8091"));

    expect(parsed()).toMatchObject([
      {
        level: 60,
        msg: "fatal boot error",
        err: {
          type: "Error",
          message: "listen EADDRINUSE: address already in use :::8091",
          stack: expect.any(String),
        },
      },
    ]);
  });
});
