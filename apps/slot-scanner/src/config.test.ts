import { describe, it, expect } from "vitest";
import { parseConfig } from "./config.js";
import { ConfigError } from "./errors.js";

const required = {
  LOCATION_ID: "5446",
  EARLIER_THAN: "2025-12-31",
  EMAIL_SENDER: "scanner@example.test",
  EMAIL_SENDER_PASSWORD: "test-secret",
  RECIPIENT_EMAIL: "me@example.test",
};

describe("parseConfig", () => {
  it("fills defaults around the required values", () => {
    expect(parseConfig(required)).toEqual({
      slotsApiUrl: "https://ttp.cbp.dhs.gov/schedulerapi/slots",
      locationId: 5446,
      queryLimit: 5,
      earlierThan: "2025-12-31",
      scanIntervalMs: 60_000,
      jitterRatio: 0.1,
      skipTimes: [],
      notifyOnce: false,
      stopAfterNotify: false,
      requestTimeoutMs: 15_000,
      smtp: {
        host: "smtp.gmail.com",
        port: 587,
        user: "scanner@example.test",
        pass: "test-secret",
      },
      mail: { from: "scanner@example.test", to: ["me@example.test"] },
      logLevel: "info",
      pretty: false,
    });
  });

  it("returns a frozen value", () => {
    const config = parseConfig(required);
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.smtp)).toBe(true);
    expect(Object.isFrozen(config.mail.to)).toBe(true);
  });

  it("reads the optional settings", () => {
    const config = parseConfig({
      ...required,
      SCAN_INTERVAL_SECS: "120",
      SKIP_TIMES: "2025-12-25T08:00, 2025-12-25T09:00",
      NOTIFY_ONCE: "TRUE",
      STOP_AFTER_NOTIFY: "yes",
      SMS_GATEWAY_EMAIL: "5550100@sms.example.test",
      METRICS_PORT: "9464",
      NODE_ENV: "development",
    });

    expect(config.scanIntervalMs).toBe(120_000);
    expect(config.skipTimes).toEqual(["2025-12-25T08:00", "2025-12-25T09:00"]);
    expect(config.notifyOnce).toBe(true);
    expect(config.stopAfterNotify).toBe(true);
    expect(config.mail.to).toEqual(["me@example.test", "5550100@sms.example.test"]);
    expect(config.metricsPort).toBe(9464);
    expect(config.pretty).toBe(true);
  });

  it("treats blank optional values as unset", () => {
    const config = parseConfig({ ...required, SMS_GATEWAY_EMAIL: "", METRICS_PORT: " " });
    expect(config.mail.to).toEqual(["me@example.test"]);
    expect(config.metricsPort).toBeUndefined();
  });

  it("rejects an impossible cutoff date", () => {
    expect(() => parseConfig({ ...required, EARLIER_THAN: "2025-13-40" })).toThrow(
      "Invalid configuration: EARLIER_THAN: not a calendar date",
    );
  });

  it("lists every missing required value", () => {
    let caught: unknown;
    try {
      parseConfig({});
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    if (!(caught instanceof ConfigError)) return;
    expect(caught.issues.map((i) => i.split(":")[0])).toEqual([
      "LOCATION_ID",
      "EARLIER_THAN",
      "EMAIL_SENDER",
      "EMAIL_SENDER_PASSWORD",
      "RECIPIENT_EMAIL",
    ]);
  });
});
