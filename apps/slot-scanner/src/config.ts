import { config as loadEnv } from "dotenv";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { DateTime } from "luxon";
import { z } from "zod";
import { DEFAULT_SLOTS_API_URL } from "@slot-scanner/shared";
import { ConfigError } from "./errors.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const FLAG_VALUES = ["true", "false", "1", "0", "yes", "no"] as const;

function blankAsUndefined(v: unknown) {
  return typeof v === "string" && v.trim() === "" ? undefined : v;
}

function csvList(v: string) {
  return v
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

const Flag = z
  .preprocess(
    (v) => {
      const value = blankAsUndefined(v);
      return typeof value === "string" ? value.trim().toLowerCase() : value;
    },
    z.enum(FLAG_VALUES).default("false"),
  )
  .transform((v) => v === "true" || v === "1" || v === "yes");

const EnvSchema = z.object({
  SLOTS_API_URL: z.string().url().default(DEFAULT_SLOTS_API_URL),
  LOCATION_ID: z.coerce.number().int().positive(),
  QUERY_LIMIT: z.coerce.number().int().positive().max(500).default(5),
  EARLIER_THAN: z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD")
    .refine((v) => DateTime.fromISO(v).isValid, "not a calendar date"),
  SCAN_INTERVAL_SECS: z.coerce.number().int().positive().default(60),
  JITTER_RATIO: z.coerce.number().min(0).lt(1).default(0.1),
  SKIP_TIMES: z
    .string()
    .default("")
    .transform(csvList)
    .pipe(
      z.array(
        z.string().regex(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}$/, "expected YYYY-MM-DDTHH:mm"),
      ),
    ),
  NOTIFY_ONCE: Flag,
  STOP_AFTER_NOTIFY: Flag,
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),

  SMTP_HOST: z.string().min(1).default("smtp.gmail.com"),
  SMTP_PORT: z.coerce.number().int().positive().max(65535).default(587),
  EMAIL_SENDER: z.string().email(),
  EMAIL_SENDER_PASSWORD: z.string().min(1),
  RECIPIENT_EMAIL: z.string().email(),
  SMS_GATEWAY_EMAIL: z.preprocess(blankAsUndefined, z.string().email().optional()),

  METRICS_PORT: z.preprocess(
    blankAsUndefined,
    z.coerce.number().int().positive().max(65535).optional(),
  ),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z.string().optional(),
});

export type LogLevel = z.infer<typeof EnvSchema>["LOG_LEVEL"];

export interface SmtpSettings {
  readonly host: string;
  readonly port: number;
  readonly user: string;
  readonly pass: string;
}

export interface ScannerConfig {
  readonly slotsApiUrl: string;
  readonly locationId: number;
  readonly queryLimit: number;
  readonly earlierThan: string; // YYYY-MM-DD
  readonly scanIntervalMs: number;
  readonly jitterRatio: number;
  readonly skipTimes: readonly string[];
  readonly notifyOnce: boolean;
  readonly stopAfterNotify: boolean;
  readonly requestTimeoutMs: number;
  readonly smtp: SmtpSettings;
  readonly mail: { readonly from: string; readonly to: readonly string[] };
  readonly metricsPort?: number;
  readonly logLevel: LogLevel;
  readonly pretty: boolean;
}

/** Validates an env map into a frozen config. Throws ConfigError. */
export function parseConfig(
  source: Record<string, string | undefined>,
): ScannerConfig {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
    );
  }
  const env = parsed.data;

  const to = env.SMS_GATEWAY_EMAIL
    ? [env.RECIPIENT_EMAIL, env.SMS_GATEWAY_EMAIL]
    : [env.RECIPIENT_EMAIL];

  return Object.freeze({
    slotsApiUrl: env.SLOTS_API_URL,
    locationId: env.LOCATION_ID,
    queryLimit: env.QUERY_LIMIT,
    earlierThan: env.EARLIER_THAN,
    scanIntervalMs: env.SCAN_INTERVAL_SECS * 1000,
    jitterRatio: env.JITTER_RATIO,
    skipTimes: Object.freeze(env.SKIP_TIMES),
    notifyOnce: env.NOTIFY_ONCE,
    stopAfterNotify: env.STOP_AFTER_NOTIFY,
    requestTimeoutMs: env.REQUEST_TIMEOUT_MS,
    smtp: Object.freeze({
      host: env.SMTP_HOST,
      port: env.SMTP_PORT,
      user: env.EMAIL_SENDER,
      pass: env.EMAIL_SENDER_PASSWORD,
    }),
    mail: Object.freeze({ from: env.EMAIL_SENDER, to: Object.freeze(to) }),
    metricsPort: env.METRICS_PORT,
    logLevel: env.LOG_LEVEL,
    pretty: env.NODE_ENV === "development",
  });
}

/** Reads `.env` at the repo root (if any), then validates process.env. */
export function loadConfig(): ScannerConfig {
  loadEnv({ path: path.resolve(__dirname, "../../../.env") });
  return parseConfig(process.env);
}
