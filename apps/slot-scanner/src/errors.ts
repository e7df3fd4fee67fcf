// Error taxonomy for the scanner, plus SMTP error classification.

export class ScannerError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ConfigError extends ScannerError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super("config_invalid", `Invalid configuration: ${issues.join("; ")}`);
    this.issues = issues;
  }
}

/** Network failure, timeout or non-2xx status from the slots API. */
export class SlotFetchError extends ScannerError {
  readonly status?: number;

  constructor(message: string, opts: { status?: number; cause?: unknown } = {}) {
    super("slot_fetch_failed", message, { cause: opts.cause });
    this.status = opts.status;
  }
}

/** The slots API answered, but not with a list of slots we can read. */
export class SlotResponseError extends ScannerError {
  constructor(message: string, opts: { cause?: unknown } = {}) {
    super("slot_response_invalid", message, { cause: opts.cause });
  }
}

/** The mail relay rejected our credentials; polling cannot usefully go on. */
export class MailAuthError extends ScannerError {
  constructor(message: string, opts: { cause?: unknown } = {}) {
    super("mail_auth_failed", message, { cause: opts.cause });
  }
}

/* -------------------------- Mail error classes -------------------------- */

export type MailErrorClass = {
  kind: "auth" | "transient" | "permanent";
  code: string;
  message: string;
};

const AUTH_RESPONSE_CODES = [530, 534, 535];
const TRANSIENT_RESPONSE_CODES = [421, 450, 451, 452];

function readProp(err: unknown, key: string): unknown {
  return typeof err === "object" && err !== null
    ? Reflect.get(err, key)
    : undefined;
}

/** Heuristics over nodemailer's `code` and the SMTP `responseCode`. */
export function classifyMailError(err: unknown): MailErrorClass {
  const rawResponse = readProp(err, "responseCode");
  const responseCode = typeof rawResponse === "number" ? rawResponse : undefined;
  const rawCode = readProp(err, "code");
  const code = typeof rawCode === "string" ? rawCode : "";
  const message = err instanceof Error ? err.message : String(err);
  const smtpCode = responseCode === undefined ? "" : `smtp_${responseCode}`;

  if (
    code === "EAUTH" ||
    (responseCode !== undefined && AUTH_RESPONSE_CODES.includes(responseCode))
  ) {
    return { kind: "auth", code: smtpCode || code, message };
  }

  // 421/450/451/452 -> transient; 5xx -> permanent; other 4xx -> transient
  if (responseCode !== undefined) {
    if (TRANSIENT_RESPONSE_CODES.includes(responseCode)) {
      return { kind: "transient", code: smtpCode, message };
    }
    if (responseCode >= 500) {
      return { kind: "permanent", code: smtpCode, message };
    }
    if (Math.floor(responseCode / 100) === 4) {
      return { kind: "transient", code: smtpCode, message };
    }
  }

  if (
    /ECONNRESET|ETIMEDOUT|ECONNREFUSED|EAI_AGAIN|ENOTFOUND|ESOCKET|ECONNECTION|Timeout/i.test(
      code,
    ) ||
    /socket|connect|network/i.test(message)
  ) {
    return { kind: "transient", code, message };
  }

  if (
    code === "EENVELOPE" ||
    /No recipients defined|address|recipient/i.test(message)
  ) {
    return { kind: "permanent", code: code || "format", message };
  }

  return { kind: "transient", code: code || "unknown", message };
}
