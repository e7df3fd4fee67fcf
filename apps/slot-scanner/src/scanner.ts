// Scanner: one poll cycle (fetch → filter → notify) and the loop that
// repeats it on a jittered fixed interval until aborted.

import { setTimeout as delay } from "node:timers/promises";
import type { DateTime } from "luxon";
import {
  buildSlotsUrl,
  filterEarlierSlots,
  parseCutoff,
  slotKey,
  type TimedSlot,
} from "@slot-scanner/shared";
import type { ScannerConfig } from "./config.js";
import type { Logger } from "./logger.js";
import type { Mailer } from "./adapters/email.js";
import { fetchSlots, type FetchLike } from "./adapters/slots.js";
import { renderSlotEmail } from "./templates/email.js";
import {
  MailAuthError,
  ScannerError,
  classifyMailError,
  type MailErrorClass,
} from "./errors.js";
import type { ScannerMetrics } from "./metrics.js";

export type ScanOutcome =
  | { status: "fetch_failed"; error: ScannerError }
  | { status: "no_match"; fetched: number }
  | { status: "already_notified"; slots: TimedSlot[] }
  | { status: "notified"; slots: TimedSlot[]; messageId: string }
  | { status: "notify_failed"; slots: TimedSlot[]; error: MailErrorClass };

const NOTIFY_FAILURE_LABEL: Record<MailErrorClass["kind"], string> = {
  auth: "auth_failed",
  transient: "transient_fail",
  permanent: "permanent_fail",
};

export interface ScannerDeps {
  config: ScannerConfig;
  mailer: Mailer;
  logger: Logger;
  fetch?: FetchLike;
  metrics?: ScannerMetrics;
  now?: () => number;
}

export class Scanner {
  private readonly url: string;
  private readonly earlierThan: DateTime;
  private readonly skipTimes: ReadonlySet<string>;
  /** Slot keys already emailed; only consulted when notifyOnce is set. */
  private readonly notified = new Set<string>();
  private readonly now: () => number;

  constructor(private readonly deps: ScannerDeps) {
    const { config } = deps;
    this.url = buildSlotsUrl({
      baseUrl: config.slotsApiUrl,
      locationId: config.locationId,
      limit: config.queryLimit,
    });
    this.earlierThan = parseCutoff(config.earlierThan);
    this.skipTimes = new Set(config.skipTimes);
    this.now = deps.now ?? Date.now;
  }

  /**
   * Runs one cycle. Fetch and payload errors are logged and reported as
   * `fetch_failed`; only a mail authentication failure throws.
   */
  async scanOnce(): Promise<ScanOutcome> {
    const startedAt = this.now();
    const outcome = await this.cycle();
    const { metrics } = this.deps;
    if (metrics) {
      metrics.polls.labels(outcome.status).inc(1);
      metrics.pollDuration.labels(outcome.status).observe(this.now() - startedAt);
    }
    return outcome;
  }

  private async cycle(): Promise<ScanOutcome> {
    const { config, logger } = this.deps;

    let slots: TimedSlot[];
    try {
      slots = await fetchSlots(this.url, {
        timeoutMs: config.requestTimeoutMs,
        fetch: this.deps.fetch,
      });
    } catch (err) {
      if (!(err instanceof ScannerError)) throw err;
      logger.warn(
        { code: err.code, err, locationId: config.locationId },
        "slot fetch failed → skipping cycle",
      );
      return { status: "fetch_failed", error: err };
    }

    const earlier = filterEarlierSlots(slots, {
      earlierThan: this.earlierThan,
      skipTimes: this.skipTimes,
    });
    if (earlier.length === 0) {
      logger.info(
        { fetched: slots.length, earlierThan: config.earlierThan },
        "no earlier slots",
      );
      return { status: "no_match", fetched: slots.length };
    }

    const fresh = config.notifyOnce
      ? earlier.filter((s) => !this.notified.has(slotKey(s)))
      : earlier;
    if (fresh.length === 0) {
      logger.info({ known: earlier.length }, "earlier slots already notified");
      return { status: "already_notified", slots: earlier };
    }

    logger.info(
      { count: fresh.length, slots: fresh.map(slotKey) },
      "earlier slots found → notifying",
    );
    return this.notify(fresh);
  }

  private async notify(slots: TimedSlot[]): Promise<ScanOutcome> {
    const { config, logger, mailer, metrics } = this.deps;
    const message = renderSlotEmail(slots, config.locationId);

    let messageId: string;
    try {
      messageId = await mailer.send(message);
    } catch (err) {
      const cls = classifyMailError(err);
      metrics?.notifications.labels(NOTIFY_FAILURE_LABEL[cls.kind]).inc(1);
      if (cls.kind === "auth") {
        metrics?.polls.labels("notify_failed").inc(1);
        logger.error({ code: cls.code, err }, "mail relay rejected credentials");
        throw new MailAuthError(cls.message, { cause: err });
      }
      logger.error(
        { code: cls.code, kind: cls.kind, err },
        "failed to send notification",
      );
      return { status: "notify_failed", slots, error: cls };
    }

    if (config.notifyOnce) {
      for (const s of slots) this.notified.add(slotKey(s));
    }
    metrics?.notifications.labels("sent").inc(1);
    logger.info(
      { messageId, recipients: config.mail.to.length, count: slots.length },
      "notification sent",
    );
    return { status: "notified", slots, messageId };
  }
}

/* ------------------------------- Poll loop ------------------------------- */

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface PollLoopOptions {
  intervalMs: number;
  jitterRatio: number;
  stopAfterNotify: boolean;
  logger: Logger;
  signal?: AbortSignal;
  now?: () => number;
  random?: () => number;
  sleep?: Sleep;
}

/** interval − elapsed + (random − ½)·interval·ratio, floored at 0. */
export function nextDelayMs(
  intervalMs: number,
  elapsedMs: number,
  jitterRatio: number,
  random: number,
): number {
  const jitter = (random - 0.5) * intervalMs * jitterRatio;
  return Math.max(0, Math.round(intervalMs - elapsedMs + jitter));
}

export const abortableSleep: Sleep = async (ms, signal) => {
  try {
    await delay(ms, undefined, { signal });
  } catch (err) {
    if (signal?.aborted) return;
    throw err;
  }
};

/**
 * Repeats scanOnce until the signal aborts, or until the first notification
 * when stopAfterNotify is set. Errors thrown by a cycle end the loop.
 * Resolves with the number of cycles run.
 */
export async function runPollLoop(
  scanner: Pick<Scanner, "scanOnce">,
  opts: PollLoopOptions,
): Promise<number> {
  const now = opts.now ?? Date.now;
  const random = opts.random ?? Math.random;
  const sleep = opts.sleep ?? abortableSleep;
  let cycles = 0;

  while (!opts.signal?.aborted) {
    const startedAt = now();
    const outcome: ScanOutcome = await scanner.scanOnce();
    cycles += 1;

    if (opts.stopAfterNotify && outcome.status === "notified") {
      opts.logger.info({ cycles }, "notified; stopping as configured");
      break;
    }

    const waitMs = nextDelayMs(
      opts.intervalMs,
      now() - startedAt,
      opts.jitterRatio,
      random(),
    );
    opts.logger.debug({ waitMs, status: outcome.status }, "sleeping until next poll");
    if (waitMs > 0) await sleep(waitMs, opts.signal);
  }

  return cycles;
}
