// Entry point: no flags, runs until killed (or until the first notification
// when STOP_AFTER_NOTIFY is set).
import { loadConfig } from "./config.js";
import { createLogger, logBootFailure } from "./logger.js";
import { createMailer } from "./adapters/email.js";
import { createMetrics, startMetricsServer } from "./metrics.js";
import { Scanner, runPollLoop } from "./scanner.js";

async function main() {
  const config = loadConfig();
  const logger = createLogger(config);

  const metrics = config.metricsPort ? createMetrics() : undefined;
  const metricsServer =
    metrics && config.metricsPort
      ? await startMetricsServer(metrics, config.metricsPort, logger)
      : undefined;

  const mailer = createMailer(config);
  const scanner = new Scanner({ config, mailer, logger, metrics });

  const controller = new AbortController();
  const stop = (signal: NodeJS.Signals) => {
    logger.info({ signal }, "shutting down");
    controller.abort();
  };
  process.once("SIGINT", stop);
  process.once("SIGTERM", stop);

  logger.info(
    {
      locationId: config.locationId,
      earlierThan: config.earlierThan,
      intervalSecs: config.scanIntervalMs / 1000,
      notifyOnce: config.notifyOnce,
    },
    "slot scanner up",
  );

  try {
    const cycles = await runPollLoop(scanner, {
      intervalMs: config.scanIntervalMs,
      jitterRatio: config.jitterRatio,
      stopAfterNotify: config.stopAfterNotify,
      signal: controller.signal,
      logger,
    });
    logger.info({ cycles }, "slot scanner stopped");
  } catch (err) {
    logger.fatal({ err }, "slot scanner fatal");
    process.exitCode = 1;
  } finally {
    mailer.close();
    await metricsServer?.close();
  }
}

main().catch((err: unknown) => {
  const bootLogger = createLogger({
    logLevel: "info",
    pretty: process.env.NODE_ENV === "development",
  });
  logBootFailure(bootLogger, err);
  process.exitCode = 1;
});
