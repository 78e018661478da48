#!/usr/bin/env node
import { createTelegramBot, registerHandlers } from "./bot.js";
import { loadConfig } from "./config.js";
import { DeliveryCoordinator } from "./downloads/delivery-coordinator.js";
import { FetchWorker } from "./downloads/fetch-worker.js";
import { ProgressReporter } from "./downloads/progress-reporter.js";
import { ProgressStore } from "./downloads/progress-store.js";
import { SessionManager } from "./downloads/session-manager.js";
import { createYtDlpFetcher } from "./downloads/yt-dlp.js";
import { safeErrorMessage } from "./lib/errors.js";
import { createLogger } from "./lib/logger.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel, pretty: config.logPretty });

  const store = new ProgressStore({ staleAfterMs: config.progressStaleAfterMs });
  const fetchMedia = createYtDlpFetcher(
    {
      binaryPath: config.ytDlpPath,
      cookiesFile: config.cookiesFile,
      ffmpegLocation: config.ffmpegLocation,
      concurrentFragments: config.concurrentFragments,
      retries: config.retries,
    },
    logger,
  );
  const worker = new FetchWorker(fetchMedia, store, logger, {
    tempDir: config.tempDir,
    maxConcurrentJobs: config.maxConcurrentJobs,
  });

  const telegram = createTelegramBot(config, logger);
  const delivery = new DeliveryCoordinator(telegram, store, logger, {
    maxVideoBytes: config.maxVideoBytes,
  });
  const sessions = new SessionManager(telegram, store, worker, delivery, logger, {
    sessionTtlMs: config.sessionTtlMs,
  });
  const reporter = new ProgressReporter(store, sessions, telegram, logger, {
    intervalMs: config.progressIntervalMs,
    initialDelayMs: config.progressInitialDelayMs,
  });

  registerHandlers({ telegram, config, logger, sessions, queue: telegram.queue });

  let isShuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (isShuttingDown) {
      logger.warn("Force exit", { signal });
      process.exit(1);
    }
    isShuttingDown = true;
    logger.info("Shutting down", { signal, activeJobs: sessions.activeJobCount });
    reporter.stop();
    try {
      await telegram.stop();
      await telegram.queue.idle();
      process.exit(0);
    } catch (error) {
      logger.error("Error stopping bot", { error: safeErrorMessage(error) });
      process.exit(1);
    }
  };
  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));

  reporter.start();
  await telegram.start();
}

main().catch((error: unknown) => {
  console.error("Failed to start:", safeErrorMessage(error));
  process.exit(1);
});
