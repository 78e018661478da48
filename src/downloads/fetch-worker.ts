import { mkdtemp, rm } from "node:fs/promises";
import { join } from "node:path";
import { FetchError, safeErrorMessage } from "../lib/errors.js";
import type { Logger } from "../lib/logger.js";
import { parsePercent } from "./render.js";
import type { ProgressStore } from "./progress-store.js";
import type { Artifact, FetchOperation, FetchProgress, MediaFormat } from "./types.js";

export interface FetchJob {
  chatId: number;
  locator: string;
  format: MediaFormat;
}

export type FetchResult = { ok: true; artifact: Artifact } | { ok: false; error: FetchError };

export interface FetchWorkerOptions {
  tempDir: string;
  maxConcurrentJobs: number;
}

/**
 * Runs fetch operations for jobs. The operation itself does its blocking work
 * elsewhere (the yt-dlp adapter uses a child process); this class owns the
 * job workspace, the progress writes and the failure boundary.
 */
export class FetchWorker {
  private running = 0;
  private readonly waiting: Array<() => void> = [];

  constructor(
    private readonly fetchMedia: FetchOperation,
    private readonly store: ProgressStore,
    private readonly logger: Logger,
    private readonly options: FetchWorkerOptions,
  ) {}

  get runningCount(): number {
    return this.running;
  }

  get waitingCount(): number {
    return this.waiting.length;
  }

  async run(job: FetchJob): Promise<FetchResult> {
    await this.acquireSlot();
    let settled = false;
    let directory: string | undefined;

    const onProgress = (progress: FetchProgress): void => {
      if (settled) {
        return;
      }
      this.writeProgress(job.chatId, progress);
    };

    try {
      directory = await mkdtemp(join(this.options.tempDir, "media-fetch-"));
      this.logger.info("Fetch started", { chatId: job.chatId, format: job.format, directory });

      const media = await this.fetchMedia(
        { locator: job.locator, format: job.format, outputDir: directory },
        onProgress,
      );

      this.writeProgress(job.chatId, { status: "finished", title: media.title });
      this.logger.info("Fetch finished", { chatId: job.chatId, title: media.title });
      return { ok: true, artifact: { ...media, directory } };
    } catch (error) {
      const fetchError =
        error instanceof FetchError
          ? error
          : new FetchError(`Download process failed: ${safeErrorMessage(error)}`, {
              chatId: job.chatId,
            });
      this.logger.error("Fetch failed", { chatId: job.chatId, error: fetchError.message });
      if (directory) {
        await this.removeWorkspace(directory);
      }
      return { ok: false, error: fetchError };
    } finally {
      settled = true;
      this.releaseSlot();
    }
  }

  private writeProgress(chatId: number, progress: FetchProgress): void {
    const previous = this.store.get(chatId);
    const title = progress.title ?? previous?.title;
    if (progress.status === "finished") {
      this.store.set(chatId, { phase: "finished", percent: 100, speed: "N/A", eta: "0s", title });
      return;
    }
    this.store.set(chatId, {
      phase: "downloading",
      percent: parsePercent(progress.percent),
      speed: progress.speed?.trim() || "N/A",
      eta: progress.eta?.trim() || "N/A",
      title,
    });
  }

  private async removeWorkspace(directory: string): Promise<void> {
    try {
      await rm(directory, { recursive: true, force: true });
    } catch (error) {
      this.logger.warn("Failed to remove fetch workspace", {
        directory,
        error: safeErrorMessage(error),
      });
    }
  }

  private acquireSlot(): Promise<void> {
    if (this.running < this.options.maxConcurrentJobs) {
      this.running += 1;
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.waiting.push(() => {
        this.running += 1;
        resolve();
      });
    });
  }

  private releaseSlot(): void {
    this.running -= 1;
    const next = this.waiting.shift();
    if (next) {
      next();
    }
  }
}
