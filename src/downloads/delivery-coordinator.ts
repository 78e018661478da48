import { readdir, rm, stat } from "node:fs/promises";
import { extname, join } from "node:path";
import { DeliveryError, safeErrorMessage } from "../lib/errors.js";
import type { Logger } from "../lib/logger.js";
import { trimWithEllipsis } from "../lib/utils.js";
import type { ProgressStore } from "./progress-store.js";
import {
  anotherDownloadChoices,
  MESSAGES,
  renderCaption,
  renderSummary,
} from "./render.js";
import type { Artifact, Attachment, JobOutcome, MediaFormat, NotificationSink } from "./types.js";

export interface DeliveryOptions {
  maxVideoBytes: number;
}

export interface DeliveryTarget {
  chatId: number;
  format: MediaFormat;
  statusMessageId?: number;
}

const EXPECTED_EXTENSIONS: Record<MediaFormat, string> = {
  audio: ".mp3",
  video: ".mp4",
};

const FALLBACK_WIDTH = 1280;
const FALLBACK_HEIGHT = 720;
const AUDIO_TITLE_MAX_LENGTH = 64;
const AUDIO_PERFORMER = "YouTube";

interface LocatedFile {
  path: string;
  sizeBytes: number;
}

export class DeliveryCoordinator {
  constructor(
    private readonly sink: NotificationSink,
    private readonly store: ProgressStore,
    private readonly logger: Logger,
    private readonly options: DeliveryOptions,
  ) {}

  /**
   * Uploads a finished artifact and reports the result. Never throws: failures
   * come back as a `failed` outcome. The chat's snapshot and the artifact
   * workspace are released in every case.
   */
  async deliver(target: DeliveryTarget, artifact: Artifact): Promise<JobOutcome> {
    const { chatId, statusMessageId } = target;
    try {
      const file = await this.locate(target.format, artifact);

      if (statusMessageId !== undefined) {
        await this.bestEffort("edit status to uploading", chatId, () =>
          this.sink.editMessage(chatId, statusMessageId, MESSAGES.uploading, {
            parseMode: "HTML",
          }),
        );
      }

      this.checkSize(target.format, file);
      const attachment = this.buildAttachment(target.format, artifact, file);
      try {
        await this.sink.sendAttachment(chatId, attachment);
      } catch (error) {
        throw new DeliveryError(`Upload to Telegram failed: ${safeErrorMessage(error)}`, "UPLOAD_FAILED", {
          chatId,
        });
      }

      if (statusMessageId !== undefined) {
        await this.bestEffort("delete status message", chatId, () =>
          this.sink.deleteMessage(chatId, statusMessageId),
        );
      }
      await this.bestEffort("send summary", chatId, () =>
        this.sink.sendMessage(chatId, renderSummary(artifact.title, target.format, file.sizeBytes), {
          parseMode: "HTML",
          buttons: anotherDownloadChoices(),
        }),
      );

      this.logger.info("Delivered media", {
        chatId,
        format: target.format,
        sizeBytes: file.sizeBytes,
      });
      return { status: "delivered", title: artifact.title, sizeBytes: file.sizeBytes };
    } catch (error) {
      const deliveryError =
        error instanceof DeliveryError
          ? error
          : new DeliveryError(safeErrorMessage(error), "UPLOAD_FAILED", { chatId });
      this.logger.error("Delivery failed", {
        chatId,
        code: deliveryError.code,
        error: deliveryError.message,
      });
      return { status: "failed", error: deliveryError };
    } finally {
      this.store.delete(chatId);
      await this.release(artifact.directory);
    }
  }

  /**
   * Drops an artifact without delivering it.
   */
  async discard(chatId: number, artifact: Artifact): Promise<void> {
    this.store.delete(chatId);
    await this.release(artifact.directory);
  }

  private async locate(format: MediaFormat, artifact: Artifact): Promise<LocatedFile> {
    const extension = EXPECTED_EXTENSIONS[format];
    const candidates: string[] = [];
    if (artifact.path && extname(artifact.path).toLowerCase() === extension) {
      candidates.push(artifact.path);
    }

    let entries: string[] = [];
    try {
      entries = await readdir(artifact.directory);
    } catch (error) {
      this.logger.warn("Failed to list fetch workspace", {
        directory: artifact.directory,
        error: safeErrorMessage(error),
      });
    }
    entries
      .filter((name) => extname(name).toLowerCase() === extension)
      .sort()
      .forEach((name) => candidates.push(join(artifact.directory, name)));

    for (const path of candidates) {
      const sizeBytes = await this.fileSize(path);
      if (sizeBytes > 0) {
        return { path, sizeBytes };
      }
    }

    throw new DeliveryError("Downloaded file not found or is empty.", "ARTIFACT_MISSING", {
      directory: artifact.directory,
    });
  }

  private checkSize(format: MediaFormat, file: LocatedFile): void {
    if (format === "video" && file.sizeBytes > this.options.maxVideoBytes) {
      throw new DeliveryError(
        `File too large for Telegram (${Math.floor(this.options.maxVideoBytes / (1024 * 1024))}MB limit).`,
        "ARTIFACT_TOO_LARGE",
        { sizeBytes: file.sizeBytes, limitBytes: this.options.maxVideoBytes },
      );
    }
  }

  private async fileSize(path: string): Promise<number> {
    try {
      const info = await stat(path);
      return info.isFile() ? info.size : 0;
    } catch {
      return 0;
    }
  }

  private buildAttachment(format: MediaFormat, artifact: Artifact, file: LocatedFile): Attachment {
    const caption = renderCaption(artifact.title, format);
    if (format === "audio") {
      return {
        kind: "audio",
        path: file.path,
        caption,
        title: trimWithEllipsis(artifact.title, AUDIO_TITLE_MAX_LENGTH),
        performer: AUDIO_PERFORMER,
        durationSeconds:
          artifact.durationSeconds === undefined ? undefined : Math.round(artifact.durationSeconds),
      };
    }
    return {
      kind: "video",
      path: file.path,
      caption,
      width: artifact.widthPx ?? FALLBACK_WIDTH,
      height: artifact.heightPx ?? FALLBACK_HEIGHT,
      durationSeconds: Math.round(artifact.durationSeconds ?? 0),
      supportsStreaming: true,
    };
  }

  private async bestEffort(action: string, chatId: number, fn: () => Promise<unknown>): Promise<void> {
    try {
      await fn();
    } catch (error) {
      this.logger.warn(`Failed to ${action}`, { chatId, error: safeErrorMessage(error) });
    }
  }

  private async release(directory: string): Promise<void> {
    try {
      await rm(directory, { recursive: true, force: true });
    } catch (error) {
      this.logger.warn("Failed to remove fetch workspace", {
        directory,
        error: safeErrorMessage(error),
      });
    }
  }
}
