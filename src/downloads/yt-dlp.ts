import { spawn } from "node:child_process";
import { join } from "node:path";
import { createInterface } from "node:readline";
import { z } from "zod";
import { FetchError } from "../lib/errors.js";
import type { Logger } from "../lib/logger.js";
import { collapseLine, stripAnsi } from "../lib/utils.js";
import type { FetchedMedia, FetchOperation, FetchProgress, FetchRequest } from "./types.js";

export interface YtDlpOptions {
  binaryPath: string;
  cookiesFile?: string;
  ffmpegLocation?: string;
  concurrentFragments: number;
  retries: number;
}

const PROGRESS_MARKER = "[fetch-progress]";
const PROGRESS_TEMPLATE =
  `download:${PROGRESS_MARKER}%(progress.status)s|%(progress._percent_str)s|` +
  "%(progress._speed_str)s|%(progress._eta_str)s|%(info.title)s";

const mediaInfoSchema = z.object({
  title: z.string().nullish(),
  duration: z.number().nullish(),
  width: z.number().nullish(),
  height: z.number().nullish(),
  filepath: z.string().nullish(),
  requested_downloads: z.array(z.object({ filepath: z.string().nullish() })).nullish(),
});

function formatArgs(request: FetchRequest): string[] {
  if (request.format === "audio") {
    return ["-f", "bestaudio/best", "-x", "--audio-format", "mp3", "--audio-quality", "0"];
  }
  return [
    "-f",
    "bestvideo[ext=mp4]+bestaudio[ext=m4a]/best[ext=mp4]/best",
    "--merge-output-format",
    "mp4",
    "--recode-video",
    "mp4",
  ];
}

export function buildYtDlpArgs(request: FetchRequest, options: YtDlpOptions): string[] {
  const args = [
    ...formatArgs(request),
    "-o",
    join(request.outputDir, "%(title).100B.%(ext)s"),
    "--no-playlist",
    "--no-colors",
    "--newline",
    "--progress",
    "--progress-template",
    PROGRESS_TEMPLATE,
    "--print",
    "after_move:%()j",
    "--concurrent-fragments",
    String(options.concurrentFragments),
    "--retries",
    String(options.retries),
    "--fragment-retries",
    String(options.retries),
  ];
  if (options.cookiesFile) {
    args.push("--cookies", options.cookiesFile);
  }
  if (options.ffmpegLocation) {
    args.push("--ffmpeg-location", options.ffmpegLocation);
  }
  args.push("--", request.locator);
  return args;
}

function missingToUndefined(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  if (!trimmed || trimmed === "NA") {
    return undefined;
  }
  return trimmed;
}

export function parseProgressLine(line: string): FetchProgress | undefined {
  const clean = stripAnsi(line).trim();
  const start = clean.indexOf(PROGRESS_MARKER);
  if (start === -1) {
    return undefined;
  }
  const [status, percent, speed, eta, ...titleParts] = clean
    .slice(start + PROGRESS_MARKER.length)
    .split("|");

  const title = missingToUndefined(titleParts.join("|"));
  if (status === "finished") {
    return { status: "finished", title };
  }
  if (status !== "downloading") {
    return undefined;
  }
  return {
    status: "downloading",
    percent: missingToUndefined(percent) ?? "0%",
    speed: missingToUndefined(speed),
    eta: missingToUndefined(eta),
    title,
  };
}

export function parseMediaInfoLine(line: string): FetchedMedia | undefined {
  const trimmed = line.trim();
  if (!trimmed.startsWith("{")) {
    return undefined;
  }
  let raw: unknown;
  try {
    raw = JSON.parse(trimmed);
  } catch {
    return undefined;
  }
  const parsed = mediaInfoSchema.safeParse(raw);
  if (!parsed.success) {
    return undefined;
  }
  const info = parsed.data;
  const path = info.filepath ?? info.requested_downloads?.[0]?.filepath ?? undefined;
  return {
    title: info.title?.trim() || "download",
    path,
    durationSeconds: info.duration ?? undefined,
    widthPx: info.width ?? undefined,
    heightPx: info.height ?? undefined,
  };
}

export function parseErrorLine(line: string): string | undefined {
  const clean = stripAnsi(line).trim();
  if (!clean.startsWith("ERROR:")) {
    return undefined;
  }
  return clean.slice("ERROR:".length).trim() || undefined;
}

/**
 * Fetch operation backed by the yt-dlp command line tool. The download runs in
 * a child process; stdout and stderr are read line by line for progress,
 * metadata and errors.
 */
export function createYtDlpFetcher(options: YtDlpOptions, logger: Logger): FetchOperation {
  return (request, onProgress) =>
    new Promise<FetchedMedia>((resolve, reject) => {
      const args = buildYtDlpArgs(request, options);
      logger.debug("Spawning yt-dlp", { binary: options.binaryPath, locator: request.locator });

      const proc = spawn(options.binaryPath, args, {
        stdio: ["ignore", "pipe", "pipe"],
        env: { ...process.env, LANG: "en_US.UTF-8", LC_ALL: "en_US.UTF-8" },
      });

      let media: FetchedMedia | undefined;
      let lastError: string | undefined;

      const handleLine = (line: string): void => {
        const progress = parseProgressLine(line);
        if (progress) {
          onProgress(progress);
          return;
        }
        const info = parseMediaInfoLine(line);
        if (info) {
          media = info;
          return;
        }
        const errorText = parseErrorLine(line);
        if (errorText) {
          lastError = errorText;
          logger.warn("yt-dlp reported an error", { error: collapseLine(errorText) });
        }
      };

      createInterface({ input: proc.stdout }).on("line", handleLine);
      createInterface({ input: proc.stderr }).on("line", handleLine);

      proc.on("error", (error) => {
        reject(new FetchError(`yt-dlp could not be started: ${error.message}`));
      });

      proc.on("close", (code) => {
        if (code !== 0) {
          reject(new FetchError(lastError ?? `yt-dlp exited with code ${String(code)}`, { code }));
          return;
        }
        if (!media) {
          reject(new FetchError("yt-dlp finished without reporting media info"));
          return;
        }
        resolve(media);
      });
    });
}
