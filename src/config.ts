import { tmpdir } from "node:os";
import { resolve } from "node:path";
import { config as loadEnv } from "dotenv";

loadEnv({ path: resolve(process.cwd(), ".env") });

export const SERVICE_NAME = "MediaFetchBot";

export interface Config {
  botToken: string;
  allowedUserIds: number[];
  apiRoot?: string;
  queueIntervalMs: number;
  ytDlpPath: string;
  cookiesFile?: string;
  ffmpegLocation?: string;
  concurrentFragments: number;
  retries: number;
  tempDir: string;
  maxConcurrentJobs: number;
  maxVideoBytes: number;
  progressIntervalMs: number;
  progressInitialDelayMs: number;
  progressStaleAfterMs: number;
  sessionTtlMs: number;
  logLevel: string;
  logPretty: boolean;
}

type Env = Record<string, string | undefined>;

function parseNumberList(value: string | undefined): number[] {
  if (!value || value.trim() === "") {
    return [];
  }

  return value
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean)
    .map((item) => Number.parseInt(item, 10))
    .filter((item) => !Number.isNaN(item));
}

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (!value || value.trim() === "") {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) {
    return true;
  }
  if (["0", "false", "no", "off"].includes(normalized)) {
    return false;
  }
  return fallback;
}

function parsePositiveInt(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (!raw || raw.trim() === "") {
    return fallback;
  }
  const parsed = Number.parseInt(raw.trim(), 10);
  if (Number.isNaN(parsed) || parsed <= 0) {
    throw new Error(`Invalid ${name} value.`);
  }
  return parsed;
}

function optionalString(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function loadConfig(env: Env = process.env): Config {
  const botToken = env.TELEGRAM_BOT_TOKEN;
  if (!botToken || botToken.trim() === "") {
    throw new Error("Missing required environment variable: TELEGRAM_BOT_TOKEN");
  }

  const cookiesFile = optionalString(env.YTDLP_COOKIES_FILE);
  const tempDir = optionalString(env.DOWNLOAD_TEMP_DIR);

  return {
    botToken: botToken.trim(),
    allowedUserIds: parseNumberList(env.TELEGRAM_ALLOWED_USER_IDS),
    apiRoot: optionalString(env.TELEGRAM_API_ROOT),
    queueIntervalMs: parsePositiveInt(env, "TELEGRAM_QUEUE_INTERVAL_MS", 50),
    ytDlpPath: optionalString(env.YTDLP_PATH) ?? "yt-dlp",
    cookiesFile: cookiesFile ? resolve(cookiesFile) : undefined,
    ffmpegLocation: optionalString(env.FFMPEG_LOCATION),
    concurrentFragments: parsePositiveInt(env, "YTDLP_CONCURRENT_FRAGMENTS", 8),
    retries: parsePositiveInt(env, "YTDLP_RETRIES", 5),
    tempDir: tempDir ? resolve(tempDir) : tmpdir(),
    maxConcurrentJobs: parsePositiveInt(env, "MAX_CONCURRENT_JOBS", 4),
    maxVideoBytes: parsePositiveInt(env, "MAX_VIDEO_BYTES", 2000 * 1024 * 1024),
    progressIntervalMs: parsePositiveInt(env, "PROGRESS_INTERVAL_MS", 3_000),
    progressInitialDelayMs: parsePositiveInt(env, "PROGRESS_INITIAL_DELAY_MS", 5_000),
    progressStaleAfterMs: parsePositiveInt(env, "PROGRESS_STALE_AFTER_MS", 300_000),
    sessionTtlMs: parsePositiveInt(env, "SESSION_TTL_MS", 600_000),
    logLevel: optionalString(env.LOG_LEVEL) ?? "info",
    logPretty: parseBoolean(env.LOG_PRETTY, false),
  };
}
