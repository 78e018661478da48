import { escapeHtml, stripAnsi, toMegabytes, trimWithEllipsis } from "../lib/utils.js";
import type { DeliveryError, FetchError } from "../lib/errors.js";
import type { ChoiceOption, MediaFormat, ProgressSnapshot } from "./types.js";

const BAR_SEGMENTS = 10;
const FILLED_SEGMENT = "🟦";
const EMPTY_SEGMENT = "⬜";
export const ERROR_CAUSE_MAX_LENGTH = 100;

export const FORMAT_CALLBACK_PREFIX = "format:";
export const ANOTHER_DOWNLOAD_CALLBACK = "another_download";

/**
 * Reads a percentage from a number or from a display string like " 45.3%".
 * Anything unreadable counts as 0; the result is clamped to [0, 100].
 */
export function parsePercent(value: unknown): number {
  let parsed = Number.NaN;
  if (typeof value === "number") {
    parsed = value;
  } else if (typeof value === "string") {
    parsed = Number.parseFloat(stripAnsi(value).trim().replace(/%$/, ""));
  }
  if (!Number.isFinite(parsed)) {
    return 0;
  }
  return Math.min(100, Math.max(0, parsed));
}

export function formatPercent(percent: number): string {
  return Number.isInteger(percent) ? `${percent}%` : `${percent.toFixed(1)}%`;
}

export function renderProgressBar(value: unknown): string {
  const percent = parsePercent(value);
  const filled = Math.min(BAR_SEGMENTS, Math.max(0, Math.floor(percent / 10)));
  const bar = FILLED_SEGMENT.repeat(filled) + EMPTY_SEGMENT.repeat(BAR_SEGMENTS - filled);
  return `${bar} ${formatPercent(percent)}`;
}

export function formatLabel(format: MediaFormat): string {
  return format === "audio" ? "MP3" : "MP4";
}

export function renderDownloadingStatus(snapshot: ProgressSnapshot): string {
  const lines = ["📥 <b>Downloading...</b>"];
  if (snapshot.title) {
    lines.push(`<i>${escapeHtml(trimWithEllipsis(snapshot.title, 100))}</i>`);
  }
  lines.push(
    "",
    renderProgressBar(snapshot.percent),
    `<b>Speed:</b> ${escapeHtml(snapshot.speed)}`,
    `<b>ETA:</b> ${escapeHtml(snapshot.eta)}`,
  );
  return lines.join("\n");
}

export function renderFailure(error: FetchError | DeliveryError): string {
  const reason = trimWithEllipsis(error.message, ERROR_CAUSE_MAX_LENGTH);
  return [
    "❌ <b>Download/Upload Failed!</b>",
    "",
    `Reason: <code>${escapeHtml(reason)}</code>`,
    "",
    "Please try a different video or try again later.",
  ].join("\n");
}

export function renderSummary(title: string, format: MediaFormat, sizeBytes: number): string {
  return [
    "✅ <b>Download Complete!</b>",
    "",
    `<b>Title:</b> ${escapeHtml(title)}`,
    `<b>Format:</b> ${formatLabel(format)}`,
    `<b>Size:</b> ${toMegabytes(sizeBytes)}MB`,
  ].join("\n");
}

export function renderCaption(title: string, format: MediaFormat): string {
  const icon = format === "audio" ? "🎵" : "🎥";
  return `${icon} ${escapeHtml(trimWithEllipsis(title, 1000))}`;
}

export const MESSAGES = {
  welcome:
    "🚀 <b>Welcome to the YouTube Downloader Bot!</b>\n\n" +
    "Send me a YouTube link and I'll download it for you.",
  help:
    "✨ <b>How to use:</b>\n" +
    "1. Send me a YouTube URL\n" +
    "2. Choose your preferred format (MP4/MP3)\n" +
    "3. Watch real-time progress\n" +
    "4. Receive your downloaded media!",
  invalidLocator: "❌ <b>Invalid YouTube URL!</b>\nPlease send a valid YouTube link.",
  jobInProgress:
    "⏳ <b>A download is already running in this chat.</b>\nPlease wait until it finishes.",
  chooseFormat: "🌌 <b>URL received!</b> Choose your desired format:",
  sessionExpired: "❌ Session expired. Please send the URL again.",
  initializing: "⚡ <b>Initializing download...</b>\n\n🚀 Preparing download...",
  starting: "📥 <b>Starting Download...</b>",
  uploading: "📤 <b>Uploading to Telegram...</b>\n\n✅ Download completed successfully!",
  sendAnother: "✨ <b>Send me another YouTube URL</b>",
} as const;

export function formatChoices(): ChoiceOption[][] {
  return [
    [{ text: "🎥 MP4 Video", callbackData: `${FORMAT_CALLBACK_PREFIX}video` }],
    [{ text: "🎵 MP3 Audio", callbackData: `${FORMAT_CALLBACK_PREFIX}audio` }],
  ];
}

export function anotherDownloadChoices(): ChoiceOption[][] {
  return [[{ text: "🔄 Download Another", callbackData: ANOTHER_DOWNLOAD_CALLBACK }]];
}
