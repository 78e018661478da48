export function trimWithEllipsis(value: string, max: number): string {
  const trimmed = value.trim();
  const chars = Array.from(trimmed);
  if (chars.length <= max) {
    return trimmed;
  }
  return `${chars.slice(0, Math.max(0, max - 3)).join("")}...`;
}

export function collapseLine(value: string, max = 120): string {
  return trimWithEllipsis(value.replace(/\s+/g, " "), max);
}

export function escapeHtml(value: string): string {
  return value
    .replaceAll("&", "&amp;")
    .replaceAll("<", "&lt;")
    .replaceAll(">", "&gt;");
}

/** Drops tags and undoes `escapeHtml`, for resending a message without markup. */
export function htmlToPlain(value: string): string {
  return value
    .replace(/<[^>]*>/g, "")
    .replaceAll("&lt;", "<")
    .replaceAll("&gt;", ">")
    .replaceAll("&amp;", "&");
}

const ANSI_PATTERN = /\u001b\[[0-9;]*m/g;

export function stripAnsi(value: string): string {
  return value.replace(ANSI_PATTERN, "");
}

/** Whole mebibytes, rounded down. */
export function toMegabytes(bytes: number): number {
  return Math.floor(bytes / (1024 * 1024));
}
