import { GrammyError, HttpError } from "grammy";
import { safeErrorMessage, TransportError, type TransportFailureReason } from "./errors.js";

export interface TelegramErrorMeta {
  message: string;
  description: string;
  errorCode?: number;
  retryAfterMs?: number;
}

export function parseTelegramErrorMeta(error: unknown): TelegramErrorMeta {
  const message = safeErrorMessage(error);
  if (!(error instanceof GrammyError)) {
    return { message, description: "" };
  }

  const retryAfterRaw = error.parameters.retry_after;
  let retryAfterMs =
    typeof retryAfterRaw === "number" && Number.isFinite(retryAfterRaw)
      ? Math.max(0, Math.round(retryAfterRaw * 1000))
      : undefined;

  if (typeof retryAfterMs === "undefined") {
    const combined = `${error.description} ${message}`.toLowerCase();
    const match = combined.match(/retry after\s+(\d+)/i);
    if (match) {
      const sec = Number.parseInt(match[1], 10);
      if (!Number.isNaN(sec)) {
        retryAfterMs = Math.max(0, sec * 1000);
      }
    }
  }

  return {
    message,
    description: error.description,
    errorCode: error.error_code,
    retryAfterMs,
  };
}

export function isMessageNotModifiedMeta(meta: TelegramErrorMeta): boolean {
  const combined = `${meta.message} ${meta.description}`.toLowerCase();
  return combined.includes("message is not modified");
}

export function isFloodMeta(meta: TelegramErrorMeta): boolean {
  if (meta.errorCode === 429) {
    return true;
  }
  if (typeof meta.retryAfterMs === "number") {
    return true;
  }
  const combined = `${meta.message} ${meta.description}`.toLowerCase();
  return combined.includes("too many requests") || combined.includes("flood");
}

export function isParseEntitiesMeta(meta: TelegramErrorMeta): boolean {
  const combined = `${meta.message} ${meta.description}`.toLowerCase();
  return combined.includes("can't parse entities") || combined.includes("can't find end tag");
}

/**
 * Maps any failure of a Telegram API call onto a TransportError.
 */
export function toTransportError(error: unknown, operation: string): TransportError {
  if (error instanceof TransportError) {
    return error;
  }
  const meta = parseTelegramErrorMeta(error);
  let reason: TransportFailureReason = "other";
  if (isMessageNotModifiedMeta(meta)) {
    reason = "not-modified";
  } else if (isFloodMeta(meta)) {
    reason = "flood";
  }
  return new TransportError(`${operation} failed: ${meta.message}`, reason, meta.retryAfterMs, {
    errorCode: meta.errorCode,
    description: meta.description,
    network: error instanceof HttpError,
  });
}
