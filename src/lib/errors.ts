/**
 * Error hierarchy for the downloader.
 *
 * Every error carries a machine-readable `code` and a `context` bag that is
 * logged but never shown to the requester.
 *
 *   - SessionError:   out-of-order or malformed interaction, recovered locally
 *   - FetchError:     the media fetch failed, session is terminated
 *   - DeliveryError:  post-fetch validation or upload failed, session is terminated
 *   - TransportError: a Telegram API call failed, logged only
 */

export type SessionErrorCode =
  | "INVALID_LOCATOR"
  | "NO_SESSION"
  | "WRONG_STATE"
  | "JOB_IN_PROGRESS";

export type DeliveryErrorCode = "ARTIFACT_MISSING" | "ARTIFACT_TOO_LARGE" | "UPLOAD_FAILED";

export type TransportFailureReason = "flood" | "not-modified" | "other";

export class DownloaderError extends Error {
  readonly code: string;
  readonly context: Record<string, unknown>;

  constructor(message: string, code: string, context: Record<string, unknown> = {}) {
    super(message);
    this.name = "DownloaderError";
    this.code = code;
    this.context = context;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

export class SessionError extends DownloaderError {
  declare readonly code: SessionErrorCode;

  constructor(message: string, code: SessionErrorCode, context: Record<string, unknown> = {}) {
    super(message, code, context);
    this.name = "SessionError";
  }
}

export class FetchError extends DownloaderError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, "FETCH_FAILED", context);
    this.name = "FetchError";
  }
}

export class DeliveryError extends DownloaderError {
  declare readonly code: DeliveryErrorCode;

  constructor(message: string, code: DeliveryErrorCode, context: Record<string, unknown> = {}) {
    super(message, code, context);
    this.name = "DeliveryError";
  }
}

export class TransportError extends DownloaderError {
  readonly reason: TransportFailureReason;
  readonly retryAfterMs?: number;

  constructor(
    message: string,
    reason: TransportFailureReason = "other",
    retryAfterMs?: number,
    context: Record<string, unknown> = {},
  ) {
    super(message, "TRANSPORT_FAILED", context);
    this.name = "TransportError";
    this.reason = reason;
    this.retryAfterMs = retryAfterMs;
  }
}

export function safeErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
