import type { DeliveryError, FetchError } from "../lib/errors.js";

export type MediaFormat = "audio" | "video";

export type SessionPhase = "awaiting-format" | "starting" | "downloading" | "uploading";

export interface Session {
  chatId: number;
  requesterId: number;
  locator: string;
  format?: MediaFormat;
  phase: SessionPhase;
  choiceMessageId?: number;
  statusMessageId?: number;
  title?: string;
  createdAt: number;
  updatedAt: number;
}

export type ProgressPhase = "starting" | "downloading" | "finished";

export interface ProgressSnapshot {
  readonly phase: ProgressPhase;
  readonly percent: number;
  readonly speed: string;
  readonly eta: string;
  readonly title?: string;
  readonly updatedAt: number;
}

/**
 * Progress as reported by a fetch operation. `percent` may be a display string
 * such as " 45.3%".
 */
export interface FetchProgress {
  status: "downloading" | "finished";
  percent?: number | string;
  speed?: string;
  eta?: string;
  title?: string;
}

export interface FetchRequest {
  locator: string;
  format: MediaFormat;
  outputDir: string;
}

export interface FetchedMedia {
  title: string;
  path?: string;
  durationSeconds?: number;
  widthPx?: number;
  heightPx?: number;
}

export type ProgressCallback = (progress: FetchProgress) => void;

export type FetchOperation = (
  request: FetchRequest,
  onProgress: ProgressCallback,
) => Promise<FetchedMedia>;

export interface Artifact extends FetchedMedia {
  /** Private workspace of the job; removed once delivery finishes. */
  directory: string;
}

export type JobOutcome =
  | { status: "delivered"; title: string; sizeBytes: number }
  | { status: "failed"; error: FetchError | DeliveryError };

export interface SendOptions {
  parseMode?: "HTML";
  buttons?: ChoiceOption[][];
}

export interface ChoiceOption {
  text: string;
  callbackData: string;
}

export type Attachment =
  | {
      kind: "audio";
      path: string;
      caption: string;
      title: string;
      performer: string;
      durationSeconds?: number;
    }
  | {
      kind: "video";
      path: string;
      caption: string;
      width: number;
      height: number;
      durationSeconds: number;
      supportsStreaming: boolean;
    };

/**
 * Outbound side of the chat transport. Every method may reject with a
 * TransportError.
 */
export interface NotificationSink {
  sendMessage(chatId: number, text: string, options?: SendOptions): Promise<number>;
  editMessage(chatId: number, messageId: number, text: string, options?: SendOptions): Promise<void>;
  deleteMessage(chatId: number, messageId: number): Promise<void>;
  sendAttachment(chatId: number, attachment: Attachment): Promise<void>;
  presentChoice(chatId: number, text: string, options: ChoiceOption[][]): Promise<number>;
}
