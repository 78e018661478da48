import { safeErrorMessage, TransportError } from "../lib/errors.js";
import type { Logger } from "../lib/logger.js";
import type { ProgressStore } from "./progress-store.js";
import { renderDownloadingStatus } from "./render.js";
import type { NotificationSink, ProgressSnapshot } from "./types.js";

const FLOOD_JITTER_MS = 250;

export interface ProgressReporterOptions {
  intervalMs: number;
  initialDelayMs: number;
  now?: () => number;
}

/** The reporter's view of the sessions: status message ids and expiry. */
export interface SessionView {
  getStatusMessageId(chatId: number): number | undefined;
  sweepExpired(): number[];
}

interface ChatReportState {
  inFlight: boolean;
  lastSentText?: string;
  blockedUntil?: number;
}

/**
 * Periodically renders every downloading job's snapshot into its chat's status
 * message. Chats are handled independently: a slow or failing edit for one chat
 * never holds back the others, and a chat whose previous edit has not returned
 * yet is skipped until it does.
 */
export class ProgressReporter {
  private readonly chats = new Map<number, ChatReportState>();
  private startTimer: ReturnType<typeof setTimeout> | null = null;
  private intervalId: ReturnType<typeof setInterval> | null = null;
  private readonly now: () => number;

  constructor(
    private readonly store: ProgressStore,
    private readonly sessions: SessionView,
    private readonly sink: NotificationSink,
    private readonly logger: Logger,
    private readonly options: ProgressReporterOptions,
  ) {
    this.now = options.now ?? Date.now;
  }

  start(): void {
    if (this.startTimer || this.intervalId) {
      return;
    }
    this.startTimer = setTimeout(() => {
      this.startTimer = null;
      this.runTick();
      this.intervalId = setInterval(() => this.runTick(), this.options.intervalMs);
    }, this.options.initialDelayMs);
  }

  stop(): void {
    if (this.startTimer) {
      clearTimeout(this.startTimer);
      this.startTimer = null;
    }
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = null;
    }
  }

  get isRunning(): boolean {
    return this.startTimer !== null || this.intervalId !== null;
  }

  /**
   * One reporting pass. Resolves once every chat's update has settled.
   */
  async tick(): Promise<void> {
    const now = this.now();
    const evicted = this.store.evictStale(now);
    if (evicted.length > 0) {
      this.logger.info("Evicted stale progress", { chatIds: evicted });
    }
    const expired = this.sessions.sweepExpired();
    if (expired.length > 0) {
      this.logger.info("Dropped sessions that never got a format", { chatIds: expired });
    }

    const active = this.store.listActive(now);
    this.forgetInactive(new Set(active.map(([chatId]) => chatId)));

    await Promise.allSettled(
      active.map(([chatId, snapshot]) => this.reportChat(chatId, snapshot, now)),
    );
  }

  private runTick(): void {
    this.tick().catch((error: unknown) => {
      this.logger.error("Progress tick failed", { error: safeErrorMessage(error) });
    });
  }

  private async reportChat(chatId: number, snapshot: ProgressSnapshot, now: number): Promise<void> {
    if (snapshot.phase !== "downloading") {
      return;
    }
    const messageId = this.sessions.getStatusMessageId(chatId);
    if (messageId === undefined) {
      return;
    }

    const state = this.getState(chatId);
    if (state.inFlight) {
      return;
    }
    if (state.blockedUntil && now < state.blockedUntil) {
      return;
    }

    const text = renderDownloadingStatus(snapshot);
    if (text === state.lastSentText) {
      return;
    }

    state.inFlight = true;
    try {
      await this.sink.editMessage(chatId, messageId, text, { parseMode: "HTML" });
      state.lastSentText = text;
      state.blockedUntil = undefined;
    } catch (error) {
      if (error instanceof TransportError && error.reason === "not-modified") {
        state.lastSentText = text;
        return;
      }
      if (error instanceof TransportError && error.reason === "flood") {
        state.blockedUntil = this.now() + (error.retryAfterMs ?? this.options.intervalMs) + FLOOD_JITTER_MS;
        this.logger.warn("Progress edit rate-limited", {
          chatId,
          retryAfterMs: error.retryAfterMs,
        });
        return;
      }
      this.logger.warn("Failed to edit progress message", {
        chatId,
        error: safeErrorMessage(error),
      });
    } finally {
      state.inFlight = false;
    }
  }

  private getState(chatId: number): ChatReportState {
    const existing = this.chats.get(chatId);
    if (existing) {
      return existing;
    }
    const created: ChatReportState = { inFlight: false };
    this.chats.set(chatId, created);
    return created;
  }

  private forgetInactive(active: Set<number>): void {
    for (const [chatId, state] of this.chats) {
      if (!active.has(chatId) && !state.inFlight) {
        this.chats.delete(chatId);
      }
    }
  }
}
