import { FetchError, safeErrorMessage, SessionError, type SessionErrorCode } from "../lib/errors.js";
import type { Logger } from "../lib/logger.js";
import type { DeliveryCoordinator } from "./delivery-coordinator.js";
import type { FetchWorker } from "./fetch-worker.js";
import { parseLocator } from "./locator.js";
import type { ProgressStore } from "./progress-store.js";
import { formatChoices, MESSAGES, renderFailure } from "./render.js";
import type { JobOutcome, MediaFormat, NotificationSink, Session } from "./types.js";

export type SessionResult = { ok: true } | { ok: false; error: SessionError };

export interface SessionManagerOptions {
  sessionTtlMs: number;
  now?: () => number;
}

function reject(code: SessionErrorCode, message: string, chatId: number): SessionResult {
  return { ok: false, error: new SessionError(message, code, { chatId }) };
}

/**
 * Owns every chat's session. Events for one chat run one at a time through a
 * per-chat lock; events for different chats interleave freely. Jobs run in the
 * background and report back through `onJobOutcome`.
 */
export class SessionManager {
  private readonly sessions = new Map<number, Session>();
  private readonly jobs = new Map<number, Promise<void>>();
  private readonly chatLocks = new Map<number, Promise<void>>();
  private readonly now: () => number;

  constructor(
    private readonly sink: NotificationSink,
    private readonly store: ProgressStore,
    private readonly worker: FetchWorker,
    private readonly delivery: DeliveryCoordinator,
    private readonly logger: Logger,
    private readonly options: SessionManagerOptions,
  ) {
    this.now = options.now ?? Date.now;
  }

  onLocatorReceived(chatId: number, requesterId: number, text: string): Promise<SessionResult> {
    return this.runChatLock(chatId, async () => {
      const locator = parseLocator(text);
      if (!locator) {
        await this.notify(chatId, MESSAGES.invalidLocator);
        return reject("INVALID_LOCATOR", "Invalid YouTube URL", chatId);
      }

      const current = this.getLiveSession(chatId);
      if (current && current.phase !== "awaiting-format") {
        this.logger.info("Rejected locator while a job is running", { chatId, phase: current.phase });
        await this.notify(chatId, MESSAGES.jobInProgress);
        return reject("JOB_IN_PROGRESS", "A download is already running in this chat", chatId);
      }

      const now = this.now();
      const session: Session = {
        chatId,
        requesterId,
        locator,
        phase: "awaiting-format",
        createdAt: now,
        updatedAt: now,
      };
      this.sessions.set(chatId, session);
      this.store.delete(chatId);

      try {
        session.choiceMessageId = await this.sink.presentChoice(
          chatId,
          MESSAGES.chooseFormat,
          formatChoices(),
        );
      } catch (error) {
        this.logger.warn("Failed to present format choice", { chatId, error: safeErrorMessage(error) });
      }

      this.logger.info("Locator accepted", { chatId, requesterId });
      return { ok: true };
    });
  }

  onFormatChosen(chatId: number, format: MediaFormat, sourceMessageId?: number): Promise<SessionResult> {
    return this.runChatLock(chatId, async () => {
      const session = this.getLiveSession(chatId);
      if (!session || session.phase !== "awaiting-format") {
        const result = session
          ? reject("WRONG_STATE", `Session is ${session.phase}`, chatId)
          : reject("NO_SESSION", "No session for chat", chatId);
        this.logger.info("Rejected format choice", { chatId, format, phase: session?.phase });
        await this.reportExpired(chatId, sourceMessageId);
        return result;
      }

      session.format = format;
      this.transition(session, "starting");

      try {
        session.statusMessageId = await this.sink.sendMessage(chatId, MESSAGES.initializing, {
          parseMode: "HTML",
        });
      } catch (error) {
        this.logger.warn("Failed to send status placeholder", {
          chatId,
          error: safeErrorMessage(error),
        });
      }

      return this.launchJob(session);
    });
  }

  startJob(chatId: number): Promise<SessionResult> {
    return this.runChatLock(chatId, async () => {
      const session = this.getLiveSession(chatId);
      if (!session) {
        return reject("NO_SESSION", "No session for chat", chatId);
      }
      return this.launchJob(session);
    });
  }

  onJobOutcome(chatId: number, outcome: JobOutcome): Promise<void> {
    return this.runChatLock(chatId, async () => {
      const session = this.sessions.get(chatId);

      if (outcome.status === "delivered") {
        this.logger.info("Job delivered", { chatId, title: outcome.title, sizeBytes: outcome.sizeBytes });
      } else {
        this.logger.warn("Job failed", {
          chatId,
          code: outcome.error.code,
          error: outcome.error.message,
        });
        await this.reportFailure(chatId, session?.statusMessageId, renderFailure(outcome.error));
      }

      this.jobs.delete(chatId);
      this.sessions.delete(chatId);
      this.store.delete(chatId);
    });
  }

  /**
   * Drops every session that waited for a format longer than the session TTL
   * and returns their chat ids. Sessions with a job are never touched.
   */
  sweepExpired(): number[] {
    const expired: number[] = [];
    for (const chatId of [...this.sessions.keys()]) {
      if (!this.getLiveSession(chatId)) {
        expired.push(chatId);
      }
    }
    return expired;
  }

  getSession(chatId: number): Readonly<Session> | undefined {
    return this.sessions.get(chatId);
  }

  getStatusMessageId(chatId: number): number | undefined {
    return this.sessions.get(chatId)?.statusMessageId;
  }

  hasActiveJob(chatId: number): boolean {
    return this.jobs.has(chatId);
  }

  get activeJobCount(): number {
    return this.jobs.size;
  }

  async waitForJob(chatId: number): Promise<void> {
    await this.jobs.get(chatId);
  }

  async drain(): Promise<void> {
    await Promise.allSettled([...this.jobs.values()]);
  }

  private launchJob(session: Session): SessionResult {
    const { chatId } = session;
    if (session.phase !== "starting" || !session.format) {
      return reject("WRONG_STATE", `Session is ${session.phase}`, chatId);
    }
    if (this.jobs.has(chatId)) {
      return reject("JOB_IN_PROGRESS", "A download is already running in this chat", chatId);
    }

    this.store.set(chatId, { phase: "starting", percent: 0, speed: "N/A", eta: "N/A" });
    this.transition(session, "downloading");

    const job = this.runJob(chatId, session.locator, session.format)
      .catch((error: unknown) => {
        this.logger.error("Job crashed", { chatId, error: safeErrorMessage(error) });
        return this.onJobOutcome(chatId, {
          status: "failed",
          error: new FetchError(safeErrorMessage(error), { chatId }),
        });
      })
      .catch((error: unknown) => {
        this.logger.error("Failed to settle crashed job", { chatId, error: safeErrorMessage(error) });
      })
      .finally(() => {
        if (this.jobs.get(chatId) === job) {
          this.jobs.delete(chatId);
        }
      });
    this.jobs.set(chatId, job);

    this.logger.info("Job started", { chatId, format: session.format });
    return { ok: true };
  }

  private async runJob(chatId: number, locator: string, format: MediaFormat): Promise<void> {
    const statusMessageId = this.getStatusMessageId(chatId);
    if (statusMessageId !== undefined) {
      await this.bestEffort("edit status to starting", chatId, () =>
        this.sink.editMessage(chatId, statusMessageId, MESSAGES.starting, { parseMode: "HTML" }),
      );
    }

    const result = await this.worker.run({ chatId, locator, format });
    if (!result.ok) {
      await this.onJobOutcome(chatId, { status: "failed", error: result.error });
      return;
    }

    const { artifact } = result;
    const target = await this.runChatLock(chatId, async () => {
      const session = this.sessions.get(chatId);
      if (!session || session.phase !== "downloading") {
        return undefined;
      }
      session.title = artifact.title;
      this.transition(session, "uploading");
      return { chatId, format, statusMessageId: session.statusMessageId };
    });

    if (!target) {
      this.logger.warn("Session vanished before delivery", { chatId });
      await this.delivery.discard(chatId, artifact);
      return;
    }

    const outcome = await this.delivery.deliver(target, artifact);
    await this.onJobOutcome(chatId, outcome);
  }

  private transition(session: Session, phase: Session["phase"]): void {
    this.logger.debug("Session transition", { chatId: session.chatId, from: session.phase, to: phase });
    session.phase = phase;
    session.updatedAt = this.now();
  }

  /**
   * Returns the chat's session, dropping it first if it has been waiting for
   * a format choice longer than the session TTL.
   */
  private getLiveSession(chatId: number): Session | undefined {
    const session = this.sessions.get(chatId);
    if (!session) {
      return undefined;
    }
    if (
      session.phase === "awaiting-format" &&
      this.now() - session.updatedAt > this.options.sessionTtlMs
    ) {
      this.logger.info("Session expired", { chatId });
      this.sessions.delete(chatId);
      return undefined;
    }
    return session;
  }

  private async reportExpired(chatId: number, sourceMessageId: number | undefined): Promise<void> {
    await this.reportFailure(chatId, sourceMessageId, MESSAGES.sessionExpired);
  }

  private async reportFailure(chatId: number, messageId: number | undefined, text: string): Promise<void> {
    if (messageId !== undefined) {
      try {
        await this.sink.editMessage(chatId, messageId, text, { parseMode: "HTML" });
        return;
      } catch (error) {
        this.logger.warn("Failed to edit message, sending a new one", {
          chatId,
          error: safeErrorMessage(error),
        });
      }
    }
    await this.notify(chatId, text);
  }

  private async notify(chatId: number, text: string): Promise<void> {
    await this.bestEffort("send message", chatId, () =>
      this.sink.sendMessage(chatId, text, { parseMode: "HTML" }),
    );
  }

  private async bestEffort(action: string, chatId: number, fn: () => Promise<unknown>): Promise<void> {
    try {
      await fn();
    } catch (error) {
      this.logger.warn(`Failed to ${action}`, { chatId, error: safeErrorMessage(error) });
    }
  }

  private async runChatLock<T>(chatId: number, task: () => Promise<T>): Promise<T> {
    const previous = this.chatLocks.get(chatId) ?? Promise.resolve();

    const current = previous.then(task);
    const settled = current.then(
      () => undefined,
      () => undefined,
    );
    this.chatLocks.set(chatId, settled);
    void settled.then(() => {
      if (this.chatLocks.get(chatId) === settled) {
        this.chatLocks.delete(chatId);
      }
    });
    return current;
  }
}
