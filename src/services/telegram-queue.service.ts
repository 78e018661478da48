import type { Logger } from "../lib/logger.js";
import { safeErrorMessage } from "../lib/errors.js";

/**
 * TelegramQueue - paces Telegram API calls to stay under the bot's flood limits.
 * One queued call is started every `intervalMs`; a call that takes long (an
 * upload) does not hold back the ones behind it.
 */
export class TelegramQueue {
  private readonly queue: Array<() => Promise<void>> = [];
  private intervalId: NodeJS.Timeout | null = null;
  private inFlight = 0;
  private idleWaiters: Array<() => void> = [];

  constructor(
    private readonly intervalMs = 50,
    private readonly logger?: Logger,
  ) {}

  /**
   * Add a Telegram API call to the queue
   * @returns Promise that settles with the call's own result
   */
  enqueue<T>(fn: () => Promise<T>): Promise<T> {
    return new Promise((resolve, reject) => {
      this.queue.push(async () => {
        try {
          resolve(await fn());
        } catch (error) {
          reject(error);
        }
      });

      if (!this.intervalId) {
        this.start();
      }
    });
  }

  /**
   * Resolves once nothing is queued and no started call is still running.
   */
  idle(): Promise<void> {
    if (this.isIdle) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  get size(): number {
    return this.queue.length;
  }

  get inFlightCount(): number {
    return this.inFlight;
  }

  get isProcessing(): boolean {
    return this.intervalId !== null;
  }

  private get isIdle(): boolean {
    return this.queue.length === 0 && this.inFlight === 0;
  }

  private start(): void {
    this.intervalId = setInterval(() => {
      void this.processNext();
    }, this.intervalMs);

    // First item goes out immediately
    void this.processNext();
  }

  private async processNext(): Promise<void> {
    const fn = this.queue.shift();
    if (!fn) {
      this.stop();
      this.notifyIfIdle();
      return;
    }

    this.inFlight += 1;
    try {
      await fn();
    } catch (error) {
      this.logger?.error("Error processing queue item", { error: safeErrorMessage(error) });
    } finally {
      this.inFlight -= 1;
      this.notifyIfIdle();
    }
  }

  private stop(): void {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = null;
    }
  }

  private notifyIfIdle(): void {
    if (!this.isIdle) {
      return;
    }
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    waiters.forEach((resolve) => resolve());
  }
}
