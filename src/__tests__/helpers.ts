import type { Attachment, ChoiceOption, NotificationSink, SendOptions } from "../downloads/types.js";

type SinkMethod = keyof NotificationSink;

export interface SentMessage {
  chatId: number;
  messageId: number;
  text: string;
  options?: SendOptions;
}

export interface EditedMessage {
  chatId: number;
  messageId: number;
  text: string;
  options?: SendOptions;
}

/**
 * In-memory NotificationSink. Every call is recorded before it is allowed to
 * fail, so tests can count attempts.
 */
export class FakeSink implements NotificationSink {
  private nextMessageId = 100;
  readonly sent: SentMessage[] = [];
  readonly edits: EditedMessage[] = [];
  readonly deleted: Array<{ chatId: number; messageId: number }> = [];
  readonly attachments: Array<{ chatId: number; attachment: Attachment }> = [];
  readonly choices: Array<{ chatId: number; messageId: number; text: string; options: ChoiceOption[][] }> =
    [];
  readonly failing = new Map<SinkMethod, Error>();
  onEdit?: (chatId: number, messageId: number, text: string) => Promise<void>;
  onAttachment?: (chatId: number, attachment: Attachment) => Promise<void>;

  async sendMessage(chatId: number, text: string, options?: SendOptions): Promise<number> {
    const messageId = this.nextMessageId++;
    this.sent.push({ chatId, messageId, text, options });
    this.check("sendMessage");
    return messageId;
  }

  async editMessage(chatId: number, messageId: number, text: string, options?: SendOptions): Promise<void> {
    this.edits.push({ chatId, messageId, text, options });
    this.check("editMessage");
    if (this.onEdit) {
      await this.onEdit(chatId, messageId, text);
    }
  }

  async deleteMessage(chatId: number, messageId: number): Promise<void> {
    this.deleted.push({ chatId, messageId });
    this.check("deleteMessage");
  }

  async sendAttachment(chatId: number, attachment: Attachment): Promise<void> {
    this.attachments.push({ chatId, attachment });
    this.check("sendAttachment");
    if (this.onAttachment) {
      await this.onAttachment(chatId, attachment);
    }
  }

  async presentChoice(chatId: number, text: string, options: ChoiceOption[][]): Promise<number> {
    const messageId = this.nextMessageId++;
    this.choices.push({ chatId, messageId, text, options });
    this.check("presentChoice");
    return messageId;
  }

  sentTexts(chatId: number): string[] {
    return this.sent.filter((entry) => entry.chatId === chatId).map((entry) => entry.text);
  }

  editTexts(chatId: number): string[] {
    return this.edits.filter((entry) => entry.chatId === chatId).map((entry) => entry.text);
  }

  private check(method: SinkMethod): void {
    const error = this.failing.get(method);
    if (error) {
      throw error;
    }
  }
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: unknown) => void;
}

export function createDeferred<T = void>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

export interface TestClock {
  now: () => number;
  advance: (ms: number) => void;
}

export function createClock(start = 1_000_000): TestClock {
  let current = start;
  return {
    now: () => current,
    advance: (ms) => {
      current += ms;
    },
  };
}

/** Lets pending promise continuations run before the next assertion. */
export function settle(): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, 0);
  });
}
