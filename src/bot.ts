import { Bot, type Context, InlineKeyboard, InputFile } from "grammy";
import type { Config } from "./config.js";
import type { Logger } from "./lib/logger.js";
import { safeErrorMessage } from "./lib/errors.js";
import { isParseEntitiesMeta, parseTelegramErrorMeta, toTransportError } from "./lib/telegram-errors.js";
import { htmlToPlain } from "./lib/utils.js";
import { TelegramQueue } from "./services/telegram-queue.service.js";
import type { Attachment, ChoiceOption, NotificationSink, SendOptions } from "./downloads/types.js";
import { FORMAT_CALLBACK_PREFIX, ANOTHER_DOWNLOAD_CALLBACK } from "./downloads/render.js";
import {
  createHelpCommandHandler,
  createLocatorMessageHandler,
  createStartCommandHandler,
  type CommandDeps,
} from "./commands/index.js";
import { createFormatCallbackHandler } from "./callbacks/format-callback.command.js";
import { createAnotherDownloadCallbackHandler } from "./callbacks/another-download-callback.command.js";

export interface TelegramBotManager extends NotificationSink {
  readonly bot: Bot;
  readonly queue: TelegramQueue;
  start(): Promise<void>;
  stop(): Promise<void>;
}

export function isUserAllowed(userId: number | undefined, allowedUserIds: number[]): boolean {
  if (allowedUserIds.length === 0) {
    return true;
  }
  if (!userId) return false;
  return allowedUserIds.includes(userId);
}

export function toInlineKeyboard(buttons: ChoiceOption[][]): InlineKeyboard {
  const keyboard = new InlineKeyboard();
  buttons.forEach((row, index) => {
    if (index > 0) {
      keyboard.row();
    }
    row.forEach((button) => keyboard.text(button.text, button.callbackData));
  });
  return keyboard;
}

function messageOptions(options?: SendOptions) {
  return {
    parse_mode: options?.parseMode,
    reply_markup: options?.buttons ? toInlineKeyboard(options.buttons) : undefined,
  };
}

/**
 * Runs a text call with HTML markup and, if Telegram rejects the markup,
 * once more as plain text.
 */
export async function withPlainTextFallback<T>(
  text: string,
  options: SendOptions | undefined,
  logger: Logger,
  call: (text: string, options: SendOptions | undefined) => Promise<T>,
): Promise<T> {
  try {
    return await call(text, options);
  } catch (error) {
    if (!options?.parseMode || !isParseEntitiesMeta(parseTelegramErrorMeta(error))) {
      throw error;
    }
    logger.warn("Telegram rejected HTML markup, resending as plain text", {
      error: safeErrorMessage(error),
    });
    return call(htmlToPlain(text), { ...options, parseMode: undefined });
  }
}

export function createTelegramBot(config: Config, logger: Logger): TelegramBotManager {
  const queue = new TelegramQueue(config.queueIntervalMs, logger);
  const bot = new Bot(config.botToken, config.apiRoot ? { client: { apiRoot: config.apiRoot } } : undefined);

  bot.use(async (ctx, next) => {
    if (!isUserAllowed(ctx.from?.id, config.allowedUserIds)) {
      logger.warn("Unauthorized user attempted access", { userId: ctx.from?.id });
      return;
    }
    await next();
  });

  bot.catch((error) => {
    logger.error("Bot error", {
      error: safeErrorMessage(error.error),
      updateId: error.ctx.update.update_id,
    });
  });

  return createBotManager(bot, queue, logger);
}

function createBotManager(bot: Bot, queue: TelegramQueue, logger: Logger): TelegramBotManager {
  return {
    bot,
    queue,

    async start() {
      logger.info("Starting long polling");
      await bot.start({
        drop_pending_updates: true,
        onStart: (info) => {
          logger.info("Telegram bot polling started", { username: info.username });
        },
      });
    },

    async stop() {
      await bot.stop();
      logger.info("Bot stopped");
    },

    async sendMessage(chatId, text, options) {
      try {
        const sent = await withPlainTextFallback(text, options, logger, (body, sendOptions) =>
          queue.enqueue(() => bot.api.sendMessage(chatId, body, messageOptions(sendOptions))),
        );
        return sent.message_id;
      } catch (error) {
        throw toTransportError(error, "sendMessage");
      }
    },

    async editMessage(chatId, messageId, text, options) {
      try {
        await withPlainTextFallback(text, options, logger, (body, editOptions) =>
          queue.enqueue(() => bot.api.editMessageText(chatId, messageId, body, messageOptions(editOptions))),
        );
      } catch (error) {
        throw toTransportError(error, "editMessageText");
      }
    },

    async deleteMessage(chatId, messageId) {
      try {
        await queue.enqueue(() => bot.api.deleteMessage(chatId, messageId));
      } catch (error) {
        throw toTransportError(error, "deleteMessage");
      }
    },

    async sendAttachment(chatId, attachment: Attachment) {
      try {
        if (attachment.kind === "audio") {
          await queue.enqueue(() =>
            bot.api.sendAudio(chatId, new InputFile(attachment.path), {
              caption: attachment.caption,
              parse_mode: "HTML",
              title: attachment.title,
              performer: attachment.performer,
              duration: attachment.durationSeconds,
            }),
          );
          return;
        }
        await queue.enqueue(() =>
          bot.api.sendVideo(chatId, new InputFile(attachment.path), {
            caption: attachment.caption,
            parse_mode: "HTML",
            supports_streaming: attachment.supportsStreaming,
            width: attachment.width,
            height: attachment.height,
            duration: attachment.durationSeconds,
          }),
        );
      } catch (error) {
        throw toTransportError(error, attachment.kind === "audio" ? "sendAudio" : "sendVideo");
      }
    },

    async presentChoice(chatId, text, options) {
      try {
        const sent = await queue.enqueue(() =>
          bot.api.sendMessage(chatId, text, messageOptions({ parseMode: "HTML", buttons: options })),
        );
        return sent.message_id;
      } catch (error) {
        throw toTransportError(error, "sendMessage");
      }
    },
  };
}

export function registerHandlers(deps: CommandDeps): void {
  const { bot } = deps.telegram;

  bot.command("start", createStartCommandHandler(deps));
  bot.command("help", createHelpCommandHandler(deps));
  bot.callbackQuery(new RegExp(`^${FORMAT_CALLBACK_PREFIX}`), createFormatCallbackHandler(deps));
  bot.callbackQuery(ANOTHER_DOWNLOAD_CALLBACK, createAnotherDownloadCallbackHandler(deps));
  bot.on("message:text", createLocatorMessageHandler(deps));
  bot.on("callback_query:data", async (ctx: Context) => {
    await deps.queue.enqueue(() => ctx.answerCallbackQuery()).catch((error: unknown) => {
      deps.logger.debug("Failed to answer unknown callback", { error: safeErrorMessage(error) });
    });
  });
}
