import type { Context } from "grammy";
import type { CommandDeps } from "../commands/types.js";
import { MESSAGES } from "../downloads/render.js";
import { safeErrorMessage } from "../lib/errors.js";

export const createAnotherDownloadCallbackHandler = (deps: CommandDeps) => async (ctx: Context) => {
  try {
    await deps.queue.enqueue(() => ctx.answerCallbackQuery());
    await deps.queue.enqueue(() => ctx.editMessageText(MESSAGES.sendAnother, { parse_mode: "HTML" }));
  } catch (error) {
    deps.logger.warn("Failed to handle download-another button", { error: safeErrorMessage(error) });
    const chatId = ctx.chat?.id;
    if (chatId !== undefined) {
      await deps.telegram
        .sendMessage(chatId, MESSAGES.sendAnother, { parseMode: "HTML" })
        .catch((sendError: unknown) => {
          deps.logger.warn("Failed to send download-another prompt", {
            error: safeErrorMessage(sendError),
          });
        });
    }
  }
};
