import type { Context } from "grammy";
import type { CommandDeps } from "./types.js";

export function createLocatorMessageHandler({ logger, sessions }: CommandDeps) {
  return async (ctx: Context) => {
    const text = ctx.message?.text;
    const chatId = ctx.chat?.id;
    const userId = ctx.from?.id;
    if (!text || chatId === undefined || userId === undefined) return;
    if (text.startsWith("/")) return;

    const result = await sessions.onLocatorReceived(chatId, userId, text);
    if (!result.ok) {
      logger.info("Locator rejected", { chatId, code: result.error.code });
    }
  };
}
