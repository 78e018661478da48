import type { Context } from "grammy";
import { MESSAGES } from "../downloads/render.js";
import type { CommandDeps } from "./types.js";

export function createStartCommandHandler({ logger, queue }: CommandDeps) {
  return async (ctx: Context) => {
    logger.debug("/start command received", { chatId: ctx.chat?.id });
    await queue.enqueue(() => ctx.reply(MESSAGES.welcome, { parse_mode: "HTML" }));
  };
}
