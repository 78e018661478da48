import type { Context } from "grammy";
import { MESSAGES } from "../downloads/render.js";
import type { CommandDeps } from "./types.js";

export function createHelpCommandHandler(deps: CommandDeps) {
  return async (ctx: Context) => {
    deps.logger.debug("/help command received", { chatId: ctx.chat?.id });
    await deps.queue.enqueue(() => ctx.reply(MESSAGES.help, { parse_mode: "HTML" }));
  };
}
