import type { Context } from "grammy";
import { z } from "zod";
import type { CommandDeps } from "../commands/types.js";
import { FORMAT_CALLBACK_PREFIX } from "../downloads/render.js";
import { safeErrorMessage } from "../lib/errors.js";

const mediaFormatSchema = z.enum(["audio", "video"]);

export const createFormatCallbackHandler = (deps: CommandDeps) => async (ctx: Context) => {
  const data = ctx.callbackQuery?.data;
  if (!data || !data.startsWith(FORMAT_CALLBACK_PREFIX)) return;

  try {
    await deps.queue.enqueue(() => ctx.answerCallbackQuery());
  } catch (error) {
    deps.logger.debug("Failed to answer format callback", { error: safeErrorMessage(error) });
  }

  const format = mediaFormatSchema.safeParse(data.slice(FORMAT_CALLBACK_PREFIX.length));
  const chatId = ctx.chat?.id;
  if (!format.success || chatId === undefined) return;

  const result = await deps.sessions.onFormatChosen(
    chatId,
    format.data,
    ctx.callbackQuery?.message?.message_id,
  );
  if (!result.ok) {
    deps.logger.info("Format choice rejected", { chatId, code: result.error.code });
  }
};
