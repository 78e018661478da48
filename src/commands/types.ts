import type { TelegramBotManager } from "../bot.js";
import type { Config } from "../config.js";
import type { SessionManager } from "../downloads/session-manager.js";
import type { Logger } from "../lib/logger.js";
import type { TelegramQueue } from "../services/telegram-queue.service.js";

export interface CommandDeps {
  telegram: TelegramBotManager;
  config: Config;
  logger: Logger;
  sessions: SessionManager;
  queue: TelegramQueue;
}
