import pino from "pino";
import { SERVICE_NAME } from "../config.js";

type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug: (message: string, extra?: Record<string, unknown>) => void;
  info: (message: string, extra?: Record<string, unknown>) => void;
  warn: (message: string, extra?: Record<string, unknown>) => void;
  error: (message: string, extra?: Record<string, unknown>) => void;
}

export interface LoggerOptions {
  level?: string;
  pretty?: boolean;
}

function log(
  base: pino.Logger,
  level: LogLevel,
  message: string,
  extra?: Record<string, unknown>,
): void {
  if (extra) {
    base[level](extra, message);
    return;
  }
  base[level](message);
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const base = pino({
    name: SERVICE_NAME,
    level: options.level ?? "info",
    ...(options.pretty
      ? {
          transport: {
            target: "pino-pretty",
            options: {
              colorize: true,
              translateTime: "HH:MM:ss",
              ignore: "pid,hostname",
            },
          },
        }
      : {}),
  });

  return {
    debug: (message, extra) => log(base, "debug", message, extra),
    info: (message, extra) => log(base, "info", message, extra),
    warn: (message, extra) => log(base, "warn", message, extra),
    error: (message, extra) => log(base, "error", message, extra),
  };
}

/**
 * Logger that drops everything; used where output would only be noise.
 */
export function createSilentLogger(): Logger {
  return createLogger({ level: "silent" });
}
