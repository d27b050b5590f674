import pino, { Logger, LoggerOptions } from "pino";
import { getStage, isLocal, isProduction, isTest } from "./env";

/**
 * Centralized structured logger.
 * - Local/dev: pretty-printed logs for readability
 * - Hosted/prod: JSON lines for the platform log collector
 */
const baseOptions: LoggerOptions = {
  level: process.env.LOG_LEVEL || (isProduction() ? "info" : "debug"),
  base: {
    service: "alphascope-bot",
    stage: getStage(),
  },
  redact: {
    // Remove sensitive fields from logs
    paths: ["*.token", "*.botToken", "*.secret", "headers.authorization"],
    remove: true,
  },
  messageKey: "message",
  timestamp: pino.stdTimeFunctions.isoTime,
};

const transport =
  isLocal() && !isProduction() && !isTest()
    ? {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          singleLine: false,
          ignore: "pid,hostname",
          messageKey: "message",
        },
      }
    : undefined;

const rootLogger: Logger = pino({ ...baseOptions, transport });

/**
 * Returns a child logger with module-scoped bindings.
 */
export function getLogger(moduleName?: string): Logger {
  if (!moduleName) return rootLogger;
  return rootLogger.child({ module: moduleName });
}

/**
 * Returns a child logger augmented with chat update fields.
 * Use inside command handlers when the update is available.
 */
export function withUpdateContext(
  moduleName: string | undefined,
  update: {
    updateId?: number;
    chatId?: number;
    command?: string;
  }
): Logger {
  return getLogger(moduleName).child({
    updateId: update.updateId,
    chatId: update.chatId,
    command: update.command,
  });
}

export default rootLogger;
