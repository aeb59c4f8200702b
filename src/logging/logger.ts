import pino from "pino";
import type { LoggingConfig } from "../config/types.js";
import type { ModerationMessage } from "../moderation/types.js";

export type Logger = pino.Logger;

// Config sections and request headers that must never reach a log line
const REDACT_PATHS = [
  "botToken",
  "signingSecret",
  "apiKey",
  "*.botToken",
  "*.signingSecret",
  "*.apiKey",
  'headers["x-slack-signature"]',
  "headers.authorization",
];

/**
 * pino with pretty output in development. `destination` overrides both the
 * pretty transport and `file`; tests use it to read what was written.
 */
export function createLogger(
  config?: Partial<LoggingConfig>,
  destination?: pino.DestinationStream,
): Logger {
  const level = config?.level ?? "info";
  const isJson = config?.json ?? process.env["NODE_ENV"] === "production";

  const base: pino.LoggerOptions = {
    name: "tonewatch",
    level,
    redact: { paths: REDACT_PATHS, censor: "[redacted]" },
  };

  if (destination) {
    return pino(base, destination);
  }
  if (config?.file) {
    return pino(base, pino.destination(config.file));
  }
  if (isJson) {
    return pino(base);
  }

  return pino({
    ...base,
    transport: {
      target: "pino-pretty",
      options: { colorize: true, translateTime: "HH:MM:ss" },
    },
  });
}

/** Child logger carrying the message's channel, timestamp and author on every line. */
export function messageLogger(
  logger: Logger,
  message: Pick<ModerationMessage, "channel" | "ts" | "userId">,
): Logger {
  return logger.child({ channel: message.channel, ts: message.ts, user: message.userId });
}
