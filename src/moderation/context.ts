import type { ChatProvider } from "../channels/provider.js";
import type { Logger } from "../logging/logger.js";
import { retry } from "../utils/retry.js";
import type { HistoryMessage, ModerationMessage } from "./types.js";

export interface ContextWindow {
  /** Chronological, oldest first. */
  readonly messages: readonly HistoryMessage[];
  readonly transcript: string;
  /** `fallback`: history failed and the triggering message stands alone. `unavailable`: rate limit never cleared. */
  readonly source: "history" | "fallback" | "unavailable";
}

export interface ContextAssemblerOptions {
  readonly limit: number;
  readonly maxAttempts: number;
}

class RateLimitedError extends Error {
  constructor(readonly retryAfterSec: number) {
    super(`Rate limited, retry after ${retryAfterSec}s`);
    this.name = "RateLimitedError";
  }
}

class HistoryUnavailableError extends Error {
  constructor(
    readonly status: number,
    readonly reason: string,
  ) {
    super(`History request failed: ${reason}`);
    this.name = "HistoryUnavailableError";
  }
}

export function isBotAuthored(message: HistoryMessage): boolean {
  return Boolean(message.botId) || message.subtype === "bot_message";
}

/** Newest-first provider history to chronological `author: text` lines, skipping bots and empty entries. */
export function toTranscript(newestFirst: readonly HistoryMessage[]): {
  messages: HistoryMessage[];
  transcript: string;
} {
  const messages = newestFirst
    .filter((m) => !isBotAuthored(m))
    .filter((m): m is HistoryMessage & { text: string } => typeof m.text === "string" && m.text.length > 0)
    .reverse();

  return {
    messages,
    transcript: messages.map((m) => `${m.userId ?? ""}: ${m.text}`).join("\n"),
  };
}

export class ContextAssembler {
  constructor(
    private readonly provider: ChatProvider,
    private readonly options: ContextAssemblerOptions,
    private readonly logger: Logger,
  ) {}

  async build(anchor: ModerationMessage, limit = this.options.limit): Promise<ContextWindow> {
    try {
      const history = await retry(
        async () => {
          const result = await this.provider.fetchHistory({
            channel: anchor.channel,
            latest: anchor.ts,
            limit,
            inclusive: true,
          });
          if (result.ok) return result.messages;
          if (result.status === 429) {
            throw new RateLimitedError(result.retryAfterSec ?? 1);
          }
          throw new HistoryUnavailableError(result.status, result.error);
        },
        {
          maxAttempts: this.options.maxAttempts,
          shouldRetry: (err) => err instanceof RateLimitedError,
          delayMs: (err) => {
            if (!(err instanceof RateLimitedError)) return undefined;
            this.logger.warn({ retryAfterSec: err.retryAfterSec }, "History rate limited, backing off");
            return err.retryAfterSec * 1000;
          },
        },
      );

      return { ...toTranscript(history), source: "history" };
    } catch (err) {
      if (err instanceof RateLimitedError) {
        this.logger.warn(
          { attempts: this.options.maxAttempts },
          "History still rate limited after retries, continuing without context",
        );
        return { messages: [], transcript: "", source: "unavailable" };
      }

      this.logger.warn({ err }, "Failed to fetch history, using the message alone as context");
      return {
        messages: [
          { ts: anchor.ts, userId: anchor.userId, text: anchor.text },
        ],
        transcript: anchor.text,
        source: "fallback",
      };
    }
  }
}
