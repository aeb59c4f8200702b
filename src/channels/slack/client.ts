import {
  ErrorCode,
  LogLevel,
  WebClient,
  type ChatPostMessageResponse,
  type ConversationsHistoryResponse,
  type WebAPICallError,
} from "@slack/web-api";
import type {
  ChatProvider,
  HistoryRequest,
  HistoryResult,
  PostResult,
} from "../provider.js";
import { normalizeHistoryMessage } from "./normalize.js";

/** The slice of the Slack Web API this provider calls. */
export interface SlackWebApi {
  conversations: {
    history(args: {
      channel: string;
      latest: string;
      limit: number;
      inclusive: boolean;
    }): Promise<ConversationsHistoryResponse>;
  };
  chat: {
    postMessage(args: { channel: string; text: string }): Promise<ChatPostMessageResponse>;
  };
}

export function createSlackWebClient(token: string): WebClient {
  // Rate-limited calls must reach the context assembler, which owns the backoff policy.
  return new WebClient(token, {
    rejectRateLimitedCalls: true,
    retryConfig: { retries: 0 },
    logLevel: LogLevel.ERROR,
  });
}

function isWebApiError(err: unknown): err is WebAPICallError {
  return err instanceof Error && "code" in err && typeof err.code === "string";
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class SlackChatProvider implements ChatProvider {
  constructor(private readonly client: SlackWebApi) {}

  async fetchHistory(request: HistoryRequest): Promise<HistoryResult> {
    let response: ConversationsHistoryResponse;
    try {
      response = await this.client.conversations.history({
        channel: request.channel,
        latest: request.latest,
        limit: request.limit,
        inclusive: request.inclusive,
      });
    } catch (err) {
      return toHistoryFailure(err);
    }

    if (!response.ok) {
      return { ok: false, status: 200, error: response.error ?? "unknown_error" };
    }

    return {
      ok: true,
      messages: (response.messages ?? []).map(normalizeHistoryMessage),
    };
  }

  async postMessage(channel: string, text: string): Promise<PostResult> {
    try {
      const result = await this.client.chat.postMessage({ channel, text });
      if (!result.ok) {
        return { ok: false, error: result.error ?? "unknown_error" };
      }
      return { ok: true, ts: result.ts ?? "" };
    } catch (err) {
      return { ok: false, error: describe(err) };
    }
  }
}

function toHistoryFailure(err: unknown): HistoryResult {
  if (!isWebApiError(err)) {
    return { ok: false, status: 0, error: describe(err) };
  }

  if (err.code === ErrorCode.RateLimitedError) {
    return { ok: false, status: 429, error: "ratelimited", retryAfterSec: err.retryAfter };
  }
  if (err.code === ErrorCode.PlatformError) {
    return { ok: false, status: 200, error: err.data.error };
  }
  if (err.code === ErrorCode.HTTPError) {
    return { ok: false, status: err.statusCode, error: err.statusMessage };
  }
  return { ok: false, status: 0, error: err.message };
}
