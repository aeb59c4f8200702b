import { describe, it, expect } from "vitest";
import {
  ErrorCode,
  type ChatPostMessageResponse,
  type ConversationsHistoryResponse,
} from "@slack/web-api";
import { SlackChatProvider, type SlackWebApi } from "../../src/channels/slack/client.js";

class FakeWebApi implements SlackWebApi {
  readonly historyCalls: Array<{ channel: string; latest: string; limit: number; inclusive: boolean }> = [];
  readonly postCalls: Array<{ channel: string; text: string }> = [];
  history: ConversationsHistoryResponse | Error = { ok: true, messages: [] };
  post: ChatPostMessageResponse | Error = { ok: true, ts: "1700000100.000100" };

  conversations = {
    history: async (args: { channel: string; latest: string; limit: number; inclusive: boolean }) => {
      this.historyCalls.push(args);
      if (this.history instanceof Error) throw this.history;
      return this.history;
    },
  };

  chat = {
    postMessage: async (args: { channel: string; text: string }) => {
      this.postCalls.push(args);
      if (this.post instanceof Error) throw this.post;
      return this.post;
    },
  };
}

const request = { channel: "C1", latest: "1700000000.000100", limit: 20, inclusive: true };

describe("SlackChatProvider.fetchHistory", () => {
  it("passes the request through and normalizes messages", async () => {
    const api = new FakeWebApi();
    api.history = { ok: true, messages: [{ ts: "2.0", user: "U1", text: "hi" }, { ts: "1.0", bot_id: "B1", text: "beep" }] };

    const result = await new SlackChatProvider(api).fetchHistory(request);

    expect(api.historyCalls).toEqual([request]);
    expect(result).toEqual({
      ok: true,
      messages: [
        { ts: "2.0", userId: "U1", text: "hi", botId: undefined, subtype: undefined },
        { ts: "1.0", userId: undefined, text: "beep", botId: "B1", subtype: undefined },
      ],
    });
  });

  it("maps a rate-limit error to 429 with its retry interval", async () => {
    const api = new FakeWebApi();
    api.history = Object.assign(new Error("A rate limit was exceeded"), {
      code: ErrorCode.RateLimitedError,
      retryAfter: 7,
    });

    expect(await new SlackChatProvider(api).fetchHistory(request)).toEqual({
      ok: false,
      status: 429,
      error: "ratelimited",
      retryAfterSec: 7,
    });
  });

  it("maps a platform error to its error string", async () => {
    const api = new FakeWebApi();
    api.history = Object.assign(new Error("An API error occurred: channel_not_found"), {
      code: ErrorCode.PlatformError,
      data: { ok: false, error: "channel_not_found" },
    });

    expect(await new SlackChatProvider(api).fetchHistory(request)).toEqual({
      ok: false,
      status: 200,
      error: "channel_not_found",
    });
  });

  it("maps an HTTP error to its status", async () => {
    const api = new FakeWebApi();
    api.history = Object.assign(new Error("An HTTP protocol error occurred"), {
      code: ErrorCode.HTTPError,
      statusCode: 503,
      statusMessage: "Service Unavailable",
      headers: {},
    });

    expect(await new SlackChatProvider(api).fetchHistory(request)).toEqual({
      ok: false,
      status: 503,
      error: "Service Unavailable",
    });
  });

  it("maps anything else to status 0", async () => {
    const api = new FakeWebApi();
    api.history = new Error("socket hang up");

    expect(await new SlackChatProvider(api).fetchHistory(request)).toEqual({
      ok: false,
      status: 0,
      error: "socket hang up",
    });
  });

  it("reports a response that is not ok", async () => {
    const api = new FakeWebApi();
    api.history = { ok: false, error: "not_in_channel" };

    expect(await new SlackChatProvider(api).fetchHistory(request)).toEqual({
      ok: false,
      status: 200,
      error: "not_in_channel",
    });
  });
});

describe("SlackChatProvider.postMessage", () => {
  it("returns the posted timestamp", async () => {
    const api = new FakeWebApi();

    expect(await new SlackChatProvider(api).postMessage("C1", "hello")).toEqual({ ok: true, ts: "1700000100.000100" });
    expect(api.postCalls).toEqual([{ channel: "C1", text: "hello" }]);
  });

  it("returns the error instead of throwing", async () => {
    const api = new FakeWebApi();
    api.post = new Error("invalid_auth");

    expect(await new SlackChatProvider(api).postMessage("C1", "hello")).toEqual({ ok: false, error: "invalid_auth" });
  });
});
