import { describe, it, expect } from "vitest";
import { EventServer } from "../../src/gateway/server.js";
import type { ModerationMessage } from "../../src/moderation/types.js";
import { silentLogger } from "../helpers/fakes.js";
import { NOW_MS, SIGNING_SECRET, messageEnvelope, signedHeaders } from "../helpers/slack-signing.js";

function createServer(dispatch: (message: ModerationMessage) => Promise<unknown> = async () => undefined) {
  return new EventServer({
    signingSecret: SIGNING_SECRET,
    port: 0,
    hostname: "127.0.0.1",
    eventsPath: "/events",
    dispatch,
    logger: silentLogger(),
    now: () => NOW_MS,
  });
}

describe("EventServer", () => {
  it("answers the liveness probe", async () => {
    const res = await createServer().app.request("/");
    expect(res.status).toBe(200);
    expect(await res.text()).toBe("tonewatch is running!");
  });

  it("reports health", async () => {
    const res = await createServer().app.request("/health");
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: "ok" });
  });

  it("echoes the url verification challenge", async () => {
    const body = JSON.stringify({ type: "url_verification", token: "x", challenge: "challenge-token" });

    const res = await createServer().app.request("/events", { method: "POST", body, headers: signedHeaders(body) });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ challenge: "challenge-token" });
  });

  it("rejects a bad signature before reading the event", async () => {
    const dispatched: ModerationMessage[] = [];
    const body = messageEnvelope({ user: "U1", channel: "C1", ts: "1.0", text: "hi" });

    const res = await createServer(async (m) => dispatched.push(m)).app.request("/events", {
      method: "POST",
      body,
      headers: signedHeaders(body, "wrong-secret"),
    });

    expect(res.status).toBe(400);
    expect(await res.text()).toBe("Invalid request signature");
    expect(dispatched).toEqual([]);
  });

  it("rejects a signed body that is not JSON", async () => {
    const body = "not json";
    const res = await createServer().app.request("/events", { method: "POST", body, headers: signedHeaders(body) });

    expect(res.status).toBe(400);
    expect(await res.text()).toBe("Malformed event body");
  });

  it("rejects an envelope of the wrong shape", async () => {
    const body = JSON.stringify({ type: "event_callback", event: 42 });
    const res = await createServer().app.request("/events", { method: "POST", body, headers: signedHeaders(body) });

    expect(res.status).toBe(400);
    expect(await res.text()).toBe("Malformed event envelope");
  });

  it("acks with an empty body and dispatches the message", async () => {
    const dispatched: ModerationMessage[] = [];
    const body = messageEnvelope({ user: "U1", channel: "C1", ts: "1700000000.000100", text: "bom dia" });

    const res = await createServer(async (m) => dispatched.push(m)).app.request("/events", {
      method: "POST",
      body,
      headers: signedHeaders(body),
    });

    expect(res.status).toBe(200);
    expect(await res.text()).toBe("");
    expect(dispatched).toEqual([
      { ts: "1700000000.000100", channel: "C1", userId: "U1", text: "bom dia", isBot: false },
    ]);
  });

  it("acks bot messages without dispatching", async () => {
    const dispatched: ModerationMessage[] = [];
    const body = messageEnvelope({ bot_id: "B1", channel: "C1", ts: "1.0", text: "beep" });

    const res = await createServer(async (m) => dispatched.push(m)).app.request("/events", {
      method: "POST",
      body,
      headers: signedHeaders(body),
    });

    expect(res.status).toBe(200);
    expect(dispatched).toEqual([]);
  });

  it("skips redelivered events", async () => {
    const dispatched: ModerationMessage[] = [];
    const body = messageEnvelope({ user: "U1", channel: "C1", ts: "1.0", text: "hi" });

    const res = await createServer(async (m) => dispatched.push(m)).app.request("/events", {
      method: "POST",
      body,
      headers: { ...signedHeaders(body), "x-slack-retry-num": "1", "x-slack-retry-reason": "http_timeout" },
    });

    expect(res.status).toBe(200);
    expect(await res.text()).toBe("");
    expect(dispatched).toEqual([]);
  });

  it("still acks when the handler fails", async () => {
    const body = messageEnvelope({ user: "U1", channel: "C1", ts: "1.0", text: "hi" });

    const res = await createServer(async () => {
      throw new Error("boom");
    }).app.request("/events", { method: "POST", body, headers: signedHeaders(body) });

    expect(res.status).toBe(200);
  });
});
