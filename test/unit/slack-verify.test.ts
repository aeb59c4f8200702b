import { createHmac } from "node:crypto";
import { describe, it, expect } from "vitest";
import { verifySlackSignature } from "../../src/channels/slack/verify.js";

const SECRET = "test-secret";
const TIMESTAMP = "1700000000";
const NOW_MS = 1_700_000_030_000;

function sign(body: string, timestamp = TIMESTAMP, secret = SECRET): string {
  return `v0=${createHmac("sha256", secret).update(`v0:${timestamp}:${body}`).digest("hex")}`;
}

describe("verifySlackSignature", () => {
  const body = JSON.stringify({ type: "event_callback" });

  it("accepts a correctly signed request", () => {
    expect(verifySlackSignature(SECRET, { body, signature: sign(body), timestamp: TIMESTAMP }, NOW_MS)).toBe(true);
  });

  it("rejects a body that was changed after signing", () => {
    expect(verifySlackSignature(SECRET, { body: `${body} `, signature: sign(body), timestamp: TIMESTAMP }, NOW_MS)).toBe(false);
  });

  it("rejects a different secret", () => {
    expect(
      verifySlackSignature(SECRET, { body, signature: sign(body, TIMESTAMP, "other-secret"), timestamp: TIMESTAMP }, NOW_MS),
    ).toBe(false);
  });

  it("rejects requests older than five minutes", () => {
    const later = NOW_MS + 10 * 60 * 1000;
    expect(verifySlackSignature(SECRET, { body, signature: sign(body), timestamp: TIMESTAMP }, later)).toBe(false);
  });

  it("rejects missing headers", () => {
    expect(verifySlackSignature(SECRET, { body, signature: undefined, timestamp: TIMESTAMP }, NOW_MS)).toBe(false);
    expect(verifySlackSignature(SECRET, { body, signature: sign(body), timestamp: undefined }, NOW_MS)).toBe(false);
  });

  it("rejects a non-numeric timestamp", () => {
    expect(verifySlackSignature(SECRET, { body, signature: sign(body), timestamp: "soon" }, NOW_MS)).toBe(false);
  });
});
