import { isValidSlackRequest } from "@slack/bolt";

export interface SignedRequest {
  readonly body: string;
  readonly signature: string | undefined;
  readonly timestamp: string | undefined;
}

/**
 * Checks the `v0` HMAC-SHA256 signature Slack puts on every event delivery.
 * Requests older than five minutes are rejected to stop replays.
 */
export function verifySlackSignature(
  signingSecret: string,
  request: SignedRequest,
  nowMilliseconds?: number,
): boolean {
  if (!request.signature || !request.timestamp) return false;

  const timestamp = Number(request.timestamp);
  if (!Number.isInteger(timestamp)) return false;

  return isValidSlackRequest({
    signingSecret,
    body: request.body,
    headers: {
      "x-slack-signature": request.signature,
      "x-slack-request-timestamp": timestamp,
    },
    ...(nowMilliseconds !== undefined ? { nowMilliseconds } : {}),
  });
}
