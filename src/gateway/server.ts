import { Hono } from "hono";
import { serve } from "@hono/node-server";
import { slackEnvelopeSchema, normalizeSlackEvent } from "../channels/slack/normalize.js";
import { verifySlackSignature } from "../channels/slack/verify.js";
import type { Logger } from "../logging/logger.js";
import type { ModerationMessage } from "../moderation/types.js";

export interface EventServerOptions {
  readonly signingSecret: string;
  readonly port: number;
  readonly hostname: string;
  readonly eventsPath: string;
  /** Handles one message; the HTTP response does not wait for it. */
  readonly dispatch: (message: ModerationMessage) => Promise<unknown>;
  readonly logger: Logger;
  readonly now?: () => number;
}

export class EventServer {
  readonly app: Hono;
  private server: ReturnType<typeof serve> | null = null;
  private readonly startedAt = Date.now();

  constructor(private readonly options: EventServerOptions) {
    this.app = new Hono();
    this.setupRoutes();
  }

  private setupRoutes(): void {
    this.app.get("/", (c) => c.text("tonewatch is running!"));

    this.app.get("/health", (c) => {
      const uptime = Date.now() - this.startedAt;
      return c.json({ status: "ok", uptime, uptimeHuman: formatUptime(uptime) });
    });

    this.app.post(this.options.eventsPath, async (c) => {
      const body = await c.req.text();
      const valid = verifySlackSignature(
        this.options.signingSecret,
        {
          body,
          signature: c.req.header("x-slack-signature"),
          timestamp: c.req.header("x-slack-request-timestamp"),
        },
        this.options.now?.(),
      );
      if (!valid) {
        this.options.logger.warn("Rejected event with invalid signature");
        return c.text("Invalid request signature", 400);
      }

      let payload: unknown;
      try {
        payload = JSON.parse(body);
      } catch {
        return c.text("Malformed event body", 400);
      }

      const envelope = slackEnvelopeSchema.safeParse(payload);
      if (!envelope.success) {
        return c.text("Malformed event envelope", 400);
      }

      if (envelope.data.challenge !== undefined) {
        return c.json({ challenge: envelope.data.challenge });
      }

      // Slack redelivers when an ack is slow; the first delivery already ran the pipeline
      const retryNum = c.req.header("x-slack-retry-num");
      if (retryNum !== undefined) {
        this.options.logger.debug({ retryNum, reason: c.req.header("x-slack-retry-reason") }, "Ignoring redelivered event");
        return c.body(null, 200);
      }

      const message = normalizeSlackEvent(envelope.data.event);
      if (message) {
        this.options.dispatch(message).catch((err) => {
          this.options.logger.error({ err, channel: message.channel }, "Failed to handle message");
        });
      }

      return c.body(null, 200);
    });
  }

  async start(): Promise<void> {
    this.server = serve({
      fetch: this.app.fetch,
      port: this.options.port,
      hostname: this.options.hostname,
    });
  }

  async stop(): Promise<void> {
    if (this.server) {
      this.server.close();
      this.server = null;
    }
  }
}

function formatUptime(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);
  const days = Math.floor(hours / 24);

  if (days > 0) return `${days}d ${hours % 24}h`;
  if (hours > 0) return `${hours}h ${minutes % 60}m`;
  if (minutes > 0) return `${minutes}m ${seconds % 60}s`;
  return `${seconds}s`;
}
