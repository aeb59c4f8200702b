import { Cron } from "croner";
import type { ChatProvider } from "../channels/provider.js";
import type { SummaryConfig } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import { buildDigests } from "./digest.js";
import type { ScoreStore } from "./types.js";

export interface DigestReport {
  readonly users: number;
  readonly sent: number;
  readonly failed: string[];
}

export class SummaryScheduler {
  private job: Cron | null = null;

  constructor(
    private readonly store: ScoreStore,
    private readonly provider: Pick<ChatProvider, "postMessage">,
    private readonly config: Pick<SummaryConfig, "schedule" | "timezone">,
    private readonly logger: Logger,
  ) {}

  get running(): boolean {
    return this.job !== null;
  }

  /** Schedules the digest job. Later calls are no-ops; returns whether this call started it. */
  start(): boolean {
    if (this.job) return false;

    this.job = new Cron(
      this.config.schedule,
      { protect: true, ...(this.config.timezone ? { timezone: this.config.timezone } : {}) },
      () => {
        this.runOnce().catch((err) => {
          this.logger.error({ err }, "Unhandled digest run error");
        });
      },
    );

    this.logger.info(
      { schedule: this.config.schedule, next: this.job.nextRun()?.toISOString() },
      "Summary digest scheduled",
    );
    return true;
  }

  stop(): void {
    this.job?.stop();
    this.job = null;
  }

  async runOnce(): Promise<DigestReport> {
    const digests = buildDigests(this.store.drain());
    const failed: string[] = [];

    for (const digest of digests) {
      try {
        const result = await this.provider.postMessage(digest.userId, digest.text);
        if (!result.ok) {
          failed.push(digest.userId);
          this.logger.warn({ user: digest.userId, error: result.error }, "Failed to send digest");
        }
      } catch (err) {
        failed.push(digest.userId);
        this.logger.warn({ err, user: digest.userId }, "Failed to send digest");
      }
    }

    const report = { users: digests.length, sent: digests.length - failed.length, failed };
    this.logger.info(report, "Summary digests delivered");
    return report;
  }
}
