import type { TonewatchConfig } from "../../src/config/types.js";
import { DEFAULT_THRESHOLDS } from "../../src/moderation/thresholds.js";
import type { HistoryMessage, ModerationMessage } from "../../src/moderation/types.js";

export function makeMessage(overrides: Partial<ModerationMessage> = {}): ModerationMessage {
  return {
    ts: "1700000000.000100",
    channel: "C100",
    userId: "U100",
    text: "Can we sync on the release notes?",
    isBot: false,
    ...overrides,
  };
}

export function makeHistory(overrides: Partial<HistoryMessage> = {}): HistoryMessage {
  return {
    ts: "1700000000.000000",
    userId: "U200",
    text: "Morning all",
    ...overrides,
  };
}

export function makeConfig(overrides: Partial<TonewatchConfig> = {}): TonewatchConfig {
  return {
    server: { port: 3000, hostname: "127.0.0.1", eventsPath: "/events" },
    slack: { botToken: "xoxb-test", signingSecret: "test-secret", historyLimit: 20, historyAttempts: 3 },
    openai: {
      apiKey: "test-key",
      baseUrl: "https://api.openai.test/v1",
      classificationModel: "gpt-4o",
      embeddingModel: "text-embedding-3-small",
      temperature: 0.2,
      timeoutMs: 5_000,
    },
    thresholds: DEFAULT_THRESHOLDS,
    detection: { quoteSuppression: false, quoteWindow: 5 },
    summary: { enabled: true, schedule: "0 9 * * 1" },
    logging: { level: "info" },
    ...overrides,
  };
}
