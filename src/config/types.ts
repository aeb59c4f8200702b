import type { Thresholds } from "../moderation/thresholds.js";

export interface TonewatchConfig {
  readonly server: ServerConfig;
  readonly slack: SlackConfig;
  readonly openai: OpenAIConfig;
  readonly thresholds: Thresholds;
  readonly detection: DetectionConfig;
  readonly summary: SummaryConfig;
  readonly logging: LoggingConfig;
}

export interface ServerConfig {
  readonly port: number;
  readonly hostname: string;
  readonly eventsPath: string;
}

export interface SlackConfig {
  readonly botToken: string;
  readonly signingSecret: string;
  /** How many messages of channel history feed the classifier. */
  readonly historyLimit: number;
  /** Total attempts at fetching history while rate limited. */
  readonly historyAttempts: number;
}

export interface OpenAIConfig {
  readonly apiKey: string;
  readonly baseUrl: string;
  readonly classificationModel: string;
  readonly embeddingModel: string;
  readonly temperature: number;
  readonly timeoutMs: number;
}

export interface DetectionConfig {
  /** Skip scoring when a message restates one of the last few messages. Off by default. */
  readonly quoteSuppression: boolean;
  readonly quoteWindow: number;
}

export interface SummaryConfig {
  readonly enabled: boolean;
  readonly schedule: string;
  readonly timezone?: string;
}

export interface LoggingConfig {
  readonly level: "debug" | "info" | "warn" | "error";
  readonly file?: string;
  readonly json?: boolean;
}

export type { Thresholds } from "../moderation/thresholds.js";
