import { z } from "zod";
import { DEFAULT_THRESHOLDS } from "../moderation/thresholds.js";
import type { TonewatchConfig } from "./types.js";

const ratio = z.number().min(0).max(1);

const serverSchema = z.object({
  port: z.coerce.number().int().positive().default(3000),
  hostname: z.string().default("0.0.0.0"),
  eventsPath: z.string().startsWith("/").default("/events"),
});

const slackSchema = z.object({
  botToken: z.string().min(1),
  signingSecret: z.string().min(1),
  historyLimit: z.number().int().min(1).max(1000).default(20),
  historyAttempts: z.number().int().min(1).default(3),
});

const openaiSchema = z.object({
  apiKey: z.string().min(1),
  baseUrl: z.string().url().default("https://api.openai.com/v1"),
  classificationModel: z.string().min(1).default("gpt-4o"),
  embeddingModel: z.string().min(1).default("text-embedding-3-small"),
  temperature: z.number().min(0).max(2).default(0.2),
  timeoutMs: z.number().int().positive().default(20_000),
});

const thresholdsSchema = z.object({
  aggression: ratio.default(DEFAULT_THRESHOLDS.aggression),
  harassment: ratio.default(DEFAULT_THRESHOLDS.harassment),
  threat: ratio.default(DEFAULT_THRESHOLDS.threat),
  coerciveAuthority: ratio.default(DEFAULT_THRESHOLDS.coerciveAuthority),
  condescension: ratio.default(DEFAULT_THRESHOLDS.condescension),
  implicitThreat: ratio.default(DEFAULT_THRESHOLDS.implicitThreat),
  quote: ratio.default(DEFAULT_THRESHOLDS.quote),
  complianceCeiling: ratio.default(DEFAULT_THRESHOLDS.complianceCeiling),
});

const detectionSchema = z.object({
  quoteSuppression: z.boolean().default(false),
  quoteWindow: z.number().int().positive().default(5),
});

const summarySchema = z.object({
  enabled: z.boolean().default(true),
  schedule: z.string().min(1).default("0 9 * * 1"),
  timezone: z.string().optional(),
});

const loggingSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]).default("info"),
  file: z.string().optional(),
  json: z.boolean().optional(),
});

export const tonewatchConfigSchema = z.object({
  server: serverSchema.default({}),
  slack: slackSchema,
  openai: openaiSchema,
  thresholds: thresholdsSchema.default({}),
  detection: detectionSchema.default({}),
  summary: summarySchema.default({}),
  logging: loggingSchema.default({}),
});

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map((i) => `  - ${i}`).join("\n")}`);
    this.name = "ConfigError";
  }
}

export function parseConfig(raw: unknown): TonewatchConfig {
  const result = tonewatchConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`),
    );
  }
  return result.data;
}
