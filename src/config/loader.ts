import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import type { TonewatchConfig } from "./types.js";
import { getConfigPath } from "./paths.js";
import { parseConfig } from "./schema.js";

const ENV_PATTERN = /\$\{env:([A-Z_][A-Z0-9_]*)\}/g;

/** Environment variables that fill a config path the file leaves unset. */
const ENV_OVERLAY: ReadonlyArray<readonly [string, readonly [string, string]]> = [
  ["SLACK_BOT_TOKEN", ["slack", "botToken"]],
  ["SLACK_SIGNING_SECRET", ["slack", "signingSecret"]],
  ["OPENAI_API_KEY", ["openai", "apiKey"]],
  ["PORT", ["server", "port"]],
];

type RawConfig = Record<string, unknown>;

function isRecord(value: unknown): value is RawConfig {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function substituteEnv(raw: string): string {
  return raw.replace(ENV_PATTERN, (match, varName: string) => {
    const value = process.env[varName];
    if (value === undefined) {
      throw new Error(`Missing environment variable: ${varName} (referenced as ${match})`);
    }
    return value;
  });
}

export function applyEnvOverlay(
  raw: unknown,
  env: NodeJS.ProcessEnv = process.env,
): RawConfig {
  const root: RawConfig = isRecord(raw) ? { ...raw } : {};

  for (const [varName, [section, key]] of ENV_OVERLAY) {
    const value = env[varName];
    if (value === undefined || value === "") continue;

    const existing = root[section];
    const target: RawConfig = isRecord(existing) ? { ...existing } : {};
    if (target[key] === undefined) {
      target[key] = value;
    }
    root[section] = target;
  }

  return root;
}

export function readConfigFile(path?: string): unknown {
  const configPath = resolve(path ?? getConfigPath());

  let content: string;
  try {
    content = readFileSync(configPath, "utf-8");
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      return {};
    }
    throw err;
  }

  const parsed: unknown = JSON.parse(substituteEnv(content));
  return parsed;
}

export function loadConfig(path?: string, env: NodeJS.ProcessEnv = process.env): TonewatchConfig {
  return parseConfig(applyEnvOverlay(readConfigFile(path), env));
}
