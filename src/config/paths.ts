export function getConfigPath(): string {
  return process.env["TONEWATCH_CONFIG_PATH"] ?? "tonewatch.config.json";
}
