export function getConfigPath(): string {
  return process.env["BEDROCK_MONITOR_CONFIG_PATH"] ?? "bedrock-monitor.config.json";
}
