import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import type { MonitorConfig } from "./types.js";
import { getConfigPath } from "./paths.js";
import { parseConfig } from "./schema.js";

const ENV_PATTERN = /\$\{env:([A-Z_][A-Z0-9_]*)\}/g;

// Environment variable -> [section, key]. Applied after the file, before validation.
const ENV_OVERRIDES: ReadonlyArray<readonly [string, string, string]> = [
  ["AWS_ACCOUNT_ID", "aws", "accountId"],
  ["AWS_DEFAULT_REGION", "aws", "region"],
  ["BEDROCK_IAM_ROLE_NAME", "iam", "roleName"],
  ["BEDROCK_S3_BUCKET_PREFIX", "storage", "s3BucketPrefix"],
  ["BEDROCK_SNS_TOPIC_NAME", "alerting", "snsTopicName"],
  ["LOG_LEVEL", "logging", "level"],
];

export function substituteEnv(raw: string): string {
  return raw.replace(ENV_PATTERN, (match, varName: string) => {
    const value = process.env[varName];
    if (value === undefined) {
      throw new Error(`Missing environment variable: ${varName} (referenced as ${match})`);
    }
    return value;
  });
}

function toRecord(value: unknown): Record<string, unknown> | null {
  if (value === null || typeof value !== "object" || Array.isArray(value)) {
    return null;
  }
  return Object.fromEntries(Object.entries(value));
}

export function applyEnvOverrides(raw: unknown): unknown {
  const root = toRecord(raw);
  if (!root) return raw;

  for (const [varName, section, key] of ENV_OVERRIDES) {
    const value = process.env[varName];
    if (value === undefined || value === "") continue;
    const current = toRecord(root[section]) ?? {};
    root[section] = { ...current, [key]: value };
  }
  return root;
}

export function readConfigFile(configPath: string): unknown {
  let content: string;
  try {
    content = readFileSync(configPath, "utf-8");
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      return {};
    }
    throw err;
  }

  return JSON.parse(substituteEnv(content)) as unknown;
}

export function loadConfig(path?: string): MonitorConfig {
  const configPath = resolve(path ?? getConfigPath());
  return parseConfig(applyEnvOverrides(readConfigFile(configPath)));
}
