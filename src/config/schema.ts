import { z } from "zod";
import type { MonitorConfig } from "./types.js";

export const AWS_ACCOUNT_ID_PATTERN = /^\d{12}$/;

const awsSchema = z.object({
  region: z.string().min(1).default("us-east-1"),
  accountId: z
    .string()
    .regex(AWS_ACCOUNT_ID_PATTERN, "AWS account ID must be 12 digits")
    .optional(),
});

const iamSchema = z.object({
  roleName: z.string().min(1).default("BedrockCloudWatchLoggingRole"),
});

const storageSchema = z.object({
  s3BucketPrefix: z.string().min(1).default("bedrock-logs"),
  logGroup: z.string().min(1).default("/aws/bedrock/modelinvocations"),
  retentionDays: z.number().int().positive().default(30),
  lifecycleDays: z.number().int().positive().default(90),
});

const thresholdsSchema = z.object({
  highTokenUsage: z.number().int().positive().default(100_000),
  errorRate: z.number().int().positive().default(10),
  invocationSpike: z.number().int().positive().default(1000),
  highLatency: z.number().positive().default(10),
});

const alertingSchema = z.object({
  snsTopicName: z.string().min(1).default("bedrock-monitoring-alerts"),
  thresholds: thresholdsSchema.default({}),
});

const dashboardSchema = z.object({
  name: z.string().min(1).default("BedrockUsageMonitoring"),
});

const pricingEntrySchema = z.object({
  inputPricePerThousandTokens: z.number().nonnegative(),
  outputPricePerThousandTokens: z.number().nonnegative(),
});

const reportSchema = z.object({
  namespace: z.string().min(1).default("AWS/Bedrock"),
  periodSeconds: z.number().int().positive().default(3600),
  logQueryTimeoutMs: z.number().int().positive().default(10_000),
  logQueryPollIntervalMs: z.number().int().positive().default(1000),
  pricing: z.record(pricingEntrySchema).optional(),
});

export const logLevelSchema = z.enum(["debug", "info", "warn", "error", "silent"]);

const loggingSchema = z.object({
  level: logLevelSchema.default("info"),
  file: z.string().optional(),
  json: z.boolean().optional(),
});

export const monitorConfigSchema = z.object({
  aws: awsSchema.default({}),
  iam: iamSchema.default({}),
  storage: storageSchema.default({}),
  alerting: alertingSchema.default({}),
  dashboard: dashboardSchema.default({}),
  report: reportSchema.default({}),
  logging: loggingSchema.optional(),
});

export function parseConfig(raw: unknown): MonitorConfig {
  return monitorConfigSchema.parse(raw);
}

export function s3BucketName(config: MonitorConfig): string {
  return `${config.storage.s3BucketPrefix}-${config.aws.accountId ?? ""}`;
}
