import type { PricingEntry } from "../usage/types.js";

export interface MonitorConfig {
  readonly aws: AwsConfig;
  readonly iam: IamConfig;
  readonly storage: StorageConfig;
  readonly alerting: AlertingConfig;
  readonly dashboard: DashboardConfig;
  readonly report: ReportConfig;
  readonly logging?: LoggingConfig;
}

export interface AwsConfig {
  readonly region: string;
  readonly accountId?: string;
}

export interface IamConfig {
  readonly roleName: string;
}

export interface StorageConfig {
  readonly s3BucketPrefix: string;
  readonly logGroup: string;
  readonly retentionDays: number;
  readonly lifecycleDays: number;
}

export interface AlertingThresholds {
  /** Tokens per hour. */
  readonly highTokenUsage: number;
  /** Errors per five minutes. */
  readonly errorRate: number;
  /** Invocations per hour. */
  readonly invocationSpike: number;
  /** Seconds. */
  readonly highLatency: number;
}

export interface AlertingConfig {
  readonly snsTopicName: string;
  readonly thresholds: AlertingThresholds;
}

export interface DashboardConfig {
  readonly name: string;
}

export interface ReportConfig {
  readonly namespace: string;
  readonly periodSeconds: number;
  readonly logQueryTimeoutMs: number;
  readonly logQueryPollIntervalMs: number;
  readonly pricing?: Record<string, PricingEntry>;
}

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface LoggingConfig {
  readonly level: LogLevel;
  readonly file?: string;
  readonly json?: boolean;
}
