export interface ModelUsage {
  readonly invocationCount: number;
  readonly inputTokenCount: number;
  readonly outputTokenCount: number;
  /** Sum of per-invocation latencies, in seconds. */
  readonly totalLatencySeconds: number;
  readonly errorCount: number;
}

export interface PricingEntry {
  readonly inputPricePerThousandTokens: number;
  readonly outputPricePerThousandTokens: number;
}

export interface ReportPeriod {
  readonly startTime: string;
  readonly endTime: string;
  readonly durationHours: number;
}

export interface ReportSummary {
  readonly totalInvocations: number;
  readonly totalInputTokens: number;
  readonly totalOutputTokens: number;
  readonly estimatedCost: number;
}

export interface ModelSummary {
  readonly invocations: number;
  readonly inputTokens: number;
  readonly outputTokens: number;
  readonly cost: number;
  readonly avgLatency: number;
  readonly errorCount: number;
}

export interface ReportProjections {
  readonly monthlyInvocations: number;
  readonly monthlyCost: number;
}

export interface ReportPerformance {
  readonly avgLatency: number;
  readonly p99Latency: number;
  readonly errorCount: number;
  /** Percentage, 0-100. */
  readonly errorRate: number;
}

export interface UsageReport {
  readonly period: ReportPeriod;
  readonly summary: ReportSummary;
  readonly byModel: Readonly<Record<string, ModelSummary>>;
  readonly projections: ReportProjections;
  readonly performance: ReportPerformance;
}

export type OutputFormat = "json" | "text";

export function averageLatency(usage: ModelUsage): number {
  return usage.invocationCount > 0 ? usage.totalLatencySeconds / usage.invocationCount : 0;
}
