import { ProjectionWindowError } from "./errors.js";
import { DEFAULT_PRICING_TABLE } from "./pricing.js";
import type { PricingTable } from "./pricing.js";
import { averageLatency } from "./types.js";
import type { ModelSummary, ModelUsage, ReportPeriod, UsageReport } from "./types.js";

/** 30 days. */
export const HOURS_PER_MONTH = 24 * 30;

export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

export function projectionMultiplier(windowHours: number): number {
  if (!Number.isFinite(windowHours) || windowHours <= 0) {
    throw new ProjectionWindowError(windowHours);
  }
  return HOURS_PER_MONTH / windowHours;
}

/**
 * Turns per-model usage into a report: costs from the pricing table, totals,
 * invocation-weighted latency, and a linear projection to 720 hours.
 *
 * p99 latency is approximated as the largest per-model accumulated latency,
 * since the metrics arrive pre-aggregated per model.
 */
export function buildReport(
  usage: ReadonlyMap<string, ModelUsage>,
  period: ReportPeriod,
  pricing: PricingTable = DEFAULT_PRICING_TABLE,
): UsageReport {
  const multiplier = projectionMultiplier(period.durationHours);

  let totalInvocations = 0;
  let totalInputTokens = 0;
  let totalOutputTokens = 0;
  let totalCost = 0;
  let totalErrors = 0;
  let weightedLatency = 0;
  let maxLatency = 0;
  const byModel: Record<string, ModelSummary> = {};

  for (const [modelId, model] of usage) {
    const cost = pricing.cost(modelId, model.inputTokenCount, model.outputTokenCount);
    const avgLatency = averageLatency(model);

    totalInvocations += model.invocationCount;
    totalInputTokens += model.inputTokenCount;
    totalOutputTokens += model.outputTokenCount;
    totalCost += cost;
    totalErrors += model.errorCount;
    weightedLatency += avgLatency * model.invocationCount;
    if (model.invocationCount > 0) {
      maxLatency = Math.max(maxLatency, model.totalLatencySeconds);
    }

    byModel[modelId] = {
      invocations: model.invocationCount,
      inputTokens: model.inputTokenCount,
      outputTokens: model.outputTokenCount,
      cost: roundTo(cost, 4),
      avgLatency: roundTo(avgLatency, 3),
      errorCount: model.errorCount,
    };
  }

  const avgLatency = totalInvocations > 0 ? weightedLatency / totalInvocations : 0;
  const errorRate = totalInvocations > 0 ? (totalErrors / totalInvocations) * 100 : 0;

  return {
    period: {
      startTime: period.startTime,
      endTime: period.endTime,
      durationHours: period.durationHours,
    },
    summary: {
      totalInvocations,
      totalInputTokens,
      totalOutputTokens,
      estimatedCost: roundTo(totalCost, 4),
    },
    byModel,
    projections: {
      monthlyInvocations: Math.floor(totalInvocations * multiplier),
      monthlyCost: roundTo(totalCost * multiplier, 2),
    },
    performance: {
      avgLatency: roundTo(avgLatency, 3),
      p99Latency: roundTo(maxLatency, 3),
      errorCount: totalErrors,
      errorRate: roundTo(errorRate, 2),
    },
  };
}
