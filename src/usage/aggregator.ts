import type { Logger } from "../logging/logger.js";
import type { LogQueryResult, MetricSource, TimeRange } from "../metrics/types.js";
import { pollUntil } from "../utils/poll.js";
import { PartialDataWarning } from "./errors.js";
import type { ModelUsage } from "./types.js";

export const INVOCATIONS_METRIC = "Invocations";
export const INPUT_TOKENS_METRIC = "InputTokenCount";
export const OUTPUT_TOKENS_METRIC = "OutputTokenCount";
export const LATENCY_METRIC = "InvocationLatency";
export const MODEL_ID_DIMENSION = "ModelId";
export const ERROR_COUNT_FIELD = "error_count";

export interface UsageAggregatorOptions {
  readonly namespace: string;
  readonly logGroup: string;
  readonly periodSeconds: number;
  readonly logQueryTimeoutMs: number;
  readonly logQueryPollIntervalMs: number;
}

function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\/]/g, "\\$&");
}

/** Logs Insights query counting error lines that mention the model. */
export function buildErrorCountQuery(modelId: string): string {
  return [
    "fields @timestamp, @message",
    "| filter @message like /ERROR/ or @message like /error/",
    `| filter @message like /${escapeRegex(modelId)}/`,
    `| stats count() as ${ERROR_COUNT_FIELD}`,
  ].join("\n");
}

function errorCountFrom(result: LogQueryResult): number {
  for (const row of result.rows) {
    const raw = row[ERROR_COUNT_FIELD];
    if (raw === undefined) continue;
    const value = Number.parseFloat(raw);
    return Number.isFinite(value) ? Math.trunc(value) : 0;
  }
  return 0;
}

/**
 * Collects per-model usage for a reporting window. Every query is
 * independently fault tolerant: a failure is logged as partial data and the
 * affected value becomes zero. `aggregate` never rejects.
 */
export class UsageAggregator {
  constructor(
    private readonly source: MetricSource,
    private readonly options: UsageAggregatorOptions,
    private readonly logger: Logger,
  ) {}

  async aggregate(startTime: Date, endTime: Date): Promise<Map<string, ModelUsage>> {
    const range: TimeRange = { start: startTime, end: endTime };
    const usage = new Map<string, ModelUsage>();

    const models = await this.discoverModels(range);
    if (models.length === 0) {
      this.logger.info("No models found with metrics in time period");
      return usage;
    }

    for (const modelId of models) {
      const [invocations, inputTokens, outputTokens, latencyMs] = await Promise.all([
        this.metricSum(INVOCATIONS_METRIC, modelId, range),
        this.metricSum(INPUT_TOKENS_METRIC, modelId, range),
        this.metricSum(OUTPUT_TOKENS_METRIC, modelId, range),
        this.metricSum(LATENCY_METRIC, modelId, range),
      ]);

      const invocationCount = Math.trunc(invocations);
      if (invocationCount <= 0) {
        this.logger.debug({ modelId }, "Skipping model without invocations");
        continue;
      }

      usage.set(modelId, {
        invocationCount,
        inputTokenCount: Math.trunc(inputTokens),
        outputTokenCount: Math.trunc(outputTokens),
        totalLatencySeconds: latencyMs / 1000,
        errorCount: await this.errorCount(modelId, range),
      });
    }

    return usage;
  }

  private async discoverModels(range: TimeRange): Promise<string[]> {
    try {
      const ids = await this.source.listMetricDimensionValues(
        this.options.namespace,
        INVOCATIONS_METRIC,
        MODEL_ID_DIMENSION,
        range,
      );
      return [...ids].sort();
    } catch (err) {
      this.warn(INVOCATIONS_METRIC, null, "Model discovery failed", err);
      return [];
    }
  }

  private async metricSum(metric: string, modelId: string, range: TimeRange): Promise<number> {
    try {
      const sum = await this.source.getMetricSum(
        this.options.namespace,
        metric,
        [{ name: MODEL_ID_DIMENSION, value: modelId }],
        range,
        this.options.periodSeconds,
      );
      return Number.isFinite(sum) && sum > 0 ? sum : 0;
    } catch (err) {
      this.warn(metric, modelId, "Metric query failed", err);
      return 0;
    }
  }

  private async errorCount(modelId: string, range: TimeRange): Promise<number> {
    let queryId: string;
    try {
      queryId = await this.source.startLogQuery(
        this.options.logGroup,
        range,
        buildErrorCountQuery(modelId),
      );
    } catch (err) {
      this.warn("ErrorCount", modelId, "Log query error", err);
      return 0;
    }

    const outcome = await pollUntil(
      async () => {
        try {
          const result = await this.source.pollLogQuery(queryId);
          return result.status === "pending" ? undefined : result;
        } catch (err) {
          // Results are not always readable while the query is still running.
          this.logger.debug({ err, modelId, queryId }, "Log query poll failed");
          return undefined;
        }
      },
      {
        timeoutMs: this.options.logQueryTimeoutMs,
        intervalMs: this.options.logQueryPollIntervalMs,
      },
    );

    if (!outcome.done) {
      this.warn("ErrorCount", modelId, "Log query timeout");
      return 0;
    }
    if (outcome.value.status === "failed") {
      this.warn("ErrorCount", modelId, "Log query failed");
      return 0;
    }
    return errorCountFrom(outcome.value);
  }

  private warn(metric: string, modelId: string | null, message: string, cause?: unknown): void {
    const warning = new PartialDataWarning(metric, modelId, message, { cause });
    this.logger.warn({ err: warning, metric, modelId }, message);
  }
}
