import {
  CloudWatchClient,
  GetMetricStatisticsCommand,
  ListMetricsCommand,
} from "@aws-sdk/client-cloudwatch";
import {
  CloudWatchLogsClient,
  GetQueryResultsCommand,
  StartQueryCommand,
} from "@aws-sdk/client-cloudwatch-logs";
import type { ResultField } from "@aws-sdk/client-cloudwatch-logs";
import { ConnectivityError } from "../usage/errors.js";
import type {
  LogQueryResult,
  LogQueryRow,
  LogQueryStatus,
  MetricDimension,
  MetricSource,
  TimeRange,
} from "./types.js";

/** GetMetricStatistics returns at most this many datapoints per call. */
export const MAX_DATAPOINTS_PER_REQUEST = 1440;

const CREDENTIAL_ERRORS = new Set([
  "CredentialsProviderError",
  "UnrecognizedClientException",
  "InvalidClientTokenId",
  "ExpiredToken",
  "ExpiredTokenException",
]);

const PERMISSION_ERRORS = new Set([
  "AccessDenied",
  "AccessDeniedException",
  "UnauthorizedOperation",
]);

export interface CloudWatchMetricSourceOptions {
  readonly cloudwatch: CloudWatchClient;
  readonly logs: CloudWatchLogsClient;
  readonly namespace: string;
}

export function toConnectivityError(err: unknown): ConnectivityError {
  const name = err instanceof Error ? err.name : "";
  if (CREDENTIAL_ERRORS.has(name)) {
    return new ConnectivityError(
      "AWS credentials not configured. Please run 'aws configure'.",
      { cause: err },
    );
  }
  if (PERMISSION_ERRORS.has(name)) {
    return new ConnectivityError("Insufficient AWS permissions for CloudWatch access.", {
      cause: err,
    });
  }
  const message = err instanceof Error ? err.message : String(err);
  return new ConnectivityError(`AWS service error: ${message}`, { cause: err });
}

export function toLogQueryStatus(status: string | undefined): LogQueryStatus {
  switch (status) {
    case "Complete":
      return "complete";
    case "Failed":
    case "Cancelled":
    case "Timeout":
      return "failed";
    default:
      return "pending";
  }
}

function toRow(fields: readonly ResultField[]): LogQueryRow {
  const row: Record<string, string> = {};
  for (const { field, value } of fields) {
    if (field !== undefined && value !== undefined) {
      row[field] = value;
    }
  }
  return row;
}

/** Splits a range so that no piece needs more than MAX_DATAPOINTS_PER_REQUEST periods. */
export function splitRange(range: TimeRange, periodSeconds: number): TimeRange[] {
  const maxSpanMs = MAX_DATAPOINTS_PER_REQUEST * periodSeconds * 1000;
  const chunks: TimeRange[] = [];
  let cursor = range.start.getTime();
  const end = range.end.getTime();

  while (cursor < end) {
    const next = Math.min(cursor + maxSpanMs, end);
    chunks.push({ start: new Date(cursor), end: new Date(next) });
    cursor = next;
  }
  return chunks;
}

export class CloudWatchMetricSource implements MetricSource {
  private readonly cloudwatch: CloudWatchClient;
  private readonly logs: CloudWatchLogsClient;
  private readonly namespace: string;

  constructor(opts: CloudWatchMetricSourceOptions) {
    this.cloudwatch = opts.cloudwatch;
    this.logs = opts.logs;
    this.namespace = opts.namespace;
  }

  async checkConnectivity(): Promise<void> {
    try {
      await this.cloudwatch.send(new ListMetricsCommand({ Namespace: this.namespace }));
    } catch (err) {
      throw toConnectivityError(err);
    }
  }

  /**
   * ListMetrics cannot filter by time: it returns every metric with data in
   * the last two weeks. Models idle during the window come back with zero
   * invocations and are dropped by the aggregator.
   */
  async listMetricDimensionValues(
    namespace: string,
    metricName: string,
    dimensionKey: string,
    _range: TimeRange,
  ): Promise<Set<string>> {
    const values = new Set<string>();
    let nextToken: string | undefined;

    do {
      const response = await this.cloudwatch.send(
        new ListMetricsCommand({
          Namespace: namespace,
          MetricName: metricName,
          Dimensions: [{ Name: dimensionKey }],
          NextToken: nextToken,
        }),
      );
      for (const metric of response.Metrics ?? []) {
        for (const dimension of metric.Dimensions ?? []) {
          if (dimension.Name === dimensionKey && dimension.Value) {
            values.add(dimension.Value);
          }
        }
      }
      nextToken = response.NextToken;
    } while (nextToken);

    return values;
  }

  async getMetricSum(
    namespace: string,
    metricName: string,
    dimensions: readonly MetricDimension[],
    range: TimeRange,
    periodSeconds: number,
  ): Promise<number> {
    let total = 0;
    for (const chunk of splitRange(range, periodSeconds)) {
      const response = await this.cloudwatch.send(
        new GetMetricStatisticsCommand({
          Namespace: namespace,
          MetricName: metricName,
          Dimensions: dimensions.map((d) => ({ Name: d.name, Value: d.value })),
          StartTime: chunk.start,
          EndTime: chunk.end,
          Period: periodSeconds,
          Statistics: ["Sum"],
        }),
      );
      for (const point of response.Datapoints ?? []) {
        total += point.Sum ?? 0;
      }
    }
    return total;
  }

  async startLogQuery(logGroup: string, range: TimeRange, queryString: string): Promise<string> {
    const response = await this.logs.send(
      new StartQueryCommand({
        logGroupName: logGroup,
        startTime: Math.floor(range.start.getTime() / 1000),
        endTime: Math.floor(range.end.getTime() / 1000),
        queryString,
      }),
    );
    if (!response.queryId) {
      throw new Error(`StartQuery on ${logGroup} returned no query id`);
    }
    return response.queryId;
  }

  async pollLogQuery(queryId: string): Promise<LogQueryResult> {
    const response = await this.logs.send(new GetQueryResultsCommand({ queryId }));
    return {
      status: toLogQueryStatus(response.status),
      rows: (response.results ?? []).map(toRow),
    };
  }
}

export function createCloudWatchMetricSource(region: string, namespace: string): CloudWatchMetricSource {
  return new CloudWatchMetricSource({
    cloudwatch: new CloudWatchClient({ region }),
    logs: new CloudWatchLogsClient({ region }),
    namespace,
  });
}
