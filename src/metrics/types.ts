export interface TimeRange {
  readonly start: Date;
  readonly end: Date;
}

export interface MetricDimension {
  readonly name: string;
  readonly value: string;
}

export type LogQueryStatus = "pending" | "complete" | "failed";

/** One result row of a log query, field name -> value. */
export type LogQueryRow = Readonly<Record<string, string>>;

export interface LogQueryResult {
  readonly status: LogQueryStatus;
  readonly rows: readonly LogQueryRow[];
}

/**
 * Read-only view of a time-series metrics store and its log-query facility.
 * Every call is an idempotent read.
 */
export interface MetricSource {
  /** Throws ConnectivityError when the backend cannot be used at all. */
  checkConnectivity(): Promise<void>;
  listMetricDimensionValues(
    namespace: string,
    metricName: string,
    dimensionKey: string,
    range: TimeRange,
  ): Promise<Set<string>>;
  getMetricSum(
    namespace: string,
    metricName: string,
    dimensions: readonly MetricDimension[],
    range: TimeRange,
    periodSeconds: number,
  ): Promise<number>;
  startLogQuery(logGroup: string, range: TimeRange, queryString: string): Promise<string>;
  pollLogQuery(queryId: string): Promise<LogQueryResult>;
}
