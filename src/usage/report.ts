import type { Logger } from "../logging/logger.js";
import type { UsageAggregator } from "./aggregator.js";
import { buildReport } from "./builder.js";
import type { PricingTable } from "./pricing.js";
import type { UsageReport } from "./types.js";

const HOUR_MS = 3_600_000;

export interface GenerateReportOptions {
  readonly hours: number;
  readonly aggregator: UsageAggregator;
  readonly pricing: PricingTable;
  readonly logger: Logger;
  /** End of the reporting window. Defaults to the current time. */
  readonly now?: Date;
}

export function reportWindow(hours: number, now: Date): { start: Date; end: Date } {
  return { start: new Date(now.getTime() - hours * HOUR_MS), end: new Date(now.getTime()) };
}

export async function generateUsageReport(opts: GenerateReportOptions): Promise<UsageReport> {
  const { start, end } = reportWindow(opts.hours, opts.now ?? new Date());

  opts.logger.info(
    { hours: opts.hours, startTime: start.toISOString(), endTime: end.toISOString() },
    "Generating usage report",
  );

  const usage = await opts.aggregator.aggregate(start, end);
  const report = buildReport(
    usage,
    {
      startTime: start.toISOString(),
      endTime: end.toISOString(),
      durationHours: opts.hours,
    },
    opts.pricing,
  );

  opts.logger.info(
    {
      hours: opts.hours,
      models: Object.keys(report.byModel).length,
      estimatedCost: report.summary.estimatedCost,
    },
    "Usage report complete",
  );
  return report;
}
