import { Command, Option } from "clipanion";
import { loadConfig } from "../../config/loader.js";
import type { MonitorConfig } from "../../config/types.js";
import { createLogger } from "../../logging/logger.js";
import { createCloudWatchMetricSource } from "../../metrics/cloudwatch.js";
import { UsageAggregator } from "../../usage/aggregator.js";
import { ValidationError } from "../../usage/errors.js";
import { formatReport } from "../../usage/formatter.js";
import { DEFAULT_PRICING_TABLE } from "../../usage/pricing.js";
import { generateUsageReport } from "../../usage/report.js";
import type { MetricSourceFactory } from "../types.js";
import { parseReportArgs } from "../validation.js";
import type { ReportArgs } from "../validation.js";

export class ReportCommand extends Command {
  static override paths = [["report"], Command.Default];

  static override usage = Command.Usage({
    description: "Generate a Bedrock usage report with cost analysis",
    details: `
      Aggregates CloudWatch metrics for every model invoked in the window,
      prices the token counts and projects the totals to a 30-day month.
    `,
    examples: [
      ["Report on the last day", "bedrock-monitor report --hours 24"],
      ["Weekly report as text", "bedrock-monitor report --hours 168 --output text"],
      ["Report for another region", "bedrock-monitor report --hours 72 --region us-west-2"],
      ["Check arguments only", "bedrock-monitor report --hours 48 --validate-only"],
    ],
  });

  hours = Option.String("--hours", "24", {
    description: "Time period in hours for the report (1-8760)",
  });

  region = Option.String("--region", {
    description: "AWS region (default: from config or us-east-1)",
  });

  output = Option.String("--output", "json", {
    description: "Output format: json or text",
  });

  validateOnly = Option.Boolean("--validate-only", false, {
    description: "Only validate parameters without generating report",
  });

  configPath = Option.String("--config", {
    description: "Path to the configuration file",
  });

  metricSourceFactory: MetricSourceFactory = createCloudWatchMetricSource;

  async execute(): Promise<void> {
    let args: ReportArgs;
    try {
      args = parseReportArgs({ hours: this.hours, region: this.region, output: this.output });
    } catch (err) {
      if (!(err instanceof ValidationError)) throw err;
      this.context.stderr.write(
        "Validation errors:\n" + err.issues.map((issue) => `  - ${issue}\n`).join(""),
      );
      process.exitCode = 1;
      return;
    }

    if (this.validateOnly) {
      this.context.stdout.write("Arguments validation passed\n");
      return;
    }

    let config: MonitorConfig;
    try {
      config = loadConfig(this.configPath);
    } catch (err) {
      this.context.stderr.write(
        `Failed to load config: ${err instanceof Error ? err.message : String(err)}\n`,
      );
      process.exitCode = 1;
      return;
    }

    const logger = createLogger(config.logging);
    const region = args.region ?? config.aws.region;
    const pricing = config.report.pricing
      ? DEFAULT_PRICING_TABLE.withOverrides(config.report.pricing)
      : DEFAULT_PRICING_TABLE;

    try {
      const source = this.metricSourceFactory(region, config.report.namespace);
      await source.checkConnectivity();

      const aggregator = new UsageAggregator(
        source,
        {
          namespace: config.report.namespace,
          logGroup: config.storage.logGroup,
          periodSeconds: config.report.periodSeconds,
          logQueryTimeoutMs: config.report.logQueryTimeoutMs,
          logQueryPollIntervalMs: config.report.logQueryPollIntervalMs,
        },
        logger.child({ component: "aggregator", region }),
      );

      const report = await generateUsageReport({
        hours: args.hours,
        aggregator,
        pricing,
        logger,
      });
      this.context.stdout.write(formatReport(report, args.output) + "\n");
    } catch (err) {
      logger.error({ err }, "Report generation failed");
      this.context.stderr.write(
        `Error generating report: ${err instanceof Error ? err.message : String(err)}\n`,
      );
      process.exitCode = 1;
    }
  }
}
