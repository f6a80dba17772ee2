import { Command, Option } from "clipanion";
import { loadConfig } from "../../config/loader.js";
import { getConfigPath } from "../../config/paths.js";
import { createCloudWatchMetricSource } from "../../metrics/cloudwatch.js";
import type { MetricSourceFactory } from "../types.js";

export class DoctorCommand extends Command {
  static override paths = [["doctor"]];

  static override usage = Command.Usage({
    description: "Run diagnostic checks on the configuration and AWS access",
    examples: [["Run diagnostics", "bedrock-monitor doctor"]],
  });

  configPath = Option.String("--config", {
    description: "Path to the configuration file",
  });

  metricSourceFactory: MetricSourceFactory = createCloudWatchMetricSource;

  async execute(): Promise<void> {
    this.context.stdout.write("Bedrock Monitor Doctor\n");
    this.context.stdout.write("======================\n\n");

    let allPassed = true;

    // Check 1: Config valid
    const configPath = this.configPath ?? getConfigPath();
    let config;
    try {
      config = loadConfig(configPath);
      this.context.stdout.write(`[PASS] Config valid (${configPath})\n`);
    } catch (err) {
      this.context.stdout.write(
        `[FAIL] Config invalid (${configPath}): ${err instanceof Error ? err.message : String(err)}\n`,
      );
      allPassed = false;
      config = null;
    }

    if (config) {
      if (config.aws.accountId) {
        this.context.stdout.write(`[INFO] Account ID: ${config.aws.accountId}\n`);
      }

      // Check 2: CloudWatch reachable with the configured credentials
      try {
        const source = this.metricSourceFactory(config.aws.region, config.report.namespace);
        await source.checkConnectivity();
        this.context.stdout.write(
          `[PASS] CloudWatch reachable (${config.aws.region}, ${config.report.namespace})\n`,
        );
      } catch (err) {
        this.context.stdout.write(
          `[FAIL] CloudWatch not reachable (${config.aws.region}): ${err instanceof Error ? err.message : String(err)}\n`,
        );
        allPassed = false;
      }

      this.context.stdout.write(`[INFO] Log group: ${config.storage.logGroup}\n`);
    }

    this.context.stdout.write("\n");
    if (allPassed) {
      this.context.stdout.write("All checks passed.\n");
    } else {
      this.context.stdout.write("Some checks failed.\n");
      process.exitCode = 1;
    }
  }
}
