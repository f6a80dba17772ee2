import { Command, Option } from "clipanion";
import { existsSync } from "node:fs";
import { ZodError } from "zod";
import { loadConfig } from "../../config/loader.js";
import { getConfigPath } from "../../config/paths.js";
import { s3BucketName } from "../../config/schema.js";
import type { MonitorConfig } from "../../config/types.js";

export class ConfigShowCommand extends Command {
  static override paths = [["config", "show"]];

  static override usage = Command.Usage({
    description: "Show the resolved monitoring configuration",
    examples: [
      ["Show config", "bedrock-monitor config show"],
      ["Show a specific file", "bedrock-monitor config show --config ./prod.json"],
    ],
  });

  configPath = Option.String("--config", {
    description: "Path to the configuration file",
  });

  async execute(): Promise<void> {
    let config;
    try {
      config = loadConfig(this.configPath);
    } catch (err) {
      this.context.stdout.write(
        `Failed to load config: ${err instanceof Error ? err.message : String(err)}\n`,
      );
      process.exitCode = 1;
      return;
    }

    const resolved = {
      ...config,
      storage: { ...config.storage, s3BucketName: s3BucketName(config) },
    };
    this.context.stdout.write(JSON.stringify(resolved, null, 2) + "\n");
  }
}

function describeConfigError(err: unknown): string[] {
  if (err instanceof ZodError) {
    return err.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
  }
  return [err instanceof Error ? err.message : String(err)];
}

export class ConfigValidateCommand extends Command {
  static override paths = [["config", "validate"]];

  static override usage = Command.Usage({
    description: "Validate a configuration file together with its environment overrides",
    examples: [
      ["Validate default config", "bedrock-monitor config validate"],
      ["Validate specific file", "bedrock-monitor config validate ./prod.json"],
    ],
  });

  configFile = Option.String({ name: "path", required: false });

  async execute(): Promise<void> {
    const configPath = this.configFile ?? getConfigPath();
    // loadConfig treats a missing file as "use defaults"; validation does not.
    if (!existsSync(configPath)) {
      this.context.stdout.write(`Config file not found: ${configPath}\n`);
      process.exitCode = 1;
      return;
    }

    let config: MonitorConfig;
    try {
      config = loadConfig(configPath);
    } catch (err) {
      const problems = describeConfigError(err).map((line) => `  - ${line}\n`);
      this.context.stdout.write(`Config is INVALID: ${configPath}\n${problems.join("")}`);
      process.exitCode = 1;
      return;
    }

    this.context.stdout.write(
      `Config is valid: ${configPath}\n` +
        `  region:    ${config.aws.region}\n` +
        `  log group: ${config.storage.logGroup}\n` +
        `  bucket:    ${s3BucketName(config)}\n`,
    );
  }
}
