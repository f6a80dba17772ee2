import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { ConfigShowCommand, ConfigValidateCommand } from "../../src/cli/commands/config-cmd.js";
import { DoctorCommand } from "../../src/cli/commands/doctor.js";
import { ReportCommand } from "../../src/cli/commands/report.js";
import { createCli } from "../../src/cli/program.js";
import { ConnectivityError } from "../../src/usage/errors.js";
import { FakeMetricSource } from "../helpers/fake-metric-source.js";
import { SONNET, captureStream } from "../helpers/fixtures.js";

const OVERRIDE_VARS = [
  "AWS_ACCOUNT_ID",
  "AWS_DEFAULT_REGION",
  "BEDROCK_IAM_ROLE_NAME",
  "BEDROCK_S3_BUCKET_PREFIX",
  "BEDROCK_SNS_TOPIC_NAME",
  "LOG_LEVEL",
];

let tempDir: string;

function writeConfig(config: unknown): string {
  const configPath = join(tempDir, "bedrock-monitor.config.json");
  writeFileSync(configPath, JSON.stringify(config));
  return configPath;
}

const quietConfig = {
  aws: { region: "us-east-1", accountId: "123456789012" },
  report: { logQueryTimeoutMs: 200, logQueryPollIntervalMs: 5 },
  logging: { level: "silent", json: true },
};

beforeEach(() => {
  tempDir = mkdtempSync(join(tmpdir(), "bedrock-monitor-cli-"));
  for (const name of OVERRIDE_VARS) {
    vi.stubEnv(name, "");
  }
});

afterEach(() => {
  rmSync(tempDir, { recursive: true, force: true });
  vi.unstubAllEnvs();
  process.exitCode = undefined;
});

function reportCommand(source: FakeMetricSource, options: Partial<Pick<ReportCommand, "hours" | "region" | "output" | "validateOnly">> = {}) {
  const cmd = new ReportCommand();
  cmd.hours = options.hours ?? "24";
  cmd.region = options.region;
  cmd.output = options.output ?? "json";
  cmd.validateOnly = options.validateOnly ?? false;
  cmd.configPath = writeConfig(quietConfig);
  const factory = vi.fn(() => source);
  cmd.metricSourceFactory = factory;

  const stdout = captureStream();
  const stderr = captureStream();
  cmd.context = { ...cmd.context, stdout: stdout.stream, stderr: stderr.stream };
  return { cmd, factory, stdout: stdout.output, stderr: stderr.output };
}

function sonnetSource(): FakeMetricSource {
  return new FakeMetricSource().addModel(
    SONNET,
    { Invocations: 100, InputTokenCount: 50_000, OutputTokenCount: 20_000, InvocationLatency: 150_000 },
    2,
  );
}

describe("CLI: ReportCommand", () => {
  it("writes a JSON report to stdout", async () => {
    const { cmd, factory, stdout, stderr } = reportCommand(sonnetSource());

    await cmd.execute();

    expect(process.exitCode).toBeUndefined();
    expect(stderr()).toBe("");
    expect(factory).toHaveBeenCalledWith("us-east-1", "AWS/Bedrock");
    const report = JSON.parse(stdout());
    expect(report.period.durationHours).toBe(24);
    expect(report.summary).toEqual({
      totalInvocations: 100,
      totalInputTokens: 50_000,
      totalOutputTokens: 20_000,
      estimatedCost: 0.45,
    });
    expect(report.byModel[SONNET].errorCount).toBe(2);
    expect(report.projections).toEqual({ monthlyInvocations: 3000, monthlyCost: 13.5 });
    expect(report.performance.errorRate).toBe(2);
  });

  it("writes a text report", async () => {
    const { cmd, stdout } = reportCommand(sonnetSource(), { hours: "168", output: "text" });

    await cmd.execute();

    const lines = stdout().split("\n");
    expect(lines[0]).toBe("=".repeat(60));
    expect(lines[1]).toBe("AWS BEDROCK USAGE REPORT");
    expect(lines).toContain("Report Period: 168 hours");
    expect(lines).toContain("Total Invocations:    100");
    expect(lines).toContain("Projected Invocations: 428");
  });

  it("uses the region argument over the config", async () => {
    const { cmd, factory } = reportCommand(sonnetSource(), { region: "eu-west-1" });

    await cmd.execute();

    expect(factory).toHaveBeenCalledWith("eu-west-1", "AWS/Bedrock");
  });

  it("runs with a --region when the environment region is outside the CLI pattern", async () => {
    vi.stubEnv("AWS_DEFAULT_REGION", "us-gov-west-1");
    const { cmd, factory, stdout } = reportCommand(sonnetSource(), { region: "us-east-1" });

    await cmd.execute();

    expect(factory).toHaveBeenCalledWith("us-east-1", "AWS/Bedrock");
    expect(JSON.parse(stdout()).summary.totalInvocations).toBe(100);
    expect(process.exitCode).toBeUndefined();
  });

  it("uses a GovCloud region from the environment", async () => {
    vi.stubEnv("AWS_DEFAULT_REGION", "us-gov-west-1");
    const { cmd, factory } = reportCommand(sonnetSource());

    await cmd.execute();

    expect(factory).toHaveBeenCalledWith("us-gov-west-1", "AWS/Bedrock");
  });

  it("reports an empty window as zeros", async () => {
    const { cmd, stdout } = reportCommand(new FakeMetricSource());

    await cmd.execute();

    const report = JSON.parse(stdout());
    expect(report.byModel).toEqual({});
    expect(report.summary.totalInvocations).toBe(0);
    expect(process.exitCode).toBeUndefined();
  });

  it("stops after validation with --validate-only", async () => {
    const { cmd, factory, stdout } = reportCommand(sonnetSource(), { hours: "48", validateOnly: true });

    await cmd.execute();

    expect(stdout()).toBe("Arguments validation passed\n");
    expect(factory).not.toHaveBeenCalled();
    expect(process.exitCode).toBeUndefined();
  });

  it("rejects zero hours before touching AWS", async () => {
    const { cmd, factory, stdout, stderr } = reportCommand(sonnetSource(), { hours: "0" });

    await cmd.execute();

    expect(stderr()).toBe("Validation errors:\n  - Hours must be a positive integer\n");
    expect(stdout()).toBe("");
    expect(factory).not.toHaveBeenCalled();
    expect(process.exitCode).toBe(1);
  });

  it("lists every invalid argument", async () => {
    const { cmd, stderr } = reportCommand(sonnetSource(), {
      hours: "9000",
      region: "invalid-region",
      output: "xml",
      validateOnly: true,
    });

    await cmd.execute();

    expect(stderr()).toBe(
      "Validation errors:\n" +
        "  - Hours cannot exceed 8760 (1 year)\n" +
        "  - Invalid AWS region format: invalid-region\n" +
        "  - Unsupported output format: xml (use json or text)\n",
    );
    expect(process.exitCode).toBe(1);
  });

  it("fails when AWS cannot be reached", async () => {
    const source = sonnetSource();
    source.connectivityError = new ConnectivityError(
      "AWS credentials not configured. Please run 'aws configure'.",
    );
    const { cmd, stdout, stderr } = reportCommand(source);

    await cmd.execute();

    expect(stderr()).toBe(
      "Error generating report: AWS credentials not configured. Please run 'aws configure'.\n",
    );
    expect(stdout()).toBe("");
    expect(process.exitCode).toBe(1);
  });

  it("still reports when individual queries fail", async () => {
    const source = sonnetSource();
    source.failingMetrics.add("InputTokenCount");
    const { cmd, stdout } = reportCommand(source);

    await cmd.execute();

    const report = JSON.parse(stdout());
    expect(report.summary.totalInputTokens).toBe(0);
    expect(report.summary.totalInvocations).toBe(100);
    expect(process.exitCode).toBeUndefined();
  });

  it("fails on an invalid config file", async () => {
    const { cmd, factory, stderr } = reportCommand(sonnetSource());
    cmd.configPath = writeConfig({ aws: { accountId: "42" } });

    await cmd.execute();

    expect(stderr()).toContain("Failed to load config: ");
    expect(factory).not.toHaveBeenCalled();
    expect(process.exitCode).toBe(1);
  });
});

describe("CLI: ConfigValidateCommand", () => {
  function validate(configFile: string) {
    const cmd = new ConfigValidateCommand();
    cmd.configFile = configFile;
    const { stream, output } = captureStream();
    cmd.context = { ...cmd.context, stdout: stream };
    return { cmd, output };
  }

  it("validates a correct config file", async () => {
    const configPath = writeConfig(quietConfig);
    const { cmd, output } = validate(configPath);

    await cmd.execute();

    expect(output()).toBe(
      `Config is valid: ${configPath}\n` +
        "  region:    us-east-1\n" +
        "  log group: /aws/bedrock/modelinvocations\n" +
        "  bucket:    bedrock-logs-123456789012\n",
    );
    expect(process.exitCode).toBeUndefined();
  });

  it("rejects an invalid config file", async () => {
    const configPath = writeConfig({ storage: { retentionDays: "thirty" } });
    const { cmd, output } = validate(configPath);

    await cmd.execute();

    expect(output()).toBe(
      `Config is INVALID: ${configPath}\n` +
        "  - storage.retentionDays: Expected number, received string\n",
    );
    expect(process.exitCode).toBe(1);
  });

  it("lists every schema issue with its path", async () => {
    const configPath = writeConfig({ aws: { accountId: "42" }, logging: { level: "loud" } });
    const { cmd, output } = validate(configPath);

    await cmd.execute();

    const lines = output().split("\n");
    expect(lines[0]).toBe(`Config is INVALID: ${configPath}`);
    expect(lines[1]).toBe("  - aws.accountId: AWS account ID must be 12 digits");
    expect(lines[2]).toMatch(/^ {2}- logging\.level: /);
    expect(lines).toHaveLength(4);
  });

  it("applies environment overrides before validating", async () => {
    vi.stubEnv("AWS_ACCOUNT_ID", "not-an-account");
    const configPath = writeConfig(quietConfig);
    const { cmd, output } = validate(configPath);

    await cmd.execute();

    expect(output()).toContain("  - aws.accountId: AWS account ID must be 12 digits\n");
    expect(process.exitCode).toBe(1);
  });

  it("reports unreadable JSON", async () => {
    const configPath = join(tempDir, "broken.json");
    writeFileSync(configPath, "{ not json");
    const { cmd, output } = validate(configPath);

    await cmd.execute();

    expect(output().startsWith(`Config is INVALID: ${configPath}\n  - `)).toBe(true);
    expect(process.exitCode).toBe(1);
  });

  it("reports missing config file", async () => {
    const configPath = join(tempDir, "nonexistent.json");
    const { cmd, output } = validate(configPath);

    await cmd.execute();

    expect(output()).toBe(`Config file not found: ${configPath}\n`);
    expect(process.exitCode).toBe(1);
  });
});

describe("CLI: ConfigShowCommand", () => {
  it("shows the resolved config with the bucket name", async () => {
    const cmd = new ConfigShowCommand();
    cmd.configPath = writeConfig({ aws: { accountId: "123456789012" } });
    const { stream, output } = captureStream();
    cmd.context = { ...cmd.context, stdout: stream };

    await cmd.execute();

    const shown = JSON.parse(output());
    expect(shown.aws).toEqual({ region: "us-east-1", accountId: "123456789012" });
    expect(shown.storage.s3BucketName).toBe("bedrock-logs-123456789012");
    expect(shown.report.namespace).toBe("AWS/Bedrock");
  });

  it("reports a config that fails to load", async () => {
    const cmd = new ConfigShowCommand();
    cmd.configPath = writeConfig({ aws: { accountId: "42" } });
    const { stream, output } = captureStream();
    cmd.context = { ...cmd.context, stdout: stream };

    await cmd.execute();

    expect(output()).toContain("Failed to load config: ");
    expect(process.exitCode).toBe(1);
  });
});

describe("CLI: DoctorCommand", () => {
  function doctor(source: FakeMetricSource, configPath: string) {
    const cmd = new DoctorCommand();
    cmd.configPath = configPath;
    cmd.metricSourceFactory = () => source;
    const { stream, output } = captureStream();
    cmd.context = { ...cmd.context, stdout: stream };
    return { cmd, output };
  }

  it("passes with a valid config and reachable CloudWatch", async () => {
    const configPath = writeConfig(quietConfig);
    const { cmd, output } = doctor(new FakeMetricSource(), configPath);

    await cmd.execute();

    expect(output()).toBe(
      "Bedrock Monitor Doctor\n" +
        "======================\n\n" +
        `[PASS] Config valid (${configPath})\n` +
        "[INFO] Account ID: 123456789012\n" +
        "[PASS] CloudWatch reachable (us-east-1, AWS/Bedrock)\n" +
        "[INFO] Log group: /aws/bedrock/modelinvocations\n" +
        "\n" +
        "All checks passed.\n",
    );
    expect(process.exitCode).toBeUndefined();
  });

  it("fails when CloudWatch is unreachable", async () => {
    const source = new FakeMetricSource();
    source.connectivityError = new ConnectivityError("Insufficient AWS permissions for CloudWatch access.");
    const { cmd, output } = doctor(source, writeConfig({}));

    await cmd.execute();

    expect(output()).toContain(
      "[FAIL] CloudWatch not reachable (us-east-1): Insufficient AWS permissions for CloudWatch access.\n",
    );
    expect(output()).toContain("Some checks failed.\n");
    expect(process.exitCode).toBe(1);
  });

  it("fails on an invalid config and skips the AWS check", async () => {
    const configPath = writeConfig({ aws: { accountId: "42" } });
    const { cmd, output } = doctor(new FakeMetricSource(), configPath);

    await cmd.execute();

    expect(output()).toContain(`[FAIL] Config invalid (${configPath}): `);
    expect(output()).not.toContain("CloudWatch");
    expect(process.exitCode).toBe(1);
  });
});

describe("createCli", () => {
  it("registers the report command as the default", () => {
    const cli = createCli();
    const command = cli.process(["--hours", "12", "--output", "text"]);
    expect(command).toBeInstanceOf(ReportCommand);
  });

  it("routes subcommands", () => {
    const cli = createCli();
    expect(cli.process(["config", "show"])).toBeInstanceOf(ConfigShowCommand);
    expect(cli.process(["config", "validate", "x.json"])).toBeInstanceOf(ConfigValidateCommand);
    expect(cli.process(["doctor"])).toBeInstanceOf(DoctorCommand);
  });
});
