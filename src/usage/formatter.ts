import { UnsupportedFormatError } from "./errors.js";
import type { UsageReport } from "./types.js";

const RULE = "=".repeat(60);
const SECTION_RULE = "-".repeat(20);

const integerFormat = new Intl.NumberFormat("en-US", { maximumFractionDigits: 0 });

function formatCount(value: number): string {
  return integerFormat.format(value);
}

function formatUsd(value: number, digits: number): string {
  return `$${value.toFixed(digits)}`;
}

/** "us.anthropic.claude-3-haiku-20240307-v1:0" -> "claude-3-haiku-20240307-v1:0" */
export function modelDisplayName(modelId: string): string {
  const stripped = modelId.replace(/^(?:[a-z][a-z0-9-]*\.)+/, "");
  return stripped === "" ? modelId : stripped;
}

function formatText(report: UsageReport): string {
  const { period, summary, performance, projections } = report;
  const lines: string[] = [
    RULE,
    "AWS BEDROCK USAGE REPORT",
    RULE,
    "",
    `Report Period: ${period.durationHours} hours`,
    `From: ${period.startTime}`,
    `To:   ${period.endTime}`,
    "",
    "SUMMARY",
    SECTION_RULE,
    `Total Invocations:    ${formatCount(summary.totalInvocations)}`,
    `Total Input Tokens:   ${formatCount(summary.totalInputTokens)}`,
    `Total Output Tokens:  ${formatCount(summary.totalOutputTokens)}`,
    `Estimated Cost:       ${formatUsd(summary.estimatedCost, 4)}`,
    "",
    "PERFORMANCE",
    SECTION_RULE,
    `Average Latency:      ${performance.avgLatency.toFixed(3)}s`,
    `P99 Latency:          ${performance.p99Latency.toFixed(3)}s`,
    `Error Count:          ${performance.errorCount}`,
    `Error Rate:           ${performance.errorRate.toFixed(2)}%`,
    "",
  ];

  const models = Object.entries(report.byModel);
  if (models.length > 0) {
    lines.push("BY MODEL", SECTION_RULE);
    for (const [modelId, model] of models) {
      lines.push(
        "",
        `${modelDisplayName(modelId)}:`,
        `  Invocations:     ${formatCount(model.invocations)}`,
        `  Input Tokens:    ${formatCount(model.inputTokens)}`,
        `  Output Tokens:   ${formatCount(model.outputTokens)}`,
        `  Cost:            ${formatUsd(model.cost, 4)}`,
        `  Avg Latency:     ${model.avgLatency.toFixed(3)}s`,
        `  Errors:          ${model.errorCount}`,
      );
    }
  }

  lines.push(
    "",
    "MONTHLY PROJECTIONS",
    SECTION_RULE,
    `Projected Invocations: ${formatCount(projections.monthlyInvocations)}`,
    `Projected Cost:        ${formatUsd(projections.monthlyCost, 2)}`,
    "",
  );

  return lines.join("\n");
}

export function formatReport(report: UsageReport, format: string): string {
  switch (format.toLowerCase()) {
    case "json":
    case "structured":
      return JSON.stringify(report, null, 2);
    case "text":
      return formatText(report);
    default:
      throw new UnsupportedFormatError(format);
  }
}
