import { z } from "zod";
import { ValidationError } from "../usage/errors.js";
import type { OutputFormat } from "../usage/types.js";

export const MAX_REPORT_HOURS = 8760;
export const AWS_REGION_PATTERN = /^[a-z]{2}-[a-z]+-\d+$/;

export interface ReportArgsInput {
  readonly hours: string;
  readonly region?: string;
  readonly output: string;
}

export interface ReportArgs {
  readonly hours: number;
  readonly region?: string;
  readonly output: OutputFormat;
}

const reportArgsSchema = z.object({
  hours: z
    .number({ invalid_type_error: "Hours must be an integer" })
    .int("Hours must be an integer")
    .min(1, "Hours must be a positive integer")
    .max(MAX_REPORT_HOURS, `Hours cannot exceed ${MAX_REPORT_HOURS} (1 year)`),
  region: z
    .string()
    .refine(
      (value) => AWS_REGION_PATTERN.test(value),
      (value) => ({ message: `Invalid AWS region format: ${value}` }),
    )
    .optional(),
  output: z.enum(["json", "text"], {
    errorMap: (_issue, ctx) => ({
      message: `Unsupported output format: ${String(ctx.data)} (use json or text)`,
    }),
  }),
});

function parseHours(raw: string): number {
  const trimmed = raw.trim();
  return trimmed === "" ? Number.NaN : Number(trimmed);
}

/** Checks every argument and throws one ValidationError listing all violations. */
export function parseReportArgs(input: ReportArgsInput): ReportArgs {
  const result = reportArgsSchema.safeParse({
    hours: parseHours(input.hours),
    region: input.region === "" ? undefined : input.region,
    output: input.output,
  });
  if (!result.success) {
    throw new ValidationError(result.error.issues.map((issue) => issue.message));
  }
  return result.data;
}
