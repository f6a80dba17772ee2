import { describe, it, expect } from "vitest";
import { MAX_REPORT_HOURS, parseReportArgs } from "../../src/cli/validation.js";
import { ValidationError } from "../../src/usage/errors.js";

function issuesFor(input: Parameters<typeof parseReportArgs>[0]): readonly string[] {
  try {
    parseReportArgs(input);
  } catch (err) {
    if (err instanceof ValidationError) return err.issues;
    throw err;
  }
  return [];
}

describe("parseReportArgs", () => {
  it("accepts the defaults", () => {
    expect(parseReportArgs({ hours: "24", output: "json" })).toEqual({
      hours: 24,
      region: undefined,
      output: "json",
    });
  });

  it("accepts a region and text output", () => {
    expect(parseReportArgs({ hours: "168", region: "us-west-2", output: "text" })).toEqual({
      hours: 168,
      region: "us-west-2",
      output: "text",
    });
  });

  it("accepts the bounds of the hours range", () => {
    expect(parseReportArgs({ hours: "1", output: "json" }).hours).toBe(1);
    expect(parseReportArgs({ hours: String(MAX_REPORT_HOURS), output: "json" }).hours).toBe(8760);
  });

  it("rejects zero hours", () => {
    expect(issuesFor({ hours: "0", output: "json" })).toEqual(["Hours must be a positive integer"]);
  });

  it("rejects more than a year", () => {
    expect(issuesFor({ hours: "9000", output: "json" })).toEqual([
      "Hours cannot exceed 8760 (1 year)",
    ]);
  });

  it("rejects non-integer hours", () => {
    expect(issuesFor({ hours: "1.5", output: "json" })).toEqual(["Hours must be an integer"]);
    expect(issuesFor({ hours: "abc", output: "json" })).toEqual(["Hours must be an integer"]);
    expect(issuesFor({ hours: "", output: "json" })).toEqual(["Hours must be an integer"]);
  });

  it("rejects a malformed region", () => {
    expect(issuesFor({ hours: "24", region: "invalid-region", output: "json" })).toEqual([
      "Invalid AWS region format: invalid-region",
    ]);
    expect(issuesFor({ hours: "24", region: "US-EAST-1", output: "json" })).toEqual([
      "Invalid AWS region format: US-EAST-1",
    ]);
  });

  it("treats an empty region as not given", () => {
    expect(parseReportArgs({ hours: "24", region: "", output: "json" }).region).toBeUndefined();
  });

  it("rejects unknown output formats", () => {
    expect(issuesFor({ hours: "24", output: "xml" })).toEqual([
      "Unsupported output format: xml (use json or text)",
    ]);
  });

  it("reports every problem at once", () => {
    expect(issuesFor({ hours: "0", region: "nowhere", output: "yaml" })).toEqual([
      "Hours must be a positive integer",
      "Invalid AWS region format: nowhere",
      "Unsupported output format: yaml (use json or text)",
    ]);
  });

  it("throws a ValidationError naming the issues", () => {
    expect(() => parseReportArgs({ hours: "0", output: "json" })).toThrow(
      "Validation failed: Hours must be a positive integer",
    );
  });
});
