/** The metrics backend cannot be reached at all: missing credentials, access denied. */
export class ConnectivityError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "ConnectivityError";
  }
}

/**
 * A single metric, model or error-count query failed or timed out and was
 * recorded as zero. Attached to warn-level log records, never thrown.
 */
export class PartialDataWarning extends Error {
  readonly modelId: string | null;
  readonly metric: string;

  constructor(
    metric: string,
    modelId: string | null,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, { cause: options?.cause });
    this.name = "PartialDataWarning";
    this.metric = metric;
    this.modelId = modelId;
  }
}

export class ValidationError extends Error {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Validation failed: ${issues.join("; ")}`);
    this.name = "ValidationError";
    this.issues = issues;
  }
}

export class UnsupportedFormatError extends Error {
  readonly format: string;

  constructor(format: string) {
    super(`Unsupported output format: ${format}`);
    this.name = "UnsupportedFormatError";
    this.format = format;
  }
}

/** Monthly projection needs a reporting window of at least one hour. */
export class ProjectionWindowError extends Error {
  readonly durationHours: number;

  constructor(durationHours: number) {
    super(`Cannot project a ${durationHours}-hour window: duration must be positive`);
    this.name = "ProjectionWindowError";
    this.durationHours = durationHours;
  }
}
