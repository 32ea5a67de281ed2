export class EvalflowError extends Error {
  constructor(message: string, options?: { readonly cause?: unknown }) {
    super(message, options);
    this.name = "EvalflowError";
  }
}

/**
 * Caller input is malformed. `path` points at the offending field, e.g.
 * `evaluations[2].backends[0].benchmarks[1]`.
 */
export class ValidationError extends EvalflowError {
  constructor(
    readonly path: string,
    readonly reason: string,
  ) {
    super(`${path}: ${reason}`);
    this.name = "ValidationError";
  }
}

/** Server-side misconfiguration (for example an unmapped risk category). */
export class ConfigurationError extends EvalflowError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class ExecutionError extends EvalflowError {
  constructor(
    message: string,
    readonly evaluationId: string,
    readonly attempt: number,
    options?: { readonly cause?: unknown },
  ) {
    super(message, options);
    this.name = "ExecutionError";
  }
}

export type TrackingOperation =
  | "createExperiment"
  | "startRun"
  | "logParameters"
  | "logResult"
  | "getExperimentUrl"
  | "searchRuns"
  | "getRunMetrics";

export class TrackingError extends EvalflowError {
  constructor(
    readonly operation: TrackingOperation,
    message: string,
    options?: { readonly cause?: unknown },
  ) {
    super(message, options);
    this.name = "TrackingError";
  }
}

export function toError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  if (typeof value === "string") {
    return new Error(value);
  }
  return new Error("Unknown error");
}

export function errorMessage(value: unknown): string {
  return toError(value).message;
}
