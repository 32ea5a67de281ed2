import type { BackendSpec, BenchmarkSpec, EvaluationRequest, EvaluationSpec } from "../models/evaluation.js";
import type { EvaluationResult } from "../models/results.js";

/** Identifies the (evaluation, backend, benchmark) a tracking run belongs to. */
export type TrackingRunContext = {
  readonly evaluation: EvaluationSpec;
  readonly backend: BackendSpec;
  readonly benchmark: BenchmarkSpec;
};

/**
 * Experiment-tracking backend. Implementations should throw `TrackingError`;
 * callers treat every failure as non-fatal.
 */
export type TrackingSink = {
  readonly createExperiment: (request: EvaluationRequest) => Promise<string>;
  readonly startRun: (experimentId: string, run: TrackingRunContext) => Promise<string>;
  readonly logParameters: (runId: string, params: Readonly<Record<string, string>>) => Promise<void>;
  readonly logResult: (runId: string, result: EvaluationResult) => Promise<void>;
  readonly getExperimentUrl: (experimentId: string) => Promise<string>;
};

function stringify(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }
  if (value === null || value === undefined) {
    return "None";
  }
  if (typeof value === "object") {
    return JSON.stringify(value);
  }
  return String(value);
}

function addPrefixed(
  params: Record<string, string>,
  prefix: string,
  values: Readonly<Record<string, unknown>>,
): void {
  for (const [key, value] of Object.entries(values)) {
    params[`${prefix}${key}`] = stringify(value);
  }
}

/** Flat string parameters describing one tracking run. */
export function buildRunParameters({
  evaluation,
  backend,
  benchmark,
}: TrackingRunContext): Record<string, string> {
  const params: Record<string, string> = {
    model_name: evaluation.model_name,
    backend_name: backend.name,
    benchmark_name: benchmark.name,
    timeout_minutes: String(evaluation.timeout_minutes),
    retry_attempts: String(evaluation.retry_attempts),
  };
  if (evaluation.risk_category) {
    params.risk_category = evaluation.risk_category;
  }
  addPrefixed(params, "model_config_", evaluation.model_configuration);
  addPrefixed(params, "backend_config_", backend.config);
  if (benchmark.num_fewshot != null) {
    params.num_fewshot = String(benchmark.num_fewshot);
  }
  if (benchmark.batch_size != null) {
    params.batch_size = String(benchmark.batch_size);
  }
  if (benchmark.limit != null) {
    params.limit = String(benchmark.limit);
  }
  if (benchmark.device) {
    params.device = benchmark.device;
  }
  addPrefixed(params, "benchmark_config_", benchmark.config);
  addPrefixed(params, "metadata_", evaluation.metadata);
  return params;
}

/** `2025-03-04T05:06:07Z` -> `20250304_050607` (UTC). */
export function formatExperimentTimestamp(isoTimestamp: string): string {
  const date = new Date(isoTimestamp);
  const pad = (value: number) => String(value).padStart(2, "0");
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

export function buildExperimentName(request: EvaluationRequest, prefix: string): string {
  let baseName: string;
  if (request.experiment_name) {
    baseName = request.experiment_name;
  } else {
    const timestamp = formatExperimentTimestamp(request.created_at);
    const models = new Set(request.evaluations.map((evaluation) => evaluation.model_name));
    const [onlyModel] = models;
    baseName =
      models.size === 1 && onlyModel !== undefined
        ? `${onlyModel}_${timestamp}`
        : `multi_model_${timestamp}`;
  }
  return `${prefix}_${baseName}`;
}
