import type { EvalSettings } from "../config/settings.js";
import type { EvaluationRequest } from "../models/evaluation.js";
import type { EvaluationResult, MetricValue } from "../models/results.js";

export type MetricSummary = {
  readonly mean: number;
  readonly min: number;
  readonly max: number;
  readonly count: number;
};

type MetricAccumulator = { sum: number; min: number; max: number; count: number };

/**
 * Mean/min/max/count for every numeric metric across `results`. String
 * metrics are left out of the summary (they stay on their own result).
 */
export function aggregateMetrics(
  results: readonly Pick<EvaluationResult, "metrics">[],
): Record<string, MetricSummary> {
  const accumulators = new Map<string, MetricAccumulator>();
  for (const result of results) {
    for (const [name, value] of Object.entries(result.metrics)) {
      if (typeof value !== "number" || !Number.isFinite(value)) {
        continue;
      }
      const current = accumulators.get(name);
      if (!current) {
        accumulators.set(name, { sum: value, min: value, max: value, count: 1 });
        continue;
      }
      current.sum += value;
      current.min = Math.min(current.min, value);
      current.max = Math.max(current.max, value);
      current.count += 1;
    }
  }

  const summaries: Record<string, MetricSummary> = {};
  for (const [name, { sum, min, max, count }] of accumulators) {
    summaries[name] = { mean: sum / count, min, max, count };
  }
  return summaries;
}

/** `{ accuracy: {...} }` -> `{ accuracy_mean, accuracy_min, accuracy_max, accuracy_count }`. */
export function flattenMetricSummaries(
  summaries: Readonly<Record<string, MetricSummary>>,
): Record<string, MetricValue> {
  const flat: Record<string, MetricValue> = {};
  for (const [name, summary] of Object.entries(summaries)) {
    flat[`${name}_mean`] = summary.mean;
    flat[`${name}_min`] = summary.min;
    flat[`${name}_max`] = summary.max;
    flat[`${name}_count`] = summary.count;
  }
  return flat;
}

export function countBenchmarks(request: Pick<EvaluationRequest, "evaluations">): number {
  let total = 0;
  for (const evaluation of request.evaluations) {
    for (const backend of evaluation.backends) {
      total += backend.benchmarks.length;
    }
  }
  return total;
}

export type CompletionEstimateSettings = Pick<
  EvalSettings,
  | "minutesPerBenchmark"
  | "queueingOverheadFactor"
  | "minimumEstimateMinutes"
  | "maxConcurrentEvaluations"
>;

/** Expected wall-clock minutes for a resolved request. */
export function estimateCompletionMinutes(
  request: Pick<EvaluationRequest, "evaluations">,
  settings: CompletionEstimateSettings,
): number {
  const benchmarkCount = countBenchmarks(request);
  let minutes = benchmarkCount * settings.minutesPerBenchmark;
  if (benchmarkCount > settings.maxConcurrentEvaluations) {
    minutes = Math.floor(minutes * settings.queueingOverheadFactor);
  }
  return Math.max(minutes, settings.minimumEstimateMinutes);
}
