import { describe, expect, it } from "vitest";

import { parseEvaluationRequest } from "../src/pipeline/parser.js";
import {
  aggregateMetrics,
  countBenchmarks,
  estimateCompletionMinutes,
  flattenMetricSummaries,
} from "../src/results/aggregator.js";

const estimateSettings = {
  minutesPerBenchmark: 5,
  queueingOverheadFactor: 1.5,
  minimumEstimateMinutes: 10,
  maxConcurrentEvaluations: 10,
};

function requestWithBenchmarks(counts: readonly number[]) {
  return parseEvaluationRequest({
    evaluations: counts.map((count) => ({
      model_name: "test-model",
      backends: [
        {
          name: "lm-evaluation-harness",
          type: "lm-evaluation-harness",
          benchmarks: Array.from({ length: count }, (_, index) => ({
            name: `bench_${index}`,
            tasks: [`bench_${index}`],
          })),
        },
      ],
    })),
  });
}

describe("aggregateMetrics", () => {
  it("summarises numeric metrics across results", () => {
    const summaries = aggregateMetrics([
      { metrics: { accuracy: 0.8 } },
      { metrics: { accuracy: 0.6, note: "partial" } },
      { metrics: { accuracy: 0.9, f1: 0.5 } },
    ]);

    expect(Object.keys(summaries).sort()).toEqual(["accuracy", "f1"]);
    expect(summaries.accuracy?.mean).toBeCloseTo(0.7667, 4);
    expect(summaries.accuracy?.min).toBe(0.6);
    expect(summaries.accuracy?.max).toBe(0.9);
    expect(summaries.accuracy?.count).toBe(3);
    expect(summaries.f1).toEqual({ mean: 0.5, min: 0.5, max: 0.5, count: 1 });
  });

  it("skips non-finite values", () => {
    const summaries = aggregateMetrics([{ metrics: { loss: Number.NaN } }, { metrics: { loss: 2 } }]);
    expect(summaries.loss).toEqual({ mean: 2, min: 2, max: 2, count: 1 });
  });

  it("flattens summaries into suffixed keys", () => {
    expect(flattenMetricSummaries({ f1: { mean: 0.5, min: 0.25, max: 0.75, count: 2 } })).toEqual({
      f1_mean: 0.5,
      f1_min: 0.25,
      f1_max: 0.75,
      f1_count: 2,
    });
  });
});

describe("estimateCompletionMinutes", () => {
  it("counts benchmarks across evaluations", () => {
    expect(countBenchmarks(requestWithBenchmarks([2, 3]))).toBe(5);
  });

  it("applies the minimum for small requests", () => {
    expect(estimateCompletionMinutes(requestWithBenchmarks([1]), estimateSettings)).toBe(10);
  });

  it("scales with the benchmark count", () => {
    expect(estimateCompletionMinutes(requestWithBenchmarks([2, 2]), estimateSettings)).toBe(20);
  });

  it("adds queueing overhead beyond the concurrency ceiling", () => {
    expect(estimateCompletionMinutes(requestWithBenchmarks([12]), estimateSettings)).toBe(90);
    expect(
      estimateCompletionMinutes(requestWithBenchmarks([3]), {
        ...estimateSettings,
        maxConcurrentEvaluations: 2,
      }),
    ).toBe(22);
  });
});
