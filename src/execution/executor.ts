import { z } from "zod";

import type { EvaluationSpec } from "../models/evaluation.js";
import { MetricValueSchema } from "../models/results.js";

/** Opaque reference to a unit submitted to an executor. */
export type ExecutorHandle = {
  readonly handleId: string;
};

export type ExecutionContext = {
  readonly requestId: string;
  /** 1-based dispatch attempt for this unit. */
  readonly attempt: number;
};

export const ExecutorBenchmarkResultSchema = z
  .object({
    backend_name: z.string().min(1),
    benchmark_name: z.string().min(1),
    status: z.enum(["completed", "failed"]),
    metrics: z.record(z.string(), MetricValueSchema).default(() => ({})),
    artifacts: z.record(z.string(), z.string()).default(() => ({})),
    error_message: z.string().nullish(),
    started_at: z.string().nullish(),
    completed_at: z.string().nullish(),
    /** Grouped `{ tasks, groups }` scores; flattened into dotted metric names. */
    nested_results: z.unknown().optional(),
  })
  .loose();

export type ExecutorBenchmarkResult = z.output<typeof ExecutorBenchmarkResultSchema>;

/** What executors report; validated before it is accepted. */
export type RawExecutorBenchmarkResult = z.input<typeof ExecutorBenchmarkResultSchema>;

export type ExecutorPollResult =
  | { readonly state: "running" }
  | { readonly state: "finished"; readonly results: readonly RawExecutorBenchmarkResult[] };

/**
 * Boundary to the engines that actually run benchmarks. Any exception thrown
 * here is treated as a unit failure, never as a crash.
 */
export type EvaluationExecutor = {
  readonly submit: (unit: EvaluationSpec, context: ExecutionContext) => Promise<ExecutorHandle>;
  /** Returns promptly: either the unit's results or `running`. */
  readonly pollOrAwait: (handle: ExecutorHandle) => Promise<ExecutorPollResult>;
  /** Best-effort stop request. */
  readonly cancel: (handle: ExecutorHandle) => Promise<void>;
};
