import type { EvalSettings } from "../config/settings.js";
import { mergeConfig } from "../models/config.js";
import {
  copyBackendSpec,
  copyBenchmarkSpec,
  type BackendSpec,
  type BackendType,
  type BenchmarkSpec,
} from "../models/evaluation.js";

export const DEFAULT_BATCH_SIZE = 1;
export const DEFAULT_DEVICE = "auto";
export const DEFAULT_HARNESS_NUM_FEWSHOT = 5;

export function applyBenchmarkDefaults(
  benchmark: BenchmarkSpec,
  backendType: BackendType,
): BenchmarkSpec {
  const next = copyBenchmarkSpec(benchmark, {
    batch_size: benchmark.batch_size ?? DEFAULT_BATCH_SIZE,
    device: benchmark.device ?? DEFAULT_DEVICE,
  });
  if (backendType === "lm-evaluation-harness") {
    next.num_fewshot = benchmark.num_fewshot ?? DEFAULT_HARNESS_NUM_FEWSHOT;
  }
  return next;
}

/**
 * Returns a copy of `backend` with the system defaults for its name merged
 * under the caller's configuration and benchmark defaults filled in. Applying
 * it to its own output changes nothing.
 */
export function applyBackendDefaults(backend: BackendSpec, settings: EvalSettings): BackendSpec {
  const defaults = settings.backendConfigs[backend.name] ?? {};
  return copyBackendSpec(backend, {
    config: mergeConfig(defaults, backend.config),
    benchmarks: backend.benchmarks.map((benchmark) =>
      applyBenchmarkDefaults(benchmark, backend.type),
    ),
  });
}
