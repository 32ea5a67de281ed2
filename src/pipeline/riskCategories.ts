import type { EvalSettings, RiskCategoryProfile } from "../config/settings.js";
import { ConfigurationError } from "../errors.js";
import type { BackendSpec, BenchmarkSpec, RiskCategory } from "../models/evaluation.js";
import { createLogger } from "../utils/logger.js";

const log = createLogger("risk-categories");

function synthesizeBenchmark(name: string, profile: RiskCategoryProfile): BenchmarkSpec {
  // One task per benchmark, named after the benchmark.
  const benchmark: BenchmarkSpec = { name, tasks: [name], config: {} };
  if (profile.num_fewshot != null) {
    benchmark.num_fewshot = profile.num_fewshot;
  }
  if (profile.limit != null) {
    benchmark.limit = profile.limit;
  }
  return benchmark;
}

/**
 * Builds one backend per configured backend, each running exactly the
 * benchmarks mapped to `riskCategory`. Same inputs always produce the same
 * backends.
 */
export function expandRiskCategory(
  riskCategory: RiskCategory,
  modelName: string,
  settings: EvalSettings,
): BackendSpec[] {
  const profile = settings.riskCategoryBenchmarks[riskCategory];
  if (!profile) {
    throw new ConfigurationError(`No configuration found for risk category: ${riskCategory}`);
  }

  const backends: BackendSpec[] = [];
  for (const backendName of Object.keys(settings.backendConfigs)) {
    const kind = settings.backendKinds[backendName];
    if (!kind) {
      throw new ConfigurationError(
        `Backend '${backendName}' has no kind mapping; add it to backendKinds to use it for risk categories`,
      );
    }
    const benchmarks = profile.benchmarks.map((name) => synthesizeBenchmark(name, profile));
    backends.push({ name: backendName, type: kind, config: {}, benchmarks });
    log.debug("Generated backend from risk category", {
      backend_name: backendName,
      backend_type: kind,
      risk_category: riskCategory,
      model_name: modelName,
      benchmark_count: benchmarks.length,
    });
  }
  return backends;
}
