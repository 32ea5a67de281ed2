import { describe, expect, it } from "vitest";

import { createSettings, loadSettingsFromEnv } from "../src/config/settings.js";
import { ConfigurationError } from "../src/errors.js";

describe("settings", () => {
  it("provides defaults", () => {
    const settings = createSettings();
    expect(settings.maxConcurrentEvaluations).toBe(10);
    expect(settings.maxRetryAttempts).toBe(3);
    expect(settings.mlflowTrackingUri).toBe("http://localhost:5000");
    expect(settings.mlflowExperimentPrefix).toBe("eval-hub");
    expect(Object.keys(settings.backendConfigs)).toEqual(["lm-evaluation-harness", "guidellm"]);
    expect(settings.riskCategoryBenchmarks.low).toEqual({
      benchmarks: ["hellaswag", "arc_easy"],
      num_fewshot: 5,
      limit: 100,
    });
    expect(settings.riskCategoryBenchmarks.critical?.limit).toBeNull();
  });

  it("does not share default tables between instances", () => {
    const first = createSettings();
    first.riskCategoryBenchmarks.low?.benchmarks.push("mmlu");
    expect(createSettings().riskCategoryBenchmarks.low?.benchmarks).toEqual(["hellaswag", "arc_easy"]);
  });

  it("rejects invalid values", () => {
    expect(() => createSettings({ maxConcurrentEvaluations: 0 })).toThrow(ConfigurationError);
    expect(() => createSettings({ maxConcurrentEvaluations: 0 })).toThrow(
      /^Invalid settings: maxConcurrentEvaluations: /u,
    );
  });

  it("rejects risk-category profiles that repeat a benchmark", () => {
    expect(() =>
      createSettings({ riskCategoryBenchmarks: { low: { benchmarks: ["hellaswag", "hellaswag"] } } }),
    ).toThrow(
      new ConfigurationError(
        "Invalid settings: riskCategoryBenchmarks.low.benchmarks: benchmark names must be unique",
      ),
    );
  });

  it("reads the retention limit from the environment", () => {
    expect(loadSettingsFromEnv({ MAX_RETAINED_REQUESTS: "25" }).maxRetainedRequests).toBe(25);
    expect(createSettings().maxRetainedRequests).toBe(1_000);
  });

  it("reads the environment", () => {
    const settings = loadSettingsFromEnv({
      MAX_CONCURRENT_EVALUATIONS: "4",
      mlflow_tracking_uri: "http://tracking.test",
      RISK_CATEGORY_BENCHMARKS: JSON.stringify({ low: { benchmarks: ["boolq"] } }),
    });
    expect(settings.maxConcurrentEvaluations).toBe(4);
    expect(settings.mlflowTrackingUri).toBe("http://tracking.test");
    expect(settings.riskCategoryBenchmarks).toEqual({ low: { benchmarks: ["boolq"] } });
  });

  it("lets explicit overrides win over the environment", () => {
    const settings = loadSettingsFromEnv(
      { MAX_CONCURRENT_EVALUATIONS: "4" },
      { maxConcurrentEvaluations: 2 },
    );
    expect(settings.maxConcurrentEvaluations).toBe(2);
  });

  it("reports malformed environment values", () => {
    expect(() => loadSettingsFromEnv({ MAX_RETRY_ATTEMPTS: "many" })).toThrow(
      new ConfigurationError('Invalid environment: MAX_RETRY_ATTEMPTS must be an integer, got "many"'),
    );
    expect(() => loadSettingsFromEnv({ BACKEND_KINDS: JSON.stringify({ x: "unknown" }) })).toThrow(
      ConfigurationError,
    );
  });
});
