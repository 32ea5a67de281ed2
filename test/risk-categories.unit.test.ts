import { describe, expect, it } from "vitest";

import { createSettings } from "../src/config/settings.js";
import { ConfigurationError } from "../src/errors.js";
import { expandRiskCategory } from "../src/pipeline/riskCategories.js";

describe("expandRiskCategory", () => {
  const settings = createSettings();

  it("builds one backend per configured backend for the low profile", () => {
    const backends = expandRiskCategory("low", "test-model", settings);

    expect(backends.map((backend) => [backend.name, backend.type])).toEqual([
      ["lm-evaluation-harness", "lm-evaluation-harness"],
      ["guidellm", "guidellm"],
    ]);
    for (const backend of backends) {
      expect(backend.config).toEqual({});
      expect(backend.benchmarks).toEqual([
        { name: "hellaswag", tasks: ["hellaswag"], config: {}, num_fewshot: 5, limit: 100 },
        { name: "arc_easy", tasks: ["arc_easy"], config: {}, num_fewshot: 5, limit: 100 },
      ]);
    }
  });

  it("omits the limit when the profile has none", () => {
    const [backend] = expandRiskCategory("critical", "test-model", settings);
    expect(backend?.benchmarks.map((benchmark) => benchmark.name)).toEqual([
      "hellaswag",
      "arc_easy",
      "arc_challenge",
      "winogrande",
      "mmlu",
      "gsm8k",
    ]);
    expect(backend?.benchmarks[0]).not.toHaveProperty("limit");
  });

  it("is deterministic", () => {
    expect(expandRiskCategory("medium", "test-model", settings)).toEqual(
      expandRiskCategory("medium", "test-model", settings),
    );
  });

  it("fails for an unmapped category", () => {
    const partial = createSettings({
      riskCategoryBenchmarks: { low: { benchmarks: ["hellaswag"] } },
    });
    expect(() => expandRiskCategory("high", "test-model", partial)).toThrow(
      new ConfigurationError("No configuration found for risk category: high"),
    );
  });

  it("fails for a configured backend without a kind mapping", () => {
    const unmapped = createSettings({ backendConfigs: { "in-house": {} } });
    expect(() => expandRiskCategory("low", "test-model", unmapped)).toThrow(ConfigurationError);
  });
});
