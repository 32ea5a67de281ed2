import { describe, expect, it } from "vitest";

import { ValidationError } from "../src/errors.js";
import { buildResultTree, metricsFromNestedResult } from "../src/results/resultTree.js";

function accuracy(value: number) {
  return { accuracy: { scores: { acc: { value } } } };
}

describe("result tree", () => {
  it("flattens tasks and nested groups into dotted keys", () => {
    const metrics = metricsFromNestedResult({
      tasks: {
        arc_easy: {
          metrics: {
            accuracy: { scores: { acc: { value: 0.5 }, acc_norm: { value: 0.6, stats: { stderr: 0.01 } } } },
          },
        },
      },
      groups: {
        mmlu: {
          metrics: accuracy(0.7),
          groups: { stem: { metrics: accuracy(0.65) } },
        },
      },
    });

    expect(metrics).toEqual({
      "tasks.arc_easy.accuracy.acc": 0.5,
      "tasks.arc_easy.accuracy.acc_norm": 0.6,
      "groups.mmlu.accuracy.acc": 0.7,
      "groups.mmlu.stem.accuracy.acc": 0.65,
    });
  });

  it("builds group and leaf nodes", () => {
    expect(buildResultTree({ tasks: { boolq: { metrics: accuracy(1) } } })).toEqual({
      kind: "group",
      children: {
        tasks: {
          kind: "group",
          children: {
            boolq: {
              kind: "group",
              children: { accuracy: { kind: "leaf", metrics: { acc: 1 } } },
            },
          },
        },
      },
    });
  });

  it("lets a subgroup replace a metric of the same name", () => {
    const metrics = metricsFromNestedResult({
      groups: {
        suite: {
          metrics: { stem: { scores: { acc: { value: 0.1 } } } },
          groups: { stem: { metrics: accuracy(0.2) } },
        },
      },
    });
    expect(metrics).toEqual({ "groups.suite.stem.accuracy.acc": 0.2 });
  });

  it("handles very deep nesting", () => {
    const depth = 5_000;
    let group: Record<string, unknown> = { metrics: { m: { scores: { s: { value: 1 } } } } };
    for (let level = 0; level < depth; level += 1) {
      group = { metrics: {}, groups: { g: group } };
    }

    const metrics = metricsFromNestedResult({ groups: { root: group } });
    expect(metrics).toEqual({ [`groups.root${".g".repeat(depth)}.m.s`]: 1 });
  });

  it("names the malformed group", () => {
    expect(() => metricsFromNestedResult({ groups: { bad: { metrics: "nope" } } })).toThrow(
      /^groups\.bad: invalid result group: /u,
    );
  });

  it("reports malformed tasks as validation errors", () => {
    let caught: unknown;
    try {
      metricsFromNestedResult({ tasks: { arc_easy: { metrics: 3 } } });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ValidationError);
    expect(caught).toMatchObject({ path: "tasks.arc_easy.metrics" });
  });

  it("returns nothing for an empty payload", () => {
    expect(metricsFromNestedResult({})).toEqual({});
  });
});
