import { z } from "zod";

import { ValidationError } from "../errors.js";

/**
 * Nested results as produced by group-based evaluators: groups contain
 * subgroups to any depth, tasks and groups carry metrics with named scores.
 */
export type ResultNode =
  | { readonly kind: "leaf"; readonly metrics: Readonly<Record<string, number>> }
  | { readonly kind: "group"; readonly children: Readonly<Record<string, ResultNode>> };

const ScoreSchema = z
  .object({
    value: z.number(),
    stats: z.record(z.string(), z.number().nullable()).optional(),
  })
  .loose();

const MetricResultSchema = z.object({
  scores: z.record(z.string(), ScoreSchema).default(() => ({})),
});

const MetricsSchema = z.record(z.string(), MetricResultSchema).default(() => ({}));

const TaskResultSchema = z.object({ metrics: MetricsSchema });

// Subgroups are parsed one level at a time while walking, so deeply nested
// payloads never recurse through the schema.
const GroupLevelSchema = z.object({
  metrics: MetricsSchema,
  groups: z.record(z.string(), z.unknown()).nullish(),
});

export const NestedEvaluationResultSchema = z.object({
  tasks: z.record(z.string(), TaskResultSchema).nullish(),
  groups: z.record(z.string(), z.unknown()).nullish(),
});

export type NestedEvaluationResult = z.output<typeof NestedEvaluationResultSchema>;

function metricNodes(metrics: z.output<typeof MetricsSchema>): Record<string, ResultNode> {
  const nodes: Record<string, ResultNode> = {};
  for (const [metricName, metric] of Object.entries(metrics)) {
    const scores: Record<string, number> = {};
    for (const [scoreName, score] of Object.entries(metric.scores)) {
      scores[scoreName] = score.value;
    }
    nodes[metricName] = { kind: "leaf", metrics: scores };
  }
  return nodes;
}

type PendingGroups = {
  readonly path: string;
  readonly source: Readonly<Record<string, unknown>>;
  readonly target: Record<string, ResultNode>;
};

/**
 * Converts the raw `{ tasks, groups }` payload into a tree. Each task or group
 * becomes an internal node whose children are its metrics (as leaves) and its
 * subgroups; a subgroup replaces a metric of the same name. Work is driven by
 * an explicit stack, so nesting depth does not grow the call stack.
 */
export function buildResultTree(raw: unknown): ResultNode {
  const result = NestedEvaluationResultSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ValidationError(
      issue && issue.path.length > 0 ? issue.path.map(String).join(".") : "results",
      issue?.message ?? "invalid nested results",
    );
  }
  const parsed = result.data;
  const root: Record<string, ResultNode> = {};

  if (parsed.tasks) {
    const tasks: Record<string, ResultNode> = {};
    for (const [name, task] of Object.entries(parsed.tasks)) {
      tasks[name] = { kind: "group", children: metricNodes(task.metrics) };
    }
    root.tasks = { kind: "group", children: tasks };
  }

  if (parsed.groups) {
    const groups: Record<string, ResultNode> = {};
    root.groups = { kind: "group", children: groups };
    const stack: PendingGroups[] = [{ path: "groups", source: parsed.groups, target: groups }];
    while (stack.length > 0) {
      const frame = stack.pop();
      if (!frame) {
        break;
      }
      for (const [name, rawGroup] of Object.entries(frame.source)) {
        const path = `${frame.path}.${name}`;
        const group = GroupLevelSchema.safeParse(rawGroup);
        if (!group.success) {
          throw new ValidationError(path, `invalid result group: ${group.error.issues[0]?.message ?? "invalid"}`);
        }
        const children = metricNodes(group.data.metrics);
        if (group.data.groups) {
          stack.push({ path, source: group.data.groups, target: children });
        }
        frame.target[name] = { kind: "group", children };
      }
    }
  }

  return { kind: "group", children: root };
}

/**
 * Flattens a tree into `path.to.metric.score -> value`, e.g.
 * `tasks.arc_easy.accuracy.acc`. Iterative depth-first walk.
 */
export function flattenResultTree(tree: ResultNode): Record<string, number> {
  const flat: Record<string, number> = {};
  const stack: Array<{ readonly node: ResultNode; readonly prefix: string }> = [
    { node: tree, prefix: "" },
  ];
  while (stack.length > 0) {
    const frame = stack.pop();
    if (!frame) {
      break;
    }
    const { node, prefix } = frame;
    if (node.kind === "leaf") {
      for (const [name, value] of Object.entries(node.metrics)) {
        flat[prefix ? `${prefix}.${name}` : name] = value;
      }
      continue;
    }
    for (const [name, child] of Object.entries(node.children)) {
      stack.push({ node: child, prefix: prefix ? `${prefix}.${name}` : name });
    }
  }
  return flat;
}

export function metricsFromNestedResult(raw: unknown): Record<string, number> {
  return flattenResultTree(buildResultTree(raw));
}
