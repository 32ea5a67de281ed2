import type { EvalSettings } from "../config/settings.js";
import { ValidationError } from "../errors.js";
import {
  MAX_EVALUATIONS_PER_REQUEST,
  type BackendSpec,
  type BenchmarkSpec,
  type EvaluationRequest,
  type EvaluationSpec,
} from "../models/evaluation.js";

export type ValidationOutcome =
  | { readonly ok: true }
  | { readonly ok: false; readonly error: ValidationError };

type Issue = { readonly path: string; readonly reason: string };

function isBlank(value: string | null | undefined): boolean {
  return !value || value.trim().length === 0;
}

function findDuplicate(names: readonly string[]): string | undefined {
  const seen = new Set<string>();
  for (const name of names) {
    if (seen.has(name)) {
      return name;
    }
    seen.add(name);
  }
  return undefined;
}

function checkBenchmark(benchmark: BenchmarkSpec, path: string): Issue | undefined {
  if (isBlank(benchmark.name)) {
    return { path, reason: "name is required" };
  }
  if (benchmark.tasks.length === 0) {
    return { path, reason: "must specify at least one task" };
  }
  const blankTask = benchmark.tasks.findIndex((task) => isBlank(task));
  if (blankTask >= 0) {
    return { path: `${path}.tasks[${blankTask}]`, reason: "task name cannot be empty" };
  }
  if (benchmark.num_fewshot != null && benchmark.num_fewshot < 0) {
    return { path, reason: "num_fewshot cannot be negative" };
  }
  if (benchmark.batch_size != null && benchmark.batch_size <= 0) {
    return { path, reason: "batch_size must be positive" };
  }
  if (benchmark.limit != null && benchmark.limit <= 0) {
    return { path, reason: "limit must be positive" };
  }
  return undefined;
}

function checkBackend(
  backend: BackendSpec,
  path: string,
  knownBackends: readonly string[],
): Issue | undefined {
  if (isBlank(backend.name)) {
    return { path, reason: "name is required" };
  }
  if (backend.benchmarks.length === 0) {
    return { path, reason: "must specify at least one benchmark" };
  }
  if (backend.type !== "custom" && !knownBackends.includes(backend.name)) {
    return {
      path,
      reason:
        `unsupported backend '${backend.name}'. ` +
        `Supported backends: ${knownBackends.length > 0 ? knownBackends.join(", ") : "(none)"}`,
    };
  }
  for (const [index, benchmark] of backend.benchmarks.entries()) {
    const issue = checkBenchmark(benchmark, `${path}.benchmarks[${index}]`);
    if (issue) {
      return issue;
    }
  }
  const duplicate = findDuplicate(backend.benchmarks.map((benchmark) => benchmark.name));
  if (duplicate !== undefined) {
    return { path, reason: `duplicate benchmark name '${duplicate}'` };
  }
  return undefined;
}

function checkEvaluation(
  evaluation: EvaluationSpec,
  path: string,
  knownBackends: readonly string[],
): Issue | undefined {
  if (isBlank(evaluation.model_name)) {
    return { path, reason: "model_name is required" };
  }
  if (evaluation.backends.length === 0 && !evaluation.risk_category) {
    return { path, reason: "must specify either backends or risk_category" };
  }
  if (evaluation.timeout_minutes <= 0) {
    return { path, reason: "timeout_minutes must be positive" };
  }
  if (evaluation.retry_attempts < 0) {
    return { path, reason: "retry_attempts cannot be negative" };
  }
  for (const [index, backend] of evaluation.backends.entries()) {
    const issue = checkBackend(backend, `${path}.backends[${index}]`, knownBackends);
    if (issue) {
      return issue;
    }
  }
  const duplicate = findDuplicate(evaluation.backends.map((backend) => backend.name));
  if (duplicate !== undefined) {
    return { path, reason: `duplicate backend name '${duplicate}'` };
  }
  return undefined;
}

function findFirstIssue(request: EvaluationRequest, settings: EvalSettings): Issue | undefined {
  const count = request.evaluations.length;
  if (count === 0) {
    return { path: "evaluations", reason: "request must contain at least one evaluation" };
  }
  if (count > MAX_EVALUATIONS_PER_REQUEST) {
    return {
      path: "evaluations",
      reason: `request cannot contain more than ${MAX_EVALUATIONS_PER_REQUEST} evaluations (got ${count})`,
    };
  }
  const knownBackends = Object.keys(settings.backendConfigs);
  const seenIds = new Set<string>();
  for (const [index, evaluation] of request.evaluations.entries()) {
    const issue = checkEvaluation(evaluation, `evaluations[${index}]`, knownBackends);
    if (issue) {
      return issue;
    }
    if (seenIds.has(evaluation.id)) {
      return { path: `evaluations[${index}].id`, reason: `duplicate evaluation id '${evaluation.id}'` };
    }
    seenIds.add(evaluation.id);
  }
  return undefined;
}

/**
 * Checks a structurally parsed request. Stops at the first violation and
 * reports its exact path; has no side effects.
 */
export function validateEvaluationRequest(
  request: EvaluationRequest,
  settings: EvalSettings,
): ValidationOutcome {
  const issue = findFirstIssue(request, settings);
  if (!issue) {
    return { ok: true };
  }
  return { ok: false, error: new ValidationError(issue.path, issue.reason) };
}

export function assertValidEvaluationRequest(
  request: EvaluationRequest,
  settings: EvalSettings,
): void {
  const outcome = validateEvaluationRequest(request, settings);
  if (!outcome.ok) {
    throw outcome.error;
  }
}
