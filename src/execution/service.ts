import { createCallbackNotifier, type CallbackDelivery, type CallbackNotifier } from "../callback/notifier.js";
import type { EvalSettings } from "../config/settings.js";
import {
  ExecutionError,
  TrackingError,
  ValidationError,
  errorMessage,
  type TrackingOperation,
} from "../errors.js";
import type { BackendSpec, BenchmarkSpec, EvaluationRequest, EvaluationSpec } from "../models/evaluation.js";
import {
  deriveDurationSeconds,
  isTerminalUnitStatus,
  type EvaluationResponse,
  type EvaluationResult,
  type UnitStatus,
} from "../models/results.js";
import { resolveEvaluationRequest } from "../pipeline/parser.js";
import { metricsFromNestedResult } from "../results/resultTree.js";
import {
  aggregateMetrics,
  estimateCompletionMinutes,
  flattenMetricSummaries,
} from "../results/aggregator.js";
import { buildRunParameters, type TrackingSink } from "../tracking/sink.js";
import { createStatusTracker, type StatusTracker } from "../tracking/statusTracker.js";
import { createLogger } from "../utils/logger.js";
import { createUnitScheduler, type UnitScheduler } from "../utils/scheduler.js";

import {
  ExecutorBenchmarkResultSchema,
  type EvaluationExecutor,
  type ExecutorBenchmarkResult,
  type ExecutorHandle,
  type ExecutorPollResult,
  type RawExecutorBenchmarkResult,
} from "./executor.js";

const log = createLogger("service");

export type ServiceClock = {
  readonly now: () => number;
  readonly sleep: (ms: number) => Promise<void>;
  /** Calls `fire` after `ms`; returns a function that clears the timer. */
  readonly schedule: (ms: number, fire: () => void) => () => void;
};

export type EvaluationServiceOptions = {
  readonly settings: EvalSettings;
  readonly executor: EvaluationExecutor;
  readonly trackingSink?: TrackingSink;
  /** Defaults to a notifier built from the callback settings. */
  readonly notifier?: CallbackNotifier;
  /** Shared admission gate; defaults to one sized by `maxConcurrentEvaluations`. */
  readonly scheduler?: UnitScheduler;
  readonly clock?: ServiceClock;
};

export type EvaluationService = {
  /**
   * Resolves and starts a request. Validation and configuration errors are
   * thrown before any unit runs. With `async_mode: false` the returned promise
   * settles with the final response; otherwise with the initial one.
   */
  readonly submit: (raw: unknown) => Promise<EvaluationResponse>;
  readonly getResponse: (requestId: string) => EvaluationResponse | undefined;
  readonly waitForCompletion: (requestId: string) => Promise<EvaluationResponse>;
  readonly cancel: (requestId: string) => Promise<EvaluationResponse>;
  readonly getCallbackDelivery: (requestId: string) => CallbackDelivery | undefined;
  /**
   * Drops a settled request. Returns `false` for unknown ids and throws
   * `ValidationError` while the request is still running.
   */
  readonly forget: (requestId: string) => boolean;
};

type RequestRecord = {
  readonly request: EvaluationRequest;
  readonly tracker: StatusTracker;
  readonly abort: AbortController;
  readonly results: Map<string, EvaluationResult[]>;
  readonly handles: Map<string, ExecutorHandle>;
  readonly runIds: Map<string, string>;
  readonly estimatedCompletion: string;
  experimentId?: string;
  experimentUrl?: string;
  updatedAtMs: number;
  completion?: Promise<EvaluationResponse>;
  settled: boolean;
  callback?: CallbackDelivery;
};

/** Outcome of an executor call raced against the unit deadline and the request's cancellation. */
type Guarded<T> =
  | { readonly state: "settled"; readonly value: T }
  | { readonly state: "expired" }
  | { readonly state: "aborted" };

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}

function defaultSchedule(ms: number, fire: () => void): () => void {
  const timer = setTimeout(fire, ms);
  return () => {
    clearTimeout(timer);
  };
}

function runKey(unitId: string, backendName: string, benchmarkName: string): string {
  return JSON.stringify([unitId, backendName, benchmarkName]);
}

function benchmarkPairs(
  spec: EvaluationSpec,
): Array<{ readonly backend: BackendSpec; readonly benchmark: BenchmarkSpec }> {
  return spec.backends.flatMap((backend) =>
    backend.benchmarks.map((benchmark) => ({ backend, benchmark })),
  );
}

export function createEvaluationService(options: EvaluationServiceOptions): EvaluationService {
  const { settings, executor, trackingSink } = options;
  const clock: ServiceClock = options.clock ?? {
    now: Date.now,
    sleep: defaultSleep,
    schedule: defaultSchedule,
  };
  const notifier =
    options.notifier ??
    createCallbackNotifier({
      timeoutMs: settings.callbackTimeoutSeconds * 1000,
      maxAttempts: settings.callbackRetryAttempts,
      retryDelayMs: settings.callbackRetryDelayMs,
    });
  const scheduler =
    options.scheduler ??
    createUnitScheduler({
      maxInFlight: settings.maxConcurrentEvaluations,
      now: clock.now,
      onSettled: (metrics) => {
        log.debug("Evaluation unit released its slot", {
          queue_wait_ms: metrics.queueWaitMs,
          run_ms: metrics.runMs,
        });
      },
    });
  const records = new Map<string, RequestRecord>();

  const isoNow = () => new Date(clock.now()).toISOString();

  async function tracked<T>(
    operation: TrackingOperation,
    fn: (sink: TrackingSink) => Promise<T>,
  ): Promise<T | undefined> {
    if (!trackingSink) {
      return undefined;
    }
    try {
      return await fn(trackingSink);
    } catch (error) {
      const trackingError =
        error instanceof TrackingError
          ? error
          : new TrackingError(operation, errorMessage(error), { cause: error });
      log.warn("Tracking sink call failed", {
        operation: trackingError.operation,
        error: trackingError.message,
      });
      return undefined;
    }
  }

  function buildResponse(record: RequestRecord): EvaluationResponse {
    const { request, tracker } = record;
    const counts = tracker.counts();
    const results = request.evaluations.flatMap((spec) => record.results.get(spec.id) ?? []);
    return {
      request_id: request.request_id,
      status: tracker.aggregateStatus(),
      total_evaluations: counts.total,
      completed_evaluations: counts.completed,
      failed_evaluations: counts.failed,
      results,
      aggregated_metrics: flattenMetricSummaries(aggregateMetrics(results)),
      ...(record.experimentUrl ? { experiment_url: record.experimentUrl } : {}),
      created_at: request.created_at,
      updated_at: new Date(record.updatedAtMs).toISOString(),
      estimated_completion: record.estimatedCompletion,
      progress_percentage: tracker.progressPercentage(),
    };
  }

  async function cancelHandle(unitId: string, handle: ExecutorHandle): Promise<void> {
    try {
      await executor.cancel(handle);
    } catch (error) {
      log.warn("Executor cancel failed", { unit_id: unitId, error: errorMessage(error) });
    }
  }

  async function startTrackingRuns(record: RequestRecord, spec: EvaluationSpec): Promise<void> {
    const { experimentId } = record;
    if (!experimentId) {
      return;
    }
    for (const { backend, benchmark } of benchmarkPairs(spec)) {
      const context = { evaluation: spec, backend, benchmark };
      const runId = await tracked("startRun", (sink) => sink.startRun(experimentId, context));
      if (!runId) {
        continue;
      }
      record.runIds.set(runKey(spec.id, backend.name, benchmark.name), runId);
      await tracked("logParameters", (sink) =>
        sink.logParameters(runId, buildRunParameters(context)),
      );
    }
  }

  /** Closes the tracking run of every result that has one. */
  async function logResults(results: readonly EvaluationResult[]): Promise<void> {
    for (const result of results) {
      const runId = result.mlflow_run_id;
      if (runId) {
        await tracked("logResult", (sink) => sink.logResult(runId, result));
      }
    }
  }

  async function persistResults(
    record: RequestRecord,
    spec: EvaluationSpec,
    results: EvaluationResult[],
  ): Promise<void> {
    // A cancel that landed meanwhile already recorded and logged the unit's results.
    if (record.tracker.get(spec.id).status === "cancelled") {
      return;
    }
    record.results.set(spec.id, results);
    record.updatedAtMs = clock.now();
    await logResults(results);
  }

  function unitStartedAt(record: RequestRecord, unitId: string): string | undefined {
    const startedAtMs = record.tracker.get(unitId).startedAtMs;
    return startedAtMs === undefined ? undefined : new Date(startedAtMs).toISOString();
  }

  function buildResult(
    record: RequestRecord,
    spec: EvaluationSpec,
    fields: {
      readonly backendName: string;
      readonly benchmarkName: string;
      readonly status: UnitStatus;
      readonly metrics?: EvaluationResult["metrics"];
      readonly artifacts?: EvaluationResult["artifacts"];
      readonly errorMessage?: string | null;
      readonly startedAt?: string | null;
      readonly completedAt?: string | null;
    },
  ): EvaluationResult {
    const startedAt = fields.startedAt ?? unitStartedAt(record, spec.id);
    const completedAt = fields.completedAt ?? isoNow();
    const duration = deriveDurationSeconds(startedAt, completedAt);
    const runId = record.runIds.get(runKey(spec.id, fields.backendName, fields.benchmarkName));
    return {
      evaluation_id: spec.id,
      backend_name: fields.backendName,
      benchmark_name: fields.benchmarkName,
      status: fields.status,
      metrics: fields.metrics ?? {},
      artifacts: fields.artifacts ?? {},
      ...(fields.errorMessage ? { error_message: fields.errorMessage } : {}),
      ...(startedAt ? { started_at: startedAt } : {}),
      completed_at: completedAt,
      ...(duration !== undefined ? { duration_seconds: duration } : {}),
      ...(runId ? { mlflow_run_id: runId } : {}),
    };
  }

  /** One result per benchmark, all sharing the unit's terminal status. */
  function unitOutcomeResults(
    record: RequestRecord,
    spec: EvaluationSpec,
    status: UnitStatus,
    error?: string,
  ): EvaluationResult[] {
    return benchmarkPairs(spec).map(({ backend, benchmark }) =>
      buildResult(record, spec, {
        backendName: backend.name,
        benchmarkName: benchmark.name,
        status,
        errorMessage: error,
      }),
    );
  }

  async function settleUnit(
    record: RequestRecord,
    spec: EvaluationSpec,
    status: "failed" | "timeout",
    error: string,
  ): Promise<void> {
    if (!record.tracker.transition(spec.id, status, { error })) {
      return;
    }
    log.warn("Evaluation unit did not complete", { unit_id: spec.id, status, error });
    await persistResults(record, spec, unitOutcomeResults(record, spec, status, error));
  }

  function validateExecutorResults(
    spec: EvaluationSpec,
    raw: readonly RawExecutorBenchmarkResult[],
  ): { readonly ok: true; readonly results: ExecutorBenchmarkResult[] } | { readonly ok: false; readonly error: string } {
    const expected = new Set(
      benchmarkPairs(spec).map(({ backend, benchmark }) => runKey(spec.id, backend.name, benchmark.name)),
    );
    const results: ExecutorBenchmarkResult[] = [];
    const seen = new Set<string>();
    for (const [index, item] of raw.entries()) {
      const parsed = ExecutorBenchmarkResultSchema.safeParse(item);
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const path = issue && issue.path.length > 0 ? `.${issue.path.map(String).join(".")}` : "";
        return { ok: false, error: `Invalid executor result [${index}]${path}: ${issue?.message ?? "invalid"}` };
      }
      const { backend_name: backendName, benchmark_name: benchmarkName } = parsed.data;
      const key = runKey(spec.id, backendName, benchmarkName);
      if (!expected.has(key)) {
        return {
          ok: false,
          error: `Executor reported unknown benchmark ${backendName}/${benchmarkName}`,
        };
      }
      if (seen.has(key)) {
        return {
          ok: false,
          error: `Executor reported ${backendName}/${benchmarkName} twice`,
        };
      }
      seen.add(key);
      if (parsed.data.nested_results == null) {
        results.push(parsed.data);
        continue;
      }
      let nested: Record<string, number>;
      try {
        nested = metricsFromNestedResult(parsed.data.nested_results);
      } catch (error) {
        return {
          ok: false,
          error: `Invalid nested results for ${backendName}/${benchmarkName}: ${errorMessage(error)}`,
        };
      }
      // Flat metrics win over flattened ones of the same name.
      results.push({ ...parsed.data, metrics: { ...nested, ...parsed.data.metrics } });
    }
    return { ok: true, results };
  }

  async function completeUnit(
    record: RequestRecord,
    spec: EvaluationSpec,
    raw: readonly RawExecutorBenchmarkResult[],
  ): Promise<void> {
    const { tracker } = record;
    if (!tracker.transition(spec.id, "completing")) {
      return;
    }
    const validated = validateExecutorResults(spec, raw);
    if (!validated.ok) {
      await settleUnit(record, spec, "failed", validated.error);
      return;
    }

    const reported = new Map(
      validated.results.map((result) => [
        runKey(spec.id, result.backend_name, result.benchmark_name),
        result,
      ]),
    );
    const results = benchmarkPairs(spec).map(({ backend, benchmark }) => {
      const result = reported.get(runKey(spec.id, backend.name, benchmark.name));
      if (!result) {
        return buildResult(record, spec, {
          backendName: backend.name,
          benchmarkName: benchmark.name,
          status: "failed",
          errorMessage: "Executor reported no result for this benchmark",
        });
      }
      return buildResult(record, spec, {
        backendName: backend.name,
        benchmarkName: benchmark.name,
        status: result.status,
        metrics: result.metrics,
        artifacts: result.artifacts,
        errorMessage: result.status === "failed" ? (result.error_message ?? "Benchmark failed") : result.error_message,
        startedAt: result.started_at,
        completedAt: result.completed_at,
      });
    });

    await persistResults(record, spec, results);
    if (tracker.get(spec.id).status !== "completing") {
      return;
    }
    const failures = results.filter((result) => result.status !== "completed");
    if (failures.length > 0) {
      tracker.transition(spec.id, "failed", {
        error: failures
          .map((result) => `${result.backend_name}/${result.benchmark_name}: ${result.error_message ?? "failed"}`)
          .join("; "),
      });
      return;
    }
    tracker.transition(spec.id, "completed");
  }

  /**
   * Races an executor call against the unit deadline and the request's abort
   * signal. A value that arrives after losing the race goes to `onLateValue`.
   */
  async function guard<T>(
    record: RequestRecord,
    deadlineMs: number,
    work: Promise<T>,
    onLateValue?: (value: T) => Promise<void>,
  ): Promise<Guarded<T>> {
    const { signal } = record.abort;
    let release = (): void => {};
    const interruption = new Promise<Guarded<T>>((resolve) => {
      const onAbort = () => resolve({ state: "aborted" });
      const clearTimer = clock.schedule(Math.max(0, deadlineMs - clock.now()), () =>
        resolve({ state: "expired" }),
      );
      signal.addEventListener("abort", onAbort, { once: true });
      release = () => {
        clearTimer();
        signal.removeEventListener("abort", onAbort);
      };
      if (signal.aborted) {
        onAbort();
      }
    });
    try {
      const outcome = await Promise.race([
        work.then((value): Guarded<T> => ({ state: "settled", value })),
        interruption,
      ]);
      if (outcome.state !== "settled") {
        void work.then(
          async (value) => {
            await onLateValue?.(value);
          },
          (error: unknown) => {
            log.debug("Executor call failed after it was abandoned", { error: errorMessage(error) });
          },
        );
      }
      return outcome;
    } finally {
      release();
    }
  }

  async function executeAttempt(record: RequestRecord, spec: EvaluationSpec): Promise<void> {
    const { tracker, request } = record;
    const unitId = spec.id;
    if (!tracker.transition(unitId, "initializing")) {
      return;
    }
    const { attempts: attempt, startedAtMs = clock.now() } = tracker.get(unitId);
    if (attempt === 1) {
      await startTrackingRuns(record, spec);
    }
    const deadlineMs = startedAtMs + spec.timeout_minutes * 60_000;
    const expire = () =>
      settleUnit(record, spec, "timeout", `Evaluation exceeded timeout of ${spec.timeout_minutes} minutes`);

    let handle: ExecutorHandle;
    try {
      const submitted = await guard(
        record,
        deadlineMs,
        executor.submit(spec, { requestId: request.request_id, attempt }),
        (lateHandle) => cancelHandle(unitId, lateHandle),
      );
      if (submitted.state === "aborted") {
        return;
      }
      if (submitted.state === "expired") {
        await expire();
        return;
      }
      handle = submitted.value;
    } catch (error) {
      throw new ExecutionError(
        `Executor rejected evaluation ${unitId}: ${errorMessage(error)}`,
        unitId,
        attempt,
        { cause: error },
      );
    }
    record.handles.set(unitId, handle);

    try {
      if (!tracker.transition(unitId, "running")) {
        await cancelHandle(unitId, handle);
        return;
      }
      const timeoutMs = spec.timeout_minutes * 60_000;
      for (;;) {
        if (tracker.get(unitId).status !== "running") {
          return;
        }
        if (clock.now() - startedAtMs > timeoutMs) {
          await cancelHandle(unitId, handle);
          await expire();
          return;
        }
        let poll: Guarded<ExecutorPollResult>;
        try {
          poll = await guard(record, deadlineMs, executor.pollOrAwait(handle));
        } catch (error) {
          await cancelHandle(unitId, handle);
          throw new ExecutionError(
            `Executor failed while running evaluation ${unitId}: ${errorMessage(error)}`,
            unitId,
            attempt,
            { cause: error },
          );
        }
        if (poll.state === "aborted") {
          return;
        }
        if (poll.state === "expired") {
          await cancelHandle(unitId, handle);
          await expire();
          return;
        }
        if (poll.value.state === "finished") {
          if (tracker.get(unitId).status === "running") {
            await completeUnit(record, spec, poll.value.results);
          }
          return;
        }
        await clock.sleep(settings.pollIntervalMs);
      }
    } finally {
      record.handles.delete(unitId);
    }
  }

  async function runUnit(record: RequestRecord, spec: EvaluationSpec): Promise<void> {
    const { tracker } = record;
    const retryBudget = Math.min(spec.retry_attempts, settings.maxRetryAttempts);
    for (;;) {
      try {
        await scheduler.run(() => executeAttempt(record, spec), {
          priority: spec.priority,
          signal: record.abort.signal,
        });
        return;
      } catch (error) {
        const state = tracker.get(spec.id);
        if (isTerminalUnitStatus(state.status)) {
          return;
        }
        if (error instanceof ExecutionError && state.attempts <= retryBudget) {
          log.warn("Retrying evaluation unit", {
            unit_id: spec.id,
            attempt: state.attempts,
            retry_budget: retryBudget,
            error: error.message,
          });
          tracker.transition(spec.id, "pending");
          continue;
        }
        await settleUnit(record, spec, "failed", errorMessage(error));
        return;
      }
    }
  }

  async function finalize(record: RequestRecord): Promise<EvaluationResponse> {
    const response = buildResponse(record);
    const { request } = record;
    log.info("Evaluation request settled", {
      request_id: request.request_id,
      status: response.status,
      completed: response.completed_evaluations,
      failed: response.failed_evaluations,
    });
    if (request.async_mode && request.callback_url) {
      record.callback = await notifier.notify(request.callback_url, response);
    }
    return response;
  }

  /** Drops the oldest settled requests beyond `maxRetainedRequests`. */
  function evictSettled(): void {
    const settled = [...records.values()].filter((record) => record.settled);
    const excess = settled.length - settings.maxRetainedRequests;
    for (const record of settled.slice(0, Math.max(0, excess))) {
      records.delete(record.request.request_id);
      log.debug("Evicted settled evaluation request", { request_id: record.request.request_id });
    }
  }

  async function execute(record: RequestRecord): Promise<EvaluationResponse> {
    await Promise.all(record.request.evaluations.map((spec) => runUnit(record, spec)));
    const response = await finalize(record);
    record.settled = true;
    evictSettled();
    return response;
  }

  function requireRecord(requestId: string): RequestRecord {
    const record = records.get(requestId);
    if (!record) {
      throw new ValidationError("request_id", `unknown evaluation request ${requestId}`);
    }
    return record;
  }

  async function submit(raw: unknown): Promise<EvaluationResponse> {
    const request = resolveEvaluationRequest(raw, settings);
    if (records.has(request.request_id)) {
      throw new ValidationError("request_id", `request ${request.request_id} was already submitted`);
    }
    const createdAtMs = Date.parse(request.created_at);
    const estimateMinutes = estimateCompletionMinutes(request, settings);
    const record: RequestRecord = {
      request,
      tracker: createStatusTracker({
        requestId: request.request_id,
        unitIds: request.evaluations.map((spec) => spec.id),
        now: clock.now,
      }),
      abort: new AbortController(),
      results: new Map(),
      handles: new Map(),
      runIds: new Map(),
      estimatedCompletion: new Date(createdAtMs + estimateMinutes * 60_000).toISOString(),
      updatedAtMs: clock.now(),
      settled: false,
    };
    record.tracker.onTransition((transition) => {
      record.updatedAtMs = transition.atMs;
    });
    records.set(request.request_id, record);

    const experimentId = await tracked("createExperiment", (sink) => sink.createExperiment(request));
    if (experimentId) {
      record.experimentId = experimentId;
      record.experimentUrl = await tracked("getExperimentUrl", (sink) =>
        sink.getExperimentUrl(experimentId),
      );
    }

    const initial = buildResponse(record);
    log.info("Accepted evaluation request", {
      request_id: request.request_id,
      evaluation_count: request.evaluations.length,
      estimated_minutes: estimateMinutes,
    });
    record.completion = execute(record);
    if (!request.async_mode) {
      return record.completion;
    }
    return initial;
  }

  async function cancel(requestId: string): Promise<EvaluationResponse> {
    const record = requireRecord(requestId);
    const flipped = record.tracker.cancelRequest();
    record.abort.abort(new Error(`Evaluation request ${requestId} was cancelled`));
    log.info("Cancelled evaluation request", { request_id: requestId, cancelled_units: flipped.length });
    const byId = new Map(record.request.evaluations.map((evaluation) => [evaluation.id, evaluation]));
    const pending: Promise<void>[] = [];
    for (const unitId of flipped) {
      const handle = record.handles.get(unitId);
      if (handle) {
        pending.push(cancelHandle(unitId, handle));
      }
      const evaluation = byId.get(unitId);
      if (evaluation) {
        const results = unitOutcomeResults(record, evaluation, "cancelled");
        record.results.set(unitId, results);
        pending.push(logResults(results));
      }
    }
    await Promise.all(pending);
    return buildResponse(record);
  }

  return {
    submit,
    getResponse: (requestId) => {
      const record = records.get(requestId);
      return record ? buildResponse(record) : undefined;
    },
    waitForCompletion: async (requestId) => {
      const record = requireRecord(requestId);
      if (!record.completion) {
        return buildResponse(record);
      }
      return record.completion;
    },
    cancel,
    getCallbackDelivery: (requestId) => records.get(requestId)?.callback,
    forget: (requestId) => {
      const record = records.get(requestId);
      if (!record) {
        return false;
      }
      if (!record.settled) {
        throw new ValidationError("request_id", `evaluation request ${requestId} is still running`);
      }
      records.delete(requestId);
      return true;
    },
  };
}
