import { fetch as undiciFetch, type Dispatcher } from "undici";
import { z } from "zod";

import { TrackingError, errorMessage, type TrackingOperation } from "../errors.js";
import type { EvaluationRequest } from "../models/evaluation.js";
import type { EvaluationResult, MetricValue } from "../models/results.js";
import { aggregateMetrics, flattenMetricSummaries } from "../results/aggregator.js";
import { createLogger } from "../utils/logger.js";

import { buildExperimentName, type TrackingRunContext, type TrackingSink } from "./sink.js";

const log = createLogger("mlflow");

const DEFAULT_MLFLOW_TIMEOUT_MS = 30_000;
// MLflow rejects longer parameter values.
export const MAX_PARAM_VALUE_LENGTH = 500;
export const MAX_PARAMS_PER_BATCH = 100;
export const MAX_METRICS_PER_BATCH = 1000;
export const MAX_TAGS_PER_BATCH = 100;
/** Params, metrics and tags together. */
export const MAX_ENTRIES_PER_BATCH = 1000;

const GetExperimentResponseSchema = z.object({
  experiment: z.object({ experiment_id: z.string() }).loose(),
});

const CreateExperimentResponseSchema = z.object({ experiment_id: z.string() });

const CreateRunResponseSchema = z.object({
  run: z.object({ info: z.object({ run_id: z.string() }).loose() }).loose(),
});

const RunSchema = z
  .object({
    info: z.object({ run_id: z.string(), status: z.string().optional() }).loose(),
    data: z
      .object({
        metrics: z.array(z.object({ key: z.string(), value: z.number() }).loose()).default(() => []),
      })
      .loose()
      .default(() => ({ metrics: [] })),
  })
  .loose();

const SearchRunsResponseSchema = z.object({
  runs: z.array(RunSchema).default(() => []),
});

const GetRunResponseSchema = z.object({ run: RunSchema });

/** A run as read back from the tracking server, with its latest metric values. */
export type MlflowRun = {
  readonly runId: string;
  readonly status?: string;
  readonly metrics: Readonly<Record<string, number>>;
};

export type MlflowTrackingSink = TrackingSink & {
  readonly getRunUrl: (experimentId: string, runId: string) => Promise<string>;
  readonly searchRuns: (
    experimentId: string,
    query?: { readonly filter?: string; readonly maxResults?: number },
  ) => Promise<MlflowRun[]>;
  readonly getRunMetrics: (runId: string) => Promise<Record<string, number>>;
  /** `<metric>_mean`, `_min`, `_max` and `_count` across every run of the experiment. */
  readonly aggregateExperimentMetrics: (experimentId: string) => Promise<Record<string, MetricValue>>;
};

type KeyValue = { readonly key: string; readonly value: string };
type MetricEntry = {
  readonly key: string;
  readonly value: number;
  readonly timestamp: number;
  readonly step: number;
};

export type MlflowTrackingSinkOptions = {
  readonly trackingUri: string;
  readonly experimentPrefix: string;
  readonly artifactLocation?: string;
  readonly serviceVersion?: string;
  readonly timeoutMs?: number;
  /** Custom undici dispatcher (connection pooling, proxies, tests). */
  readonly dispatcher?: Dispatcher;
  readonly now?: () => number;
};

function toRun(run: z.output<typeof RunSchema>): MlflowRun {
  const metrics: Record<string, number> = {};
  for (const metric of run.data.metrics) {
    metrics[metric.key] = metric.value;
  }
  return {
    runId: run.info.run_id,
    ...(run.info.status ? { status: run.info.status } : {}),
    metrics,
  };
}

function toKeyValues(values: Readonly<Record<string, string>>): KeyValue[] {
  return Object.entries(values).map(([key, value]) => ({
    key,
    value: value.length > MAX_PARAM_VALUE_LENGTH ? value.slice(0, MAX_PARAM_VALUE_LENGTH) : value,
  }));
}

export function createMlflowTrackingSink(options: MlflowTrackingSinkOptions): MlflowTrackingSink {
  const baseUrl = options.trackingUri.replace(/\/+$/u, "");
  const timeoutMs = options.timeoutMs ?? DEFAULT_MLFLOW_TIMEOUT_MS;
  const now = options.now ?? Date.now;

  async function call(
    operation: TrackingOperation,
    method: "GET" | "POST",
    endpoint: string,
    body?: unknown,
  ): Promise<{ readonly status: number; readonly payload: unknown }> {
    let response: Awaited<ReturnType<typeof undiciFetch>>;
    try {
      response = await undiciFetch(`${baseUrl}/api/2.0/mlflow/${endpoint}`, {
        method,
        headers: { Accept: "application/json", "Content-Type": "application/json" },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(timeoutMs),
        ...(options.dispatcher ? { dispatcher: options.dispatcher } : {}),
      });
    } catch (error) {
      throw new TrackingError(operation, `MLflow request ${endpoint} failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }
    const text = await response.text();
    let payload: unknown = {};
    if (text) {
      try {
        payload = JSON.parse(text) as unknown;
      } catch {
        payload = { raw: text };
      }
    }
    return { status: response.status, payload };
  }

  async function callOk(
    operation: TrackingOperation,
    endpoint: string,
    body: unknown,
    method: "GET" | "POST" = "POST",
  ): Promise<unknown> {
    const { status, payload } = await call(operation, method, endpoint, body);
    if (status < 200 || status >= 300) {
      throw new TrackingError(
        operation,
        `MLflow ${endpoint} returned ${status}: ${JSON.stringify(payload)}`,
      );
    }
    return payload;
  }

  function parsePayload<T>(
    operation: TrackingOperation,
    schema: z.ZodType<T>,
    payload: unknown,
    endpoint: string,
  ): T {
    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      throw new TrackingError(operation, `Unexpected MLflow ${endpoint} response`, {
        cause: parsed.error,
      });
    }
    return parsed.data;
  }

  async function logBatch(
    operation: TrackingOperation,
    runId: string,
    batch: {
      readonly params?: readonly KeyValue[];
      readonly metrics?: readonly MetricEntry[];
      readonly tags?: readonly KeyValue[];
    },
  ): Promise<void> {
    const params = batch.params ?? [];
    const metrics = batch.metrics ?? [];
    const tags = batch.tags ?? [];
    let paramOffset = 0;
    let metricOffset = 0;
    let tagOffset = 0;
    while (paramOffset < params.length || metricOffset < metrics.length || tagOffset < tags.length) {
      const chunkParams = params.slice(paramOffset, paramOffset + MAX_PARAMS_PER_BATCH);
      const chunkTags = tags.slice(tagOffset, tagOffset + MAX_TAGS_PER_BATCH);
      const metricRoom = Math.min(
        MAX_METRICS_PER_BATCH,
        MAX_ENTRIES_PER_BATCH - chunkParams.length - chunkTags.length,
      );
      const chunkMetrics = metrics.slice(metricOffset, metricOffset + metricRoom);
      paramOffset += chunkParams.length;
      metricOffset += chunkMetrics.length;
      tagOffset += chunkTags.length;
      await callOk(operation, "runs/log-batch", {
        run_id: runId,
        params: chunkParams,
        metrics: chunkMetrics,
        tags: chunkTags,
      });
    }
  }

  async function createExperiment(request: EvaluationRequest): Promise<string> {
    const name = buildExperimentName(request, options.experimentPrefix);
    const existing = await call(
      "createExperiment",
      "GET",
      `experiments/get-by-name?experiment_name=${encodeURIComponent(name)}`,
    );
    if (existing.status >= 200 && existing.status < 300) {
      const { experiment } = parsePayload(
        "createExperiment",
        GetExperimentResponseSchema,
        existing.payload,
        "experiments/get-by-name",
      );
      log.info("Using existing MLflow experiment", {
        experiment_name: name,
        experiment_id: experiment.experiment_id,
      });
      return experiment.experiment_id;
    }
    if (existing.status !== 404) {
      throw new TrackingError(
        "createExperiment",
        `MLflow experiments/get-by-name returned ${existing.status}: ${JSON.stringify(existing.payload)}`,
      );
    }

    const created = parsePayload(
      "createExperiment",
      CreateExperimentResponseSchema,
      await callOk("createExperiment", "experiments/create", {
        name,
        ...(options.artifactLocation ? { artifact_location: options.artifactLocation } : {}),
        tags: toKeyValues({
          request_id: request.request_id,
          created_at: request.created_at,
          evaluation_count: String(request.evaluations.length),
          ...(options.serviceVersion ? { service_version: options.serviceVersion } : {}),
        }),
      }),
      "experiments/create",
    );
    log.info("Created new MLflow experiment", {
      experiment_name: name,
      experiment_id: created.experiment_id,
    });
    return created.experiment_id;
  }

  async function startRun(experimentId: string, run: TrackingRunContext): Promise<string> {
    const { evaluation, backend, benchmark } = run;
    const runName = `${evaluation.model_name}_${backend.name}_${benchmark.name}`;
    const tags: Record<string, string> = {
      "mlflow.runName": runName,
      evaluation_id: evaluation.id,
      model_name: evaluation.model_name,
      backend_name: backend.name,
      benchmark_name: benchmark.name,
      priority: String(evaluation.priority),
      started_at: new Date(now()).toISOString(),
    };
    if (evaluation.risk_category) {
      tags.risk_category = evaluation.risk_category;
    }
    const created = parsePayload(
      "startRun",
      CreateRunResponseSchema,
      await callOk("startRun", "runs/create", {
        experiment_id: experimentId,
        run_name: runName,
        start_time: now(),
        tags: toKeyValues(tags),
      }),
      "runs/create",
    );
    const runId = created.run.info.run_id;
    log.info("Started MLflow run", { run_id: runId, run_name: runName, evaluation_id: evaluation.id });
    return runId;
  }

  async function logParameters(
    runId: string,
    params: Readonly<Record<string, string>>,
  ): Promise<void> {
    await logBatch("logParameters", runId, { params: toKeyValues(params) });
  }

  async function logResult(runId: string, result: EvaluationResult): Promise<void> {
    const timestamp = now();
    const metrics: MetricEntry[] = [];
    const params: Record<string, string> = { status: result.status };
    for (const [name, value] of Object.entries(result.metrics)) {
      if (typeof value === "number") {
        metrics.push({ key: name, value, timestamp, step: 0 });
      } else {
        params[`metric_${name}`] = value;
      }
    }
    if (result.duration_seconds != null) {
      metrics.push({ key: "duration_seconds", value: result.duration_seconds, timestamp, step: 0 });
    }
    if (result.started_at) {
      params.started_at = result.started_at;
    }
    if (result.completed_at) {
      params.completed_at = result.completed_at;
    }
    if (result.error_message) {
      params.error_message = result.error_message;
    }
    const tags: Record<string, string> = {};
    for (const [name, location] of Object.entries(result.artifacts)) {
      tags[`artifact.${name}`] = location;
    }

    await logBatch("logResult", runId, {
      metrics,
      params: toKeyValues(params),
      tags: toKeyValues(tags),
    });
    await callOk("logResult", "runs/update", {
      run_id: runId,
      status: result.status === "completed" ? "FINISHED" : "FAILED",
      end_time: timestamp,
    });
    log.info("Logged evaluation result to MLflow", {
      run_id: runId,
      evaluation_id: result.evaluation_id,
      status: result.status,
    });
  }

  async function searchRuns(
    experimentId: string,
    query: { readonly filter?: string; readonly maxResults?: number } = {},
  ): Promise<MlflowRun[]> {
    const { runs } = parsePayload(
      "searchRuns",
      SearchRunsResponseSchema,
      await callOk("searchRuns", "runs/search", {
        experiment_ids: [experimentId],
        ...(query.filter ? { filter: query.filter } : {}),
        max_results: query.maxResults ?? 100,
      }),
      "runs/search",
    );
    return runs.map(toRun);
  }

  async function getRunMetrics(runId: string): Promise<Record<string, number>> {
    const { run } = parsePayload(
      "getRunMetrics",
      GetRunResponseSchema,
      await callOk("getRunMetrics", `runs/get?run_id=${encodeURIComponent(runId)}`, undefined, "GET"),
      "runs/get",
    );
    return { ...toRun(run).metrics };
  }

  async function aggregateExperimentMetrics(experimentId: string): Promise<Record<string, MetricValue>> {
    const runs = await searchRuns(experimentId);
    return flattenMetricSummaries(aggregateMetrics(runs));
  }

  return {
    createExperiment,
    startRun,
    logParameters,
    logResult,
    getExperimentUrl: async (experimentId) => `${baseUrl}/#/experiments/${experimentId}`,
    getRunUrl: async (experimentId, runId) => `${baseUrl}/#/experiments/${experimentId}/runs/${runId}`,
    searchRuns,
    getRunMetrics,
    aggregateExperimentMetrics,
  };
}
