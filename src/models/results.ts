import { z } from "zod";

export const UNIT_STATUSES = [
  "pending",
  "initializing",
  "running",
  "completing",
  "completed",
  "failed",
  "cancelled",
  "timeout",
] as const;

export const UnitStatusSchema = z.enum(UNIT_STATUSES);
export type UnitStatus = z.infer<typeof UnitStatusSchema>;

export const TERMINAL_UNIT_STATUSES: ReadonlySet<UnitStatus> = new Set<UnitStatus>([
  "completed",
  "failed",
  "cancelled",
  "timeout",
]);

export function isTerminalUnitStatus(status: UnitStatus): boolean {
  return TERMINAL_UNIT_STATUSES.has(status);
}

export const REQUEST_STATUSES = ["pending", "running", "completed", "failed", "cancelled"] as const;

export const RequestStatusSchema = z.enum(REQUEST_STATUSES);
export type RequestStatus = z.infer<typeof RequestStatusSchema>;

export const MetricValueSchema = z.union([z.number(), z.string()]);
export type MetricValue = z.infer<typeof MetricValueSchema>;

export const EvaluationResultSchema = z
  .object({
    evaluation_id: z.string(),
    backend_name: z.string(),
    benchmark_name: z.string(),
    status: UnitStatusSchema,
    metrics: z.record(z.string(), MetricValueSchema).default(() => ({})),
    artifacts: z.record(z.string(), z.string()).default(() => ({})),
    error_message: z.string().nullish(),
    started_at: z.string().nullish(),
    completed_at: z.string().nullish(),
    duration_seconds: z.number().nullish(),
    mlflow_run_id: z.string().nullish(),
  })
  .loose();

export type EvaluationResult = z.output<typeof EvaluationResultSchema>;

export const EvaluationResponseSchema = z
  .object({
    request_id: z.string(),
    status: RequestStatusSchema,
    total_evaluations: z.number().int(),
    completed_evaluations: z.number().int().default(0),
    failed_evaluations: z.number().int().default(0),
    results: z.array(EvaluationResultSchema).default(() => []),
    aggregated_metrics: z.record(z.string(), MetricValueSchema).default(() => ({})),
    experiment_url: z.string().nullish(),
    created_at: z.string(),
    updated_at: z.string(),
    estimated_completion: z.string().nullish(),
    progress_percentage: z.number().min(0).max(100).default(0),
  })
  .loose();

export type EvaluationResponse = z.output<typeof EvaluationResponseSchema>;

/** Seconds between two ISO timestamps, or `undefined` if either is missing. */
export function deriveDurationSeconds(
  startedAt: string | null | undefined,
  completedAt: string | null | undefined,
): number | undefined {
  if (!startedAt || !completedAt) {
    return undefined;
  }
  const start = Date.parse(startedAt);
  const end = Date.parse(completedAt);
  if (!Number.isFinite(start) || !Number.isFinite(end)) {
    return undefined;
  }
  return Math.max(0, (end - start) / 1000);
}
