import { randomUUID } from "node:crypto";

import { z } from "zod";

import { ConfigMapSchema } from "./config.js";

export const BACKEND_TYPES = [
  "lm-evaluation-harness",
  "guidellm",
  "nemo-evaluator",
  "custom",
] as const;

export const BackendTypeSchema = z.enum(BACKEND_TYPES);
export type BackendType = z.infer<typeof BackendTypeSchema>;

export const RISK_CATEGORIES = ["low", "medium", "high", "critical"] as const;

export const RiskCategorySchema = z.enum(RISK_CATEGORIES);
export type RiskCategory = z.infer<typeof RiskCategorySchema>;

export const MAX_EVALUATIONS_PER_REQUEST = 100;

// Structural checks only: emptiness, ranges and cross-references are the
// validator's job so that it can report them with an indexed path.

export const BenchmarkSpecSchema = z
  .object({
    name: z.string(),
    tasks: z.array(z.string()),
    num_fewshot: z.number().int().nullish(),
    batch_size: z.number().int().nullish(),
    limit: z.number().int().nullish(),
    device: z.string().nullish(),
    config: ConfigMapSchema.default(() => ({})),
  })
  .loose();

export type BenchmarkSpec = z.output<typeof BenchmarkSpecSchema>;

export const BackendSpecSchema = z
  .object({
    name: z.string(),
    type: BackendTypeSchema,
    endpoint: z.string().nullish(),
    config: ConfigMapSchema.default(() => ({})),
    benchmarks: z.array(BenchmarkSpecSchema),
  })
  .loose();

export type BackendSpec = z.output<typeof BackendSpecSchema>;
export type BackendSpecInput = z.input<typeof BackendSpecSchema>;

export const EvaluationSpecSchema = z
  .object({
    id: z.uuid().default(() => randomUUID()),
    name: z.string().nullish(),
    description: z.string().nullish(),
    model_name: z.string(),
    model_configuration: ConfigMapSchema.default(() => ({})),
    backends: z.array(BackendSpecSchema).default(() => []),
    risk_category: RiskCategorySchema.nullish(),
    priority: z.number().int().default(0),
    timeout_minutes: z.number().int().default(60),
    retry_attempts: z.number().int().default(3),
    metadata: ConfigMapSchema.default(() => ({})),
  })
  .loose();

export type EvaluationSpec = z.output<typeof EvaluationSpecSchema>;

export const EvaluationRequestSchema = z
  .object({
    request_id: z.uuid().default(() => randomUUID()),
    evaluations: z.array(EvaluationSpecSchema),
    experiment_name: z.string().nullish(),
    tags: z.record(z.string(), z.string()).default(() => ({})),
    async_mode: z.boolean().default(true),
    callback_url: z.string().nullish(),
    created_at: z.iso.datetime({ offset: true }).default(() => new Date().toISOString()),
  })
  .loose();

export type EvaluationRequest = z.output<typeof EvaluationRequestSchema>;

/** Raw request as accepted on the wire, before defaults are materialised. */
export type EvaluationRequestInput = z.input<typeof EvaluationRequestSchema>;

/** One benchmark from the provider catalog, run against one model. */
export const SingleBenchmarkEvaluationRequestSchema = z
  .object({
    model_name: z.string().min(1),
    model_configuration: ConfigMapSchema.default(() => ({})),
    timeout_minutes: z.number().int().positive().default(60),
    retry_attempts: z.number().int().min(0).default(3),
    limit: z.number().int().positive().nullish(),
    num_fewshot: z.number().int().min(0).nullish(),
    experiment_name: z.string().nullish(),
    tags: z.record(z.string(), z.string()).default(() => ({})),
    async_mode: z.boolean().default(true),
    callback_url: z.string().nullish(),
  })
  .loose();

export type SingleBenchmarkEvaluationRequest = z.output<typeof SingleBenchmarkEvaluationRequestSchema>;

export function copyBenchmarkSpec(
  spec: BenchmarkSpec,
  overrides: Partial<BenchmarkSpec> = {},
): BenchmarkSpec {
  return { ...spec, tasks: [...spec.tasks], ...overrides };
}

export function copyBackendSpec(
  spec: BackendSpec,
  overrides: Partial<BackendSpec> = {},
): BackendSpec {
  return { ...spec, benchmarks: [...spec.benchmarks], ...overrides };
}

export function copyEvaluationSpec(
  spec: EvaluationSpec,
  overrides: Partial<EvaluationSpec> = {},
): EvaluationSpec {
  return { ...spec, backends: [...spec.backends], ...overrides };
}

export function copyEvaluationRequest(
  request: EvaluationRequest,
  overrides: Partial<Omit<EvaluationRequest, "created_at">> = {},
): EvaluationRequest {
  return { ...request, evaluations: [...request.evaluations], ...overrides };
}
