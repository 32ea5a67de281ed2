import { z } from "zod";

import { ConfigurationError } from "../errors.js";
import { ConfigMapSchema } from "../models/config.js";
import { BackendTypeSchema, RiskCategorySchema } from "../models/evaluation.js";
import {
  loadDotEnv,
  readEnv,
  readEnvInteger,
  readEnvJson,
  type EnvSource,
} from "../utils/env.js";

export const RiskCategoryProfileSchema = z
  .object({
    benchmarks: z.array(z.string().min(1)).min(1),
    num_fewshot: z.number().int().min(0).nullish(),
    limit: z.number().int().positive().nullish(),
  })
  .refine((profile) => new Set(profile.benchmarks).size === profile.benchmarks.length, {
    message: "benchmark names must be unique",
    path: ["benchmarks"],
  });

export type RiskCategoryProfile = z.output<typeof RiskCategoryProfileSchema>;

const DEFAULT_BACKEND_CONFIGS = {
  "lm-evaluation-harness": {
    image: "eval-harness:latest",
    resources: { cpu: "2", memory: "4Gi" },
    timeout: 3600,
  },
  guidellm: {
    image: "guidellm:latest",
    resources: { cpu: "1", memory: "2Gi" },
    timeout: 1800,
  },
};

// Explicit backend name -> kind policy for backends synthesised from a risk
// category. Backends configured without an entry here cannot be synthesised.
const DEFAULT_BACKEND_KINDS = {
  "lm-evaluation-harness": "lm-evaluation-harness",
  guidellm: "guidellm",
} as const;

const DEFAULT_RISK_CATEGORY_BENCHMARKS = {
  low: { benchmarks: ["hellaswag", "arc_easy"], num_fewshot: 5, limit: 100 },
  medium: {
    benchmarks: ["hellaswag", "arc_easy", "arc_challenge", "winogrande"],
    num_fewshot: 5,
    limit: 500,
  },
  high: {
    benchmarks: ["hellaswag", "arc_easy", "arc_challenge", "winogrande", "mmlu"],
    num_fewshot: 5,
    limit: 1000,
  },
  critical: {
    benchmarks: ["hellaswag", "arc_easy", "arc_challenge", "winogrande", "mmlu", "gsm8k"],
    num_fewshot: 5,
    limit: null,
  },
};

export const EvalSettingsSchema = z.object({
  appName: z.string().default("evalflow"),
  version: z.string().default("0.1.0"),
  mlflowTrackingUri: z.string().default("http://localhost:5000"),
  mlflowExperimentPrefix: z.string().default("eval-hub"),
  mlflowArtifactLocation: z.string().optional(),
  /** Global ceiling on simultaneously in-flight evaluation units. */
  maxConcurrentEvaluations: z.number().int().positive().default(10),
  /** Upper bound applied to every unit's own `retry_attempts`. */
  maxRetryAttempts: z.number().int().min(0).default(3),
  pollIntervalMs: z.number().int().positive().default(5_000),
  /** Settled requests kept for status queries; the oldest are dropped first. */
  maxRetainedRequests: z.number().int().positive().default(1_000),
  callbackTimeoutSeconds: z.number().positive().default(30),
  callbackRetryAttempts: z.number().int().positive().default(3),
  callbackRetryDelayMs: z.number().int().min(0).default(1_000),
  minutesPerBenchmark: z.number().positive().default(5),
  queueingOverheadFactor: z.number().min(1).default(1.5),
  minimumEstimateMinutes: z.number().min(0).default(10),
  backendConfigs: z
    .record(z.string(), ConfigMapSchema)
    .default(() => structuredClone(DEFAULT_BACKEND_CONFIGS)),
  backendKinds: z
    .record(z.string(), BackendTypeSchema)
    .default(() => ({ ...DEFAULT_BACKEND_KINDS })),
  riskCategoryBenchmarks: z
    .partialRecord(RiskCategorySchema, RiskCategoryProfileSchema)
    .default(() => structuredClone(DEFAULT_RISK_CATEGORY_BENCHMARKS)),
});

export type EvalSettings = z.output<typeof EvalSettingsSchema>;
export type EvalSettingsInput = z.input<typeof EvalSettingsSchema>;

function formatSettingsIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.map(String).join(".") : "settings";
      return `${path}: ${issue.message}`;
    })
    .join("; ");
}

/**
 * Builds a settings object. Every component receives settings explicitly, so
 * tests and callers that need different values simply build another one.
 */
export function createSettings(overrides: EvalSettingsInput = {}): EvalSettings {
  const parsed = EvalSettingsSchema.safeParse(overrides);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid settings: ${formatSettingsIssues(parsed.error)}`);
  }
  return parsed.data;
}

function withoutUndefined(values: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}

export function loadSettingsFromEnv(
  env: EnvSource = process.env,
  overrides: EvalSettingsInput = {},
): EvalSettings {
  let fromEnv: Record<string, unknown>;
  try {
    fromEnv = withoutUndefined({
      appName: readEnv(env, "APP_NAME"),
      version: readEnv(env, "VERSION"),
      mlflowTrackingUri: readEnv(env, "MLFLOW_TRACKING_URI"),
      mlflowExperimentPrefix: readEnv(env, "MLFLOW_EXPERIMENT_PREFIX"),
      mlflowArtifactLocation: readEnv(env, "MLFLOW_ARTIFACT_LOCATION"),
      maxConcurrentEvaluations: readEnvInteger(env, "MAX_CONCURRENT_EVALUATIONS"),
      maxRetryAttempts: readEnvInteger(env, "MAX_RETRY_ATTEMPTS"),
      pollIntervalMs: readEnvInteger(env, "POLL_INTERVAL_MS"),
      maxRetainedRequests: readEnvInteger(env, "MAX_RETAINED_REQUESTS"),
      callbackTimeoutSeconds: readEnvInteger(env, "CALLBACK_TIMEOUT_SECONDS"),
      callbackRetryAttempts: readEnvInteger(env, "CALLBACK_RETRY_ATTEMPTS"),
      backendConfigs: readEnvJson(env, "BACKEND_CONFIGS"),
      backendKinds: readEnvJson(env, "BACKEND_KINDS"),
      riskCategoryBenchmarks: readEnvJson(env, "RISK_CATEGORY_BENCHMARKS"),
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Invalid environment: ${message}`);
  }
  const parsed = EvalSettingsSchema.safeParse({ ...fromEnv, ...overrides });
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid settings: ${formatSettingsIssues(parsed.error)}`);
  }
  return parsed.data;
}

/** Loads `.env` from the working directory, then reads settings from `process.env`. */
export function loadSettings(overrides: EvalSettingsInput = {}): EvalSettings {
  loadDotEnv();
  return loadSettingsFromEnv(process.env, overrides);
}
