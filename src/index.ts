export {
  EvalflowError,
  ValidationError,
  ConfigurationError,
  ExecutionError,
  TrackingError,
} from "./errors.js";
export type { TrackingOperation } from "./errors.js";

export {
  BACKEND_TYPES,
  RISK_CATEGORIES,
  MAX_EVALUATIONS_PER_REQUEST,
  BackendTypeSchema,
  RiskCategorySchema,
  BenchmarkSpecSchema,
  BackendSpecSchema,
  EvaluationSpecSchema,
  EvaluationRequestSchema,
  SingleBenchmarkEvaluationRequestSchema,
} from "./models/evaluation.js";
export type {
  BackendType,
  RiskCategory,
  BenchmarkSpec,
  BackendSpec,
  BackendSpecInput,
  EvaluationSpec,
  EvaluationRequest,
  EvaluationRequestInput,
  SingleBenchmarkEvaluationRequest,
} from "./models/evaluation.js";

export {
  PROVIDER_TYPES,
  ProviderTypeSchema,
  CatalogBenchmarkSchema,
  ProviderSchema,
  BenchmarkReferenceSchema,
  CollectionSchema,
  ProvidersDataSchema,
} from "./models/provider.js";
export type {
  ProviderType,
  CatalogBenchmark,
  Provider,
  BenchmarkReference,
  Collection,
  ProvidersData,
  ProviderSummary,
  BenchmarkDetail,
  ListProvidersResponse,
  ListBenchmarksResponse,
  ListCollectionsResponse,
} from "./models/provider.js";
export { createProviderCatalog, loadProviderCatalog } from "./catalog/providerCatalog.js";
export type {
  ProviderCatalog,
  ProviderCatalogOptions,
  BenchmarkFilter,
} from "./catalog/providerCatalog.js";

export {
  UNIT_STATUSES,
  REQUEST_STATUSES,
  UnitStatusSchema,
  RequestStatusSchema,
  EvaluationResultSchema,
  EvaluationResponseSchema,
  isTerminalUnitStatus,
} from "./models/results.js";
export type {
  UnitStatus,
  RequestStatus,
  MetricValue,
  EvaluationResult,
  EvaluationResponse,
} from "./models/results.js";

export { mergeConfig } from "./models/config.js";
export type { ConfigMap } from "./models/config.js";

export {
  EvalSettingsSchema,
  createSettings,
  loadSettings,
  loadSettingsFromEnv,
} from "./config/settings.js";
export type { EvalSettings, EvalSettingsInput, RiskCategoryProfile } from "./config/settings.js";

export {
  validateEvaluationRequest,
  assertValidEvaluationRequest,
} from "./pipeline/validator.js";
export type { ValidationOutcome } from "./pipeline/validator.js";
export { expandRiskCategory } from "./pipeline/riskCategories.js";
export { applyBackendDefaults, applyBenchmarkDefaults } from "./pipeline/defaults.js";
export { parseEvaluationRequest, resolveEvaluationRequest } from "./pipeline/parser.js";

export {
  aggregateMetrics,
  flattenMetricSummaries,
  countBenchmarks,
  estimateCompletionMinutes,
} from "./results/aggregator.js";
export type { MetricSummary } from "./results/aggregator.js";
export {
  buildResultTree,
  flattenResultTree,
  metricsFromNestedResult,
} from "./results/resultTree.js";
export type { ResultNode } from "./results/resultTree.js";

export {
  createStatusTracker,
  computeProgressPercentage,
  deriveRequestStatus,
} from "./tracking/statusTracker.js";
export type { StatusTracker, UnitState, UnitTransition, StatusCounts } from "./tracking/statusTracker.js";
export { buildRunParameters, buildExperimentName } from "./tracking/sink.js";
export type { TrackingSink, TrackingRunContext } from "./tracking/sink.js";
export { createMlflowTrackingSink } from "./tracking/mlflow.js";
export type { MlflowTrackingSinkOptions, MlflowTrackingSink, MlflowRun } from "./tracking/mlflow.js";

export { createCallbackNotifier } from "./callback/notifier.js";
export type { CallbackNotifier, CallbackDelivery } from "./callback/notifier.js";

export { ExecutorBenchmarkResultSchema } from "./execution/executor.js";
export type {
  EvaluationExecutor,
  ExecutionContext,
  ExecutorHandle,
  ExecutorPollResult,
  RawExecutorBenchmarkResult,
} from "./execution/executor.js";
export { createEvaluationService } from "./execution/service.js";
export type {
  EvaluationService,
  EvaluationServiceOptions,
  ServiceClock,
} from "./execution/service.js";

export { createUnitScheduler } from "./utils/scheduler.js";
export type { UnitScheduler, UnitSchedulerRunMetrics } from "./utils/scheduler.js";
export { createLogger } from "./utils/logger.js";
export type { Logger } from "./utils/logger.js";
export { loadDotEnv, loadEnvFromFile } from "./utils/env.js";
