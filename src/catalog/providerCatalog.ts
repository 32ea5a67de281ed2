import fs from "node:fs";

import type { z } from "zod";

import type { EvalSettings } from "../config/settings.js";
import { ConfigurationError, ValidationError, errorMessage } from "../errors.js";
import {
  SingleBenchmarkEvaluationRequestSchema,
  type BackendSpecInput,
  type BackendType,
  type EvaluationRequestInput,
} from "../models/evaluation.js";
import {
  ProvidersDataSchema,
  type BenchmarkDetail,
  type CatalogBenchmark,
  type Collection,
  type ListBenchmarksResponse,
  type ListCollectionsResponse,
  type ListProvidersResponse,
  type Provider,
  type ProvidersData,
} from "../models/provider.js";
import { formatIssuePath } from "../pipeline/parser.js";
import { createLogger } from "../utils/logger.js";

const log = createLogger("catalog");

export type ProviderCatalogOptions = {
  /**
   * Backend kind per provider id. Providers without an entry run as
   * `nemo-evaluator` backends when they are nemo providers, else as `custom`.
   */
  readonly backendKinds?: EvalSettings["backendKinds"];
};

export type BenchmarkFilter = {
  readonly providerId?: string;
  readonly category?: string;
  readonly tag?: string;
};

export type ProviderCatalog = {
  readonly listProviders: () => ListProvidersResponse;
  readonly getProvider: (providerId: string) => Provider | undefined;
  readonly listBenchmarks: (filter?: BenchmarkFilter) => ListBenchmarksResponse;
  readonly getBenchmark: (providerId: string, benchmarkId: string) => BenchmarkDetail | undefined;
  readonly listCollections: () => ListCollectionsResponse;
  readonly getCollection: (collectionId: string) => Collection | undefined;
  /** One backend per provider, in order of first reference, ready for an evaluation's `backends`. */
  readonly resolveCollection: (collectionId: string) => BackendSpecInput[];
  /** Expands a single-benchmark request into a full request payload for the service. */
  readonly buildSingleBenchmarkRequest: (
    providerId: string,
    benchmarkId: string,
    raw: unknown,
  ) => EvaluationRequestInput;
};

function describeIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) {
    return "invalid";
  }
  return `${issue.path.length > 0 ? formatIssuePath(issue.path) : "catalog"}: ${issue.message}`;
}

function baseUrlOf(provider: Provider): { readonly base_url?: string } {
  return provider.base_url ? { base_url: provider.base_url } : {};
}

function checkCatalog(data: ProvidersData): void {
  const benchmarkIds = new Map<string, Set<string>>();
  for (const provider of data.providers) {
    if (benchmarkIds.has(provider.provider_id)) {
      throw new ConfigurationError(`Duplicate provider id '${provider.provider_id}'`);
    }
    const ids = new Set<string>();
    for (const benchmark of provider.benchmarks) {
      if (ids.has(benchmark.benchmark_id)) {
        throw new ConfigurationError(
          `Provider '${provider.provider_id}' lists benchmark '${benchmark.benchmark_id}' twice`,
        );
      }
      ids.add(benchmark.benchmark_id);
    }
    benchmarkIds.set(provider.provider_id, ids);
  }

  const collectionIds = new Set<string>();
  for (const collection of data.collections) {
    if (collectionIds.has(collection.collection_id)) {
      throw new ConfigurationError(`Duplicate collection id '${collection.collection_id}'`);
    }
    collectionIds.add(collection.collection_id);
    const references = new Set<string>();
    for (const { provider_id: providerId, benchmark_id: benchmarkId } of collection.benchmarks) {
      if (!benchmarkIds.get(providerId)?.has(benchmarkId)) {
        throw new ConfigurationError(
          `Collection '${collection.collection_id}' references unknown benchmark ${providerId}/${benchmarkId}`,
        );
      }
      const key = `${providerId}/${benchmarkId}`;
      if (references.has(key)) {
        throw new ConfigurationError(`Collection '${collection.collection_id}' references ${key} twice`);
      }
      references.add(key);
    }
  }
}

/** Validates catalog data and indexes it. Throws `ConfigurationError` on malformed or inconsistent data. */
export function createProviderCatalog(
  raw: unknown,
  options: ProviderCatalogOptions = {},
): ProviderCatalog {
  const parsed = ProvidersDataSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid provider catalog: ${describeIssue(parsed.error)}`);
  }
  const data = parsed.data;
  checkCatalog(data);

  const providers = new Map(data.providers.map((provider) => [provider.provider_id, provider]));
  const benchmarks = new Map(
    data.providers.map((provider) => [
      provider.provider_id,
      new Map(provider.benchmarks.map((benchmark) => [benchmark.benchmark_id, benchmark])),
    ]),
  );
  const collections = new Map(data.collections.map((collection) => [collection.collection_id, collection]));

  function toDetail(provider: Provider, benchmark: CatalogBenchmark): BenchmarkDetail {
    return {
      ...benchmark,
      provider_id: provider.provider_id,
      provider_name: provider.provider_name,
      provider_type: provider.provider_type,
      ...baseUrlOf(provider),
    };
  }

  function backendType(provider: Provider): BackendType {
    const configured = options.backendKinds?.[provider.provider_id];
    if (configured) {
      return configured;
    }
    return provider.provider_type === "nemo-evaluator" ? "nemo-evaluator" : "custom";
  }

  function toBackend(
    provider: Provider,
    entries: readonly CatalogBenchmark[],
  ): BackendSpecInput {
    return {
      name: provider.provider_id,
      type: backendType(provider),
      ...(provider.base_url ? { endpoint: provider.base_url } : {}),
      benchmarks: entries.map((benchmark) => ({
        name: benchmark.benchmark_id,
        tasks: [benchmark.benchmark_id],
        num_fewshot: benchmark.num_few_shot,
      })),
    };
  }

  function listBenchmarks(filter: BenchmarkFilter = {}): ListBenchmarksResponse {
    const details: BenchmarkDetail[] = [];
    const included: string[] = [];
    for (const provider of data.providers) {
      if (filter.providerId !== undefined && provider.provider_id !== filter.providerId) {
        continue;
      }
      const matching = provider.benchmarks.filter(
        (benchmark) =>
          (filter.category === undefined || benchmark.category === filter.category) &&
          (filter.tag === undefined || benchmark.tags.includes(filter.tag)),
      );
      if (matching.length === 0) {
        continue;
      }
      included.push(provider.provider_id);
      details.push(...matching.map((benchmark) => toDetail(provider, benchmark)));
    }
    return { benchmarks: details, total_count: details.length, providers_included: included };
  }

  function resolveCollection(collectionId: string): BackendSpecInput[] {
    const collection = collections.get(collectionId);
    if (!collection) {
      throw new ValidationError("collection_id", `unknown collection '${collectionId}'`);
    }
    const grouped = new Map<string, CatalogBenchmark[]>();
    for (const reference of collection.benchmarks) {
      const benchmark = benchmarks.get(reference.provider_id)?.get(reference.benchmark_id);
      if (!benchmark) {
        continue;
      }
      const entries = grouped.get(reference.provider_id) ?? [];
      entries.push(benchmark);
      grouped.set(reference.provider_id, entries);
    }
    const backends: BackendSpecInput[] = [];
    for (const [providerId, entries] of grouped) {
      const provider = providers.get(providerId);
      if (provider) {
        backends.push(toBackend(provider, entries));
      }
    }
    log.debug("Resolved benchmark collection", {
      collection_id: collectionId,
      backends: backends.length,
      benchmarks: collection.benchmarks.length,
    });
    return backends;
  }

  function buildSingleBenchmarkRequest(
    providerId: string,
    benchmarkId: string,
    raw: unknown,
  ): EvaluationRequestInput {
    const provider = providers.get(providerId);
    if (!provider) {
      throw new ValidationError("provider_id", `unknown provider '${providerId}'`);
    }
    const benchmark = benchmarks.get(providerId)?.get(benchmarkId);
    if (!benchmark) {
      throw new ValidationError("benchmark_id", `unknown benchmark '${benchmarkId}' for provider '${providerId}'`);
    }
    const parsed = SingleBenchmarkEvaluationRequestSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ValidationError(
        issue ? formatIssuePath(issue.path) : "request",
        issue?.message ?? "invalid request",
      );
    }
    const single = parsed.data;
    const backend = toBackend(provider, [benchmark]);
    return {
      evaluations: [
        {
          model_name: single.model_name,
          model_configuration: single.model_configuration,
          timeout_minutes: single.timeout_minutes,
          retry_attempts: single.retry_attempts,
          backends: [
            {
              ...backend,
              benchmarks: [
                {
                  name: benchmark.benchmark_id,
                  tasks: [benchmark.benchmark_id],
                  num_fewshot: single.num_fewshot ?? benchmark.num_few_shot,
                  ...(single.limit != null ? { limit: single.limit } : {}),
                },
              ],
            },
          ],
        },
      ],
      ...(single.experiment_name ? { experiment_name: single.experiment_name } : {}),
      tags: single.tags,
      async_mode: single.async_mode,
      ...(single.callback_url ? { callback_url: single.callback_url } : {}),
    };
  }

  log.info("Loaded provider catalog", {
    providers: data.providers.length,
    collections: data.collections.length,
  });

  return {
    listProviders: () => ({
      providers: data.providers.map((provider) => ({
        provider_id: provider.provider_id,
        provider_name: provider.provider_name,
        description: provider.description,
        provider_type: provider.provider_type,
        ...baseUrlOf(provider),
        benchmark_count: provider.benchmarks.length,
      })),
      total_providers: data.providers.length,
      total_benchmarks: data.providers.reduce((sum, provider) => sum + provider.benchmarks.length, 0),
    }),
    getProvider: (providerId) => providers.get(providerId),
    listBenchmarks,
    getBenchmark: (providerId, benchmarkId) => {
      const provider = providers.get(providerId);
      const benchmark = benchmarks.get(providerId)?.get(benchmarkId);
      return provider && benchmark ? toDetail(provider, benchmark) : undefined;
    },
    listCollections: () => ({
      collections: data.collections,
      total_collections: data.collections.length,
    }),
    getCollection: (collectionId) => collections.get(collectionId),
    resolveCollection,
    buildSingleBenchmarkRequest,
  };
}

/** Reads a JSON catalog file (`{ providers, collections }`). */
export function loadProviderCatalog(
  filePath: string,
  options: ProviderCatalogOptions = {},
): ProviderCatalog {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (error) {
    throw new ConfigurationError(`Cannot read provider catalog ${filePath}: ${errorMessage(error)}`);
  }
  return createProviderCatalog(raw, options);
}
