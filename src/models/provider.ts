import { z } from "zod";

export const PROVIDER_TYPES = ["builtin", "nemo-evaluator"] as const;

export const ProviderTypeSchema = z.enum(PROVIDER_TYPES);
export type ProviderType = z.infer<typeof ProviderTypeSchema>;

export const CatalogBenchmarkSchema = z
  .object({
    benchmark_id: z.string().min(1),
    name: z.string(),
    description: z.string(),
    category: z.string(),
    metrics: z.array(z.string()),
    num_few_shot: z.number().int().min(0),
    dataset_size: z.number().int().nullish(),
    tags: z.array(z.string()).default(() => []),
  })
  .loose();

export type CatalogBenchmark = z.output<typeof CatalogBenchmarkSchema>;

export const ProviderSchema = z
  .object({
    provider_id: z.string().min(1),
    provider_name: z.string(),
    description: z.string(),
    provider_type: ProviderTypeSchema,
    base_url: z.string().nullish(),
    benchmarks: z.array(CatalogBenchmarkSchema),
  })
  .loose()
  .refine((provider) => provider.provider_type !== "nemo-evaluator" || provider.base_url != null, {
    message: "base_url is required for nemo-evaluator providers",
    path: ["base_url"],
  });

export type Provider = z.output<typeof ProviderSchema>;

export const BenchmarkReferenceSchema = z
  .object({
    provider_id: z.string().min(1),
    benchmark_id: z.string().min(1),
  })
  .loose();

export type BenchmarkReference = z.output<typeof BenchmarkReferenceSchema>;

export const CollectionSchema = z
  .object({
    collection_id: z.string().min(1),
    name: z.string(),
    description: z.string(),
    benchmarks: z.array(BenchmarkReferenceSchema),
  })
  .loose();

export type Collection = z.output<typeof CollectionSchema>;

export const ProvidersDataSchema = z
  .object({
    providers: z.array(ProviderSchema),
    collections: z.array(CollectionSchema).default(() => []),
  })
  .loose();

export type ProvidersData = z.output<typeof ProvidersDataSchema>;

// `base_url` is left out when a provider has none.

export type ProviderSummary = {
  readonly provider_id: string;
  readonly provider_name: string;
  readonly description: string;
  readonly provider_type: ProviderType;
  readonly base_url?: string;
  readonly benchmark_count: number;
};

export type BenchmarkDetail = CatalogBenchmark & {
  readonly provider_id: string;
  readonly provider_name: string;
  readonly provider_type: ProviderType;
  readonly base_url?: string;
};

export type ListProvidersResponse = {
  readonly providers: readonly ProviderSummary[];
  readonly total_providers: number;
  readonly total_benchmarks: number;
};

export type ListBenchmarksResponse = {
  readonly benchmarks: readonly BenchmarkDetail[];
  readonly total_count: number;
  readonly providers_included: readonly string[];
};

export type ListCollectionsResponse = {
  readonly collections: readonly Collection[];
  readonly total_collections: number;
};
