import { z } from "zod";

export const ConfigMapSchema = z.record(z.string(), z.unknown());

/** Free-form key/value configuration supplied by callers or settings. */
export type ConfigMap = Readonly<Record<string, unknown>>;

/**
 * Shallow merge: keys in `overrides` win, keys only present in `defaults` are
 * kept. Neither argument is mutated.
 */
export function mergeConfig(defaults: ConfigMap, overrides: ConfigMap): ConfigMap {
  return { ...defaults, ...overrides };
}
