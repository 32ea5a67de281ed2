import type { z } from "zod";

import type { EvalSettings } from "../config/settings.js";
import { ValidationError } from "../errors.js";
import {
  EvaluationRequestSchema,
  copyEvaluationRequest,
  copyEvaluationSpec,
  type EvaluationRequest,
  type EvaluationSpec,
} from "../models/evaluation.js";
import { createLogger } from "../utils/logger.js";

import { applyBackendDefaults } from "./defaults.js";
import { expandRiskCategory } from "./riskCategories.js";
import { assertValidEvaluationRequest } from "./validator.js";

const log = createLogger("parser");

/** `["evaluations", 2, "backends", 0]` -> `evaluations[2].backends[0]`. */
export function formatIssuePath(path: ReadonlyArray<PropertyKey>): string {
  let output = "";
  for (const segment of path) {
    if (typeof segment === "number") {
      output += `[${segment}]`;
    } else {
      const key = String(segment);
      output += output ? `.${key}` : key;
    }
  }
  return output || "request";
}

function toValidationError(error: z.ZodError): ValidationError {
  const issue = error.issues[0];
  if (!issue) {
    return new ValidationError("request", "invalid request");
  }
  return new ValidationError(formatIssuePath(issue.path), issue.message);
}

/** Structural parse of a wire payload; materialises documented defaults. */
export function parseEvaluationRequest(raw: unknown): EvaluationRequest {
  const parsed = EvaluationRequestSchema.safeParse(raw);
  if (!parsed.success) {
    throw toValidationError(parsed.error);
  }
  return parsed.data;
}

function resolveEvaluationSpec(spec: EvaluationSpec, settings: EvalSettings): EvaluationSpec {
  let backends = spec.backends;
  if (spec.risk_category && backends.length === 0) {
    log.info("Generating backends from risk category", {
      evaluation_id: spec.id,
      risk_category: spec.risk_category,
    });
    backends = expandRiskCategory(spec.risk_category, spec.model_name, settings);
  }
  return copyEvaluationSpec(spec, {
    backends: backends.map((backend) => applyBackendDefaults(backend, settings)),
  });
}

/**
 * Parses, validates, expands risk categories and applies defaults. The input
 * is never mutated; throws `ValidationError` or `ConfigurationError` before
 * anything is executed.
 */
export function resolveEvaluationRequest(raw: unknown, settings: EvalSettings): EvaluationRequest {
  const request = parseEvaluationRequest(raw);
  log.info("Parsing evaluation request", {
    request_id: request.request_id,
    evaluation_count: request.evaluations.length,
  });

  assertValidEvaluationRequest(request, settings);

  const resolved = copyEvaluationRequest(request, {
    evaluations: request.evaluations.map((spec) => resolveEvaluationSpec(spec, settings)),
  });

  log.info("Successfully parsed evaluation request", {
    request_id: resolved.request_id,
    total_backends: resolved.evaluations.reduce((sum, spec) => sum + spec.backends.length, 0),
  });
  return resolved;
}
