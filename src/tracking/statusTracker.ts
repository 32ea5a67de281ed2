import {
  isTerminalUnitStatus,
  type RequestStatus,
  type UnitStatus,
} from "../models/results.js";
import { createLogger } from "../utils/logger.js";

const log = createLogger("status");

const ALLOWED_TRANSITIONS: Readonly<Record<UnitStatus, readonly UnitStatus[]>> = {
  pending: ["initializing", "failed", "cancelled"],
  initializing: ["running", "pending", "failed", "cancelled", "timeout"],
  running: ["completing", "timeout", "pending", "failed", "cancelled"],
  completing: ["completed", "pending", "failed", "cancelled"],
  completed: [],
  failed: [],
  cancelled: [],
  timeout: [],
};

export type UnitState = {
  readonly unitId: string;
  readonly status: UnitStatus;
  /** Number of times the unit has been dispatched. */
  readonly attempts: number;
  /** Entry into `initializing` for the current attempt (epoch ms). */
  readonly startedAtMs?: number;
  readonly finishedAtMs?: number;
  readonly error?: string;
};

export type UnitTransition = {
  readonly unitId: string;
  readonly from: UnitStatus;
  readonly to: UnitStatus;
  readonly atMs: number;
  readonly error?: string;
};

export type StatusCounts = {
  readonly total: number;
  readonly completed: number;
  /** `failed` plus `timeout`. */
  readonly failed: number;
  readonly cancelled: number;
  readonly terminal: number;
};

export type StatusTracker = {
  readonly requestId: string;
  readonly unitIds: readonly string[];
  readonly get: (unitId: string) => UnitState;
  readonly list: () => readonly UnitState[];
  /**
   * Applies a transition. Returns `false` (and changes nothing) when the unit
   * is already terminal; throws on a transition the state machine forbids.
   */
  readonly transition: (
    unitId: string,
    to: UnitStatus,
    details?: { readonly error?: string },
  ) => boolean;
  /** Cancels every non-terminal unit and marks the request as cancelled. */
  readonly cancelRequest: () => readonly string[];
  readonly isCancelled: () => boolean;
  readonly aggregateStatus: () => RequestStatus;
  readonly progressPercentage: () => number;
  readonly counts: () => StatusCounts;
  readonly isSettled: () => boolean;
  readonly onTransition: (listener: (transition: UnitTransition) => void) => () => void;
};

export function countStatuses(statuses: readonly UnitStatus[]): StatusCounts {
  let completed = 0;
  let failed = 0;
  let cancelled = 0;
  for (const status of statuses) {
    if (status === "completed") {
      completed += 1;
    } else if (status === "failed" || status === "timeout") {
      failed += 1;
    } else if (status === "cancelled") {
      cancelled += 1;
    }
  }
  return {
    total: statuses.length,
    completed,
    failed,
    cancelled,
    terminal: completed + failed + cancelled,
  };
}

export function computeProgressPercentage(statuses: readonly UnitStatus[]): number {
  if (statuses.length === 0) {
    return 0;
  }
  return (countStatuses(statuses).terminal / statuses.length) * 100;
}

/**
 * Request status derived from its units: nothing terminal until every unit
 * is, `completed` only when all units completed, otherwise `failed` when any
 * unit failed or timed out, otherwise `cancelled`.
 */
export function deriveRequestStatus(statuses: readonly UnitStatus[]): RequestStatus {
  if (statuses.length === 0) {
    return "pending";
  }
  if (statuses.some((status) => !isTerminalUnitStatus(status))) {
    return statuses.every((status) => status === "pending") ? "pending" : "running";
  }
  const counts = countStatuses(statuses);
  if (counts.completed === counts.total) {
    return "completed";
  }
  if (counts.failed > 0) {
    return "failed";
  }
  return "cancelled";
}

type MutableUnitState = {
  -readonly [K in keyof UnitState]: UnitState[K];
};

export function createStatusTracker(options: {
  readonly requestId: string;
  readonly unitIds: readonly string[];
  readonly now?: () => number;
}): StatusTracker {
  const now = options.now ?? Date.now;
  const units = new Map<string, MutableUnitState>();
  for (const unitId of options.unitIds) {
    if (units.has(unitId)) {
      throw new Error(`Duplicate evaluation unit id ${unitId}`);
    }
    units.set(unitId, { unitId, status: "pending", attempts: 0 });
  }
  const listeners = new Set<(transition: UnitTransition) => void>();
  let cancelled = false;
  let progress = 0;

  function requireUnit(unitId: string): MutableUnitState {
    const unit = units.get(unitId);
    if (!unit) {
      throw new Error(`Unknown evaluation unit ${unitId} for request ${options.requestId}`);
    }
    return unit;
  }

  function statuses(): UnitStatus[] {
    return [...units.values()].map((unit) => unit.status);
  }

  function transition(
    unitId: string,
    to: UnitStatus,
    details: { readonly error?: string } = {},
  ): boolean {
    const unit = requireUnit(unitId);
    const from = unit.status;
    if (isTerminalUnitStatus(from)) {
      return false;
    }
    if (!ALLOWED_TRANSITIONS[from].includes(to)) {
      throw new Error(`Illegal transition ${from} -> ${to} for evaluation unit ${unitId}`);
    }
    const atMs = now();
    unit.status = to;
    if (to === "initializing") {
      unit.attempts += 1;
      unit.startedAtMs = atMs;
      unit.finishedAtMs = undefined;
      unit.error = undefined;
    } else if (to === "pending") {
      unit.startedAtMs = undefined;
    }
    if (details.error !== undefined) {
      unit.error = details.error;
    }
    if (isTerminalUnitStatus(to)) {
      unit.finishedAtMs = atMs;
    }
    progress = Math.max(progress, computeProgressPercentage(statuses()));

    const event: UnitTransition = {
      unitId,
      from,
      to,
      atMs,
      ...(details.error !== undefined ? { error: details.error } : {}),
    };
    for (const listener of listeners) {
      try {
        listener(event);
      } catch (error) {
        log.warn("Transition listener failed", {
          request_id: options.requestId,
          unit_id: unitId,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
    return true;
  }

  return {
    requestId: options.requestId,
    unitIds: [...units.keys()],
    get: (unitId) => ({ ...requireUnit(unitId) }),
    list: () => [...units.values()].map((unit) => ({ ...unit })),
    transition,
    cancelRequest: () => {
      cancelled = true;
      const flipped: string[] = [];
      for (const unit of units.values()) {
        if (transition(unit.unitId, "cancelled")) {
          flipped.push(unit.unitId);
        }
      }
      return flipped;
    },
    isCancelled: () => cancelled,
    aggregateStatus: () => deriveRequestStatus(statuses()),
    progressPercentage: () => progress,
    counts: () => countStatuses(statuses()),
    isSettled: () => statuses().every((status) => isTerminalUnitStatus(status)),
    onTransition: (listener) => {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
  };
}
