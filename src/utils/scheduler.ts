import { toError } from "../errors.js";

export type UnitSchedulerRunMetrics = {
  readonly enqueuedAtMs: number;
  readonly startedAtMs: number;
  readonly completedAtMs: number;
  readonly queueWaitMs: number;
  readonly runMs: number;
  readonly priority: number;
};

export type UnitSchedulerOptions = {
  /**
   * Hard upper bound for in-flight jobs; everything beyond it waits in the queue.
   */
  readonly maxInFlight?: number;
  readonly onSettled?: (metrics: UnitSchedulerRunMetrics) => void;
  readonly now?: () => number;
};

export type UnitSchedulerRunOptions = {
  /** Higher runs first; equal priorities run in submission order. */
  readonly priority?: number;
  /** Aborting while the job is still queued rejects it without running it. */
  readonly signal?: AbortSignal;
};

export type UnitSchedulerStats = {
  readonly active: number;
  readonly queued: number;
  readonly maxInFlight: number;
};

export type UnitScheduler = {
  run: <T>(fn: () => Promise<T>, options?: UnitSchedulerRunOptions) => Promise<T>;
  stats: () => UnitSchedulerStats;
};

export const DEFAULT_MAX_IN_FLIGHT = 10;

function abortReason(signal: AbortSignal): Error {
  const reason: unknown = signal.reason;
  if (reason instanceof Error) {
    return reason;
  }
  const error = new Error(typeof reason === "string" ? reason : "The job was aborted");
  error.name = "AbortError";
  return error;
}

export function createUnitScheduler(options: UnitSchedulerOptions = {}): UnitScheduler {
  const maxInFlight = Math.max(1, Math.floor(options.maxInFlight ?? DEFAULT_MAX_IN_FLIGHT));
  const now = options.now ?? Date.now;

  let activeCount = 0;

  type QueueJob = {
    readonly priority: number;
    readonly start: () => Promise<void>;
    readonly cancel: (error: Error) => void;
    readonly signal?: AbortSignal;
  };
  const queue: QueueJob[] = [];

  function enqueue(job: QueueJob): void {
    // Insert after the last job with priority >= job.priority (stable order).
    let index = queue.length;
    while (index > 0) {
      const previous = queue[index - 1];
      if (!previous || previous.priority >= job.priority) {
        break;
      }
      index -= 1;
    }
    queue.splice(index, 0, job);
  }

  function drainQueue(): void {
    while (activeCount < maxInFlight && queue.length > 0) {
      const job = queue.shift();
      if (!job) {
        continue;
      }
      if (job.signal?.aborted) {
        job.cancel(abortReason(job.signal));
        continue;
      }
      activeCount += 1;
      void job.start();
    }
  }

  function run<T>(fn: () => Promise<T>, runOptions: UnitSchedulerRunOptions = {}): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const { signal } = runOptions;
      if (signal?.aborted) {
        reject(abortReason(signal));
        return;
      }
      const priority = runOptions.priority ?? 0;
      const enqueuedAtMs = now();

      const onAbort = () => {
        const index = queue.indexOf(job);
        if (index >= 0) {
          queue.splice(index, 1);
          job.cancel(signal ? abortReason(signal) : new Error("The job was aborted"));
        }
      };

      const job: QueueJob = {
        priority,
        signal,
        cancel: (error) => {
          signal?.removeEventListener("abort", onAbort);
          reject(error);
        },
        start: async () => {
          signal?.removeEventListener("abort", onAbort);
          const startedAtMs = now();
          try {
            resolve(await fn());
          } catch (error: unknown) {
            reject(toError(error));
          } finally {
            const completedAtMs = now();
            const metrics: UnitSchedulerRunMetrics = {
              enqueuedAtMs,
              startedAtMs,
              completedAtMs,
              queueWaitMs: Math.max(0, startedAtMs - enqueuedAtMs),
              runMs: Math.max(0, completedAtMs - startedAtMs),
              priority,
            };
            try {
              options.onSettled?.(metrics);
            } catch {
              // Metrics hooks must not interfere with scheduling behavior.
            }
            activeCount -= 1;
            queueMicrotask(drainQueue);
          }
        },
      };

      signal?.addEventListener("abort", onAbort, { once: true });
      enqueue(job);
      drainQueue();
    });
  }

  return {
    run,
    stats: () => ({ active: activeCount, queued: queue.length, maxInFlight }),
  };
}
