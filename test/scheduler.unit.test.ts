import { describe, expect, it } from "vitest";

import { createUnitScheduler, type UnitSchedulerRunMetrics } from "../src/utils/scheduler.js";

type Deferred<T> = {
  readonly promise: Promise<T>;
  resolve: (value: T | PromiseLike<T>) => void;
  reject: (reason?: unknown) => void;
};

function createDeferred<T>(): Deferred<T> {
  let resolve: (value: T | PromiseLike<T>) => void = () => {};
  let reject: (reason?: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

async function flushTick(): Promise<void> {
  await new Promise<void>((resolve) => {
    setTimeout(resolve, 0);
  });
}

describe("createUnitScheduler", () => {
  it("never runs more than maxInFlight jobs at once", async () => {
    const scheduler = createUnitScheduler({ maxInFlight: 2 });
    const gates = [1, 2, 3, 4].map(() => createDeferred<void>());
    const started: number[] = [];

    const jobs = gates.map((gate, index) =>
      scheduler.run(async () => {
        started.push(index + 1);
        await gate.promise;
        return index + 1;
      }),
    );

    await flushTick();
    expect(started).toEqual([1, 2]);
    expect(scheduler.stats()).toEqual({ active: 2, queued: 2, maxInFlight: 2 });

    gates[0]?.resolve();
    await flushTick();
    expect(started).toEqual([1, 2, 3]);

    for (const gate of gates) {
      gate.resolve();
    }
    await expect(Promise.all(jobs)).resolves.toEqual([1, 2, 3, 4]);
    expect(scheduler.stats()).toEqual({ active: 0, queued: 0, maxInFlight: 2 });
  });

  it("admits queued jobs by priority, then submission order", async () => {
    const scheduler = createUnitScheduler({ maxInFlight: 1 });
    const gate = createDeferred<void>();
    const order: string[] = [];
    const record = (name: string) => async () => {
      order.push(name);
    };

    const first = scheduler.run(async () => {
      order.push("first");
      await gate.promise;
    });
    const jobs = [
      scheduler.run(record("low"), { priority: 0 }),
      scheduler.run(record("high-1"), { priority: 5 }),
      scheduler.run(record("high-2"), { priority: 5 }),
      scheduler.run(record("mid"), { priority: 2 }),
    ];

    gate.resolve();
    await Promise.all([first, ...jobs]);
    expect(order).toEqual(["first", "high-1", "high-2", "mid", "low"]);
  });

  it("rejects a queued job when its signal aborts", async () => {
    const scheduler = createUnitScheduler({ maxInFlight: 1 });
    const gate = createDeferred<void>();
    const blocker = scheduler.run(() => gate.promise);

    const controller = new AbortController();
    let ran = false;
    const queued = scheduler.run(
      async () => {
        ran = true;
      },
      { signal: controller.signal },
    );
    controller.abort(new Error("request cancelled"));

    await expect(queued).rejects.toThrow("request cancelled");
    expect(scheduler.stats().queued).toBe(0);

    gate.resolve();
    await blocker;
    expect(ran).toBe(false);
  });

  it("rejects immediately when the signal is already aborted", async () => {
    const scheduler = createUnitScheduler();
    const controller = new AbortController();
    controller.abort("stopped");

    await expect(scheduler.run(async () => 1, { signal: controller.signal })).rejects.toMatchObject({
      name: "AbortError",
      message: "stopped",
    });
  });

  it("wraps non-Error rejections", async () => {
    const scheduler = createUnitScheduler();
    await expect(scheduler.run(() => Promise.reject("plain failure"))).rejects.toThrow(
      new Error("plain failure"),
    );
  });

  it("reports queue wait and run time", async () => {
    let now = 0;
    const settled: UnitSchedulerRunMetrics[] = [];
    const scheduler = createUnitScheduler({
      maxInFlight: 1,
      now: () => now,
      onSettled: (metrics) => {
        settled.push(metrics);
      },
    });
    const gate = createDeferred<void>();
    const first = scheduler.run(() => gate.promise);
    const second = scheduler.run(
      async () => {
        now = 8;
      },
      { priority: 3 },
    );

    now = 5;
    gate.resolve();
    await Promise.all([first, second]);

    expect(settled[1]).toEqual({
      enqueuedAtMs: 0,
      startedAtMs: 5,
      completedAtMs: 8,
      queueWaitMs: 5,
      runMs: 3,
      priority: 3,
    });
  });
});
