import { MockAgent } from "undici";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { createCallbackNotifier } from "../src/callback/notifier.js";

const ORIGIN = "http://hooks.test";
const CALLBACK_URL = `${ORIGIN}/evaluations/done`;

describe("createCallbackNotifier", () => {
  let agent: MockAgent;
  let sleeps: number[];

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
    sleeps = [];
  });

  afterEach(async () => {
    await agent.close();
  });

  function createNotifier(maxAttempts: number) {
    return createCallbackNotifier({
      timeoutMs: 1_000,
      maxAttempts,
      retryDelayMs: 250,
      dispatcher: agent,
      sleep: async (ms) => {
        sleeps.push(ms);
      },
    });
  }

  it("posts the payload as JSON", async () => {
    const received: unknown[] = [];
    agent
      .get(ORIGIN)
      .intercept({ path: "/evaluations/done", method: "POST" })
      .reply((options) => {
        received.push(typeof options.body === "string" ? JSON.parse(options.body) : undefined);
        return { statusCode: 204, data: "" };
      });

    const delivery = await createNotifier(3).notify(CALLBACK_URL, { request_id: "req-1", status: "completed" });

    expect(delivery).toEqual({ delivered: true, attempts: 1, statusCode: 204 });
    expect(received).toEqual([{ request_id: "req-1", status: "completed" }]);
    expect(sleeps).toEqual([]);
  });

  it("retries after a failed attempt", async () => {
    const pool = agent.get(ORIGIN);
    pool.intercept({ path: "/evaluations/done", method: "POST" }).reply(500, "unavailable");
    pool.intercept({ path: "/evaluations/done", method: "POST" }).reply(200, "ok");

    const delivery = await createNotifier(3).notify(CALLBACK_URL, {});

    expect(delivery).toEqual({ delivered: true, attempts: 2, statusCode: 200 });
    expect(sleeps).toEqual([250]);
  });

  it("reports persistent failure without throwing", async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: "/evaluations/done", method: "POST" })
      .reply(503, "busy")
      .times(3);

    const delivery = await createNotifier(3).notify(CALLBACK_URL, {});

    expect(delivery).toEqual({
      delivered: false,
      attempts: 3,
      statusCode: 503,
      error: "Callback returned HTTP 503",
    });
    expect(sleeps).toEqual([250, 250]);
  });

  it("reports network errors", async () => {
    const delivery = await createNotifier(1).notify(CALLBACK_URL, {});

    expect(delivery.delivered).toBe(false);
    expect(delivery.attempts).toBe(1);
    expect(delivery.statusCode).toBeUndefined();
    expect(delivery.error).toBe("fetch failed");
  });
});
