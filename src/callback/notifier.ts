import { fetch as undiciFetch, type Dispatcher } from "undici";

import { errorMessage } from "../errors.js";
import { createLogger } from "../utils/logger.js";

const log = createLogger("callback");

export type CallbackDelivery = {
  readonly delivered: boolean;
  readonly attempts: number;
  readonly statusCode?: number;
  readonly error?: string;
};

export type CallbackNotifier = {
  /** Never throws; persistent failure is reported in the returned delivery. */
  readonly notify: (url: string, payload: unknown) => Promise<CallbackDelivery>;
};

export type CallbackNotifierOptions = {
  readonly timeoutMs: number;
  readonly maxAttempts: number;
  readonly retryDelayMs?: number;
  readonly dispatcher?: Dispatcher;
  readonly sleep?: (ms: number) => Promise<void>;
};

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}

export function createCallbackNotifier(options: CallbackNotifierOptions): CallbackNotifier {
  const maxAttempts = Math.max(1, Math.floor(options.maxAttempts));
  const retryDelayMs = Math.max(0, options.retryDelayMs ?? 0);
  const wait = options.sleep ?? sleep;

  async function attempt(
    url: string,
    body: string,
  ): Promise<{ readonly ok: boolean; readonly statusCode?: number; readonly error?: string }> {
    try {
      const response = await undiciFetch(url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body,
        signal: AbortSignal.timeout(options.timeoutMs),
        ...(options.dispatcher ? { dispatcher: options.dispatcher } : {}),
      });
      // Drain the body so the connection can be reused.
      await response.arrayBuffer();
      if (response.ok) {
        return { ok: true, statusCode: response.status };
      }
      return {
        ok: false,
        statusCode: response.status,
        error: `Callback returned HTTP ${response.status}`,
      };
    } catch (error) {
      return { ok: false, error: errorMessage(error) };
    }
  }

  async function notify(url: string, payload: unknown): Promise<CallbackDelivery> {
    const body = JSON.stringify(payload);
    let last: { readonly statusCode?: number; readonly error?: string } = {};
    for (let attemptNumber = 1; attemptNumber <= maxAttempts; attemptNumber += 1) {
      const outcome = await attempt(url, body);
      if (outcome.ok) {
        log.info("Delivered completion callback", { url, attempts: attemptNumber });
        return { delivered: true, attempts: attemptNumber, statusCode: outcome.statusCode };
      }
      last = outcome;
      log.warn("Completion callback attempt failed", {
        url,
        attempt: attemptNumber,
        status_code: outcome.statusCode,
        error: outcome.error,
      });
      if (attemptNumber < maxAttempts && retryDelayMs > 0) {
        await wait(retryDelayMs);
      }
    }
    log.error("Giving up on completion callback", { url, attempts: maxAttempts, error: last.error });
    return {
      delivered: false,
      attempts: maxAttempts,
      ...(last.statusCode !== undefined ? { statusCode: last.statusCode } : {}),
      ...(last.error !== undefined ? { error: last.error } : {}),
    };
  }

  return { notify };
}
