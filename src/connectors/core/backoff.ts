import {
  CancelledError,
  isTransientError,
  RetriesExhaustedError,
  ThrottlingSignal,
  TransportTimeoutError,
} from "./errors.js";
import type { BackoffConfig, Sleep } from "./types.js";

export const sleep: Sleep = (ms, signal) =>
  new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });

// ─── Controller ───

export type BackoffState =
  | { kind: "idle" }
  | { kind: "waiting"; durationMs: number };

/**
 * Decides how long to wait after a failed provider call.
 *
 * Throttling signals carry their own wait, which is honoured as-is and does
 * not count as an attempt. Unexplained failures wait `base * 2^n` (capped),
 * and the n-th consecutive failure with n >= maxAttempts is fatal.
 */
export class BackoffController {
  private readonly config: BackoffConfig;
  private readonly sleepFn: Sleep;
  private failures = 0;
  private current: BackoffState = { kind: "idle" };

  constructor(config: BackoffConfig, sleepFn: Sleep = sleep) {
    this.config = config;
    this.sleepFn = sleepFn;
  }

  get state(): BackoffState {
    return this.current;
  }

  get attempts(): number {
    return this.failures;
  }

  nextDelayMs(): number {
    return Math.min(
      this.config.baseDelayMs * 2 ** this.failures,
      this.config.maxDelayMs,
    );
  }

  async onThrottle(waitMs: number, signal?: AbortSignal): Promise<void> {
    await this.wait(waitMs, signal);
  }

  async onFailure(err: unknown, signal?: AbortSignal): Promise<void> {
    const delay = this.nextDelayMs();
    this.failures++;
    if (this.failures >= this.config.maxAttempts) {
      throw new RetriesExhaustedError(this.failures, { cause: err });
    }
    await this.wait(delay, signal);
  }

  onSuccess(): void {
    this.failures = 0;
  }

  private async wait(durationMs: number, signal?: AbortSignal): Promise<void> {
    this.current = { kind: "waiting", durationMs };
    try {
      await this.sleepFn(durationMs, signal);
    } finally {
      this.current = { kind: "idle" };
    }
  }
}

// ─── Helpers ───

export interface BackoffOptions {
  signal?: AbortSignal;
  retryOn?: (err: unknown) => boolean;
  onWait?: (event: { reason: "throttled" | "failed"; error: unknown }) => void;
}

/**
 * Run `fn` until it succeeds, letting the controller pace the retries.
 * Errors that are neither throttling nor retryable propagate untouched.
 */
export async function withBackoff<T>(
  controller: BackoffController,
  fn: () => Promise<T>,
  opts: BackoffOptions = {},
): Promise<T> {
  const retryOn = opts.retryOn ?? isTransientError;

  for (;;) {
    try {
      const result = await fn();
      controller.onSuccess();
      return result;
    } catch (err) {
      if (err instanceof ThrottlingSignal) {
        opts.onWait?.({ reason: "throttled", error: err });
        await controller.onThrottle(err.waitMs, opts.signal);
        continue;
      }
      if (!retryOn(err)) throw err;
      opts.onWait?.({ reason: "failed", error: err });
      await controller.onFailure(err, opts.signal);
    }
  }
}

/**
 * Bound `fn` by `timeoutMs`. On expiry the signal handed to `fn` is aborted
 * and the call rejects with a TransportTimeoutError.
 */
export async function withTimeout<T>(
  label: string,
  timeoutMs: number,
  fn: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const ac = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const err = new TransportTimeoutError(label, timeoutMs);
      // Settle first, so a call that rejects on abort cannot win the race.
      reject(err);
      ac.abort(err);
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(ac.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}
