import { type BackoffController, withBackoff, withTimeout } from "./backoff.js";
import { errorMessage } from "./errors.js";
import type {
  ArchiveMessage,
  ChannelHandle,
  HistoryTransport,
  Logger,
  RateLimiter,
} from "./types.js";

export interface HistoryOptions<H extends ChannelHandle> {
  transport: HistoryTransport<H>;
  handle: H;
  /** Start strictly after this message id. */
  afterId: number;
  pageSize: number;
  /** Messages the consumer still wants, or null for all of them. */
  remaining: () => number | null;
  backoff: BackoffController;
  rateLimiter: RateLimiter;
  pageTimeoutMs: number;
  logger: Logger;
  signal: AbortSignal;
}

/**
 * Lazily walk a channel oldest-first, one page at a time. The next page is
 * only requested once every message of the current one has been consumed,
 * so restarting from the consumer's cursor never skips or repeats a message.
 *
 * Ends quietly when the history is exhausted, the consumer wants no more,
 * or a stop is requested between pages.
 */
export async function* iterateHistory<H extends ChannelHandle>(
  opts: HistoryOptions<H>,
): AsyncGenerator<ArchiveMessage> {
  const { transport, handle, backoff, rateLimiter, logger, signal } = opts;
  let lastId = opts.afterId;

  for (;;) {
    if (signal.aborted) return;

    const wanted = opts.remaining();
    if (wanted === 0) return;
    const limit = wanted === null ? opts.pageSize : Math.min(opts.pageSize, wanted);
    const afterId = lastId;

    const page = await withBackoff(
      backoff,
      async () => {
        await rateLimiter.acquire(signal);
        return withTimeout(
          `history page after ${afterId}`,
          opts.pageTimeoutMs,
          (timeoutSignal) =>
            transport.fetchHistoryPage(
              handle,
              { afterId, limit },
              timeoutSignal,
            ),
        );
      },
      {
        signal,
        onWait: ({ reason, error }) =>
          logger.warn(
            reason === "throttled"
              ? "Rate limited while fetching history, waiting"
              : "History fetch failed, backing off",
            { afterId, attempt: backoff.attempts, error: errorMessage(error) },
          ),
      },
    );

    if (page.length === 0) return;

    let advanced = false;
    for (const message of page) {
      if (message.id <= lastId) {
        logger.warn("Skipping out-of-order message", {
          id: message.id,
          after: lastId,
        });
        continue;
      }
      lastId = message.id;
      advanced = true;
      yield message;
    }

    // A page of nothing but stale ids would repeat forever.
    if (!advanced) return;
  }
}
