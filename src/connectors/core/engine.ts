import * as path from "node:path";
import {
  BackoffController,
  sleep as defaultSleep,
  withBackoff,
  withTimeout,
} from "./backoff.js";
import { type MediaAssignment, MediaClassifier } from "./classifier.js";
import {
  CancelledError,
  errorMessage,
  RetriesExhaustedError,
  RetrievalAbortedError,
} from "./errors.js";
import { ExportWriter, toExportRecord } from "./export-writer.js";
import { iterateHistory } from "./history.js";
import { silentLogger } from "./logger.js";
import { createOutputWriter } from "./output.js";
import { createRateLimiter } from "./rate-limiter.js";
import { DownloadSession } from "./session.js";
import { normalizeChannelIdentifier } from "./slugify.js";
import type {
  ArchiveConfig,
  ArchiveMessage,
  ChannelHandle,
  HistoryTransport,
  Logger,
  OutputWriter,
  RateLimiter,
  RunStatus,
  RunSummary,
  Sleep,
} from "./types.js";

const PROGRESS_EVERY = 100;

export interface RetrievalEngineOptions<H extends ChannelHandle> {
  transport: HistoryTransport<H>;
  config: ArchiveConfig;
  logger?: Logger;
  rateLimiter?: RateLimiter;
  sleep?: Sleep;
  now?: () => Date;
}

export interface DownloadRequest {
  /** `@name`, `name` or a t.me link. Ignored when resuming. */
  channel?: string;
  /** Total records wanted. On resume, overrides the stored limit. */
  limit?: number | null;
  /** Run directory of an earlier, interrupted run. */
  resumeDir?: string;
  /** Stop request. Honoured between messages, never mid-file. */
  signal?: AbortSignal;
}

interface RunContext<H extends ChannelHandle> {
  handle: H;
  session: DownloadSession;
  writer: OutputWriter;
  exports: ExportWriter;
  classifier: MediaClassifier;
  signal: AbortSignal;
}

export class RetrievalEngine<H extends ChannelHandle = ChannelHandle> {
  private readonly transport: HistoryTransport<H>;
  private readonly config: ArchiveConfig;
  private readonly logger: Logger;
  private readonly rateLimiter: RateLimiter;
  private readonly sleep: Sleep;
  private readonly now: () => Date;

  constructor(opts: RetrievalEngineOptions<H>) {
    this.transport = opts.transport;
    this.config = opts.config;
    this.logger = opts.logger ?? silentLogger;
    this.sleep = opts.sleep ?? defaultSleep;
    this.rateLimiter =
      opts.rateLimiter ?? createRateLimiter(opts.config.rateLimiter);
    this.now = opts.now ?? (() => new Date());
  }

  /**
   * Archive a channel, or continue an interrupted archive. Resolution errors
   * and exhausted retries reject; everything else ends in a summary.
   */
  async download(request: DownloadRequest): Promise<RunSummary> {
    const startTime = Date.now();
    const signal = request.signal ?? new AbortController().signal;
    const ctx = await this.open(request, signal);
    const { session } = ctx;

    this.logger.info(`Saving to: ${session.outputDir}`);
    if (session.cursor > 0) {
      this.logger.info(`Resuming after message ${session.cursor}`, {
        messages: session.stats.messages,
      });
    }

    let status: RunStatus = "completed";
    let fatal: RetrievalAbortedError | null = null;

    try {
      status = await this.run(ctx);
    } catch (err) {
      if (err instanceof CancelledError) {
        status = "cancelled";
      } else {
        status = "aborted";
        fatal = new RetrievalAbortedError(session.cursor, { cause: err });
        this.logger.error("Retrieval aborted", {
          cursor: session.cursor,
          error: errorMessage(err),
        });
      }
    }

    await session.finalize(status);
    const summary: RunSummary = {
      channel: session.channel.title,
      status,
      outputDir: path.resolve(session.outputDir),
      cursor: session.cursor,
      stats: { ...session.stats },
      durationMs: Date.now() - startTime,
    };
    this.logSummary(summary);

    if (fatal) throw fatal;
    return summary;
  }

  // ─── Setup ───

  private async open(
    request: DownloadRequest,
    signal: AbortSignal,
  ): Promise<RunContext<H>> {
    const classifier = new MediaClassifier();

    if (request.resumeDir) {
      const session = await DownloadSession.resume(request.resumeDir, {
        limit: request.limit,
      });
      const handle = await this.resolve(
        session.channel.identifier,
        signal,
        session.cursor,
      );
      if (handle.id !== session.channel.id) {
        throw new Error(
          `${request.resumeDir} belongs to channel ${session.channel.id}, but "${session.channel.identifier}" now resolves to ${handle.id}`,
        );
      }

      const writer = createOutputWriter(session.outputDir);
      await writer.ensureLayout();
      const partials = await writer.removePartials();
      if (partials > 0) {
        this.logger.info(`Removed ${partials} incomplete media files`);
      }

      const { writer: exports, records } = await ExportWriter.open(
        session.outputDir,
        session.exportOffsets,
      );
      for (const record of records) {
        if (record.media_path) classifier.restore(record.media_path);
      }
      return { handle, session, writer, exports, classifier, signal };
    }

    if (!request.channel) {
      throw new Error("A channel identifier is required");
    }
    const identifier = normalizeChannelIdentifier(request.channel);
    this.logger.info(`Fetching channel: ${identifier}`);
    const handle = await this.resolve(identifier, signal, 0);

    const now = this.now();
    const outputDir = DownloadSession.allocateDir(
      this.config.outputDir,
      handle.title || identifier,
      now,
    );
    const exports = await ExportWriter.create(outputDir, {
      channelTitle: handle.title || identifier,
      startedAt: now.toISOString(),
    });
    const session = await DownloadSession.start({
      outputDir,
      identifier,
      channel: handle,
      limit: request.limit ?? null,
      now,
      exportOffsets: exports.offsets,
    });

    const writer = createOutputWriter(session.outputDir);
    await writer.ensureLayout();
    return { handle, session, writer, exports, classifier, signal };
  }

  /** Resolution errors propagate as-is; exhausted retries abort the run. */
  private async resolve(
    identifier: string,
    signal: AbortSignal,
    cursor: number,
  ): Promise<H> {
    const backoff = new BackoffController(this.config.backoff, this.sleep);
    try {
      return await withBackoff(
        backoff,
        async () => {
          await this.rateLimiter.acquire(signal);
          return withTimeout(
            `resolving ${identifier}`,
            this.config.pageTimeoutMs,
            () => this.transport.resolveChannel(identifier),
          );
        },
        {
          signal,
          onWait: ({ error }) =>
            this.logger.warn(`Resolving ${identifier} failed, retrying`, {
              error: errorMessage(error),
            }),
        },
      );
    } catch (err) {
      if (err instanceof RetriesExhaustedError) {
        throw new RetrievalAbortedError(cursor, { cause: err });
      }
      throw err;
    }
  }

  // ─── Loop ───

  private async run(ctx: RunContext<H>): Promise<RunStatus> {
    const { session, signal } = ctx;
    if (session.limitReached()) return "limited";

    const messages = iterateHistory({
      transport: this.transport,
      handle: ctx.handle,
      afterId: session.cursor,
      pageSize: this.config.pageSize,
      remaining: () => session.remaining(),
      backoff: new BackoffController(this.config.backoff, this.sleep),
      rateLimiter: this.rateLimiter,
      pageTimeoutMs: this.config.pageTimeoutMs,
      logger: this.logger,
      signal,
    });

    for await (const message of messages) {
      if (signal.aborted) return "cancelled";
      await this.processMessage(ctx, message);
      if (session.limitReached()) return "limited";
    }
    return signal.aborted ? "cancelled" : "completed";
  }

  /**
   * Save one message. Media and export failures are counted and logged, and
   * the cursor still moves on; only a stop request during a retry wait
   * leaves the message unprocessed.
   */
  private async processMessage(
    ctx: RunContext<H>,
    message: ArchiveMessage,
  ): Promise<void> {
    const { session, exports, writer, classifier } = ctx;

    if (message.service) {
      session.advance(message.id);
      await session.checkpoint();
      return;
    }

    let saved: MediaAssignment | null = null;
    if (message.media) {
      const assignment = classifier.assign(message.id, message.media);
      try {
        await this.downloadMedia(ctx, message, assignment);
        saved = assignment;
      } catch (err) {
        classifier.release(assignment);
        if (err instanceof CancelledError) throw err;
        session.recordError();
        this.logger.error(
          `Error downloading media from message ${message.id}`,
          { error: errorMessage(err) },
        );
      }
    }

    try {
      const record = toExportRecord(message, saved?.relativePath ?? null);
      const offsets = await exports.append(record);
      session.recordMessage(message.id, saved?.category ?? null, offsets);
      const count = session.stats.messages;
      if (count % PROGRESS_EVERY === 0) {
        this.logger.progress(count, "Downloaded messages");
      }
    } catch (err) {
      if (saved) {
        await writer.remove(saved.relativePath);
        classifier.release(saved);
      }
      session.recordError();
      session.advance(message.id);
      this.logger.error(`Failed to export message ${message.id}`, {
        error: errorMessage(err),
      });
    }
    await session.checkpoint();
  }

  private async downloadMedia(
    ctx: RunContext<H>,
    message: ArchiveMessage,
    assignment: MediaAssignment,
  ): Promise<void> {
    const media = message.media;
    if (!media) return;
    const backoff = new BackoffController(this.config.backoff, this.sleep);
    await withBackoff(
      backoff,
      async () => {
        await this.rateLimiter.acquire(ctx.signal);
        return withTimeout(
          `media of message ${message.id}`,
          this.config.mediaTimeoutMs,
          (timeoutSignal) =>
            ctx.writer.writeStream(
              assignment.relativePath,
              this.transport.fetchMedia(media, timeoutSignal),
              { signal: timeoutSignal, expectedBytes: media.size },
            ),
        );
      },
      {
        signal: ctx.signal,
        onWait: ({ reason, error }) =>
          this.logger.warn(
            reason === "throttled"
              ? `Rate limited on media of message ${message.id}, waiting`
              : `Media of message ${message.id} failed, retrying`,
            { error: errorMessage(error) },
          ),
      },
    );
  }

  // ─── Summary ───

  private logSummary(summary: RunSummary): void {
    const { stats } = summary;
    this.logger.info(`Download ${summary.status}`, {
      channel: summary.channel,
      cursor: summary.cursor,
      durationMs: summary.durationMs,
    });
    this.logger.info(`Total messages: ${stats.messages}`);
    this.logger.info(`Photos: ${stats.photos}`);
    this.logger.info(`Videos: ${stats.videos}`);
    this.logger.info(`Documents: ${stats.documents}`);
    this.logger.info(`Audio files: ${stats.audio}`);
    this.logger.info(`Errors: ${stats.errors}`);
    this.logger.info(`Saved to: ${summary.outputDir}`);
  }
}
