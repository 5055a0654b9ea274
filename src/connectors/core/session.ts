import * as fs from "node:fs";
import * as path from "node:path";
import { channelDirName, runTimestamp } from "./slugify.js";
import { StateManager } from "./state.js";
import type {
  ChannelHandle,
  ExportOffsets,
  MediaCategory,
  PersistedSession,
  RunStatus,
  SessionStats,
} from "./types.js";

export const STATE_FILE = path.join("_meta", "state.json");

const CATEGORY_STATS: Record<MediaCategory, keyof SessionStats> = {
  photo: "photos",
  video: "videos",
  document: "documents",
  audio: "audio",
};

export function emptyStats(): SessionStats {
  return { messages: 0, photos: 0, videos: 0, documents: 0, audio: 0, errors: 0 };
}

export interface StartSessionOptions {
  outputDir: string;
  identifier: string;
  channel: ChannelHandle;
  limit: number | null;
  now: Date;
  /** Byte sizes of the freshly created export files. */
  exportOffsets: ExportOffsets;
}

/**
 * All mutable state of one run: where it writes, how far it got, and what
 * it has counted. Every change reaches disk through `checkpoint()`.
 */
export class DownloadSession {
  readonly outputDir: string;
  private readonly store: StateManager;
  private state: PersistedSession;

  private constructor(
    outputDir: string,
    store: StateManager,
    state: PersistedSession,
  ) {
    this.outputDir = outputDir;
    this.store = store;
    this.state = state;
  }

  /** Create `<root>/<channel>_<YYYYMMDD_HHMMSS>`, suffixed if taken. */
  static allocateDir(outputRoot: string, title: string, now: Date): string {
    const base = `${channelDirName(title)}_${runTimestamp(now)}`;
    let outputDir = path.join(outputRoot, base);
    for (let n = 2; fs.existsSync(outputDir); n++) {
      outputDir = path.join(outputRoot, `${base}_${n}`);
    }
    fs.mkdirSync(outputDir, { recursive: true });
    return outputDir;
  }

  static async start(opts: StartSessionOptions): Promise<DownloadSession> {
    const startedAt = opts.now.toISOString();
    const session = new DownloadSession(
      opts.outputDir,
      new StateManager(path.join(opts.outputDir, STATE_FILE)),
      {
        channel: {
          identifier: opts.identifier,
          id: opts.channel.id,
          title: opts.channel.title,
        },
        startedAt,
        updatedAt: startedAt,
        limit: opts.limit,
        cursor: 0,
        status: "running",
        stats: emptyStats(),
        export: opts.exportOffsets,
      },
    );
    await session.checkpoint();
    return session;
  }

  static async resume(
    outputDir: string,
    opts: { limit?: number | null } = {},
  ): Promise<DownloadSession> {
    const store = new StateManager(path.join(outputDir, STATE_FILE));
    if (!store.exists()) {
      throw new Error(`No checkpoint found in ${outputDir}`);
    }
    const state = store.load();
    state.status = "running";
    if (opts.limit !== undefined) state.limit = opts.limit;
    return new DownloadSession(outputDir, store, state);
  }

  static read(outputDir: string): PersistedSession {
    return new StateManager(path.join(outputDir, STATE_FILE)).load();
  }

  get channel(): PersistedSession["channel"] {
    return this.state.channel;
  }

  get cursor(): number {
    return this.state.cursor;
  }

  get stats(): Readonly<SessionStats> {
    return this.state.stats;
  }

  get status(): RunStatus {
    return this.state.status;
  }

  get limit(): number | null {
    return this.state.limit;
  }

  get exportOffsets(): ExportOffsets {
    return this.state.export;
  }

  /** Records still allowed under the limit, or null when unlimited. */
  remaining(): number | null {
    if (this.state.limit === null) return null;
    return Math.max(0, this.state.limit - this.state.stats.messages);
  }

  limitReached(): boolean {
    return this.remaining() === 0;
  }

  /** Move past a message that produces no record. */
  advance(messageId: number): void {
    if (messageId <= this.state.cursor) {
      throw new Error(
        `Cursor must increase: ${messageId} after ${this.state.cursor}`,
      );
    }
    this.state.cursor = messageId;
  }

  recordMessage(
    messageId: number,
    savedMedia: MediaCategory | null,
    offsets: ExportOffsets,
  ): void {
    this.advance(messageId);
    this.state.stats.messages++;
    if (savedMedia) this.state.stats[CATEGORY_STATS[savedMedia]]++;
    this.state.export = offsets;
  }

  recordError(): void {
    this.state.stats.errors++;
  }

  async checkpoint(): Promise<void> {
    this.state.updatedAt = new Date().toISOString();
    await this.store.save(this.state);
  }

  async finalize(status: RunStatus): Promise<void> {
    this.state.status = status;
    await this.checkpoint();
  }
}
