/** Core type definitions for channel-archive. */

// ─── Messages ───

export type PayloadKind = "photo" | "document" | "voice";

export type MediaCategory = "photo" | "video" | "document" | "audio";

export interface MediaDescriptor {
  kind: PayloadKind;
  mimeType: string;
  fileName: string | null;
  size: number | null;
}

export interface ArchiveMessage {
  id: number;
  date: Date;
  sender: string | null;
  text: string;
  media: MediaDescriptor | null;
  views: number | null;
  forwards: number | null;
  /** Joins, pins, title changes. Paged over but never exported. */
  service: boolean;
}

// ─── Transport (provider capability) ───

export interface ChannelHandle {
  id: string;
  title: string;
}

export interface HistoryPageRequest {
  /** Only messages with an id strictly greater than this are returned. */
  afterId: number;
  limit: number;
}

export interface HistoryTransport<H extends ChannelHandle = ChannelHandle> {
  resolveChannel(identifier: string): Promise<H>;
  /** Ascending by id. An empty page means the history is exhausted. */
  fetchHistoryPage(
    handle: H,
    request: HistoryPageRequest,
    signal: AbortSignal,
  ): Promise<ArchiveMessage[]>;
  fetchMedia(
    media: MediaDescriptor,
    signal: AbortSignal,
  ): AsyncIterable<Uint8Array>;
}

// ─── Export ───

export interface ExportRecord {
  id: number;
  date: string;
  sender: string | null;
  text: string;
  media_path: string | null;
  views: number | null;
  forwards: number | null;
}

export interface ExportOffsets {
  textBytes: number;
  jsonBytes: number;
  records: number;
}

// ─── Session ───

export interface SessionStats {
  messages: number;
  photos: number;
  videos: number;
  documents: number;
  audio: number;
  errors: number;
}

export type RunStatus =
  | "running"
  | "completed"
  | "limited"
  | "cancelled"
  | "aborted";

export interface PersistedSession {
  channel: { identifier: string; id: string; title: string };
  startedAt: string;
  updatedAt: string;
  limit: number | null;
  cursor: number;
  status: RunStatus;
  stats: SessionStats;
  export: ExportOffsets;
}

export interface RunSummary {
  channel: string;
  status: RunStatus;
  outputDir: string;
  cursor: number;
  stats: SessionStats;
  durationMs: number;
}

// ─── Backoff / Rate Limiter ───

export interface BackoffConfig {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface RateLimiterConfig {
  maxRequests?: number;
  windowMs?: number;
  minDelayMs?: number;
}

export interface RateLimiter {
  acquire(signal?: AbortSignal): Promise<void>;
}

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

// ─── Logger ───

export interface Logger {
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
  progress(current: number, label: string): void;
}

// ─── Output Writer ───

export interface OutputWriter {
  readonly baseDir: string;
  resolve(relativePath: string): string;
  ensureLayout(): Promise<void>;
  writeStream(
    relativePath: string,
    source: AsyncIterable<Uint8Array>,
    opts?: { signal?: AbortSignal; expectedBytes?: number | null },
  ): Promise<number>;
  remove(relativePath: string): Promise<void>;
  removePartials(): Promise<number>;
}

// ─── Config ───

export interface ArchiveConfig {
  outputDir: string;
  pageSize: number;
  backoff: BackoffConfig;
  pageTimeoutMs: number;
  mediaTimeoutMs: number;
  rateLimiter: RateLimiterConfig;
  logFile: string | null;
}
