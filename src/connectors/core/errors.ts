// ─── Resolution ───

export class ChannelNotFoundError extends Error {
  readonly identifier: string;

  constructor(identifier: string, options?: { cause?: unknown }) {
    super(`Channel "${identifier}" could not be found`, options);
    this.name = "ChannelNotFoundError";
    this.identifier = identifier;
  }
}

export class AccessDeniedError extends Error {
  readonly identifier: string;

  constructor(identifier: string, options?: { cause?: unknown }) {
    super(`Access to channel "${identifier}" was denied`, options);
    this.name = "AccessDeniedError";
    this.identifier = identifier;
  }
}

// ─── Transport ───

/** Provider asked us to wait before the next call. The wait is authoritative. */
export class ThrottlingSignal extends Error {
  readonly waitMs: number;

  constructor(waitMs: number, options?: { cause?: unknown }) {
    super(`Throttled by provider for ${waitMs}ms`, options);
    this.name = "ThrottlingSignal";
    this.waitMs = waitMs;
  }
}

export class TransportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransportError";
  }
}

export class TransportTimeoutError extends TransportError {
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = "TransportTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class RetriesExhaustedError extends Error {
  readonly attempts: number;

  constructor(attempts: number, options?: { cause?: unknown }) {
    super(
      `Gave up after ${attempts} failed attempts: ${errorMessage(options?.cause)}`,
      options,
    );
    this.name = "RetriesExhaustedError";
    this.attempts = attempts;
  }
}

// ─── Run ───

/** A stop was requested while waiting. */
export class CancelledError extends Error {
  constructor() {
    super("Operation cancelled");
    this.name = "CancelledError";
  }
}

export class RetrievalAbortedError extends Error {
  /** Id of the last message whose record is durable; resume after it. */
  readonly cursor: number;

  constructor(cursor: number, options?: { cause?: unknown }) {
    super(
      `Retrieval aborted after message ${cursor}: ${errorMessage(options?.cause)}`,
      options,
    );
    this.name = "RetrievalAbortedError";
    this.cursor = cursor;
  }
}

export class AuthorizationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "AuthorizationError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

// ─── Helpers ───

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (err === undefined) return "unknown error";
  return String(err);
}

export function isResolutionError(
  err: unknown,
): err is ChannelNotFoundError | AccessDeniedError {
  return err instanceof ChannelNotFoundError || err instanceof AccessDeniedError;
}

const NETWORK_FAILURE_MARKERS = [
  "econnreset",
  "etimedout",
  "enotfound",
  "econnrefused",
  "socket hang up",
  "fetch failed",
];

/** Failures worth another attempt under exponential backoff. */
export function isTransientError(err: unknown): boolean {
  if (err instanceof TransportError) return true;
  if (err instanceof Error) {
    const msg = err.message.toLowerCase();
    return NETWORK_FAILURE_MARKERS.some((marker) => msg.includes(marker));
  }
  return false;
}
