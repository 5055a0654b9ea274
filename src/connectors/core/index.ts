// Retrieval loop
export type { DownloadRequest, RetrievalEngineOptions } from "./engine.js";
export { RetrievalEngine } from "./engine.js";
export type { HistoryOptions } from "./history.js";
export { iterateHistory } from "./history.js";
// Media classification
export type { Classification, MediaAssignment } from "./classifier.js";
export {
  CATEGORY_FOLDERS,
  classifyCategory,
  classifyMedia,
  extensionForMime,
  FilenameRegistry,
  MEDIA_CATEGORIES,
  MediaClassifier,
} from "./classifier.js";
// Backoff
export type { BackoffOptions, BackoffState } from "./backoff.js";
export { BackoffController, sleep, withBackoff, withTimeout } from "./backoff.js";
// Exports and output
export {
  ExportWriter,
  formatHeader,
  formatTextBlock,
  JSON_EXPORT,
  TEXT_EXPORT,
  toExportRecord,
} from "./export-writer.js";
export { createOutputWriter, FileOutputWriter } from "./output.js";
// Session state
export { DownloadSession, emptyStats, STATE_FILE } from "./session.js";
export { isPersistedSession, StateManager } from "./state.js";
// Config
export type { ConfigOverrides, Env } from "./config.js";
export {
  DEFAULT_CONFIG,
  loadConfig,
  parseInteger,
  parseLimit,
} from "./config.js";
// Errors
export {
  AccessDeniedError,
  AuthorizationError,
  CancelledError,
  ChannelNotFoundError,
  ConfigError,
  errorMessage,
  isResolutionError,
  isTransientError,
  RetriesExhaustedError,
  RetrievalAbortedError,
  ThrottlingSignal,
  TransportError,
  TransportTimeoutError,
} from "./errors.js";
// Logger
export { ConsoleLogger, createLogger, silentLogger } from "./logger.js";
// Rate limiter
export { createRateLimiter, SlidingWindowRateLimiter } from "./rate-limiter.js";
// Filenames
export {
  channelDirName,
  normalizeChannelIdentifier,
  runTimestamp,
  sanitizeFilename,
} from "./slugify.js";
export type {
  ArchiveConfig,
  ArchiveMessage,
  BackoffConfig,
  ChannelHandle,
  ExportOffsets,
  ExportRecord,
  HistoryPageRequest,
  HistoryTransport,
  Logger,
  MediaCategory,
  MediaDescriptor,
  OutputWriter,
  PayloadKind,
  PersistedSession,
  RateLimiter,
  RateLimiterConfig,
  RunStatus,
  RunSummary,
  SessionStats,
  Sleep,
} from "./types.js";
// CLI output
export {
  EXIT_ABORTED,
  EXIT_OK,
  EXIT_UNUSABLE,
  exitCodeFor,
  formatFailure,
  formatStatus,
  formatSummary,
} from "./report.js";
