import {
  AuthorizationError,
  CancelledError,
  ConfigError,
  errorMessage,
  isResolutionError,
  RetrievalAbortedError,
} from "./errors.js";
import type { PersistedSession, RunSummary } from "./types.js";

export const EXIT_OK = 0;
export const EXIT_ABORTED = 1;
export const EXIT_UNUSABLE = 2;

/** Process exit code for a run that rejected with `err`. */
export function exitCodeFor(err: unknown): number {
  if (err instanceof CancelledError) return EXIT_OK;
  if (err instanceof RetrievalAbortedError) return EXIT_ABORTED;
  if (
    isResolutionError(err) ||
    err instanceof AuthorizationError ||
    err instanceof ConfigError
  ) {
    return EXIT_UNUSABLE;
  }
  return EXIT_ABORTED;
}

export function formatSummary(summary: RunSummary): string[] {
  const { stats } = summary;
  const mark = summary.status === "aborted" ? "✗" : "✓";
  return [
    "",
    "═══ Download Summary ═══",
    "",
    `${mark} ${summary.channel} (${summary.status}) [${(summary.durationMs / 1000).toFixed(1)}s]`,
    `  Messages:  ${stats.messages}`,
    `  Photos:    ${stats.photos}`,
    `  Videos:    ${stats.videos}`,
    `  Documents: ${stats.documents}`,
    `  Audio:     ${stats.audio}`,
    `  Errors:    ${stats.errors}`,
    `  Last message: ${summary.cursor}`,
    `  Saved to:  ${summary.outputDir}`,
  ];
}

export function formatStatus(outputDir: string, state: PersistedSession): string[] {
  const { stats } = state;
  return [
    `${state.channel.title} (${state.channel.identifier})`,
    `  Run directory: ${outputDir}`,
    `  Status:        ${state.status}`,
    `  Started:       ${state.startedAt}`,
    `  Updated:       ${state.updatedAt}`,
    `  Limit:         ${state.limit ?? "none"}`,
    `  Last message:  ${state.cursor}`,
    `  Saved:         ${stats.messages} messages, ${stats.photos} photos, ${stats.videos} videos, ${stats.documents} documents, ${stats.audio} audio`,
    `  Errors:        ${stats.errors}`,
  ];
}

export function formatFailure(err: unknown): string {
  if (err instanceof RetrievalAbortedError) {
    return `${err.message}\nResume with: --resume <run directory> (continues after message ${err.cursor})`;
  }
  return errorMessage(err);
}
