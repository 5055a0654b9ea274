import { describe, expect, it } from "vitest";
import {
  AccessDeniedError,
  AuthorizationError,
  CancelledError,
  ChannelNotFoundError,
  ConfigError,
  RetrievalAbortedError,
  TransportError,
} from "../../../src/connectors/core/errors.js";
import {
  exitCodeFor,
  formatFailure,
  formatStatus,
  formatSummary,
} from "../../../src/connectors/core/report.js";
import { emptyStats } from "../../../src/connectors/core/session.js";

describe("exitCodeFor", () => {
  it("maps failures to exit codes", () => {
    expect(exitCodeFor(new CancelledError())).toBe(0);
    expect(exitCodeFor(new RetrievalAbortedError(12))).toBe(1);
    expect(exitCodeFor(new Error("unexpected"))).toBe(1);
    expect(exitCodeFor(new ChannelNotFoundError("missing"))).toBe(2);
    expect(exitCodeFor(new AccessDeniedError("private"))).toBe(2);
    expect(exitCodeFor(new AuthorizationError("no session"))).toBe(2);
    expect(exitCodeFor(new ConfigError("bad value"))).toBe(2);
  });
});

describe("formatFailure", () => {
  it("tells how to continue an aborted run", () => {
    const err = new RetrievalAbortedError(12, { cause: new TransportError("reset") });
    expect(formatFailure(err)).toBe(
      "Retrieval aborted after message 12: reset\n" +
        "Resume with: --resume <run directory> (continues after message 12)",
    );
  });

  it("prints other errors as their message", () => {
    expect(formatFailure(new ConfigError("bad value"))).toBe("bad value");
  });
});

describe("formatSummary", () => {
  it("lists the totals", () => {
    const lines = formatSummary({
      channel: "Example Channel",
      status: "completed",
      outputDir: "/tmp/out",
      cursor: 40,
      stats: { ...emptyStats(), messages: 40, photos: 3 },
      durationMs: 2500,
    });
    expect(lines).toContain("✓ Example Channel (completed) [2.5s]");
    expect(lines).toContain("  Messages:  40");
    expect(lines).toContain("  Photos:    3");
    expect(lines).toContain("  Saved to:  /tmp/out");
  });

  it("marks an aborted run", () => {
    const lines = formatSummary({
      channel: "Example Channel",
      status: "aborted",
      outputDir: "/tmp/out",
      cursor: 0,
      stats: emptyStats(),
      durationMs: 100,
    });
    expect(lines).toContain("✗ Example Channel (aborted) [0.1s]");
  });
});

describe("formatStatus", () => {
  it("describes a checkpoint", () => {
    const lines = formatStatus("/tmp/out", {
      channel: { identifier: "example_channel", id: "1001", title: "Example Channel" },
      startedAt: "2026-01-01T00:00:00.000Z",
      updatedAt: "2026-01-01T00:01:00.000Z",
      limit: null,
      cursor: 9,
      status: "cancelled",
      stats: { ...emptyStats(), messages: 9, documents: 2 },
      export: { textBytes: 100, jsonBytes: 200, records: 9 },
    });
    expect(lines[0]).toBe("Example Channel (example_channel)");
    expect(lines).toContain("  Status:        cancelled");
    expect(lines).toContain("  Limit:         none");
    expect(lines).toContain(
      "  Saved:         9 messages, 0 photos, 0 videos, 2 documents, 0 audio",
    );
  });
});
