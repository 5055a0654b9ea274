import { describe, expect, it } from "vitest";
import {
  DEFAULT_CONFIG,
  DEFAULT_REQUEST_WINDOW_MS,
  loadConfig,
  parseLimit,
} from "../../../src/connectors/core/config.js";
import { ConfigError } from "../../../src/connectors/core/errors.js";

describe("loadConfig", () => {
  it("uses defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it("reads the environment", () => {
    const config = loadConfig({
      ARCHIVE_OUTPUT_DIR: "/tmp/archive",
      ARCHIVE_PAGE_SIZE: "50",
      ARCHIVE_MAX_ATTEMPTS: "3",
      ARCHIVE_BACKOFF_BASE_MS: "200",
      ARCHIVE_BACKOFF_MAX_MS: "800",
      ARCHIVE_REQUEST_DELAY_MS: "25",
      ARCHIVE_LOG_FILE: "logs/archive.log",
    });
    expect(config.outputDir).toBe("/tmp/archive");
    expect(config.pageSize).toBe(50);
    expect(config.backoff).toEqual({
      maxAttempts: 3,
      baseDelayMs: 200,
      maxDelayMs: 800,
    });
    expect(config.rateLimiter).toEqual({ minDelayMs: 25 });
    expect(config.logFile).toBe("logs/archive.log");
  });

  it("enables the request window once a cap is set", () => {
    expect(loadConfig({ ARCHIVE_REQUEST_MAX: "20" }).rateLimiter).toEqual({
      minDelayMs: 0,
      maxRequests: 20,
      windowMs: DEFAULT_REQUEST_WINDOW_MS,
    });
    expect(
      loadConfig({
        ARCHIVE_REQUEST_MAX: "5",
        ARCHIVE_REQUEST_WINDOW_MS: "1000",
        ARCHIVE_REQUEST_DELAY_MS: "10",
      }).rateLimiter,
    ).toEqual({ minDelayMs: 10, maxRequests: 5, windowMs: 1000 });
  });

  it("ignores the window length without a cap", () => {
    expect(
      loadConfig({ ARCHIVE_REQUEST_WINDOW_MS: "1000" }).rateLimiter,
    ).toEqual({ minDelayMs: 0 });
  });

  it("rejects a zero request cap", () => {
    expect(() => loadConfig({ ARCHIVE_REQUEST_MAX: "0" })).toThrow(
      'ARCHIVE_REQUEST_MAX must be an integer >= 1, got "0"',
    );
  });

  it("lets command-line values win", () => {
    const config = loadConfig(
      { ARCHIVE_OUTPUT_DIR: "env-dir", ARCHIVE_PAGE_SIZE: "50" },
      { outputDir: "cli-dir", pageSize: "10", maxAttempts: "2" },
    );
    expect(config.outputDir).toBe("cli-dir");
    expect(config.pageSize).toBe(10);
    expect(config.backoff.maxAttempts).toBe(2);
  });

  it("rejects out-of-range values", () => {
    expect(() => loadConfig({ ARCHIVE_PAGE_SIZE: "500" })).toThrow(
      'page size must be an integer 1-100, got "500"',
    );
    expect(() => loadConfig({}, { maxAttempts: "0" })).toThrow(ConfigError);
    expect(() => loadConfig({ ARCHIVE_PAGE_TIMEOUT_MS: "soon" })).toThrow(
      ConfigError,
    );
  });

  it("rejects a cap below the base delay", () => {
    expect(() =>
      loadConfig({ ARCHIVE_BACKOFF_BASE_MS: "500", ARCHIVE_BACKOFF_MAX_MS: "100" }),
    ).toThrow("ARCHIVE_BACKOFF_MAX_MS (100) is below ARCHIVE_BACKOFF_BASE_MS (500)");
  });
});

describe("parseLimit", () => {
  it("treats an absent value as unlimited", () => {
    expect(parseLimit(undefined)).toBeUndefined();
    expect(parseLimit(" ")).toBeUndefined();
  });

  it("accepts zero and positive integers", () => {
    expect(parseLimit("0")).toBe(0);
    expect(parseLimit("25")).toBe(25);
  });

  it("rejects anything else", () => {
    expect(() => parseLimit("-1")).toThrow(ConfigError);
    expect(() => parseLimit("2.5")).toThrow(ConfigError);
  });
});
