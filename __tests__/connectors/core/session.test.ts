import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { DownloadSession } from "../../../src/connectors/core/session.js";

const NOW = new Date(2026, 0, 2, 3, 4, 5);
const OFFSETS = { textBytes: 10, jsonBytes: 3, records: 0 };

describe("DownloadSession", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "channel-archive-session-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  async function start(limit: number | null = null): Promise<DownloadSession> {
    const outputDir = DownloadSession.allocateDir(tmpDir, "Example Channel", NOW);
    return DownloadSession.start({
      outputDir,
      identifier: "example_channel",
      channel: { id: "1001", title: "Example Channel" },
      limit,
      now: NOW,
      exportOffsets: OFFSETS,
    });
  }

  it("names run directories after the channel and start time", () => {
    const first = DownloadSession.allocateDir(tmpDir, "Example Channel", NOW);
    const second = DownloadSession.allocateDir(tmpDir, "Example Channel", NOW);

    expect(path.basename(first)).toBe("Example_Channel_20260102_030405");
    expect(path.basename(second)).toBe("Example_Channel_20260102_030405_2");
  });

  it("checkpoints as soon as it starts", async () => {
    const session = await start();

    expect(DownloadSession.read(session.outputDir)).toMatchObject({
      channel: { identifier: "example_channel", id: "1001", title: "Example Channel" },
      startedAt: NOW.toISOString(),
      limit: null,
      cursor: 0,
      status: "running",
      export: OFFSETS,
    });
  });

  it("counts records and saved media", async () => {
    const session = await start();
    session.recordMessage(3, "photo", { textBytes: 20, jsonBytes: 30, records: 1 });
    session.recordMessage(5, null, { textBytes: 40, jsonBytes: 60, records: 2 });
    session.recordError();

    expect(session.cursor).toBe(5);
    expect(session.stats).toEqual({
      messages: 2,
      photos: 1,
      videos: 0,
      documents: 0,
      audio: 0,
      errors: 1,
    });
    expect(session.exportOffsets).toEqual({ textBytes: 40, jsonBytes: 60, records: 2 });
  });

  it("only moves the cursor forward", async () => {
    const session = await start();
    session.advance(4);

    expect(() => session.advance(4)).toThrow("Cursor must increase: 4 after 4");
  });

  it("tracks what is left under a limit", async () => {
    const session = await start(2);
    expect(session.remaining()).toBe(2);

    session.recordMessage(1, null, OFFSETS);
    session.recordMessage(2, null, OFFSETS);
    expect(session.remaining()).toBe(0);
    expect(session.limitReached()).toBe(true);
  });

  it("resumes from the last checkpoint", async () => {
    const session = await start(10);
    session.recordMessage(7, "audio", { textBytes: 20, jsonBytes: 30, records: 1 });
    await session.finalize("cancelled");

    const resumed = await DownloadSession.resume(session.outputDir, { limit: 20 });
    expect(resumed.status).toBe("running");
    expect(resumed.cursor).toBe(7);
    expect(resumed.limit).toBe(20);
    expect(resumed.stats.audio).toBe(1);
  });

  it("keeps the stored limit unless a new one is given", async () => {
    const session = await start(10);
    const resumed = await DownloadSession.resume(session.outputDir);
    expect(resumed.limit).toBe(10);
  });

  it("refuses to resume a directory without a checkpoint", async () => {
    await expect(DownloadSession.resume(tmpDir)).rejects.toThrow(
      `No checkpoint found in ${tmpDir}`,
    );
  });
});
