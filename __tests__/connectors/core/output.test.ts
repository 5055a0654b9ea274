import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { TransportError } from "../../../src/connectors/core/errors.js";
import { FileOutputWriter } from "../../../src/connectors/core/output.js";

async function* chunks(...parts: string[]): AsyncGenerator<Uint8Array> {
  for (const part of parts) yield Buffer.from(part);
}

async function* brokenAfter(part: string): AsyncGenerator<Uint8Array> {
  yield Buffer.from(part);
  throw new TransportError("connection lost");
}

describe("FileOutputWriter", () => {
  let tmpDir: string;
  let writer: FileOutputWriter;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "channel-archive-out-"));
    writer = new FileOutputWriter(tmpDir);
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("creates the run layout", async () => {
    await writer.ensureLayout();
    expect(fs.readdirSync(tmpDir).sort()).toEqual([
      "audio",
      "documents",
      "messages",
      "photos",
      "videos",
    ]);
  });

  it("streams chunks into place", async () => {
    const bytes = await writer.writeStream("photos/a.jpg", chunks("abc", "def"));

    expect(bytes).toBe(6);
    expect(fs.readFileSync(path.join(tmpDir, "photos", "a.jpg"), "utf-8")).toBe(
      "abcdef",
    );
    expect(fs.readdirSync(path.join(tmpDir, "photos"))).toEqual(["a.jpg"]);
  });

  it("leaves nothing behind when the source fails", async () => {
    await expect(
      writer.writeStream("videos/b.mp4", brokenAfter("partial")),
    ).rejects.toThrow("connection lost");
    expect(fs.readdirSync(path.join(tmpDir, "videos"))).toEqual([]);
  });

  it("rejects a payload shorter than announced", async () => {
    await expect(
      writer.writeStream("documents/c.pdf", chunks("1234"), { expectedBytes: 10 }),
    ).rejects.toThrow("Incomplete payload for documents/c.pdf: 4 of 10 bytes");
    expect(fs.existsSync(path.join(tmpDir, "documents", "c.pdf"))).toBe(false);
  });

  it("accepts a payload of the announced size", async () => {
    await expect(
      writer.writeStream("documents/d.pdf", chunks("1234"), { expectedBytes: 4 }),
    ).resolves.toBe(4);
  });

  it("removes partial files of an earlier run", async () => {
    await writer.ensureLayout();
    fs.writeFileSync(path.join(tmpDir, "photos", "x.jpg.3.part"), "x");
    fs.writeFileSync(path.join(tmpDir, "audio", "y.ogg.9.part"), "y");
    fs.writeFileSync(path.join(tmpDir, "audio", "kept.ogg"), "z");

    expect(await writer.removePartials()).toBe(2);
    expect(fs.readdirSync(path.join(tmpDir, "photos"))).toEqual([]);
    expect(fs.readdirSync(path.join(tmpDir, "audio"))).toEqual(["kept.ogg"]);
  });

  it("removes files", async () => {
    await writer.writeStream("photos/e.jpg", chunks("e"));
    await writer.remove("photos/e.jpg");
    expect(fs.existsSync(path.join(tmpDir, "photos", "e.jpg"))).toBe(false);
  });

  it("remove is idempotent for missing files", async () => {
    await expect(writer.remove("photos/none.jpg")).resolves.toBeUndefined();
  });
});
