/**
 * Human-readable and JSON exports of a channel, kept in lock-step.
 *
 * Produces:
 * - messages/messages.txt  (header, then one YAML block per message)
 * - messages/messages.json (array of ExportRecord, one per line)
 *
 * Both files are appended in place after every message. The JSON array is
 * kept valid by overwriting only its closing bracket, so the byte sizes in
 * ExportOffsets fully describe a consistent state to roll back or resume to.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { stringify as yamlStringify } from "yaml";
import type { ArchiveMessage, ExportOffsets, ExportRecord } from "./types.js";

export const TEXT_EXPORT = "messages/messages.txt";
export const JSON_EXPORT = "messages/messages.json";

const HEADER_RULE = "=".repeat(80);
const BLOCK_RULE = "-".repeat(80);

function jsonTail(records: number): string {
  return records === 0 ? "]\n" : "\n]\n";
}

export function toExportRecord(
  message: ArchiveMessage,
  mediaPath: string | null,
): ExportRecord {
  return {
    id: message.id,
    date: message.date.toISOString(),
    sender: message.sender,
    text: message.text,
    media_path: mediaPath,
    views: message.views,
    forwards: message.forwards,
  };
}

export function formatHeader(channelTitle: string, startedAt: string): string {
  const fields = yamlStringify(
    { Channel: channelTitle, "Download started": startedAt },
    { lineWidth: 0 },
  );
  return `${fields}${HEADER_RULE}\n\n`;
}

export function formatTextBlock(record: ExportRecord): string {
  const fields: Record<string, string | number> = {
    "Message ID": record.id,
    Date: record.date,
    Sender: record.sender ?? "unknown",
  };
  if (record.text) fields.Text = record.text;
  if (record.media_path) fields.Media = record.media_path;
  return `${yamlStringify(fields, { lineWidth: 0 })}${BLOCK_RULE}\n\n`;
}

function isExportRecord(value: unknown): value is ExportRecord {
  if (typeof value !== "object" || value === null) return false;
  const r: Record<string, unknown> = { ...value };
  return (
    typeof r.id === "number" &&
    typeof r.date === "string" &&
    typeof r.text === "string" &&
    (r.media_path === null || typeof r.media_path === "string")
  );
}

export class ExportWriter {
  private readonly textPath: string;
  private readonly jsonPath: string;
  private current: ExportOffsets;

  private constructor(runDir: string, offsets: ExportOffsets) {
    this.textPath = path.join(runDir, ...TEXT_EXPORT.split("/"));
    this.jsonPath = path.join(runDir, ...JSON_EXPORT.split("/"));
    this.current = offsets;
  }

  /** Start both exports from scratch. */
  static async create(
    runDir: string,
    header: { channelTitle: string; startedAt: string },
  ): Promise<ExportWriter> {
    const text = formatHeader(header.channelTitle, header.startedAt);
    const json = "[]\n";
    const writer = new ExportWriter(runDir, {
      textBytes: Buffer.byteLength(text),
      jsonBytes: Buffer.byteLength(json),
      records: 0,
    });
    fs.mkdirSync(path.dirname(writer.textPath), { recursive: true });
    fs.writeFileSync(writer.textPath, text);
    fs.writeFileSync(writer.jsonPath, json);
    return writer;
  }

  /**
   * Reopen exports at a checkpoint. Anything written after it (a record
   * that was in flight when the previous run died) is cut off.
   */
  static async open(
    runDir: string,
    offsets: ExportOffsets,
  ): Promise<{ writer: ExportWriter; records: ExportRecord[] }> {
    const writer = new ExportWriter(runDir, offsets);
    writer.restore(offsets);
    const records = writer.readRecords();
    if (records.length !== offsets.records) {
      throw new Error(
        `Export holds ${records.length} records, checkpoint expects ${offsets.records}`,
      );
    }
    return { writer, records };
  }

  get offsets(): ExportOffsets {
    return { ...this.current };
  }

  /**
   * Append one record to both sinks. If either write fails both files are
   * put back to their previous state before the error is rethrown.
   */
  async append(record: ExportRecord): Promise<ExportOffsets> {
    const before = this.offsets;
    try {
      const block = formatTextBlock(record);
      fs.appendFileSync(this.textPath, block);

      const tail = jsonTail(before.records);
      const at = before.jsonBytes - Buffer.byteLength(tail);
      const prefix = before.records === 0 ? "\n" : ",\n";
      const chunk = Buffer.from(
        `${prefix}  ${JSON.stringify(record)}${jsonTail(1)}`,
      );
      writeAt(this.jsonPath, chunk, at);

      this.current = {
        textBytes: before.textBytes + Buffer.byteLength(block),
        jsonBytes: at + chunk.byteLength,
        records: before.records + 1,
      };
      return this.offsets;
    } catch (err) {
      this.restore(before);
      throw err;
    }
  }

  readRecords(): ExportRecord[] {
    const parsed: unknown = JSON.parse(fs.readFileSync(this.jsonPath, "utf-8"));
    if (!Array.isArray(parsed) || !parsed.every(isExportRecord)) {
      throw new Error(`${this.jsonPath} is not a list of export records`);
    }
    return parsed;
  }

  private restore(offsets: ExportOffsets): void {
    const tail = Buffer.from(jsonTail(offsets.records));
    const at = offsets.jsonBytes - tail.byteLength;
    if (fs.statSync(this.textPath).size < offsets.textBytes) {
      throw new Error(`${this.textPath} is shorter than its checkpoint`);
    }
    if (fs.statSync(this.jsonPath).size < at) {
      throw new Error(`${this.jsonPath} is shorter than its checkpoint`);
    }
    fs.truncateSync(this.textPath, offsets.textBytes);
    writeAt(this.jsonPath, tail, at);
    this.current = { ...offsets };
  }
}

/** Overwrite from `position` and drop anything beyond the written bytes. */
function writeAt(filePath: string, data: Buffer, position: number): void {
  const fd = fs.openSync(filePath, "r+");
  try {
    fs.writeSync(fd, data, 0, data.byteLength, position);
    fs.ftruncateSync(fd, position + data.byteLength);
  } finally {
    fs.closeSync(fd);
  }
}
