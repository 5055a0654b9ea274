import * as fs from "node:fs";
import * as path from "node:path";
import type { PersistedSession, RunStatus } from "./types.js";

const RUN_STATUSES: readonly RunStatus[] = [
  "running",
  "completed",
  "limited",
  "cancelled",
  "aborted",
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function hasNumbers(value: unknown, keys: readonly string[]): boolean {
  return isRecord(value) && keys.every((k) => typeof value[k] === "number");
}

export function isPersistedSession(value: unknown): value is PersistedSession {
  if (!isRecord(value)) return false;
  const { channel, limit, cursor, status } = value;
  return (
    isRecord(channel) &&
    typeof channel.identifier === "string" &&
    typeof channel.id === "string" &&
    typeof channel.title === "string" &&
    typeof value.startedAt === "string" &&
    typeof value.updatedAt === "string" &&
    (limit === null || typeof limit === "number") &&
    typeof cursor === "number" &&
    RUN_STATUSES.some((s) => s === status) &&
    hasNumbers(value.stats, [
      "messages",
      "photos",
      "videos",
      "documents",
      "audio",
      "errors",
    ]) &&
    hasNumbers(value.export, ["textBytes", "jsonBytes", "records"])
  );
}

/** Checkpoint file for one run directory. Writes are atomic. */
export class StateManager {
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  get path(): string {
    return this.filePath;
  }

  exists(): boolean {
    return fs.existsSync(this.filePath);
  }

  load(): PersistedSession {
    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(this.filePath, "utf-8"));
    } catch (err) {
      throw new Error(`Cannot read checkpoint ${this.filePath}`, {
        cause: err,
      });
    }
    if (!isPersistedSession(parsed)) {
      throw new Error(`Checkpoint ${this.filePath} is malformed`);
    }
    return parsed;
  }

  async save(state: PersistedSession): Promise<void> {
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    const tmp = `${this.filePath}.tmp`;
    fs.writeFileSync(tmp, JSON.stringify(state, null, 2));
    fs.renameSync(tmp, this.filePath);
  }
}
