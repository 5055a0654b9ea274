import * as fs from "node:fs";
import * as path from "node:path";
import { pipeline } from "node:stream/promises";
import { CATEGORY_FOLDERS } from "./classifier.js";
import { TransportError } from "./errors.js";
import type { OutputWriter } from "./types.js";

const PARTIAL_SUFFIX = ".part";

let partialSeq = 0;

export class FileOutputWriter implements OutputWriter {
  readonly baseDir: string;

  constructor(baseDir: string) {
    this.baseDir = baseDir;
  }

  resolve(relativePath: string): string {
    return path.join(this.baseDir, ...relativePath.split("/"));
  }

  private ensureDir(filePath: string): void {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
  }

  async ensureLayout(): Promise<void> {
    for (const folder of Object.values(CATEGORY_FOLDERS)) {
      fs.mkdirSync(path.join(this.baseDir, folder), { recursive: true });
    }
    fs.mkdirSync(path.join(this.baseDir, "messages"), { recursive: true });
  }

  /**
   * Stream `source` into a `.part` file, then rename into place. The final
   * name only ever holds a complete payload. Each call writes its own partial
   * file.
   */
  async writeStream(
    relativePath: string,
    source: AsyncIterable<Uint8Array>,
    opts: { signal?: AbortSignal; expectedBytes?: number | null } = {},
  ): Promise<number> {
    const filePath = this.resolve(relativePath);
    this.ensureDir(filePath);
    const tmp = `${filePath}.${++partialSeq}${PARTIAL_SUFFIX}`;

    let bytes = 0;
    async function* counted(): AsyncGenerator<Uint8Array> {
      for await (const chunk of source) {
        bytes += chunk.byteLength;
        yield chunk;
      }
    }

    try {
      await pipeline(counted(), fs.createWriteStream(tmp), {
        signal: opts.signal,
      });
      if (opts.expectedBytes != null && bytes !== opts.expectedBytes) {
        throw new TransportError(
          `Incomplete payload for ${relativePath}: ${bytes} of ${opts.expectedBytes} bytes`,
        );
      }
      fs.renameSync(tmp, filePath);
    } catch (err) {
      fs.rmSync(tmp, { force: true });
      throw err;
    }
    return bytes;
  }

  async remove(relativePath: string): Promise<void> {
    fs.rmSync(this.resolve(relativePath), { force: true });
  }

  /** Delete `.part` leftovers of an interrupted run. Returns how many. */
  async removePartials(): Promise<number> {
    let removed = 0;
    for (const folder of Object.values(CATEGORY_FOLDERS)) {
      const dir = path.join(this.baseDir, folder);
      if (!fs.existsSync(dir)) continue;
      for (const entry of fs.readdirSync(dir)) {
        if (entry.endsWith(PARTIAL_SUFFIX)) {
          fs.rmSync(path.join(dir, entry), { force: true });
          removed++;
        }
      }
    }
    return removed;
  }
}

export function createOutputWriter(baseDir: string): OutputWriter {
  return new FileOutputWriter(baseDir);
}
