import * as fs from "node:fs";
import * as path from "node:path";
import type { Logger } from "./types.js";

type Level = "info" | "warn" | "error";

export class ConsoleLogger implements Logger {
  private readonly prefix: string;
  private readonly logFile: string | null;

  constructor(component: string, logFile: string | null = null) {
    this.prefix = `[${component}]`;
    this.logFile = logFile;
    if (logFile) fs.mkdirSync(path.dirname(logFile), { recursive: true });
  }

  info(msg: string, data?: Record<string, unknown>): void {
    const line = this.format(msg, data);
    console.log(`${this.prefix} ${line}`);
    this.mirror("info", line);
  }

  warn(msg: string, data?: Record<string, unknown>): void {
    const line = this.format(msg, data);
    console.warn(`${this.prefix} ⚠ ${line}`);
    this.mirror("warn", line);
  }

  error(msg: string, data?: Record<string, unknown>): void {
    const line = this.format(msg, data);
    console.error(`${this.prefix} ✗ ${line}`);
    this.mirror("error", line);
  }

  progress(current: number, label: string): void {
    this.info(`${label}: ${current}`);
  }

  private format(msg: string, data?: Record<string, unknown>): string {
    return data ? `${msg} ${JSON.stringify(data)}` : msg;
  }

  private mirror(level: Level, line: string): void {
    if (!this.logFile) return;
    const stamp = new Date().toISOString();
    fs.appendFileSync(
      this.logFile,
      `${stamp} ${level.toUpperCase()} ${this.prefix} ${line}\n`,
    );
  }
}

export function createLogger(
  component: string,
  logFile: string | null = null,
): Logger {
  return new ConsoleLogger(component, logFile);
}

/** Discards everything. For tests and embedding. */
export const silentLogger: Logger = {
  info() {},
  warn() {},
  error() {},
  progress() {},
};
