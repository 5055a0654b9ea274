#!/usr/bin/env node
import { Command } from "commander";
import { config as loadDotenv } from "dotenv";
import { type ConfigOverrides, loadConfig, parseLimit } from "./config.js";
import { RetrievalEngine } from "./engine.js";
import { createLogger } from "./logger.js";
import {
  EXIT_ABORTED,
  EXIT_OK,
  exitCodeFor,
  formatFailure,
  formatStatus,
  formatSummary,
} from "./report.js";
import { DownloadSession } from "./session.js";
import type { ArchiveConfig } from "./types.js";
import type {
  TelegramCredentials,
  TelegramTransport,
} from "../telegram/index.js";

loadDotenv();
loadDotenv({ path: ".env.local", override: true });

interface DownloadCliOptions extends ConfigOverrides {
  limit?: string;
  resume?: string;
}

async function download(
  channel: string | undefined,
  opts: DownloadCliOptions,
): Promise<number> {
  const telegram = await import("../telegram/index.js");
  let config: ArchiveConfig;
  let credentials: TelegramCredentials;
  let limit: number | undefined;
  try {
    config = loadConfig(process.env, opts);
    credentials = telegram.loadCredentials(process.env);
    limit = parseLimit(opts.limit);
  } catch (err) {
    console.error(formatFailure(err));
    return exitCodeFor(err);
  }

  const logger = createLogger("archive", config.logFile);
  const ac = new AbortController();
  let interrupts = 0;
  const onSignal = () => {
    interrupts++;
    if (interrupts > 1) {
      logger.warn("Second interrupt, exiting immediately");
      process.exit(130);
    }
    logger.warn("Stop requested, finishing current message...");
    ac.abort();
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  let transport: TelegramTransport;
  try {
    transport = await telegram.TelegramTransport.connect(credentials, logger);
  } catch (err) {
    logger.error(`Could not connect: ${formatFailure(err)}`);
    return exitCodeFor(err);
  }

  try {
    const engine = new RetrievalEngine({ transport, config, logger });
    const summary = await engine.download({
      channel,
      limit,
      resumeDir: opts.resume,
      signal: ac.signal,
    });
    for (const line of formatSummary(summary)) console.log(line);
    return EXIT_OK;
  } catch (err) {
    logger.error(formatFailure(err));
    return exitCodeFor(err);
  } finally {
    process.removeListener("SIGINT", onSignal);
    process.removeListener("SIGTERM", onSignal);
    await transport.disconnect();
  }
}

const program = new Command()
  .name("channel-archive")
  .description("Archive a channel's messages and media to local files")
  .version("1.0.0");

program
  .command("download")
  .description("Download messages and media from a channel")
  .argument("[channel]", "channel username, @name or t.me link")
  .option("--limit <n>", "stop after this many messages")
  .option("--output <dir>", "output root directory (default: downloads)")
  .option("--page-size <n>", "messages per history request (1-100)")
  .option("--max-attempts <n>", "tries per page or media file")
  .option("--log-file <path>", "also append log lines to this file")
  .option("--resume <runDir>", "continue an interrupted run in this directory")
  .action(
    async (
      channel: string | undefined,
      opts: {
        limit?: string;
        output?: string;
        pageSize?: string;
        maxAttempts?: string;
        logFile?: string;
        resume?: string;
      },
    ) => {
      if (!channel && !opts.resume) {
        console.error("Give a channel, or --resume <runDir>.");
        process.exit(EXIT_ABORTED);
      }
      const code = await download(channel, {
        outputDir: opts.output,
        pageSize: opts.pageSize,
        maxAttempts: opts.maxAttempts,
        logFile: opts.logFile,
        limit: opts.limit,
        resume: opts.resume,
      });
      process.exit(code);
    },
  );

program
  .command("status")
  .description("Show the checkpoint of a run directory")
  .argument("<runDir>", "run directory created by download")
  .action((runDir: string) => {
    try {
      const state = DownloadSession.read(runDir);
      for (const line of formatStatus(runDir, state)) console.log(line);
    } catch (err) {
      console.error(formatFailure(err));
      process.exit(EXIT_ABORTED);
    }
  });

await program.parseAsync();
