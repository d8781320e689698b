#!/usr/bin/env node
/**
 * CLI entrypoint for assetline.
 *
 * Usage:
 *   assetline ~/game/assets
 *   assetline ~/game/assets --db-path ./catalog.db --settle-ms 250
 */
import { stat } from "node:fs/promises";
import { createInterface, emitKeypressEvents } from "node:readline";
import { resolve } from "node:path";
import { parseArgs } from "node:util";

import { parseCountOption } from "./config.js";
import { ConsoleSink } from "./console-sink.js";
import { AssetPipeline } from "./index.js";
import { LogLevel, setLogHandler, setLogLevel } from "./logger.js";
import { activityLines, summaryLines } from "./report.js";

const USAGE = `
assetline: asset ingestion pipeline with live change detection

Usage:
  assetline [root]

Options:
  --db-path <file>     SQLite catalog          (default: ./assetline.db)
  --settle-ms <n>      Watcher settle delay    (default: 500)
  --workers <n>        Watcher worker count    (default: 4)
  --verbose            Show debug logging
  --help               Show this help

Keys while watching:
  r   rescan the whole tree
  q   quit
`.trim();

const { values, positionals } = parseArgs({
  args: process.argv.slice(2),
  options: {
    "db-path": { type: "string", default: "./assetline.db" },
    "settle-ms": { type: "string", default: "500" },
    workers: { type: "string", default: "4" },
    verbose: { type: "boolean", default: false },
    help: { type: "boolean", short: "h", default: false },
  },
  allowPositionals: true,
  strict: true,
});

if (values.help) {
  console.log(USAGE);
  process.exit(0);
}

function countOption(name: string, raw: string, min: number): number {
  const value = parseCountOption(raw, min);
  if (value === null) {
    console.error(`Invalid --${name}: ${raw}\n\n${USAGE}`);
    process.exit(1);
  }
  return value;
}

const settleDelayMs = countOption("settle-ms", values["settle-ms"], 0);
const workers = countOption("workers", values.workers, 1);

const sink = new ConsoleSink();
setLogHandler((entry) => sink.log(entry));
setLogLevel(values.verbose ? LogLevel.Debug : LogLevel.Warn);

async function prompt(question: string): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    return await new Promise<string>((answer) => rl.question(question, answer));
  } finally {
    rl.close();
  }
}

const rawRoot =
  positionals[0] ?? (await prompt("\n  Enter directory path to watch: "));
const root = resolve(rawRoot.trim().replace(/^"|"$/g, ""));

const rootStats = await stat(root).catch(() => null);
if (!rootStats?.isDirectory()) {
  sink.write([{ text: `Directory not found: ${root}`, tone: "error" }]);
  process.exit(1);
}

const pipeline = await AssetPipeline.fromConfig({
  db: { provider: "sqlite", config: { path: values["db-path"] } },
  pipeline: {
    settleDelayMs,
    workers,
  },
});
sink.write([{ text: `  Database: ${resolve(values["db-path"])}`, tone: "muted" }]);

let scanning: Promise<void> | null = null;
let shuttingDown = false;

async function runScan(): Promise<void> {
  sink.write([{ text: `\n  Scanning: ${root}`, tone: "warn" }]);
  const result = await pipeline.scan(root, {
    onProgress: ({ processed, path }) =>
      sink.progress(`  Processing (${processed}): ${path.slice(root.length + 1)}`),
  });
  sink.write([
    {
      text: `  ${result.filesProcessed} files: ${result.inserted} new, ${result.updated} updated, ${result.unchanged} unchanged, ${result.failed} failed`,
      tone: "muted",
    },
  ]);
  sink.write(summaryLines(await pipeline.summary()));
}

function rescan(): void {
  if (scanning) return;
  scanning = runScan()
    .catch((err: unknown) => {
      sink.write([{ text: `  Scan failed: ${String(err)}`, tone: "error" }]);
    })
    .finally(() => {
      scanning = null;
    });
}

async function shutdown(): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  sink.write([{ text: "\n  Shutting down...", tone: "info" }]);
  if (process.stdin.isTTY) process.stdin.setRawMode(false);
  process.stdin.pause();
  await scanning;
  await pipeline.close();
  process.exit(0);
}

function requestShutdown(): void {
  shutdown().catch((err: unknown) => {
    sink.write([{ text: `  Shutdown failed: ${String(err)}`, tone: "error" }]);
    process.exit(1);
  });
}

await runScan();

await pipeline.watch(root, {
  onActivity: (activity) => sink.write(activityLines(activity)),
});

sink.write([
  {
    text: "\n  Watching for file changes... Press 'q' to quit, 'r' to rescan.\n",
    tone: "accent",
  },
]);

emitKeypressEvents(process.stdin);
if (process.stdin.isTTY) process.stdin.setRawMode(true);
process.stdin.on("keypress", (_str: string | undefined, key: { name?: string; ctrl?: boolean }) => {
  if (key.name === "q" || (key.ctrl && key.name === "c")) {
    requestShutdown();
  } else if (key.name === "r") {
    rescan();
  }
});
process.on("SIGINT", requestShutdown);
process.on("SIGTERM", requestShutdown);
