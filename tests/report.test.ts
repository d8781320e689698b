/**
 * Tests for operator output: report lines, console sink, size formatting.
 */
import { beforeAll, describe, test, expect } from "vitest";
import chalk from "chalk";

import { ConsoleSink } from "../src/console-sink.js";
import { formatFileSize } from "../src/core/format.js";
import { AssetStatus, type CatalogSummary } from "../src/core/types.js";
import { LogLevel } from "../src/logger.js";
import { activityLines, summaryLines } from "../src/report.js";
import { makeRun } from "./fixtures.js";

const RULE = "  ----------------------------------------";

beforeAll(() => {
  chalk.level = 0;
});

class MemoryOut {
  chunks: string[] = [];
  write(chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }
}

describe("formatFileSize", () => {
  test("picks the unit by magnitude", () => {
    expect(formatFileSize(0)).toBe("0 B");
    expect(formatFileSize(1023)).toBe("1023 B");
    expect(formatFileSize(1024)).toBe("1.0 KB");
    expect(formatFileSize(1536)).toBe("1.5 KB");
    expect(formatFileSize(5 * 1024 * 1024)).toBe("5.0 MB");
    expect(formatFileSize(1.25 * 1024 * 1024 * 1024)).toBe("1.25 GB");
  });
});

describe("summaryLines", () => {
  test("renders totals and per-category counts", () => {
    const summary: CatalogSummary = {
      totalAssets: 3,
      completedAssets: 3,
      failedAssets: 0,
      pendingAssets: 0,
      totalSizeBytes: 70,
      avgProcessingTimeMs: 1.234,
      assetsByCategory: { Image: 2, Audio: 1 },
      assetsByStatus: { Completed: 3 },
      categories: [
        { category: "Image", count: 2, totalSizeBytes: 66, avgProcessingTimeMs: 1 },
        { category: "Audio", count: 1, totalSizeBytes: 4, avgProcessingTimeMs: 2 },
      ],
    };
    const lines = summaryLines(summary);
    expect(lines.map((l) => l.text)).toEqual([
      RULE,
      "          PIPELINE SUMMARY",
      RULE,
      "  Total Assets:          3",
      "  Completed:             3",
      "  Failed:                0",
      "  Total Size:         70 B",
      "  Avg Process Time:    1.2 ms",
      RULE,
      "  Image                   2",
      "  Audio                   1",
      RULE,
    ]);
    expect(new Set(lines.map((l) => l.tone))).toEqual(new Set(["accent"]));
  });
});

describe("activityLines", () => {
  test("processed", () => {
    const run = makeRun();
    const lines = activityLines({
      kind: "processed",
      path: run.path,
      result: {
        run,
        outcome: { path: run.path, action: "inserted", status: AssetStatus.Completed },
      },
    });
    expect(lines).toEqual([
      { text: "  [+] inserted: art/hero.png", tone: "success" },
      { text: "       -> Completed: Image, 2.0 KB, 1.5ms", tone: "success" },
    ]);
  });

  test("renamed, deleted, error", () => {
    expect(activityLines({ kind: "renamed", path: "/b.png", oldPath: "/a.png" })).toEqual([
      { text: "  [~] Renamed: /a.png -> /b.png", tone: "warn" },
    ]);
    expect(activityLines({ kind: "renamed", path: "/b.png", oldPath: null })).toEqual([
      { text: "  [~] Renamed: ? -> /b.png", tone: "warn" },
    ]);
    expect(activityLines({ kind: "deleted", path: "/a.png" })).toEqual([
      { text: "  [-] Deleted: /a.png", tone: "error" },
    ]);
    expect(
      activityLines({ kind: "error", path: "/a.png", error: new Error("disk full") }),
    ).toEqual([
      { text: "  [!] /a.png", tone: "error" },
      { text: "       -> Error: disk full", tone: "error" },
    ]);
  });
});

describe("ConsoleSink", () => {
  test("each block is one write", () => {
    const out = new MemoryOut();
    const sink = new ConsoleSink(out);
    sink.write([
      { text: "first", tone: "info" },
      { text: "second", tone: "error" },
    ]);
    expect(out.chunks).toEqual(["first\nsecond\n"]);
  });

  test("a block after a progress line starts on a fresh line", () => {
    const out = new MemoryOut();
    const sink = new ConsoleSink(out);
    sink.progress("  Processing (1): a.png");
    sink.write([{ text: "done", tone: "success" }]);
    sink.write([{ text: "again", tone: "info" }]);
    expect(out.chunks).toEqual([
      `\r${"  Processing (1): a.png".padEnd(80)}`,
      "\ndone\n",
      "again\n",
    ]);
  });

  test("log entries render with level and context", () => {
    const out = new MemoryOut();
    const sink = new ConsoleSink(out);
    sink.log({
      level: LogLevel.Warn,
      message: "watcher error",
      context: { root: "/assets" },
      timestamp: "2024-01-01T00:00:00.000Z",
    });
    sink.log({ level: LogLevel.Info, message: "plain", timestamp: "2024-01-01T00:00:00.000Z" });
    expect(out.chunks).toEqual([
      '  warn: watcher error {"root":"/assets"}\n',
      "  info: plain\n",
    ]);
  });
});
