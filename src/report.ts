/**
 * Operator-facing text for scan summaries and watcher activity.
 *
 * Returns plain lines tagged with a tone; `ConsoleSink` decides colors.
 */
import { formatFileSize } from "./core/format.js";
import type { CatalogSummary } from "./core/types.js";
import type { WatchActivity } from "./core/watcher.js";

export type Tone = "info" | "muted" | "success" | "warn" | "error" | "accent";

export interface OutputLine {
  text: string;
  tone: Tone;
}

const RULE = "  ----------------------------------------";

const line = (text: string, tone: Tone = "info"): OutputLine => ({ text, tone });

export function summaryLines(summary: CatalogSummary): OutputLine[] {
  const lines: OutputLine[] = [
    line(RULE, "accent"),
    line("          PIPELINE SUMMARY", "accent"),
    line(RULE, "accent"),
    line(`  Total Assets:     ${String(summary.totalAssets).padStart(6)}`, "accent"),
    line(`  Completed:        ${String(summary.completedAssets).padStart(6)}`, "accent"),
    line(`  Failed:           ${String(summary.failedAssets).padStart(6)}`, "accent"),
    line(`  Total Size:       ${formatFileSize(summary.totalSizeBytes).padStart(6)}`, "accent"),
    line(`  Avg Process Time: ${summary.avgProcessingTimeMs.toFixed(1).padStart(6)} ms`, "accent"),
    line(RULE, "accent"),
  ];
  for (const cat of summary.categories) {
    lines.push(line(`  ${cat.category.padEnd(18)} ${String(cat.count).padStart(6)}`, "accent"));
  }
  lines.push(line(RULE, "accent"));
  return lines;
}

export function activityLines(activity: WatchActivity): OutputLine[] {
  switch (activity.kind) {
    case "processed": {
      const { run, outcome } = activity.result;
      return [
        line(`  [+] ${outcome.action}: ${run.relativePath}`, "success"),
        line(
          `       -> ${run.status}: ${run.category}, ${formatFileSize(run.size)}, ${run.processingTimeMs.toFixed(1)}ms`,
          "success",
        ),
      ];
    }
    case "renamed":
      return [line(`  [~] Renamed: ${activity.oldPath ?? "?"} -> ${activity.path}`, "warn")];
    case "deleted":
      return [line(`  [-] Deleted: ${activity.path}`, "error")];
    case "error":
      return [
        line(`  [!] ${activity.path}`, "error"),
        line(`       -> Error: ${activity.error.message}`, "error"),
      ];
  }
}
