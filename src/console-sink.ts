/**
 * Serialized console output.
 *
 * Every block of lines is rendered into one string and written with a
 * single `write` call, so output from concurrent jobs never interleaves
 * inside a block.
 */
import chalk from "chalk";

import { LogLevel, type LogEntry } from "./logger.js";
import type { OutputLine, Tone } from "./report.js";

const TONES: Record<Tone, (text: string) => string> = {
  info: (text) => text,
  muted: chalk.gray,
  success: chalk.green,
  warn: chalk.yellow,
  error: chalk.red,
  accent: chalk.cyan,
};

export interface Writable {
  write(chunk: string): unknown;
}

export class ConsoleSink {
  private out: Writable;
  private progressVisible = false;

  constructor(out: Writable = process.stdout) {
    this.out = out;
  }

  write(lines: OutputLine[]): void {
    const body = lines.map((l) => TONES[l.tone](l.text)).join("\n");
    this.out.write(`${this.clearProgress()}${body}\n`);
  }

  /** Overwrite the current progress line in place. */
  progress(text: string): void {
    this.progressVisible = true;
    this.out.write(`\r${TONES.muted(text.padEnd(80))}`);
  }

  log(entry: LogEntry): void {
    const tone: Tone =
      entry.level === LogLevel.Error
        ? "error"
        : entry.level === LogLevel.Warn
          ? "warn"
          : "muted";
    const context = entry.context ? ` ${JSON.stringify(entry.context)}` : "";
    this.write([{ text: `  ${entry.level}: ${entry.message}${context}`, tone }]);
  }

  private clearProgress(): string {
    if (!this.progressVisible) return "";
    this.progressVisible = false;
    return "\n";
  }
}
