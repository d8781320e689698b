/**
 * Directory scanner – lazy recursive walk yielding supported files.
 *
 * Unreadable directories and entries (permission denied, vanished files,
 * dangling links) are skipped; the walk always continues.
 */
import { opendir, stat } from "node:fs/promises";
import type { Dirent } from "node:fs";
import { join, resolve } from "node:path";

import { createLogger, type Logger } from "../logger.js";
import type { ExtensionClassifier } from "./classifier.js";

export interface ScanOptions {
  /** Checked between entries; the walk stops once aborted. */
  signal?: AbortSignal;
  logger?: Logger;
}

const defaultLog = createLogger({ component: "scanner" });

async function isRegularFile(path: string, entry: Dirent): Promise<boolean> {
  if (entry.isFile()) return true;
  if (!entry.isSymbolicLink()) return false;
  const target = await stat(path);
  return target.isFile();
}

/**
 * Yield absolute paths of every supported file under `root`. Each call
 * starts a fresh walk.
 */
export async function* scanDirectory(
  root: string,
  classifier: ExtensionClassifier,
  opts: ScanOptions = {},
): AsyncGenerator<string> {
  const log = opts.logger ?? defaultLog;
  const pending: string[] = [resolve(root)];

  while (pending.length > 0) {
    if (opts.signal?.aborted) return;
    const dir = pending.pop();
    if (dir === undefined) break;

    let entries: Dirent[];
    try {
      entries = [];
      for await (const entry of await opendir(dir)) {
        entries.push(entry);
      }
    } catch (err) {
      log.debug("skipping unreadable directory", { dir, error: String(err) });
      continue;
    }

    entries.sort((a, b) => a.name.localeCompare(b.name));
    const subdirs: string[] = [];

    for (const entry of entries) {
      if (opts.signal?.aborted) return;
      const full = join(dir, entry.name);

      if (entry.isDirectory()) {
        subdirs.push(full);
        continue;
      }
      if (!classifier.isSupported(full)) continue;

      try {
        if (!(await isRegularFile(full, entry))) continue;
      } catch (err) {
        log.debug("skipping unreadable entry", { path: full, error: String(err) });
        continue;
      }
      yield full;
    }

    // Reverse so the stack pops subdirectories in name order.
    pending.push(...subdirs.reverse());
  }
}
