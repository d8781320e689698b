/**
 * Live watcher – turns filesystem notifications into pipeline runs.
 *
 * Create/modify notifications are debounced per path: every new
 * notification restarts that path's settle timer, so a burst collapses
 * into one run once writers have gone quiet. Settled paths are handed to
 * a fixed-size worker pool; a path already waiting in the pool is not
 * queued twice. Rename and delete notifications are reported only, the
 * catalog keeps its record for the old path.
 */
import { resolve } from "node:path";
import { setTimeout as delay } from "node:timers/promises";
import { watch, type FSWatcher, type WatchOptions } from "chokidar";
import pLimit, { type LimitFunction } from "p-limit";

import { createLogger, type Logger } from "../logger.js";
import { normalizeLockKey } from "./path-lock.js";
import type { ProcessedAsset } from "./types.js";

export const DEFAULT_SETTLE_DELAY_MS = 500;
export const DEFAULT_WATCH_WORKERS = 4;

export type WatchEventKind = "created" | "modified" | "renamed" | "deleted";

export interface WatchEvent {
  kind: WatchEventKind;
  path: string;
  /** Previous path, for `renamed`. */
  oldPath?: string;
}

export type WatchActivity =
  | { kind: "processed"; path: string; result: ProcessedAsset }
  | { kind: "renamed"; path: string; oldPath: string | null }
  | { kind: "deleted"; path: string }
  | { kind: "error"; path: string; error: Error };

export type AssetProcessor = (path: string) => Promise<ProcessedAsset>;

export interface WatcherOptions {
  root: string;
  process: AssetProcessor;
  settleDelayMs?: number;
  workers?: number;
  onActivity?: (activity: WatchActivity) => void;
  logger?: Logger;
}

export const WATCHER_OPTIONS: WatchOptions = {
  persistent: true,
  ignoreInitial: true,
  followSymlinks: false,
  ignorePermissionErrors: true,
};

export class AssetWatcher {
  readonly root: string;
  private processAsset: AssetProcessor;
  private settleDelayMs: number;
  private onActivity?: (activity: WatchActivity) => void;
  private log: Logger;

  private pool: LimitFunction;
  private timers = new Map<string, ReturnType<typeof setTimeout>>();
  private queued = new Set<string>();
  private inflight = new Set<Promise<void>>();
  private fsWatcher: FSWatcher | null = null;
  private closed = false;

  constructor(opts: WatcherOptions) {
    this.root = resolve(opts.root);
    this.processAsset = opts.process;
    this.settleDelayMs = opts.settleDelayMs ?? DEFAULT_SETTLE_DELAY_MS;
    this.onActivity = opts.onActivity;
    this.log = opts.logger ?? createLogger({ component: "watcher" });
    this.pool = pLimit(opts.workers ?? DEFAULT_WATCH_WORKERS);
  }

  /** Subscribe to notifications under `root`; resolves once chokidar is ready. */
  async start(): Promise<void> {
    if (this.fsWatcher || this.closed) return;

    const fsWatcher = watch(this.root, WATCHER_OPTIONS);
    fsWatcher.on("add", (path) => this.notify({ kind: "created", path }));
    fsWatcher.on("change", (path) => this.notify({ kind: "modified", path }));
    fsWatcher.on("unlink", (path) => this.notify({ kind: "deleted", path }));
    fsWatcher.on("error", (err) => {
      this.log.error("watcher error", { root: this.root, error: String(err) });
    });
    this.fsWatcher = fsWatcher;

    await new Promise<void>((ready) => fsWatcher.once("ready", () => ready()));
    this.log.info("watching", { root: this.root });
  }

  /** Entry point for every notification; never blocks the caller. */
  notify(event: WatchEvent): void {
    if (this.closed) return;
    const path = resolve(event.path);

    switch (event.kind) {
      case "created":
      case "modified":
        this.schedule(path);
        break;
      case "renamed": {
        const oldPath = event.oldPath ? resolve(event.oldPath) : null;
        this.log.info("asset renamed", { path, oldPath });
        this.emit({ kind: "renamed", path, oldPath });
        break;
      }
      case "deleted":
        this.log.info("asset deleted", { path });
        this.emit({ kind: "deleted", path });
        break;
    }
  }

  /** Paths whose settle timer has not fired yet. */
  get pendingCount(): number {
    return this.timers.size;
  }

  /** Resolve once no timers are pending and no jobs are queued or running. */
  async idle(): Promise<void> {
    while (this.timers.size > 0 || this.inflight.size > 0) {
      if (this.inflight.size > 0) {
        await Promise.all([...this.inflight]);
      } else {
        await delay(this.settleDelayMs);
      }
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    for (const timer of this.timers.values()) clearTimeout(timer);
    this.timers.clear();
    this.queued.clear();
    if (this.fsWatcher) {
      await this.fsWatcher.close();
      this.fsWatcher = null;
    }
    await Promise.all([...this.inflight]);
    this.log.info("watcher closed", { root: this.root });
  }

  // ------------------------------------------------------------------
  // Internals
  // ------------------------------------------------------------------

  private schedule(path: string): void {
    const key = normalizeLockKey(path);
    const existing = this.timers.get(key);
    if (existing) clearTimeout(existing);

    const timer = setTimeout(() => {
      this.timers.delete(key);
      this.enqueue(key, path);
    }, this.settleDelayMs);
    this.timers.set(key, timer);
  }

  private enqueue(key: string, path: string): void {
    // A job that has not started yet will read the newest bytes anyway.
    if (this.queued.has(key)) return;
    this.queued.add(key);

    const job: Promise<void> = this.pool(() => {
      this.queued.delete(key);
      return this.closed ? Promise.resolve() : this.runJob(path);
    }).finally(() => {
      this.inflight.delete(job);
    });
    this.inflight.add(job);
  }

  private async runJob(path: string): Promise<void> {
    try {
      const result = await this.processAsset(path);
      this.log.info("asset processed", {
        path,
        action: result.outcome.action,
        status: result.run.status,
      });
      this.emit({ kind: "processed", path, result });
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      this.log.error("asset processing failed", { path, error: error.message });
      this.emit({ kind: "error", path, error });
    }
  }

  private emit(activity: WatchActivity): void {
    if (!this.onActivity) return;
    try {
      this.onActivity(activity);
    } catch (err) {
      this.log.error("activity callback failed", {
        path: activity.path,
        error: String(err),
      });
    }
  }
}
