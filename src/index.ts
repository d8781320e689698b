/**
 * assetline – asset ingestion pipeline with live change detection.
 */
import { stat } from "node:fs/promises";
import { resolve } from "node:path";

import { CatalogStore } from "./catalog/store.js";
import {
  parseConfig,
  PipelineConfigSchema,
  type PipelineConfig,
  type PipelineConfigInput,
} from "./config.js";
import { ExtensionClassifier } from "./core/classifier.js";
import { ChangeCoordinator } from "./core/coordinator.js";
import { ScanRootNotFoundError } from "./core/exceptions.js";
import type { Fingerprinter } from "./core/fingerprint.js";
import { AssetOrchestrator } from "./core/orchestrator.js";
import { PathLock } from "./core/path-lock.js";
import { scanDirectory } from "./core/scanner.js";
import { AssetStatus } from "./core/types.js";
import type {
  AssetRecord,
  CatalogSummary,
  EventLogEntry,
  ProcessedAsset,
  ScanResult,
} from "./core/types.js";
import { AssetWatcher, type WatchActivity } from "./core/watcher.js";
import type { DatabaseBackend } from "./db/backend.js";
import { createLogger } from "./logger.js";

export * from "./core/types.js";
export { AssetWatcher } from "./core/watcher.js";
export type { WatchActivity, WatchEvent, WatchEventKind } from "./core/watcher.js";
export { ExtensionClassifier } from "./core/classifier.js";
export { readImageDimensions } from "./core/image-header.js";
export { fingerprintFile } from "./core/fingerprint.js";
export { formatFileSize } from "./core/format.js";
export type { DatabaseBackend } from "./db/backend.js";

export interface ScanProgress {
  processed: number;
  path: string;
  result: ProcessedAsset | null;
}

export interface ScanOptions {
  signal?: AbortSignal;
  /** Called once per processed candidate. */
  onProgress?: (progress: ScanProgress) => void;
  concurrency?: number;
}

export interface WatchOptions {
  onActivity?: (activity: WatchActivity) => void;
}

export interface AssetPipelineOptions extends PipelineConfigInput {
  /** Replaces the default MD5 file fingerprint. */
  fingerprint?: Fingerprinter;
}

const log = createLogger({ component: "pipeline" });

export class AssetPipeline {
  readonly store: CatalogStore;
  private db: DatabaseBackend;
  private config: PipelineConfig;
  private classifier: ExtensionClassifier;
  private orchestrator: AssetOrchestrator;
  private coordinator: ChangeCoordinator;
  private locks = new PathLock();
  private watchers = new Set<AssetWatcher>();

  constructor(db: DatabaseBackend, options: AssetPipelineOptions = {}) {
    const { fingerprint, ...pipelineOptions } = options;
    this.db = db;
    this.config = PipelineConfigSchema.parse(pipelineOptions);
    this.store = new CatalogStore(db);
    this.classifier = new ExtensionClassifier(this.config.extensions);
    this.orchestrator = new AssetOrchestrator({
      classifier: this.classifier,
      thumbnailDir: this.config.thumbnailDir,
      fingerprint,
      logger: createLogger({ component: "orchestrator" }),
    });
    this.coordinator = new ChangeCoordinator(this.store);
  }

  /** Construct from a configuration object (validated with Zod). */
  static async fromConfig(config: unknown): Promise<AssetPipeline> {
    const { db, pipeline } = await parseConfig(config);
    const instance = new AssetPipeline(db, pipeline);
    await instance.initialize();
    return instance;
  }

  /** Create catalog tables. Call once after construction. */
  async initialize(): Promise<void> {
    await this.store.initialize();
  }

  // ------------------------------------------------------------------
  // Public API
  // ------------------------------------------------------------------

  /**
   * Run one file through the orchestrator and reconcile the result. Calls
   * for the same path are serialized; other paths proceed in parallel.
   */
  async processFile(path: string, root: string): Promise<ProcessedAsset> {
    return this.locks.run(path, async () => {
      const run = await this.orchestrator.process(path, root);
      const outcome = await this.coordinator.reconcileOne(run);
      return { run, outcome };
    });
  }

  /** Walk `root` once and process every supported file. */
  async scan(root: string, opts: ScanOptions = {}): Promise<ScanResult> {
    const fullRoot = resolve(root);
    const rootStats = await stat(fullRoot).catch(() => null);
    if (!rootStats?.isDirectory()) {
      throw new ScanRootNotFoundError(fullRoot);
    }

    const concurrency = opts.concurrency ?? this.config.scanConcurrency;
    const result: ScanResult = {
      root: fullRoot,
      filesProcessed: 0,
      inserted: 0,
      updated: 0,
      unchanged: 0,
      failed: 0,
      aborted: false,
    };
    const inflight = new Set<Promise<void>>();

    const handle = async (path: string): Promise<void> => {
      let processed: ProcessedAsset | null = null;
      try {
        processed = await this.processFile(path, fullRoot);
        this.tally(result, processed);
      } catch (err) {
        result.failed++;
        log.error("scan entry failed", { path, error: String(err) });
      }
      result.filesProcessed++;
      try {
        opts.onProgress?.({
          processed: result.filesProcessed,
          path,
          result: processed,
        });
      } catch (err) {
        log.warn("progress callback failed", { path, error: String(err) });
      }
    };

    log.info("scan started", { root: fullRoot });
    for await (const path of scanDirectory(fullRoot, this.classifier, {
      signal: opts.signal,
    })) {
      if (opts.signal?.aborted) break;
      const task: Promise<void> = handle(path).finally(() => {
        inflight.delete(task);
      });
      inflight.add(task);
      if (inflight.size >= concurrency) {
        await Promise.race(inflight);
      }
    }
    await Promise.all(inflight);

    result.aborted = opts.signal?.aborted ?? false;
    log.info("scan finished", { ...result });
    return result;
  }

  /** Start a live watcher on `root`; closed together with the pipeline. */
  async watch(root: string, opts: WatchOptions = {}): Promise<AssetWatcher> {
    const fullRoot = resolve(root);
    const watcher = this.createWatcher(fullRoot, opts);
    await watcher.start();
    return watcher;
  }

  /** Watcher bound to this pipeline without an OS subscription. */
  createWatcher(root: string, opts: WatchOptions = {}): AssetWatcher {
    const fullRoot = resolve(root);
    const watcher = new AssetWatcher({
      root: fullRoot,
      process: (path) => this.processFile(path, fullRoot),
      settleDelayMs: this.config.settleDelayMs,
      workers: this.config.workers,
      onActivity: opts.onActivity,
      logger: createLogger({ component: "watcher" }),
    });
    this.watchers.add(watcher);
    return watcher;
  }

  getAsset(path: string): Promise<AssetRecord | null> {
    return this.store.getByPath(resolve(path));
  }

  summary(): Promise<CatalogSummary> {
    return this.store.summarize();
  }

  recentEvents(limit?: number): Promise<EventLogEntry[]> {
    return this.store.recentEvents(limit);
  }

  async close(): Promise<void> {
    await Promise.all([...this.watchers].map((w) => w.close()));
    this.watchers.clear();
    await this.db.close();
  }

  // ------------------------------------------------------------------
  // Internals
  // ------------------------------------------------------------------

  private tally(result: ScanResult, processed: ProcessedAsset): void {
    switch (processed.outcome.action) {
      case "inserted":
        result.inserted++;
        break;
      case "updated":
        result.updated++;
        break;
      case "unchanged":
        result.unchanged++;
        break;
      case "skipped":
        break;
    }
    if (processed.run.status === AssetStatus.Failed) result.failed++;
  }
}
