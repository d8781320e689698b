/**
 * Pipeline orchestrator – runs a single asset through
 * validate → hash → extract metadata and returns the terminal run record.
 *
 * The orchestrator never writes to the catalog; see `ChangeCoordinator`.
 */
import { stat } from "node:fs/promises";
import { basename, extname, join, relative, resolve } from "node:path";
import { performance } from "node:perf_hooks";

import { createLogger, type Logger } from "../logger.js";
import type { ExtensionClassifier } from "./classifier.js";
import { fingerprintFile, type Fingerprinter } from "./fingerprint.js";
import { readImageDimensions, readImageHeader } from "./image-header.js";
import { statusForStage, transitionStage } from "./state-machine.js";
import {
  AssetCategory,
  AssetStatus,
  PipelineStage,
  type PipelineRun,
} from "./types.js";

export const FILE_NOT_FOUND_MESSAGE = "File not found";

export interface OrchestratorOptions {
  classifier: ExtensionClassifier;
  /** Directory that thumbnail names are reserved under. */
  thumbnailDir: string;
  fingerprint?: Fingerprinter;
  logger?: Logger;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class AssetOrchestrator {
  private classifier: ExtensionClassifier;
  private thumbnailDir: string;
  private fingerprint: Fingerprinter;
  private log: Logger;

  constructor(opts: OrchestratorOptions) {
    this.classifier = opts.classifier;
    this.thumbnailDir = opts.thumbnailDir;
    this.fingerprint = opts.fingerprint ?? fingerprintFile;
    this.log = opts.logger ?? createLogger({ component: "orchestrator" });
  }

  async process(filePath: string, rootPath: string): Promise<PipelineRun> {
    const started = performance.now();
    const fullPath = resolve(filePath);
    const extension = extname(fullPath).toLowerCase();
    const run: PipelineRun = {
      path: fullPath,
      fileName: basename(fullPath, extname(fullPath)),
      relativePath: relative(resolve(rootPath), fullPath),
      extension,
      category: AssetCategory.Other,
      mimeType: "application/octet-stream",
      size: 0,
      fingerprint: "",
      status: AssetStatus.Pending,
      errorMessage: null,
      imageWidth: null,
      imageHeight: null,
      thumbnailPath: null,
      fileCreatedAt: null,
      fileModifiedAt: null,
      discoveredAt: new Date(),
      processedAt: null,
      processingTimeMs: 0,
      stage: PipelineStage.Discovered,
    };

    try {
      await this.runStages(run);
    } catch (err) {
      this.advance(run, PipelineStage.Failed);
      run.errorMessage = errorMessage(err);
    }

    run.processedAt = new Date();
    run.processingTimeMs = performance.now() - started;
    this.log.debug("asset processed", {
      path: run.path,
      stage: run.stage,
      ms: Math.round(run.processingTimeMs * 10) / 10,
    });
    return run;
  }

  private async runStages(run: PipelineRun): Promise<void> {
    this.advance(run, PipelineStage.Validating);

    const classification = this.classifier.classify(run.extension);
    if (!classification.supported) {
      this.advance(run, PipelineStage.Skipped);
      run.errorMessage = `Unsupported extension: ${run.extension}`;
      return;
    }

    const stats = await stat(run.path).catch(() => null);
    if (!stats || !stats.isFile()) {
      this.advance(run, PipelineStage.Failed);
      run.errorMessage = FILE_NOT_FOUND_MESSAGE;
      return;
    }

    run.size = stats.size;
    run.fileCreatedAt = stats.birthtime;
    run.fileModifiedAt = stats.mtime;
    run.category = classification.category;
    run.mimeType = classification.mimeHint;

    this.advance(run, PipelineStage.Hashing);
    run.fingerprint = await this.fingerprint(run.path);

    this.advance(run, PipelineStage.MetadataExtraction);
    if (run.category === AssetCategory.Image) {
      await this.extractImageMetadata(run);
    }

    this.advance(run, PipelineStage.Completed);
  }

  // Non-critical: a failure here leaves dimensions unset and nothing else.
  private async extractImageMetadata(run: PipelineRun): Promise<void> {
    try {
      const header = await readImageHeader(run.path);
      const { width, height } = readImageDimensions(header, run.extension);
      run.imageWidth = width;
      run.imageHeight = height;
      run.thumbnailPath = join(
        this.thumbnailDir,
        `${run.fingerprint}_thumb${run.extension}`,
      );
    } catch (err) {
      this.log.debug("image metadata unavailable", {
        path: run.path,
        error: errorMessage(err),
      });
    }
  }

  private advance(run: PipelineRun, target: PipelineStage): void {
    const result = transitionStage(run.stage, target);
    if (result.error) throw result.error;
    run.stage = target;
    run.status = statusForStage(target);
  }
}
