/**
 * Change coordinator – reconciles finished pipeline runs into the catalog.
 *
 * Lookup is by path. A new path is inserted and logged as `FileDiscovered`;
 * an equal fingerprint is a no-op; a different fingerprint updates the row
 * in place and logs `FileUpdated`. Single runs go through the same batch
 * path so the watcher and the scanner never diverge.
 */
import type { CatalogStore, CatalogTransaction } from "../catalog/store.js";
import { createLogger, type Logger } from "../logger.js";
import { ReconcileFailedException } from "./exceptions.js";
import { formatFileSize } from "./format.js";
import {
  AssetStatus,
  EventKind,
  type AssetRecord,
  type PipelineRun,
  type ReconcileOutcome,
} from "./types.js";

function toRecord(run: PipelineRun): AssetRecord {
  const { stage: _stage, ...record } = run;
  return record;
}

export class ChangeCoordinator {
  private store: CatalogStore;
  private log: Logger;

  constructor(store: CatalogStore, logger?: Logger) {
    this.store = store;
    this.log = logger ?? createLogger({ component: "coordinator" });
  }

  async reconcile(runs: PipelineRun[]): Promise<ReconcileOutcome[]> {
    if (runs.length === 0) return [];
    try {
      return await this.store.transaction(async (tx) => {
        const outcomes: ReconcileOutcome[] = [];
        for (const run of runs) {
          outcomes.push(await this.apply(tx, run));
        }
        return outcomes;
      });
    } catch (err) {
      throw new ReconcileFailedException(
        err instanceof Error ? err.message : String(err),
      );
    }
  }

  async reconcileOne(run: PipelineRun): Promise<ReconcileOutcome> {
    const [outcome] = await this.reconcile([run]);
    return outcome;
  }

  private async apply(
    tx: CatalogTransaction,
    run: PipelineRun,
  ): Promise<ReconcileOutcome> {
    if (run.status === AssetStatus.Skipped) {
      return { path: run.path, action: "skipped", status: run.status };
    }

    const existing = await tx.getByPath(run.path);

    if (!existing) {
      await tx.insertAsset(toRecord(run));
      await tx.appendEvent({
        kind: EventKind.FileDiscovered,
        path: run.path,
        fileName: run.fileName,
        message: `New asset processed: ${run.relativePath} (${run.category}, ${formatFileSize(run.size)})`,
      });
      this.log.debug("asset inserted", { path: run.path, status: run.status });
      return { path: run.path, action: "inserted", status: run.status };
    }

    if (existing.fingerprint === run.fingerprint) {
      return { path: run.path, action: "unchanged", status: existing.status };
    }

    await tx.updateContent(toRecord(run));
    await tx.appendEvent({
      kind: EventKind.FileUpdated,
      path: run.path,
      fileName: run.fileName,
      message: `Re-processed changed file: ${run.relativePath}`,
    });
    this.log.debug("asset updated", { path: run.path, status: run.status });
    return { path: run.path, action: "updated", status: run.status };
  }
}
