/**
 * Catalog store – raw SQL access to asset records and the event log.
 *
 * Reads go straight to the backend. Writes are only reachable through
 * `transaction()`, which is what `ChangeCoordinator` uses.
 */
import type { DatabaseBackend, DatabaseExecutor, SqlParam } from "../db/backend.js";
import type {
  AssetRecord,
  CatalogSummary,
  EventKind,
  EventLogEntry,
} from "../core/types.js";
import {
  AssetRowSchema,
  EventRowSchema,
  GroupRowSchema,
  TotalsRowSchema,
} from "./schemas.js";

export const DEFAULT_EVENT_LIMIT = 50;

export interface NewEvent {
  kind: EventKind;
  path: string;
  fileName: string;
  message: string;
  timestamp?: Date;
}

function iso(date: Date | null): string | null {
  return date ? date.toISOString() : null;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

async function selectAsset(
  db: DatabaseExecutor,
  path: string,
): Promise<AssetRecord | null> {
  const row = await db.queryOne("SELECT * FROM assets WHERE path = ?", [path]);
  return row ? AssetRowSchema.parse(row) : null;
}

// ---------------------------------------------------------------------------
// Write side
// ---------------------------------------------------------------------------

export class CatalogTransaction {
  private tx: DatabaseExecutor;

  constructor(tx: DatabaseExecutor) {
    this.tx = tx;
  }

  getByPath(path: string): Promise<AssetRecord | null> {
    return selectAsset(this.tx, path);
  }

  async insertAsset(asset: AssetRecord): Promise<void> {
    const params: SqlParam[] = [
      asset.path,
      asset.fileName,
      asset.relativePath,
      asset.extension,
      asset.category,
      asset.mimeType,
      asset.size,
      asset.fingerprint,
      asset.status,
      asset.errorMessage,
      asset.imageWidth,
      asset.imageHeight,
      asset.thumbnailPath,
      iso(asset.fileCreatedAt),
      iso(asset.fileModifiedAt),
      asset.discoveredAt.toISOString(),
      iso(asset.processedAt),
      asset.processingTimeMs,
    ];
    await this.tx.execute(
      `INSERT INTO assets (path, file_name, relative_path, extension, category, mime_type, size_bytes, fingerprint, status, error_message, image_width, image_height, thumbnail_path, file_created_at, file_modified_at, discovered_at, processed_at, processing_time_ms)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      params,
    );
  }

  /** Overwrite the content-derived fields; path and discovered_at are kept. */
  async updateContent(asset: AssetRecord): Promise<void> {
    await this.tx.execute(
      `UPDATE assets
          SET fingerprint = ?, size_bytes = ?, file_modified_at = ?, status = ?,
              processed_at = ?, processing_time_ms = ?, image_width = ?,
              image_height = ?, error_message = ?, thumbnail_path = ?
        WHERE path = ?`,
      [
        asset.fingerprint,
        asset.size,
        iso(asset.fileModifiedAt),
        asset.status,
        iso(asset.processedAt),
        asset.processingTimeMs,
        asset.imageWidth,
        asset.imageHeight,
        asset.errorMessage,
        asset.thumbnailPath,
        asset.path,
      ],
    );
  }

  async appendEvent(event: NewEvent): Promise<void> {
    await this.tx.execute(
      `INSERT INTO pipeline_events (event_type, path, file_name, message, timestamp) VALUES (?, ?, ?, ?, ?)`,
      [
        event.kind,
        event.path,
        event.fileName,
        event.message,
        (event.timestamp ?? new Date()).toISOString(),
      ],
    );
  }
}

// ---------------------------------------------------------------------------
// Store
// ---------------------------------------------------------------------------

export class CatalogStore {
  private db: DatabaseBackend;

  constructor(db: DatabaseBackend) {
    this.db = db;
  }

  async initialize(): Promise<void> {
    await this.db.initialize();
  }

  transaction<T>(fn: (tx: CatalogTransaction) => Promise<T>): Promise<T> {
    return this.db.transaction((tx) => fn(new CatalogTransaction(tx)));
  }

  getByPath(path: string): Promise<AssetRecord | null> {
    return selectAsset(this.db, path);
  }

  async countAssets(): Promise<number> {
    const row = await this.db.queryOne("SELECT COUNT(*) AS count FROM assets");
    return Number(row?.count ?? 0);
  }

  async listAssets(): Promise<AssetRecord[]> {
    const rows = await this.db.query("SELECT * FROM assets ORDER BY path");
    return rows.map((row) => AssetRowSchema.parse(row));
  }

  /** Most recent events first. */
  async recentEvents(limit: number = DEFAULT_EVENT_LIMIT): Promise<EventLogEntry[]> {
    const rows = await this.db.query(
      "SELECT * FROM pipeline_events ORDER BY id DESC LIMIT ?",
      [limit],
    );
    return rows.map((row) => EventRowSchema.parse(row));
  }

  async summarize(): Promise<CatalogSummary> {
    const totals = TotalsRowSchema.parse(
      await this.db.queryOne(
        `SELECT COUNT(*) AS total,
                COALESCE(SUM(CASE WHEN status = 'Completed' THEN 1 ELSE 0 END), 0) AS completed,
                COALESCE(SUM(CASE WHEN status = 'Failed' THEN 1 ELSE 0 END), 0) AS failed,
                COALESCE(SUM(CASE WHEN status = 'Pending' THEN 1 ELSE 0 END), 0) AS pending,
                COALESCE(SUM(size_bytes), 0) AS total_size,
                COALESCE(AVG(processing_time_ms), 0) AS avg_ms
           FROM assets`,
      ),
    );

    const byCategory = (
      await this.db.query(
        `SELECT category AS label, COUNT(*) AS count,
                COALESCE(SUM(size_bytes), 0) AS total_size,
                COALESCE(AVG(processing_time_ms), 0) AS avg_ms
           FROM assets GROUP BY category ORDER BY count DESC, category`,
      )
    ).map((row) => GroupRowSchema.parse(row));

    const byStatus = (
      await this.db.query(
        `SELECT status AS label, COUNT(*) AS count,
                COALESCE(SUM(size_bytes), 0) AS total_size,
                COALESCE(AVG(processing_time_ms), 0) AS avg_ms
           FROM assets GROUP BY status ORDER BY status`,
      )
    ).map((row) => GroupRowSchema.parse(row));

    return {
      totalAssets: totals.total,
      completedAssets: totals.completed,
      failedAssets: totals.failed,
      pendingAssets: totals.pending,
      totalSizeBytes: totals.total_size,
      avgProcessingTimeMs: round2(totals.avg_ms),
      assetsByCategory: Object.fromEntries(byCategory.map((g) => [g.label, g.count])),
      assetsByStatus: Object.fromEntries(byStatus.map((g) => [g.label, g.count])),
      categories: byCategory.map((g) => ({
        category: g.label,
        count: g.count,
        totalSizeBytes: g.total_size,
        avgProcessingTimeMs: round2(g.avg_ms),
      })),
    };
  }
}
