/**
 * Asset pipeline domain types.
 */

export enum AssetCategory {
  Image = "Image",
  Audio = "Audio",
  Model = "Model",
  Config = "Config",
  Script = "Script",
  Other = "Other",
}

/** Catalog-facing status of an asset record. */
export enum AssetStatus {
  Pending = "Pending",
  Processing = "Processing",
  Completed = "Completed",
  Failed = "Failed",
  Skipped = "Skipped",
}

/** Orchestrator stages a single run moves through. */
export enum PipelineStage {
  Discovered = "Discovered",
  Validating = "Validating",
  Hashing = "Hashing",
  MetadataExtraction = "MetadataExtraction",
  Completed = "Completed",
  Failed = "Failed",
  Skipped = "Skipped",
}

export enum EventKind {
  FileDiscovered = "FileDiscovered",
  FileUpdated = "FileUpdated",
}

// ---------------------------------------------------------------------------
// Records
// ---------------------------------------------------------------------------

/** One catalog row; `path` is the identity key, `fingerprint` the change key. */
export interface AssetRecord {
  path: string;
  fileName: string;
  relativePath: string;
  extension: string;
  category: AssetCategory;
  mimeType: string;
  size: number;
  fingerprint: string;
  status: AssetStatus;
  errorMessage: string | null;
  imageWidth: number | null;
  imageHeight: number | null;
  thumbnailPath: string | null;
  fileCreatedAt: Date | null;
  fileModifiedAt: Date | null;
  discoveredAt: Date;
  processedAt: Date | null;
  processingTimeMs: number;
}

/** Working record for one pass through the orchestrator. */
export interface PipelineRun extends AssetRecord {
  stage: PipelineStage;
}

export interface EventLogEntry {
  id: number;
  kind: EventKind;
  path: string;
  fileName: string;
  message: string;
  timestamp: Date;
}

/** Result of classifying a file extension. */
export interface Classification {
  supported: boolean;
  category: AssetCategory;
  mimeHint: string;
}

export interface ImageDimensions {
  width: number;
  height: number;
}

// ---------------------------------------------------------------------------
// Coordinator / reporting
// ---------------------------------------------------------------------------

export type ReconcileAction = "inserted" | "unchanged" | "updated" | "skipped";

export interface ReconcileOutcome {
  path: string;
  action: ReconcileAction;
  status: AssetStatus;
}

/** A pipeline run together with what the coordinator did with it. */
export interface ProcessedAsset {
  run: PipelineRun;
  outcome: ReconcileOutcome;
}

export interface CategoryBreakdown {
  category: string;
  count: number;
  totalSizeBytes: number;
  avgProcessingTimeMs: number;
}

/** Aggregate view over the catalog for reporting consumers. */
export interface CatalogSummary {
  totalAssets: number;
  completedAssets: number;
  failedAssets: number;
  pendingAssets: number;
  totalSizeBytes: number;
  avgProcessingTimeMs: number;
  assetsByCategory: Record<string, number>;
  assetsByStatus: Record<string, number>;
  categories: CategoryBreakdown[];
}

/** Result returned from a directory scan. */
export interface ScanResult {
  root: string;
  filesProcessed: number;
  inserted: number;
  updated: number;
  unchanged: number;
  failed: number;
  aborted: boolean;
}
