/**
 * Zod schemas for catalog rows as returned by either SQL backend.
 *
 * Numeric columns are coerced: postgres-js returns BIGINT and aggregate
 * results as strings.
 */
import { z } from "zod";

import {
  AssetCategory,
  AssetStatus,
  EventKind,
  type AssetRecord,
  type EventLogEntry,
} from "../core/types.js";

const isoDate = z.string().transform((value) => new Date(value));
const nullableIsoDate = isoDate.nullable();
const nullableInt = z.coerce.number().int().nullable();

export const AssetRowSchema = z
  .object({
    path: z.string(),
    file_name: z.string(),
    relative_path: z.string(),
    extension: z.string(),
    category: z.nativeEnum(AssetCategory),
    mime_type: z.string(),
    size_bytes: z.coerce.number(),
    fingerprint: z.string(),
    status: z.nativeEnum(AssetStatus),
    error_message: z.string().nullable(),
    image_width: nullableInt,
    image_height: nullableInt,
    thumbnail_path: z.string().nullable(),
    file_created_at: nullableIsoDate,
    file_modified_at: nullableIsoDate,
    discovered_at: isoDate,
    processed_at: nullableIsoDate,
    processing_time_ms: z.coerce.number(),
  })
  .transform(
    (row): AssetRecord => ({
      path: row.path,
      fileName: row.file_name,
      relativePath: row.relative_path,
      extension: row.extension,
      category: row.category,
      mimeType: row.mime_type,
      size: row.size_bytes,
      fingerprint: row.fingerprint,
      status: row.status,
      errorMessage: row.error_message,
      imageWidth: row.image_width,
      imageHeight: row.image_height,
      thumbnailPath: row.thumbnail_path,
      fileCreatedAt: row.file_created_at,
      fileModifiedAt: row.file_modified_at,
      discoveredAt: row.discovered_at,
      processedAt: row.processed_at,
      processingTimeMs: row.processing_time_ms,
    }),
  );

export const EventRowSchema = z
  .object({
    id: z.coerce.number(),
    event_type: z.nativeEnum(EventKind),
    path: z.string(),
    file_name: z.string(),
    message: z.string(),
    timestamp: isoDate,
  })
  .transform(
    (row): EventLogEntry => ({
      id: row.id,
      kind: row.event_type,
      path: row.path,
      fileName: row.file_name,
      message: row.message,
      timestamp: row.timestamp,
    }),
  );

export const TotalsRowSchema = z.object({
  total: z.coerce.number(),
  completed: z.coerce.number(),
  failed: z.coerce.number(),
  pending: z.coerce.number(),
  total_size: z.coerce.number(),
  avg_ms: z.coerce.number(),
});

export const GroupRowSchema = z.object({
  label: z.string(),
  count: z.coerce.number(),
  total_size: z.coerce.number(),
  avg_ms: z.coerce.number(),
});
