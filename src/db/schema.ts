/**
 * Catalog schema: one row per asset path plus the append-only event log.
 */
import type { SqlDialect } from "./backend.js";

export function schemaSql(dialect: SqlDialect): string {
  const eventId =
    dialect === "postgres" ? "BIGSERIAL PRIMARY KEY" : "INTEGER PRIMARY KEY";

  return `
CREATE TABLE IF NOT EXISTS assets (
  path               TEXT PRIMARY KEY,
  file_name          TEXT NOT NULL,
  relative_path      TEXT NOT NULL,
  extension          TEXT NOT NULL,
  category           TEXT NOT NULL,
  mime_type          TEXT NOT NULL,
  size_bytes         BIGINT NOT NULL DEFAULT 0,
  fingerprint        TEXT NOT NULL,
  status             TEXT NOT NULL,
  error_message      TEXT,
  image_width        BIGINT,
  image_height       BIGINT,
  thumbnail_path     TEXT,
  file_created_at    TEXT,
  file_modified_at   TEXT,
  discovered_at      TEXT NOT NULL,
  processed_at       TEXT,
  processing_time_ms DOUBLE PRECISION NOT NULL DEFAULT 0
);

CREATE INDEX IF NOT EXISTS idx_assets_fingerprint ON assets (fingerprint);
CREATE INDEX IF NOT EXISTS idx_assets_category ON assets (category);
CREATE INDEX IF NOT EXISTS idx_assets_status ON assets (status);

CREATE TABLE IF NOT EXISTS pipeline_events (
  id         ${eventId},
  event_type TEXT NOT NULL,
  path       TEXT NOT NULL,
  file_name  TEXT NOT NULL,
  message    TEXT NOT NULL,
  timestamp  TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_pipeline_events_timestamp ON pipeline_events (timestamp);
CREATE INDEX IF NOT EXISTS idx_pipeline_events_type ON pipeline_events (event_type);
`;
}
