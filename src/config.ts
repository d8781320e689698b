/**
 * Configuration validation and backend factory.
 */
import { homedir } from "node:os";
import { join } from "node:path";
import { z } from "zod";

import { ExtensionAllowlistSchema } from "./core/classifier.js";
import { UnsupportedBackendError } from "./core/exceptions.js";
import type { DatabaseBackend } from "./db/backend.js";

// ---------------------------------------------------------------------------
// Config schema
// ---------------------------------------------------------------------------

const SqliteConfigSchema = z.object({
  provider: z.literal("sqlite"),
  config: z.object({ path: z.string().default(":memory:") }).default({}),
});

const PostgresConfigSchema = z.object({
  provider: z.literal("postgres"),
  config: z.object({ connectionString: z.string().min(1) }),
});

const DbConfigSchema = z.discriminatedUnion("provider", [
  SqliteConfigSchema,
  PostgresConfigSchema,
]);

export const PipelineConfigSchema = z.object({
  /** Replaces the bundled allowlist from `config/extensions.json`. */
  extensions: ExtensionAllowlistSchema.optional(),
  thumbnailDir: z.string().default(join(homedir(), ".assetline", "thumbnails")),
  settleDelayMs: z.number().int().nonnegative().default(500),
  workers: z.number().int().positive().default(4),
  scanConcurrency: z.number().int().positive().default(4),
});

export const ConfigSchema = z.object({
  db: DbConfigSchema.default({ provider: "sqlite" }),
  pipeline: PipelineConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type DbConfig = z.infer<typeof DbConfigSchema>;
export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>;

/** Whole number >= `min` from a command-line string, or null. */
export function parseCountOption(raw: string, min: number): number | null {
  const value = Number(raw);
  if (raw.trim() === "" || !Number.isInteger(value) || value < min) return null;
  return value;
}

// ---------------------------------------------------------------------------
// DB factory
// ---------------------------------------------------------------------------

export async function buildDb(db: DbConfig): Promise<DatabaseBackend> {
  switch (db.provider) {
    case "sqlite": {
      const { SQLiteBackend } = await import("./db/sqlite.js");
      return new SQLiteBackend(db.config.path);
    }
    case "postgres": {
      const { PostgresBackend } = await import("./db/postgres.js");
      return PostgresBackend.connect(db.config.connectionString);
    }
    default:
      throw new UnsupportedBackendError(`Unknown db provider: ${String(db)}`);
  }
}

// ---------------------------------------------------------------------------
// Top-level config → backend + pipeline settings
// ---------------------------------------------------------------------------

export async function parseConfig(
  raw: unknown,
): Promise<{ db: DatabaseBackend; pipeline: PipelineConfig }> {
  const config = ConfigSchema.parse(raw);
  const db = await buildDb(config.db);
  return { db, pipeline: config.pipeline };
}
