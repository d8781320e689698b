/**
 * Shared test fixtures: temp dirs, synthetic image headers, pre-configured pipeline.
 */
import { mkdirSync, mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";

import {
  AssetCategory,
  AssetPipeline,
  AssetStatus,
  PipelineStage,
  type AssetPipelineOptions,
  type PipelineRun,
} from "../src/index.js";
import { SQLiteBackend } from "../src/db/sqlite.js";

export function makeTmpDir(): string {
  return mkdtempSync(join(tmpdir(), "assetline-test-"));
}

export function writeFile(root: string, relative: string, data: Uint8Array | string): string {
  const full = join(root, relative);
  mkdirSync(dirname(full), { recursive: true });
  writeFileSync(full, data);
  return full;
}

// ---------------------------------------------------------------------------
// Synthetic image headers
// ---------------------------------------------------------------------------

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

/** PNG signature + IHDR chunk header; `length` bytes in total (min 24). */
export function pngHeader(width: number, height: number, length = 33): Uint8Array {
  const bytes = new Uint8Array(length);
  bytes.set(PNG_SIGNATURE, 0);
  const view = new DataView(bytes.buffer);
  view.setUint32(8, 13, false);
  bytes.set([0x49, 0x48, 0x44, 0x52], 12); // "IHDR"
  view.setUint32(16, width, false);
  view.setUint32(20, height, false);
  return bytes;
}

/** BMP file header + BITMAPINFOHEADER prefix (54 bytes). */
export function bmpHeader(width: number, height: number): Uint8Array {
  const bytes = new Uint8Array(54);
  bytes[0] = 0x42;
  bytes[1] = 0x4d;
  const view = new DataView(bytes.buffer);
  view.setUint32(2, 54, true);
  view.setUint32(10, 54, true);
  view.setUint32(14, 40, true);
  view.setInt32(18, width, true);
  view.setInt32(22, height, true);
  return bytes;
}

// ---------------------------------------------------------------------------
// Pipeline runs
// ---------------------------------------------------------------------------

export const DISCOVERED = new Date("2024-03-01T10:00:00.000Z");

/** A completed PNG run for `/assets/art/hero.png`. */
export function makeRun(overrides: Partial<PipelineRun> = {}): PipelineRun {
  return {
    path: "/assets/art/hero.png",
    fileName: "hero",
    relativePath: "art/hero.png",
    extension: ".png",
    category: AssetCategory.Image,
    mimeType: "image/png",
    size: 2048,
    fingerprint: "aaaa",
    status: AssetStatus.Completed,
    errorMessage: null,
    imageWidth: 32,
    imageHeight: 64,
    thumbnailPath: "/thumbs/aaaa_thumb.png",
    fileCreatedAt: new Date("2024-01-01T00:00:00.000Z"),
    fileModifiedAt: new Date("2024-02-01T00:00:00.000Z"),
    discoveredAt: DISCOVERED,
    processedAt: new Date("2024-03-01T10:00:01.000Z"),
    processingTimeMs: 1.5,
    stage: PipelineStage.Completed,
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// Pipeline
// ---------------------------------------------------------------------------

export async function makePipeline(
  dir: string,
  options: AssetPipelineOptions = {},
): Promise<AssetPipeline> {
  const pipeline = new AssetPipeline(new SQLiteBackend(":memory:"), {
    thumbnailDir: join(dir, ".thumbs"),
    settleDelayMs: 20,
    ...options,
  });
  await pipeline.initialize();
  return pipeline;
}
