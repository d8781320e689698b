/**
 * Image dimensions from raw container headers (PNG and BMP only).
 */
import { open } from "node:fs/promises";

import type { ImageDimensions } from "./types.js";

/** Bytes read from the start of an image; covers both header layouts. */
export const IMAGE_HEADER_BYTES = 32;

const NO_DIMENSIONS: ImageDimensions = { width: 0, height: 0 };

// PNG: 0x89 'P' ..., IHDR width/height as big-endian u32 at 16 / 20
function readPng(bytes: Uint8Array): ImageDimensions {
  if (bytes.length <= 24 || bytes[0] !== 0x89 || bytes[1] !== 0x50) {
    return NO_DIMENSIONS;
  }
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  return { width: view.getUint32(16, false), height: view.getUint32(20, false) };
}

// BMP: 'B' 'M' ..., BITMAPINFOHEADER width/height as little-endian i32 at 18 / 22.
// A negative height marks a top-down bitmap.
function readBmp(bytes: Uint8Array): ImageDimensions {
  if (bytes.length <= 26 || bytes[0] !== 0x42 || bytes[1] !== 0x4d) {
    return NO_DIMENSIONS;
  }
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  return {
    width: view.getInt32(18, true),
    height: Math.abs(view.getInt32(22, true)),
  };
}

/**
 * Recover width/height from header bytes. Unknown extensions, short buffers
 * and signature mismatches all yield `{ width: 0, height: 0 }`.
 */
export function readImageDimensions(
  bytes: Uint8Array,
  extension: string,
): ImageDimensions {
  switch (extension.toLowerCase()) {
    case ".png":
      return readPng(bytes);
    case ".bmp":
      return readBmp(bytes);
    default:
      return NO_DIMENSIONS;
  }
}

/** Read at most `IMAGE_HEADER_BYTES` from the start of `path`. */
export async function readImageHeader(path: string): Promise<Uint8Array> {
  const handle = await open(path, "r");
  try {
    const buffer = Buffer.alloc(IMAGE_HEADER_BYTES);
    const { bytesRead } = await handle.read(buffer, 0, IMAGE_HEADER_BYTES, 0);
    return buffer.subarray(0, bytesRead);
  } finally {
    await handle.close();
  }
}
