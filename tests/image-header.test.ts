/**
 * Unit tests for PNG / BMP header parsing.
 */
import { describe, test, expect } from "vitest";
import { join } from "node:path";

import {
  IMAGE_HEADER_BYTES,
  readImageDimensions,
  readImageHeader,
} from "../src/core/image-header.js";
import { bmpHeader, makeTmpDir, pngHeader, writeFile } from "./fixtures.js";

describe("readImageDimensions", () => {
  test("25-byte PNG buffer yields big-endian width/height", () => {
    const bytes = pngHeader(1920, 1080, 25);
    expect(bytes.length).toBe(25);
    expect(readImageDimensions(bytes, ".png")).toEqual({ width: 1920, height: 1080 });
  });

  test("PNG buffer of 24 bytes or fewer yields zeros", () => {
    expect(readImageDimensions(pngHeader(32, 64, 24), ".png")).toEqual({
      width: 0,
      height: 0,
    });
    expect(readImageDimensions(new Uint8Array(0), ".png")).toEqual({
      width: 0,
      height: 0,
    });
  });

  test("PNG signature mismatch yields zeros", () => {
    const bytes = pngHeader(32, 64);
    bytes[1] = 0x51;
    expect(readImageDimensions(bytes, ".png")).toEqual({ width: 0, height: 0 });
  });

  test("extension match is case-insensitive", () => {
    expect(readImageDimensions(pngHeader(7, 9), ".PNG")).toEqual({ width: 7, height: 9 });
  });

  test("BMP little-endian width/height", () => {
    expect(readImageDimensions(bmpHeader(640, 480), ".bmp")).toEqual({
      width: 640,
      height: 480,
    });
  });

  test("BMP negative (top-down) height is returned as its absolute value", () => {
    const bytes = bmpHeader(256, -128);
    expect(bytes[22]).toBe(0x80);
    expect(bytes[25]).toBe(0xff);
    expect(readImageDimensions(bytes, ".bmp")).toEqual({ width: 256, height: 128 });
  });

  test("BMP buffer of 26 bytes or fewer yields zeros", () => {
    const bytes = bmpHeader(10, 10).subarray(0, 26);
    expect(readImageDimensions(bytes, ".bmp")).toEqual({ width: 0, height: 0 });
  });

  test("signature for the wrong extension yields zeros", () => {
    expect(readImageDimensions(pngHeader(32, 64), ".bmp")).toEqual({ width: 0, height: 0 });
    expect(readImageDimensions(bmpHeader(32, 64), ".png")).toEqual({ width: 0, height: 0 });
  });

  test("other image formats are not parsed", () => {
    expect(readImageDimensions(pngHeader(32, 64), ".jpg")).toEqual({ width: 0, height: 0 });
  });

  test("works on a subarray with a non-zero byte offset", () => {
    const padded = new Uint8Array(40);
    padded.set(pngHeader(3, 5, 33), 7);
    expect(readImageDimensions(padded.subarray(7), ".png")).toEqual({ width: 3, height: 5 });
  });
});

describe("readImageHeader", () => {
  test("reads a bounded prefix", async () => {
    const dir = makeTmpDir();
    const data = new Uint8Array(4096).fill(0xab);
    const path = writeFile(dir, "big.png", data);
    const header = await readImageHeader(path);
    expect(header.length).toBe(IMAGE_HEADER_BYTES);
    expect(header[0]).toBe(0xab);
  });

  test("short files return what is there", async () => {
    const dir = makeTmpDir();
    const path = writeFile(dir, "tiny.png", new Uint8Array([1, 2, 3]));
    expect(Array.from(await readImageHeader(path))).toEqual([1, 2, 3]);
  });

  test("missing files reject", async () => {
    await expect(readImageHeader(join(makeTmpDir(), "nope.png"))).rejects.toThrow();
  });
});
