/**
 * Unit tests for the extension classifier.
 */
import { describe, test, expect } from "vitest";

import { ExtensionClassifier, loadDefaultAllowlist } from "../src/core/classifier.js";
import { AssetCategory } from "../src/core/types.js";

describe("ExtensionClassifier", () => {
  const classifier = new ExtensionClassifier();

  test("bundled allowlist has every default extension", () => {
    expect(classifier.extensions).toHaveLength(33);
    expect(loadDefaultAllowlist().categories.Image).toContain(".dds");
  });

  test("classifies by category", () => {
    expect(classifier.classify(".png")).toEqual({
      supported: true,
      category: AssetCategory.Image,
      mimeHint: "image/png",
    });
    expect(classifier.classify(".mp3").category).toBe(AssetCategory.Audio);
    expect(classifier.classify(".glb").category).toBe(AssetCategory.Model);
    expect(classifier.classify(".yml").category).toBe(AssetCategory.Config);
    expect(classifier.classify(".hlsl").category).toBe(AssetCategory.Script);
  });

  test("matching is case-insensitive and dot-optional", () => {
    expect(classifier.classify(".PNG").supported).toBe(true);
    expect(classifier.classify("Jpeg").mimeHint).toBe("image/jpeg");
  });

  test("whitelisted text files are supported as Other", () => {
    expect(classifier.classify(".md")).toEqual({
      supported: true,
      category: AssetCategory.Other,
      mimeHint: "application/octet-stream",
    });
  });

  test("unknown extensions are unsupported", () => {
    expect(classifier.classify(".tmp")).toEqual({
      supported: false,
      category: AssetCategory.Other,
      mimeHint: "application/octet-stream",
    });
    expect(classifier.classify("").supported).toBe(false);
    expect(classifier.classifyPath("/assets/Makefile").supported).toBe(false);
  });

  test("classifyPath uses the final extension", () => {
    expect(classifier.classifyPath("/a/b/hero.final.PNG").category).toBe(
      AssetCategory.Image,
    );
    expect(classifier.isSupported("/a/b/scene.blend")).toBe(true);
  });

  test("allowlist is injected, not global", () => {
    const custom = new ExtensionClassifier({
      categories: { [AssetCategory.Audio]: ["opus"] },
      mimeTypes: { opus: "audio/opus" },
    });
    expect(custom.classify(".opus")).toEqual({
      supported: true,
      category: AssetCategory.Audio,
      mimeHint: "audio/opus",
    });
    expect(custom.classify(".png").supported).toBe(false);
    expect(classifier.classify(".opus").supported).toBe(false);
  });
});
