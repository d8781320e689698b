/**
 * Extension classifier – maps a file extension to support flag, category
 * and MIME hint from an allowlist supplied at construction.
 */
import { readFileSync } from "node:fs";
import { extname } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

import { AssetCategory, type Classification } from "./types.js";

const FALLBACK_MIME = "application/octet-stream";

export const ExtensionAllowlistSchema = z.object({
  categories: z.record(z.nativeEnum(AssetCategory), z.array(z.string())),
  mimeTypes: z.record(z.string()).default({}),
});

export type ExtensionAllowlist = z.infer<typeof ExtensionAllowlistSchema>;

const DEFAULT_ALLOWLIST_PATH = fileURLToPath(
  new URL("../../config/extensions.json", import.meta.url),
);

/** Load the bundled allowlist from `config/extensions.json`. */
export function loadDefaultAllowlist(): ExtensionAllowlist {
  const raw: unknown = JSON.parse(readFileSync(DEFAULT_ALLOWLIST_PATH, "utf8"));
  return ExtensionAllowlistSchema.parse(raw);
}

function normaliseExtension(ext: string): string {
  const lower = ext.trim().toLowerCase();
  if (lower === "") return "";
  return lower.startsWith(".") ? lower : `.${lower}`;
}

export class ExtensionClassifier {
  private categories = new Map<string, AssetCategory>();
  private mimeTypes = new Map<string, string>();

  constructor(allowlist: ExtensionAllowlist = loadDefaultAllowlist()) {
    for (const [category, extensions] of Object.entries(allowlist.categories)) {
      const parsed = z.nativeEnum(AssetCategory).parse(category);
      for (const ext of extensions ?? []) {
        this.categories.set(normaliseExtension(ext), parsed);
      }
    }
    for (const [ext, mime] of Object.entries(allowlist.mimeTypes)) {
      this.mimeTypes.set(normaliseExtension(ext), mime);
    }
  }

  classify(extension: string): Classification {
    const ext = normaliseExtension(extension);
    const category = this.categories.get(ext);
    return {
      supported: category !== undefined,
      category: category ?? AssetCategory.Other,
      mimeHint: this.mimeTypes.get(ext) ?? FALLBACK_MIME,
    };
  }

  classifyPath(path: string): Classification {
    return this.classify(extname(path));
  }

  isSupported(path: string): boolean {
    return this.classifyPath(path).supported;
  }

  /** Every extension on the allowlist, sorted. */
  get extensions(): string[] {
    return [...this.categories.keys()].sort();
  }
}
