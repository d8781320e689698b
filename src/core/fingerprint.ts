/**
 * Content fingerprinting.
 *
 * MD5 is used for accidental-change detection only. It is not collision
 * resistant and must not be treated as an integrity check.
 */
import { createHash } from "node:crypto";
import { createReadStream } from "node:fs";

import { FingerprintFailedException } from "./exceptions.js";

export const FINGERPRINT_ALGORITHM = "md5";

export type Fingerprinter = (path: string) => Promise<string>;

/** Stream the whole file through the digest; returns lowercase hex. */
export async function fingerprintFile(path: string): Promise<string> {
  const hash = createHash(FINGERPRINT_ALGORITHM);
  try {
    for await (const chunk of createReadStream(path)) {
      hash.update(chunk);
    }
  } catch (err) {
    throw new FingerprintFailedException(
      path,
      err instanceof Error ? err.message : String(err),
    );
  }
  return hash.digest("hex");
}

export function fingerprintBytes(data: Uint8Array): string {
  return createHash(FINGERPRINT_ALGORITHM).update(data).digest("hex");
}
