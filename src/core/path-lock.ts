/**
 * Per-path mutual exclusion.
 *
 * Each normalized path gets its own single-slot limiter, created on first
 * use and dropped once nothing is running or waiting on it. Work on
 * different paths never waits on each other.
 */
import { resolve } from "node:path";
import pLimit, { type LimitFunction } from "p-limit";

export function normalizeLockKey(path: string): string {
  const resolved = resolve(path);
  return process.platform === "win32" ? resolved.toLowerCase() : resolved;
}

interface LockSlot {
  limit: LimitFunction;
  holders: number;
}

export class PathLock {
  private slots = new Map<string, LockSlot>();

  /** Run `fn` once no other holder of `path` is running. */
  async run<T>(path: string, fn: () => Promise<T>): Promise<T> {
    const key = normalizeLockKey(path);
    let slot = this.slots.get(key);
    if (!slot) {
      slot = { limit: pLimit(1), holders: 0 };
      this.slots.set(key, slot);
    }
    slot.holders++;
    try {
      return await slot.limit(fn);
    } finally {
      slot.holders--;
      if (slot.holders === 0) this.slots.delete(key);
    }
  }

  /** Number of paths that currently hold or wait for the lock. */
  get size(): number {
    return this.slots.size;
  }

  isLocked(path: string): boolean {
    return this.slots.has(normalizeLockKey(path));
  }
}
