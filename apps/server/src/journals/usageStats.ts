/**
 * Usage statistics for tag values.
 * Counts how often each tag was committed on a trade so the selector can rank
 * frequently used tags higher and render them more prominently.
 */

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";

import { usageStatsFileSchema } from "@shared/schemas";
import type { TagCategory } from "@shared/types/journal";

import { logger } from "../logger";
import { isMissingFile } from "../utils/files";
import { TAG_CATEGORIES, assertTagCategory, isTagCategory } from "./vocabulary";

const log = logger.child({ module: "usage-stats" });

export type UsageTier = "none" | "low" | "medium" | "high";

export type UsageStatsSnapshot = Record<TagCategory, Record<string, number>>;

export interface TagUsage {
  value: string;
  count: number;
}

/**
 * Popularity bucket for a usage count:
 * 0 → none, 1–2 → low, 3–5 → medium, 6+ → high.
 */
export function usageTier(count: number): UsageTier {
  if (count <= 0) return "none";
  if (count <= 2) return "low";
  if (count <= 5) return "medium";
  return "high";
}

export class UsageStatsStore {
  // Map keeps first-seen order, which is the tie-break for topN
  private counts = new Map<TagCategory, Map<string, number>>();

  constructor() {
    for (const category of TAG_CATEGORIES) {
      this.counts.set(category, new Map());
    }
  }

  private bucket(category: TagCategory): Map<string, number> {
    let bucket = this.counts.get(category);
    if (!bucket) {
      bucket = new Map();
      this.counts.set(category, bucket);
    }
    return bucket;
  }

  /** Adds one use for each distinct value. */
  record(category: TagCategory, values: Iterable<string>): void {
    const bucket = this.bucket(assertTagCategory(category));
    const distinct = new Set<string>();
    for (const raw of values) {
      const value = raw.trim();
      if (value) distinct.add(value);
    }

    for (const value of distinct) {
      bucket.set(value, (bucket.get(value) ?? 0) + 1);
    }
  }

  count(category: TagCategory, value: string): number {
    return this.counts.get(category)?.get(value.trim()) ?? 0;
  }

  tier(category: TagCategory, value: string): UsageTier {
    return usageTier(this.count(category, value));
  }

  /** Most used values first; equal counts keep the order they were first recorded in. */
  topN(category: TagCategory, n: number): TagUsage[] {
    if (n <= 0) return [];

    const entries = [...(this.counts.get(category) ?? new Map<string, number>()).entries()];
    return entries
      .filter(([, count]) => count > 0)
      .sort((a, b) => b[1] - a[1])
      .slice(0, n)
      .map(([value, count]) => ({ value, count }));
  }

  reset(category?: TagCategory): void {
    const targets = category ? [assertTagCategory(category)] : TAG_CATEGORIES;
    for (const target of targets) {
      this.counts.set(target, new Map());
    }
  }

  /**
   * Plain objects list integer-like keys ("2", "10") first, so such custom
   * values lose their first-seen tie position once saved and reloaded.
   */
  toJSON(): UsageStatsSnapshot {
    return {
      emotional_states: Object.fromEntries(this.bucket("emotional_states")),
      triggers: Object.fromEntries(this.bucket("triggers")),
      mistakes: Object.fromEntries(this.bucket("mistakes")),
      actions: Object.fromEntries(this.bucket("actions")),
    };
  }

  /** Overwrites `path` with the full mapping. Resolves false on any write error. */
  async save(path: string): Promise<boolean> {
    try {
      await mkdir(dirname(path), { recursive: true });
      await writeFile(path, JSON.stringify(this.toJSON(), null, 2), "utf8");
      log.debug({ path }, "Usage stats saved");
      return true;
    } catch (error) {
      log.error({ err: error, path }, "Failed to save usage stats");
      return false;
    }
  }

  /**
   * Merges the counts stored at `path` into this store, keeping the higher of
   * the in-memory and stored count for each value. A missing file is a no-op;
   * a malformed one leaves the store untouched and resolves false.
   */
  async load(path: string): Promise<boolean> {
    let raw: string;
    try {
      raw = await readFile(path, "utf8");
    } catch (error) {
      if (isMissingFile(error)) {
        log.debug({ path }, "No usage stats file yet");
        return true;
      }
      log.error({ err: error, path }, "Failed to read usage stats");
      return false;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      log.error({ err: error, path }, "Usage stats file is not valid JSON");
      return false;
    }

    const parsed = usageStatsFileSchema.safeParse(json);
    if (!parsed.success) {
      log.error({ path, issues: parsed.error.issues }, "Usage stats file has an invalid shape");
      return false;
    }

    for (const key of Object.keys(parsed.data)) {
      if (!isTagCategory(key)) {
        log.warn({ path, key }, "Ignoring unknown category in usage stats file");
      }
    }

    for (const category of TAG_CATEGORIES) {
      const stored = parsed.data[category];
      if (!stored) continue;

      const bucket = this.bucket(category);
      for (const [rawValue, count] of Object.entries(stored)) {
        const value = rawValue.trim();
        if (!value || count === 0) continue;
        bucket.set(value, Math.max(bucket.get(value) ?? 0, count));
      }
    }

    log.info({ path }, "Usage stats loaded");
    return true;
  }
}
