import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";

import { UsageStatsStore, usageTier } from "../usageStats";

describe("usageTier", () => {
  it("buckets counts at 0, 1-2, 3-5 and 6+", () => {
    expect([0, 1, 2, 3, 5, 6, 40].map(usageTier)).toEqual([
      "none",
      "low",
      "low",
      "medium",
      "medium",
      "high",
      "high",
    ]);
  });
});

describe("UsageStatsStore", () => {
  let dir: string;
  let stats: UsageStatsStore;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "usage-stats-"));
    stats = new UsageStatsStore();
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("counts each distinct value once per record call", () => {
    stats.record("emotional_states", ["Fear", "Fear", " Greed ", ""]);
    expect(stats.count("emotional_states", "Fear")).toBe(1);
    expect(stats.count("emotional_states", "Greed")).toBe(1);
    expect(stats.count("emotional_states", "Hope")).toBe(0);
    expect(stats.count("triggers", "Fear")).toBe(0);
  });

  it("ranks by count and keeps first-seen order on ties", () => {
    stats.record("triggers", ["Price surges"]);
    stats.record("triggers", ["Recent losses"]);
    stats.record("triggers", ["Herd mentality"]);
    stats.record("triggers", ["Herd mentality"]);

    expect(stats.topN("triggers", 2)).toEqual([
      { value: "Herd mentality", count: 2 },
      { value: "Price surges", count: 1 },
    ]);
    expect(stats.topN("triggers", 0)).toEqual([]);
    expect(stats.topN("mistakes", 3)).toEqual([]);
  });

  it("reports tiers from counts", () => {
    for (let i = 0; i < 3; i++) stats.record("actions", ["Take regular breaks"]);
    expect(stats.tier("actions", "Take regular breaks")).toBe("medium");
    expect(stats.tier("actions", "Set realistic goals")).toBe("none");
  });

  it("resets a single category or all of them", () => {
    stats.record("mistakes", ["Overtrading"]);
    stats.record("actions", ["Use position sizing"]);

    stats.reset("mistakes");
    expect(stats.count("mistakes", "Overtrading")).toBe(0);
    expect(stats.count("actions", "Use position sizing")).toBe(1);

    stats.reset();
    expect(stats.toJSON()).toEqual({ emotional_states: {}, triggers: {}, mistakes: {}, actions: {} });
  });

  it("round-trips through the stats file", async () => {
    const path = join(dir, "nested", "stats.json");
    stats.record("emotional_states", ["Fear"]);
    stats.record("emotional_states", ["Fear", "Doubt"]);

    expect(await stats.save(path)).toBe(true);
    expect(JSON.parse(await readFile(path, "utf8"))).toEqual({
      emotional_states: { Fear: 2, Doubt: 1 },
      triggers: {},
      mistakes: {},
      actions: {},
    });

    const restored = new UsageStatsStore();
    expect(await restored.load(path)).toBe(true);
    expect(restored.count("emotional_states", "Fear")).toBe(2);
    expect(restored.count("emotional_states", "Doubt")).toBe(1);
  });

  it("reloads integer-like values ahead of other ties", async () => {
    const path = join(dir, "stats.json");
    stats.record("emotional_states", ["Hope"]);
    stats.record("emotional_states", ["2"]);
    expect(stats.topN("emotional_states", 2).map((usage) => usage.value)).toEqual(["Hope", "2"]);

    await stats.save(path);
    const restored = new UsageStatsStore();
    await restored.load(path);
    expect(restored.topN("emotional_states", 2).map((usage) => usage.value)).toEqual(["2", "Hope"]);
  });

  it("keeps the higher count when merging a file", async () => {
    const path = join(dir, "stats.json");
    await writeFile(path, JSON.stringify({ triggers: { "Price surges": 4, "Recent losses": 0 }, moods: {} }));
    stats.record("triggers", ["Price surges"]);
    stats.record("triggers", ["Social media buzz"]);

    expect(await stats.load(path)).toBe(true);
    expect(stats.count("triggers", "Price surges")).toBe(4);
    expect(stats.count("triggers", "Social media buzz")).toBe(1);
    expect(stats.topN("triggers", 5)).toEqual([
      { value: "Price surges", count: 4 },
      { value: "Social media buzz", count: 1 },
    ]);
  });

  it("treats a missing file as empty", async () => {
    expect(await stats.load(join(dir, "absent.json"))).toBe(true);
    expect(stats.topN("emotional_states", 5)).toEqual([]);
  });

  it("leaves the store untouched when the file is malformed", async () => {
    const path = join(dir, "stats.json");
    stats.record("mistakes", ["Overtrading"]);

    await writeFile(path, "{ not json");
    expect(await stats.load(path)).toBe(false);

    await writeFile(path, JSON.stringify({ mistakes: { Overtrading: 2.5 } }));
    expect(await stats.load(path)).toBe(false);

    expect(stats.count("mistakes", "Overtrading")).toBe(1);
  });

  it("reports a failed save", async () => {
    const blocker = join(dir, "file");
    await writeFile(blocker, "");
    expect(await stats.save(join(blocker, "stats.json"))).toBe(false);
  });
});
