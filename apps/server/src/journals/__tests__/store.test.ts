import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";

import type { JournalDocument } from "@shared/types/journal";

import { CorruptJournalError, NotFoundError } from "../../errors";
import {
  backupPath,
  journalFileName,
  listJournalFiles,
  loadJournal,
  saveJournal,
  stringifySorted,
} from "../store";

const DOCUMENT: JournalDocument = {
  trades: [
    {
      id: "101",
      coin: "BTC",
      side: "Long",
      size: 0.25,
      price: 61000,
      pnl: 12.5,
      fee: 0.4,
      time: "2024-03-05 10:00:00",
      type: "API Trade",
      emotional_state: "Greed",
    },
  ],
  manual_trades: [],
  reflections: { patterns: "Entering late" },
  wallet_address: "0x0000000000000000000000000000000000000001",
};

describe("journal store", () => {
  let dir: string;
  let path: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "journal-store-"));
    path = join(dir, "trade-log-20240305.json");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("names files by date in the journal zone", () => {
    const instant = new Date("2024-03-05T02:00:00Z");
    expect(journalFileName(instant)).toBe("trade-log-20240305.json");
    expect(journalFileName(instant, "America/Los_Angeles")).toBe("trade-log-20240304.json");
  });

  it("sorts keys at every depth", () => {
    expect(stringifySorted({ b: 1, a: { d: [{ z: 1, y: 2 }], c: null } }, 0)).toBe(
      '{"a":{"c":null,"d":[{"y":2,"z":1}]},"b":1}',
    );
  });

  it("round-trips a document", async () => {
    expect(await saveJournal(path, DOCUMENT)).toBe(true);

    const result = await loadJournal(path);
    expect(result).toEqual({ ok: true, source: "primary", document: DOCUMENT });
  });

  it("writes four-space indented JSON", async () => {
    await saveJournal(path, DOCUMENT);
    const raw = await readFile(path, "utf8");
    expect(raw.split("\n")[1]).toBe('    "manual_trades": [],');
  });

  it("copies the previous file to the backup before overwriting", async () => {
    await saveJournal(path, DOCUMENT);
    await saveJournal(path, { ...DOCUMENT, reflections: { goals: "Sleep" } });

    const backup = JSON.parse(await readFile(backupPath(path), "utf8"));
    expect(backup.reflections).toEqual({ patterns: "Entering late" });
  });

  it("backfills missing core keys on load", async () => {
    await writeFile(path, JSON.stringify({ trades: [], extra: 1 }));

    const result = await loadJournal(path);
    expect(result).toEqual({
      ok: true,
      source: "primary",
      document: { trades: [], manual_trades: [], reflections: {}, extra: 1 },
    });
  });

  it("loads journals that store numeric trade ids", async () => {
    const [trade] = DOCUMENT.trades;
    await writeFile(path, JSON.stringify({ ...DOCUMENT, trades: [{ ...trade, id: 123456789 }] }));

    const result = await loadJournal(path);
    expect(result.ok && result.source).toBe("primary");
    if (result.ok) {
      expect(result.document.trades[0]?.id).toBe("123456789");
    }
  });

  it("falls back to the backup when the primary is corrupt", async () => {
    await saveJournal(path, DOCUMENT);
    await saveJournal(path, DOCUMENT);
    await writeFile(path, "{ truncated");

    const result = await loadJournal(path);
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.source).toBe("backup");
      expect(result.document.trades[0]?.id).toBe("101");
    }
  });

  it("uses the backup when the primary has an invalid shape", async () => {
    await writeFile(backupPath(path), JSON.stringify(DOCUMENT));
    await writeFile(path, JSON.stringify({ trades: "nope" }));

    const result = await loadJournal(path);
    expect(result.ok && result.source).toBe("backup");
  });

  it("reports corruption when neither file is readable", async () => {
    await writeFile(path, "{");

    const result = await loadJournal(path);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.reason).toBe("corrupt");
      expect(result.error).toBeInstanceOf(CorruptJournalError);
    }
  });

  it("reports a missing file separately", async () => {
    const result = await loadJournal(join(dir, "trade-log-19990101.json"));
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.reason).toBe("missing");
      expect(result.error).toBeInstanceOf(NotFoundError);
    }
  });

  it("lists journal files newest first", async () => {
    await writeFile(join(dir, "trade-log-20240101.json"), "{}");
    await writeFile(join(dir, "trade-log-20240301.json"), "{}");
    await writeFile(join(dir, "trade-log-20240301.json.backup"), "{}");
    await writeFile(join(dir, "notes.txt"), "");

    expect(await listJournalFiles(dir)).toEqual(["trade-log-20240301.json", "trade-log-20240101.json"]);
    expect(await listJournalFiles(join(dir, "absent"))).toEqual([]);
  });

  it("reports a failed write", async () => {
    const blocker = join(dir, "file");
    await writeFile(blocker, "");
    expect(await saveJournal(join(blocker, "trade-log-20240305.json"), DOCUMENT)).toBe(false);
  });
});
