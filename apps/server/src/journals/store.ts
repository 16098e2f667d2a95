/**
 * Journal file persistence.
 * Whole-document JSON rewrites with a `.backup` sibling refreshed before each
 * overwrite. Not safe for concurrent writers: backup-then-write is not atomic.
 */

import { copyFile, mkdir, readFile, readdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";

import { journalDocumentSchema } from "@shared/schemas";
import type { JournalDocument } from "@shared/types/journal";
import { journalDateStamp } from "@shared/utils/time";

import { CorruptJournalError, NotFoundError } from "../errors";
import { logger } from "../logger";
import { isMissingFile } from "../utils/files";

const log = logger.child({ module: "journal-store" });

const JOURNAL_FILE_RE = /^trade-log-\d{8}\.json$/;

export type JournalLoadResult =
  | { ok: true; document: JournalDocument; source: "primary" | "backup" }
  | { ok: false; reason: "missing"; error: NotFoundError }
  | { ok: false; reason: "corrupt"; error: CorruptJournalError };

type ReadOutcome =
  | { kind: "ok"; document: JournalDocument }
  | { kind: "missing" }
  | { kind: "invalid"; error: unknown };

export function backupPath(path: string): string {
  return `${path}.backup`;
}

export function journalFileName(date: Date = new Date(), timeZone: string = "UTC"): string {
  return `trade-log-${journalDateStamp(date, timeZone)}.json`;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** JSON with object keys sorted at every depth. */
export function stringifySorted(value: unknown, indent: number = 4): string {
  return JSON.stringify(
    value,
    (_key, current: unknown) => {
      if (!isPlainObject(current)) return current;
      return Object.fromEntries(Object.entries(current).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
    },
    indent,
  );
}

async function readDocument(path: string): Promise<ReadOutcome> {
  let raw: string;
  try {
    raw = await readFile(path, "utf8");
  } catch (error) {
    if (isMissingFile(error)) return { kind: "missing" };
    return { kind: "invalid", error };
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    return { kind: "invalid", error };
  }

  const parsed = journalDocumentSchema.safeParse(json);
  if (!parsed.success) {
    return { kind: "invalid", error: parsed.error };
  }
  return { kind: "ok", document: parsed.data };
}

/**
 * Writes `document` to `path`. An existing file is first copied to
 * `<path>.backup`; a failed copy is logged and the write goes ahead.
 * Resolves false when the write itself fails.
 */
export async function saveJournal(path: string, document: JournalDocument): Promise<boolean> {
  try {
    await mkdir(dirname(path), { recursive: true });
  } catch (error) {
    log.error({ err: error, path }, "Failed to create journal directory");
    return false;
  }

  try {
    await copyFile(path, backupPath(path));
  } catch (error) {
    if (!isMissingFile(error)) {
      log.warn({ err: error, path }, "Could not create journal backup");
    }
  }

  try {
    await writeFile(path, stringifySorted(document), "utf8");
    log.info({ path, trades: document.trades.length, manualTrades: document.manual_trades.length }, "Journal saved");
    return true;
  } catch (error) {
    log.error({ err: error, path }, "Failed to save journal");
    return false;
  }
}

/**
 * Reads the journal at `path`, falling back to `<path>.backup` when the
 * primary file cannot be parsed. "missing" and "corrupt" are distinct results.
 */
export async function loadJournal(path: string): Promise<JournalLoadResult> {
  const primary = await readDocument(path);
  if (primary.kind === "ok") {
    return { ok: true, document: primary.document, source: "primary" };
  }
  if (primary.kind === "missing") {
    return { ok: false, reason: "missing", error: new NotFoundError(`Journal file not found: ${path}`) };
  }

  log.error({ err: primary.error, path }, "Journal file is unreadable, trying backup");

  const backup = await readDocument(backupPath(path));
  if (backup.kind === "ok") {
    log.warn({ path: backupPath(path) }, "Loaded journal from backup");
    return { ok: true, document: backup.document, source: "backup" };
  }

  if (backup.kind === "invalid") {
    log.error({ err: backup.error, path: backupPath(path) }, "Journal backup is also unreadable");
  }
  return { ok: false, reason: "corrupt", error: new CorruptJournalError(path, { cause: primary.error }) };
}

/** Saved journal file names in `dir`, newest first. */
export async function listJournalFiles(dir: string): Promise<string[]> {
  try {
    const entries = await readdir(dir);
    return entries.filter((name) => JOURNAL_FILE_RE.test(name)).sort().reverse();
  } catch (error) {
    if (isMissingFile(error)) return [];
    throw error;
  }
}
