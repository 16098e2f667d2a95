/**
 * JournalSession owns the working journal for one user: the trade book, the
 * tag contexts being edited, the usage counters, and the provider handle.
 * Every layer that needs journal state receives the session explicitly.
 */

import { join } from "node:path";

import type { ManualTradeInput, TradeFieldsPatch } from "@shared/schemas";
import type { Reflections, TagCategory, TradeRecord } from "@shared/types/journal";

import { NotFoundError } from "../errors";
import { logger } from "../logger";
import { fillToTradeRecord } from "../market/hyperliquid";
import type { TradeDataProvider } from "../market/hyperliquid";
import { JournalBook } from "./book";
import { generateMarkdownJournal } from "./markdown";
import { journalFileName, listJournalFiles, loadJournal, saveJournal } from "./store";
import { summarizePortfolio, summarizeTrades } from "./summary";
import type { PortfolioSummary, TradeSummary } from "./summary";
import { NEW_TRADE_CONTEXT, TagContextRegistry } from "./tagSelection";
import type { TagContext } from "./tagSelection";
import { UsageStatsStore } from "./usageStats";
import type { TagUsage, UsageTier } from "./usageStats";
import { TAG_CATEGORIES, canonicalOptions, isCustom } from "./vocabulary";
import { assertWalletAddress } from "./wallet";

const log = logger.child({ module: "journal-session" });

export interface JournalSessionOptions {
  provider: TradeDataProvider;
  journalDir: string;
  statsFile: string;
  timeZone?: string;
  fillLimit?: number;
  /** Clock override, used by tests. */
  now?: () => Date;
  stats?: UsageStatsStore;
}

export interface TagOptionView {
  value: string;
  selected: boolean;
  custom: boolean;
  count: number;
  tier: UsageTier;
}

export interface CategoryView {
  category: TagCategory;
  selected: string[];
  options: TagOptionView[];
}

export interface ContextView {
  contextId: string;
  categories: CategoryView[];
}

export interface SaveJournalResult {
  ok: boolean;
  fileName: string;
  statsSaved: boolean;
}

export class JournalSession {
  readonly stats: UsageStatsStore;
  private book: JournalBook;
  private readonly contexts = new TagContextRegistry();
  private readonly provider: TradeDataProvider;
  private readonly journalDir: string;
  private readonly statsFile: string;
  private readonly timeZone: string;
  private readonly fillLimit: number;
  private readonly now: () => Date;

  constructor(options: JournalSessionOptions) {
    this.provider = options.provider;
    this.journalDir = options.journalDir;
    this.statsFile = options.statsFile;
    this.timeZone = options.timeZone ?? "UTC";
    this.fillLimit = options.fillLimit ?? 10;
    this.now = options.now ?? (() => new Date());
    this.stats = options.stats ?? new UsageStatsStore();
    this.book = new JournalBook(this.timeZone);
  }

  get journal(): JournalBook {
    return this.book;
  }

  // ─── Trades ───────────────────────────────────────────────────────

  async fetchTrades(walletAddress: string): Promise<TradeRecord[]> {
    const address = assertWalletAddress(walletAddress);
    const { fills, userState } = await this.provider.fetchTradeData(address);

    const records = fills.slice(0, this.fillLimit).map((fill) => fillToTradeRecord(fill, this.timeZone));
    const installed = this.book.replaceApiTrades(records);
    this.book.setAccount(userState, address);

    log.info({ walletAddress: address, trades: installed.length }, "API trades refreshed");
    return installed;
  }

  /** Adds a manual trade tagged with the draft context, then discards the draft. */
  addManualTrade(input: ManualTradeInput): TradeRecord {
    const draft = this.contexts.open(NEW_TRADE_CONTEXT);
    const record = this.book.addManualTrade(input, draft.toTagFields(), this.now());
    this.recordUsage(draft);
    this.contexts.discard(NEW_TRADE_CONTEXT);
    return record;
  }

  /**
   * Folds the trade's tag context (if any) into the record, applies field
   * edits and counts the committed tags once.
   */
  commitTrade(id: string, fields?: TradeFieldsPatch): TradeRecord {
    const trade = this.book.find(id);
    if (!trade) {
      throw new NotFoundError(`Trade not found: ${id}`);
    }

    const context = this.contexts.get(id);
    const updated = this.book.updateTrade(
      id,
      { ...(context ? { tags: context.toTagFields() } : {}), ...(fields ? { fields } : {}) },
      this.now(),
    );
    if (!updated) {
      throw new NotFoundError(`Trade not found: ${id}`);
    }

    if (context) {
      this.recordUsage(context);
      this.contexts.discard(id);
    }
    return updated;
  }

  /** Idempotent: deleting an unknown id resolves false. */
  deleteTrade(id: string): boolean {
    this.contexts.discard(id);
    return this.book.deleteTrade(id);
  }

  listTrades(): { all: TradeRecord[]; trades: readonly TradeRecord[]; manualTrades: readonly TradeRecord[] } {
    return { all: this.book.allTrades(), trades: this.book.apiTrades, manualTrades: this.book.manual };
  }

  // ─── Tag contexts ─────────────────────────────────────────────────

  /** Opens the context, seeding it from the stored trade the first time. */
  tagContext(contextId: string): TagContext {
    const trade = contextId === NEW_TRADE_CONTEXT ? undefined : this.book.find(contextId);
    if (contextId !== NEW_TRADE_CONTEXT && !trade) {
      throw new NotFoundError(`Trade not found: ${contextId}`);
    }
    return this.contexts.open(contextId, trade);
  }

  toggleTag(contextId: string, category: TagCategory, value: string): ContextView {
    this.tagContext(contextId).selection(category).toggle(value);
    return this.describeContext(contextId);
  }

  addCustomTag(contextId: string, category: TagCategory, value: string): ContextView {
    this.tagContext(contextId).selection(category).addCustom(value);
    return this.describeContext(contextId);
  }

  clearTags(contextId: string, category: TagCategory): ContextView {
    this.tagContext(contextId).selection(category).clear();
    return this.describeContext(contextId);
  }

  /** Drops unsaved edits; the next open re-seeds from the stored trade. */
  resetTagContext(contextId: string): boolean {
    return this.contexts.discard(contextId);
  }

  describeContext(contextId: string): ContextView {
    const context = this.tagContext(contextId);

    return {
      contextId,
      categories: TAG_CATEGORIES.map((category) => {
        const selected = context.selection(category).snapshot();
        const values = [...canonicalOptions(category), ...selected.filter((value) => isCustom(category, value))];
        return {
          category,
          selected,
          options: values.map((value) => ({
            value,
            selected: selected.includes(value),
            custom: isCustom(category, value),
            count: this.stats.count(category, value),
            tier: this.stats.tier(category, value),
          })),
        };
      }),
    };
  }

  private recordUsage(context: TagContext): void {
    for (const [category, values] of context.nonEmpty()) {
      this.stats.record(category, values);
    }
  }

  topTags(n: number): Record<TagCategory, TagUsage[]> {
    return {
      emotional_states: this.stats.topN("emotional_states", n),
      triggers: this.stats.topN("triggers", n),
      mistakes: this.stats.topN("mistakes", n),
      actions: this.stats.topN("actions", n),
    };
  }

  // ─── Persistence ──────────────────────────────────────────────────

  saveStats(): Promise<boolean> {
    return this.stats.save(this.statsFile);
  }

  loadStats(): Promise<boolean> {
    return this.stats.load(this.statsFile);
  }

  async saveJournal(): Promise<SaveJournalResult> {
    const now = this.now();
    const fileName = journalFileName(now, this.timeZone);
    const ok = await saveJournal(join(this.journalDir, fileName), this.book.toDocument(now));

    // Stats ride along with a successful journal save but never fail it
    const statsSaved = ok ? await this.saveStats() : false;
    return { ok, fileName, statsSaved };
  }

  async loadJournal(fileName: string): Promise<{ source: "primary" | "backup"; trades: number }> {
    if (!/^trade-log-\d{8}\.json$/.test(fileName)) {
      throw new NotFoundError(`Not a journal file: ${fileName}`);
    }

    const result = await loadJournal(join(this.journalDir, fileName));
    if (!result.ok) {
      throw result.error;
    }

    this.book = JournalBook.fromDocument(result.document, this.timeZone);
    this.contexts.clear();
    return { source: result.source, trades: this.book.allTrades().length };
  }

  listJournals(): Promise<string[]> {
    return listJournalFiles(this.journalDir);
  }

  // ─── Reports ──────────────────────────────────────────────────────

  exportMarkdown(): string {
    return generateMarkdownJournal(this.book.toDocument(this.now()), { now: this.now(), timeZone: this.timeZone });
  }

  summary(): { trades: TradeSummary; portfolio: PortfolioSummary; walletAddress: string | null } {
    return {
      trades: summarizeTrades(this.book.allTrades()),
      portfolio: summarizePortfolio(this.book.account),
      walletAddress: this.book.wallet,
    };
  }

  updateReflections(patch: Reflections): Reflections {
    return this.book.updateReflections(patch);
  }
}
