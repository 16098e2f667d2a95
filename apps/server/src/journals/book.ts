import { nanoid } from "nanoid";
import type { ZodError } from "zod";

import { manualTradeInputSchema, tradeFieldsPatchSchema } from "@shared/schemas";
import type { ManualTradeInput, TradeFieldsPatch } from "@shared/schemas";
import type {
  AccountState,
  JournalDocument,
  Reflections,
  TagFields,
  TradeRecord,
} from "@shared/types/journal";
import { formatJournalTime } from "@shared/utils/time";

import { InvalidInputError } from "../errors";

const CORE_KEYS = new Set([
  "trades",
  "manual_trades",
  "reflections",
  "user_state",
  "wallet_address",
  "saved_at",
]);

const EMPTY_TAGS: TagFields = {
  emotional_state: "",
  triggers: "",
  mistakes: "",
  corrective_action: "",
};

function describeIssues(error: ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "input"}: ${issue.message}`).join("; ");
}

function toTime(entryTime: string | number, timeZone: string): string {
  return formatJournalTime(new Date(entryTime), timeZone);
}

export interface TradeUpdate {
  tags?: TagFields;
  fields?: TradeFieldsPatch;
}

/**
 * In-memory journal: API-sourced and manually entered trades in two separate
 * ordered lists, reflections, and whatever else the loaded document carried.
 */
export class JournalBook {
  private trades: TradeRecord[] = [];
  private manualTrades: TradeRecord[] = [];
  private reflections: Reflections = {};
  private userState: AccountState | null = null;
  private walletAddress: string | null = null;
  private extras: Record<string, unknown> = {};

  constructor(private readonly timeZone: string = "UTC") {}

  static fromDocument(document: JournalDocument, timeZone: string = "UTC"): JournalBook {
    const book = new JournalBook(timeZone);
    book.trades = document.trades.map((trade) => ({ ...trade }));
    book.manualTrades = document.manual_trades.map((trade) => ({ ...trade }));
    book.reflections = { ...document.reflections };
    book.userState = document.user_state ?? null;
    book.walletAddress = document.wallet_address ?? null;
    for (const [key, value] of Object.entries(document)) {
      if (!CORE_KEYS.has(key)) book.extras[key] = value;
    }
    return book;
  }

  toDocument(now: Date = new Date()): JournalDocument {
    return {
      ...this.extras,
      trades: this.trades.map((trade) => ({ ...trade })),
      manual_trades: this.manualTrades.map((trade) => ({ ...trade })),
      reflections: { ...this.reflections },
      user_state: this.userState,
      wallet_address: this.walletAddress,
      saved_at: now.toISOString(),
    };
  }

  get apiTrades(): readonly TradeRecord[] {
    return this.trades;
  }

  get manual(): readonly TradeRecord[] {
    return this.manualTrades;
  }

  get account(): AccountState | null {
    return this.userState;
  }

  get wallet(): string | null {
    return this.walletAddress;
  }

  getReflections(): Reflections {
    return { ...this.reflections };
  }

  /** API trades followed by manual trades. The merged list is never stored. */
  allTrades(): TradeRecord[] {
    return [...this.trades, ...this.manualTrades];
  }

  find(id: string): TradeRecord | undefined {
    return this.trades.find((trade) => trade.id === id) ?? this.manualTrades.find((trade) => trade.id === id);
  }

  ids(): Set<string> {
    return new Set(this.allTrades().map((trade) => trade.id));
  }

  private freshManualId(): string {
    const taken = this.ids();
    let id = `manual-${nanoid(12)}`;
    while (taken.has(id)) {
      id = `manual-${nanoid(12)}`;
    }
    return id;
  }

  addManualTrade(input: ManualTradeInput, tags: TagFields = EMPTY_TAGS, now: Date = new Date()): TradeRecord {
    const parsed = manualTradeInputSchema.safeParse(input);
    if (!parsed.success) {
      throw new InvalidInputError(`Invalid manual trade: ${describeIssues(parsed.error)}`);
    }

    const trade = parsed.data;
    const record: TradeRecord = {
      id: this.freshManualId(),
      coin: trade.coin,
      side: trade.side,
      size: trade.size,
      price: trade.price,
      pnl: trade.pnl,
      fee: trade.fee,
      time: toTime(trade.entryTime, this.timeZone),
      leverage: trade.leverage,
      type: "Manual Trade",
      last_edited: formatJournalTime(now, this.timeZone),
      ...tags,
    };

    this.manualTrades.push(record);
    return record;
  }

  /** Edits a trade in place. Returns undefined when no trade has that id. */
  updateTrade(id: string, update: TradeUpdate, now: Date = new Date()): TradeRecord | undefined {
    const trade = this.find(id);
    if (!trade) return undefined;

    if (update.fields) {
      const parsed = tradeFieldsPatchSchema.safeParse(update.fields);
      if (!parsed.success) {
        throw new InvalidInputError(`Invalid trade fields: ${describeIssues(parsed.error)}`);
      }

      const patch = parsed.data;
      if (patch.coin !== undefined) trade.coin = patch.coin;
      if (patch.side !== undefined) trade.side = patch.side;
      if (patch.size !== undefined) trade.size = patch.size;
      if (patch.price !== undefined) trade.price = patch.price;
      if (patch.pnl !== undefined) trade.pnl = patch.pnl;
      if (patch.fee !== undefined) trade.fee = patch.fee;
      if (patch.leverage !== undefined) trade.leverage = patch.leverage;
      if (patch.entryTime !== undefined) trade.time = toTime(patch.entryTime, this.timeZone);
    }
    if (update.tags) Object.assign(trade, update.tags);
    trade.last_edited = formatJournalTime(now, this.timeZone);

    return trade;
  }

  /** Removes the trade from whichever list holds it. False when absent. */
  deleteTrade(id: string): boolean {
    for (const list of [this.trades, this.manualTrades]) {
      const index = list.findIndex((trade) => trade.id === id);
      if (index !== -1) {
        list.splice(index, 1);
        return true;
      }
    }
    return false;
  }

  /**
   * Installs freshly fetched API trades. Annotations of a previously stored
   * API trade with the same id carry over; ids already in use get a numeric
   * suffix.
   */
  replaceApiTrades(records: readonly TradeRecord[]): TradeRecord[] {
    const previous = new Map(this.trades.map((trade) => [trade.id, trade] as const));
    const taken = new Set(this.manualTrades.map((trade) => trade.id));
    const next: TradeRecord[] = [];

    for (const record of records) {
      let id = record.id;
      for (let n = 2; taken.has(id); n++) {
        id = `${record.id}-${n}`;
      }
      taken.add(id);

      // Partial fills share an order id, so annotations follow the suffixed id
      const prior = previous.get(id);
      const carried: Partial<TradeRecord> = {};
      if (prior) {
        for (const key of ["emotional_state", "triggers", "mistakes", "corrective_action", "last_edited"] as const) {
          if (prior[key] !== undefined) carried[key] = prior[key];
        }
      }

      next.push({ ...record, ...carried, id });
    }

    this.trades = next;
    return next;
  }

  updateReflections(patch: Reflections): Reflections {
    this.reflections = { ...this.reflections, ...patch };
    return this.getReflections();
  }

  setAccount(userState: AccountState | null, walletAddress: string | null): void {
    this.userState = userState;
    this.walletAddress = walletAddress;
  }
}
