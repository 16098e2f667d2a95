export type TagCategory = "emotional_states" | "triggers" | "mistakes" | "actions";

/** Trade-record field that stores the joined selection of a category. */
export type TagField = "emotional_state" | "triggers" | "mistakes" | "corrective_action";

export const TAG_FIELD_BY_CATEGORY: Readonly<Record<TagCategory, TagField>> = {
  emotional_states: "emotional_state",
  triggers: "triggers",
  mistakes: "mistakes",
  actions: "corrective_action",
};

export type TagFields = Record<TagField, string>;

export type TradeSide = "Long" | "Short";

export type TradeProvenance = "API Trade" | "Manual Trade";

export interface TradeRecord extends Partial<TagFields> {
  id: string;
  coin: string;
  side: TradeSide;
  size: number;
  price: number;
  pnl: number;
  fee: number;
  time: string; // YYYY-MM-DD HH:MM:SS
  leverage?: number;
  type: TradeProvenance;
  last_edited?: string;
  [extra: string]: unknown;
}

export interface Reflections {
  patterns?: string;
  triggers?: string;
  adjustments?: string;
  goals?: string;
}

export type ReflectionKey = keyof Reflections;

export interface OpenPosition {
  coin: string;
  szi: number;
  unrealizedPnl: number;
  [extra: string]: unknown;
}

export interface AccountState {
  marginSummary?: {
    accountValue: number;
    [extra: string]: unknown;
  };
  assetPositions?: Array<{ position: OpenPosition; [extra: string]: unknown }>;
  [extra: string]: unknown;
}

export interface JournalDocument {
  trades: TradeRecord[];
  manual_trades: TradeRecord[];
  reflections: Reflections;
  user_state?: AccountState | null;
  wallet_address?: string | null;
  saved_at?: string;
  [extra: string]: unknown;
}

/** A single execution as reported by the trade-data provider. */
export interface Fill {
  coin: string;
  side: string; // "B" buy, "A" sell
  sz: number;
  px: number;
  closedPnl: number;
  fee: number;
  time: number; // epoch ms
  oid?: number | string;
  [extra: string]: unknown;
}
