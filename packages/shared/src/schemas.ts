import { z } from "zod";

export const tagCategorySchema = z.enum(["emotional_states", "triggers", "mistakes", "actions"]);

export const tradeSideSchema = z.enum(["Long", "Short"]);

export const tradeRecordSchema = z
  .object({
    // Older journals store API trade ids as the numeric order id
    id: z.union([z.string().min(1), z.number()]).transform(String),
    coin: z.string(),
    side: tradeSideSchema,
    size: z.number(),
    price: z.number(),
    pnl: z.number(),
    fee: z.number(),
    time: z.string(),
    leverage: z.number().int().min(1).optional(),
    type: z.enum(["API Trade", "Manual Trade"]),
    last_edited: z.string().optional(),
    emotional_state: z.string().optional(),
    triggers: z.string().optional(),
    mistakes: z.string().optional(),
    corrective_action: z.string().optional(),
  })
  .passthrough();

export const reflectionsSchema = z
  .object({
    patterns: z.string().optional(),
    triggers: z.string().optional(),
    adjustments: z.string().optional(),
    goals: z.string().optional(),
  })
  .passthrough();

export const openPositionSchema = z
  .object({
    coin: z.string(),
    szi: z.coerce.number(),
    unrealizedPnl: z.coerce.number(),
  })
  .passthrough();

export const accountStateSchema = z
  .object({
    marginSummary: z.object({ accountValue: z.coerce.number() }).passthrough().optional(),
    assetPositions: z.array(z.object({ position: openPositionSchema }).passthrough()).optional(),
  })
  .passthrough();

/**
 * Persisted journal document. The three core keys are backfilled when an
 * older file lacks them; unknown keys pass through untouched.
 */
export const journalDocumentSchema = z
  .object({
    trades: z.array(tradeRecordSchema).default([]),
    manual_trades: z.array(tradeRecordSchema).default([]),
    reflections: reflectionsSchema.default({}),
    user_state: accountStateSchema.nullable().optional(),
    wallet_address: z.string().nullable().optional(),
    saved_at: z.string().optional(),
  })
  .passthrough();

const categoryCountsSchema = z.record(z.string(), z.number().int().nonnegative());

export const usageStatsFileSchema = z
  .object({
    emotional_states: categoryCountsSchema.optional(),
    triggers: categoryCountsSchema.optional(),
    mistakes: categoryCountsSchema.optional(),
    actions: categoryCountsSchema.optional(),
  })
  .passthrough();

export const manualTradeInputSchema = z.object({
  coin: z.string().trim().min(1, "Asset is required"),
  side: tradeSideSchema,
  size: z.coerce.number().finite().nonnegative(),
  price: z.coerce.number().finite().nonnegative(),
  pnl: z.coerce.number().finite().default(0),
  fee: z.coerce.number().finite().nonnegative().default(0),
  leverage: z.coerce.number().int().min(1).max(100).default(1),
  entryTime: z.union([z.string().datetime({ offset: true }), z.number().int().nonnegative()]),
});

export const fillSchema = z
  .object({
    coin: z.string(),
    side: z.string(),
    sz: z.coerce.number(),
    px: z.coerce.number(),
    closedPnl: z.coerce.number().default(0),
    fee: z.coerce.number().default(0),
    time: z.number(),
    oid: z.union([z.number(), z.string()]).optional(),
  })
  .passthrough();

export const fillsResponseSchema = z.array(fillSchema);

export const walletAddressSchema = z.string().trim().min(1, "Wallet address is required");

export type ManualTradeInput = z.input<typeof manualTradeInputSchema>;

/** Field edits allowed on an existing trade; tag fields go through tag contexts. */
export const tradeFieldsPatchSchema = manualTradeInputSchema.partial();

export type TradeFieldsPatch = z.input<typeof tradeFieldsPatchSchema>;
