import { Router } from "express";
import type { NextFunction, Request, Response } from "express";
import { z } from "zod";

import { tradeFieldsPatchSchema, walletAddressSchema } from "@shared/schemas";

import type { JournalSession } from "../journals/session";

const FetchTradesSchema = z.object({
  walletAddress: walletAddressSchema,
});

const CommitTradeSchema = z.object({
  fields: tradeFieldsPatchSchema.optional(),
});

export function createTradesRouter(session: JournalSession): Router {
  const router: Router = Router();

  router.get("/", (_req: Request, res: Response) => {
    const { all, trades, manualTrades } = session.listTrades();
    res.json({ all, trades, manualTrades });
  });

  /**
   * POST /api/trades/fetch
   * Replaces the API trades with the wallet's most recent fills
   */
  router.post("/fetch", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { walletAddress } = FetchTradesSchema.parse(req.body);
      const trades = await session.fetchTrades(walletAddress);
      res.json({ trades, count: trades.length });
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/trades/manual
   * Adds a manual trade tagged with the "new-trade" context
   */
  router.post("/manual", (req: Request, res: Response, next: NextFunction) => {
    try {
      const trade = session.addManualTrade(req.body);
      res.status(201).json({ trade });
    } catch (error) {
      next(error);
    }
  });

  router.put("/:id", (req: Request, res: Response, next: NextFunction) => {
    try {
      const { fields } = CommitTradeSchema.parse(req.body ?? {});
      const trade = session.commitTrade(req.params.id ?? "", fields);
      res.json({ trade });
    } catch (error) {
      next(error);
    }
  });

  router.delete("/:id", (req: Request, res: Response) => {
    const removed = session.deleteTrade(req.params.id ?? "");
    res.json({ removed });
  });

  return router;
}
