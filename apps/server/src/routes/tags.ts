import { Router } from "express";
import type { NextFunction, Request, Response } from "express";
import { z } from "zod";

import { tagCategorySchema } from "@shared/schemas";

import type { JournalSession } from "../journals/session";
import { CATEGORY_LABELS, TAG_CATEGORIES, canonicalOptions } from "../journals/vocabulary";

const TagValueSchema = z.object({
  value: z.string().trim().min(1, "Tag value is required"),
});

const TopTagsQuerySchema = z.object({
  n: z.coerce.number().int().min(1).max(100).default(5),
});

export function createTagsRouter(session: JournalSession): Router {
  const router: Router = Router();

  router.get("/vocabulary", (_req: Request, res: Response) => {
    res.json({
      categories: TAG_CATEGORIES.map((category) => ({
        category,
        label: CATEGORY_LABELS[category],
        options: canonicalOptions(category),
      })),
    });
  });

  router.get("/contexts/:contextId", (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(session.describeContext(req.params.contextId ?? ""));
    } catch (error) {
      next(error);
    }
  });

  router.post("/contexts/:contextId/:category/toggle", (req: Request, res: Response, next: NextFunction) => {
    try {
      const category = tagCategorySchema.parse(req.params.category);
      const { value } = TagValueSchema.parse(req.body);
      res.json(session.toggleTag(req.params.contextId ?? "", category, value));
    } catch (error) {
      next(error);
    }
  });

  router.post("/contexts/:contextId/:category/custom", (req: Request, res: Response, next: NextFunction) => {
    try {
      const category = tagCategorySchema.parse(req.params.category);
      const { value } = TagValueSchema.parse(req.body);
      res.json(session.addCustomTag(req.params.contextId ?? "", category, value));
    } catch (error) {
      next(error);
    }
  });

  router.post("/contexts/:contextId/:category/clear", (req: Request, res: Response, next: NextFunction) => {
    try {
      const category = tagCategorySchema.parse(req.params.category);
      res.json(session.clearTags(req.params.contextId ?? "", category));
    } catch (error) {
      next(error);
    }
  });

  router.delete("/contexts/:contextId", (req: Request, res: Response) => {
    res.json({ reset: session.resetTagContext(req.params.contextId ?? "") });
  });

  router.get("/stats", (req: Request, res: Response, next: NextFunction) => {
    try {
      const { n } = TopTagsQuerySchema.parse(req.query);
      res.json({ top: session.topTags(n), counts: session.stats.toJSON() });
    } catch (error) {
      next(error);
    }
  });

  router.post("/stats/save", async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const ok = await session.saveStats();
      res.status(ok ? 200 : 500).json({ ok });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
