import { Router } from "express";
import type { NextFunction, Request, Response } from "express";
import { z } from "zod";

import { reflectionsSchema } from "@shared/schemas";

import type { JournalSession } from "../journals/session";

const LoadJournalSchema = z.object({
  fileName: z.string().min(1),
});

const ReflectionsPatchSchema = reflectionsSchema
  .pick({
    patterns: true,
    triggers: true,
    adjustments: true,
    goals: true,
  })
  .strip();

export function createJournalsRouter(session: JournalSession): Router {
  const router: Router = Router();

  router.get("/files", async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const files = await session.listJournals();
      res.json({ files });
    } catch (error) {
      next(error);
    }
  });

  router.post("/save", async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const result = await session.saveJournal();
      if (!result.ok) {
        return res.status(500).json({
          ok: false,
          error: { code: "PERSISTENCE_FAILURE", message: `Could not save ${result.fileName}` },
        });
      }
      res.json(result);
    } catch (error) {
      next(error);
    }
  });

  router.post("/load", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { fileName } = LoadJournalSchema.parse(req.body);
      const result = await session.loadJournal(fileName);
      res.json({ ok: true, fileName, ...result });
    } catch (error) {
      next(error);
    }
  });

  router.get("/export.md", (_req: Request, res: Response, next: NextFunction) => {
    try {
      const markdown = session.exportMarkdown();
      res.setHeader("Content-Type", "text/markdown; charset=utf-8");
      res.setHeader("Content-Disposition", `attachment; filename="trade-log-${Date.now()}.md"`);
      res.send(markdown);
    } catch (error) {
      next(error);
    }
  });

  router.get("/summary", (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(session.summary());
    } catch (error) {
      next(error);
    }
  });

  router.get("/reflections", (_req: Request, res: Response) => {
    res.json({ reflections: session.journal.getReflections() });
  });

  router.put("/reflections", (req: Request, res: Response, next: NextFunction) => {
    try {
      const patch = ReflectionsPatchSchema.parse(req.body);
      res.json({ reflections: session.updateReflections(patch) });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
