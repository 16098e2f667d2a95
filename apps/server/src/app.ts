import compression from "compression";
import express from "express";
import type { Express } from "express";

import type { Env } from "@shared/env";

import { setupSecurity } from "./config/security";
import { healthz, liveness } from "./health";
import type { JournalSession } from "./journals/session";
import { createHttpLogger } from "./logger";
import { errorHandler, notFound } from "./middleware/error";
import { createJournalsRouter } from "./routes/journals";
import { createTagsRouter } from "./routes/tags";
import { createTradesRouter } from "./routes/trades";

export function createApp(session: JournalSession, env: Pick<Env, "NODE_ENV" | "APP_ORIGIN">): Express {
  const app = express();

  app.use(compression());
  app.use(express.json());
  app.use(createHttpLogger());
  setupSecurity(app, env);

  app.get("/health", (_req, res) => {
    res.json({
      ok: true,
      now: Date.now(),
      uptimeSec: Math.round(process.uptime()),
    });
  });
  app.get("/api/livez", liveness);
  app.get("/api/healthz", healthz);

  app.use("/api/trades", createTradesRouter(session));
  app.use("/api/tags", createTagsRouter(session));
  app.use("/api/journal", createJournalsRouter(session));

  app.use(notFound);
  app.use(errorHandler);

  return app;
}
