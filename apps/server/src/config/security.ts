import cors from "cors";
import { type Express } from "express";
import helmet from "helmet";

import type { Env } from "@shared/env";

export function setupSecurity(app: Express, env: Pick<Env, "NODE_ENV" | "APP_ORIGIN">) {
  const isProd = env.NODE_ENV === "production";

  app.use(
    helmet({
      contentSecurityPolicy: isProd ? { useDefaults: true } : false,
      crossOriginEmbedderPolicy: false,
    }),
  );

  const allowedOrigins = new Set(env.APP_ORIGIN ? [env.APP_ORIGIN] : []);

  app.use(
    cors({
      origin: (origin, callback) => {
        if (!origin || allowedOrigins.has(origin)) {
          return callback(null, true);
        }
        const isLocalDev =
          !isProd && (origin.startsWith("http://localhost:") || origin.startsWith("http://127.0.0.1:"));
        if (isLocalDev) {
          return callback(null, true);
        }
        return callback(new Error(`Origin ${origin} not allowed by CORS`));
      },
      methods: ["GET", "POST", "PUT", "DELETE", "OPTIONS"],
      allowedHeaders: ["Content-Type"],
    }),
  );
}
