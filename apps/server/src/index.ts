import { createServer } from "http";

import { validateEnv } from "@shared/env";

import { createApp } from "./app";
import { JournalSession } from "./journals/session";
import { logger } from "./logger";
import { HyperliquidClient } from "./market/hyperliquid";

const env = validateEnv(process.env);

const session = new JournalSession({
  provider: new HyperliquidClient({
    baseUrl: env.HYPERLIQUID_API_URL,
    timeoutMs: env.PROVIDER_TIMEOUT_MS,
    requestGapMs: env.PROVIDER_REQUEST_GAP_MS,
  }),
  journalDir: env.JOURNAL_DIR,
  statsFile: env.STATS_FILE,
  timeZone: env.JOURNAL_TZ,
  fillLimit: env.FILL_LIMIT,
});

const app = createApp(session, env);
const server = createServer(app);

async function start() {
  const statsLoaded = await session.loadStats();
  if (!statsLoaded) {
    logger.warn({ path: env.STATS_FILE }, "Starting with empty usage stats");
  }

  server.listen(env.PORT, () => {
    logger.info({ port: env.PORT, journalDir: env.JOURNAL_DIR }, "Trade journal server listening");
  });
}

async function shutdown(signal: string) {
  logger.info({ signal }, "Shutting down");
  await session.saveStats();
  server.close(() => process.exit(0));
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      logger.error({ err: error }, "Shutdown failed");
      process.exit(1);
    });
  });
}

start().catch((error: unknown) => {
  logger.fatal({ err: error }, "Failed to start server");
  process.exit(1);
});
