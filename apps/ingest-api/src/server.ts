/**
 * ─────────────────────────────────────────────────────────
 *  SENSOR INGEST API
 *  Stack: Node.js + TypeScript + Express + PostgreSQL (pg)
 * ─────────────────────────────────────────────────────────
 *
 *  Starting → ensuring schema → Serving
 *  - configuration is resolved once; bad config never serves traffic
 *  - tables are created if absent before the port opens
 *  - one pg.Pool for the process lifetime, one pool checkout per query
 */

import dotenv from "dotenv";
import { createApp } from "./app";
import { loadConfig } from "./config";
import { createPool, pingDatabase } from "./db";
import { ConfigurationError } from "./errors";
import { createBootLogger, createLogger } from "./logger";
import { ensureSchema } from "./schema";
import { createHeroStore, createMeasurementStore } from "./store";

dotenv.config();

async function main(): Promise<void> {
  const config = loadConfig(process.env);
  const logger = createLogger({ level: config.logLevel, nodeEnv: config.nodeEnv });

  const pool = createPool(config.database, logger, { max: config.poolMax });
  await ensureSchema(pool);
  logger.info(
    { host: config.database.host, database: config.database.database },
    "Schema ensured",
  );

  const app = createApp(
    {
      logger,
      measurements: createMeasurementStore(pool),
      heroes: createHeroStore(pool),
      ping: () => pingDatabase(pool),
      now: () => new Date(),
    },
    { bodyLimit: config.bodyLimit, rateLimitPerMinute: config.rateLimitPerMinute },
  );

  app.listen(config.port, () => logger.info(`Ingest API ${process.pid} on :${config.port}`));
}

main().catch((err: unknown) => {
  const bootLogger = createBootLogger();
  if (err instanceof ConfigurationError) {
    bootLogger.fatal({ issues: err.issues }, "Invalid configuration, not starting");
  } else {
    bootLogger.fatal({ err }, "Startup failed");
  }
  process.exit(1);
});
