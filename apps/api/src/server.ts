/**
 * Process entry point: config → pool → migrations → repositories →
 * services → app, then listen until SIGTERM/SIGINT.
 */

import { config as loadEnv } from "dotenv";
loadEnv();

import path from "path";
import { createApp } from "./app";
import { loadConfig } from "./config";
import { PgDatabase, createPool } from "./db";
import { getLogger, initLogger } from "./logger";
import { runMigrations } from "./migrate";
import { PgCommentRepository } from "./repository/commentRepository";
import { PgFilmRepository } from "./repository/filmRepository";
import { CommentServiceImpl } from "./service/commentService";
import { FilmServiceImpl } from "./service/filmService";

const REQUEST_TIMEOUT_MS = 15_000;
const IDLE_TIMEOUT_MS = 60_000;

async function main() {
  const config = loadConfig();
  const logger = initLogger({ level: config.logLevel, env: config.env });

  const db = new PgDatabase(createPool(config.db, logger));
  try {
    await db.ping();
    logger.info({ host: config.db.host, database: config.db.database }, "Connected to database");
    await runMigrations(db, path.resolve(config.migrationsDir), logger);
  } catch (err) {
    await db.close();
    throw err;
  }

  const filmRepo = new PgFilmRepository(db);
  const commentRepo = new PgCommentRepository(db);

  const filmService = new FilmServiceImpl(filmRepo, logger);
  const commentService = new CommentServiceImpl(commentRepo, filmRepo, logger);

  const app = createApp({
    filmService,
    commentService,
    ping: () => db.ping(),
    logger,
    rateLimitPerMinute: config.rateLimitPerMinute,
    corsOrigin: config.corsOrigin,
  });

  const server = app.listen(config.port, () => {
    logger.info({ port: config.port }, "Mockbuster Movie API listening");
    logger.info({ url: `http://localhost:${config.port}/api/v1` }, "API base URL");
  });
  server.requestTimeout = REQUEST_TIMEOUT_MS;
  server.keepAliveTimeout = IDLE_TIMEOUT_MS;

  // ─── Graceful Shutdown ────────────────────────────────────
  const shutdown = (signal: string) => {
    logger.info(`${signal}, shutting down`);
    server.close(() => {
      db.close()
        .then(() => process.exit(0))
        .catch((err) => {
          logger.error({ err }, "Failed to close database pool");
          process.exit(1);
        });
    });
    setTimeout(() => process.exit(1), 10_000).unref();
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err) => {
  getLogger().error({ err }, "Failed to start server");
  // exitCode, not exit(): the log transport still has to flush
  process.exitCode = 1;
});
