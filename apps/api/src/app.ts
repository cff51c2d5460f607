import express, { Express, NextFunction, Request, Response } from "express";
import compression from "compression";
import cors from "cors";
import helmet from "helmet";
import rateLimit from "express-rate-limit";
import type { ErrorResponse } from "@mockbuster/types";
import { messageOf } from "./errors";
import { FilmHandler } from "./handlers/filmHandlers";
import { getLogger, Logger } from "./logger";
import { createRouter } from "./routes";
import type { CommentService, FilmService } from "./service/types";

export interface AppDeps {
  filmService: FilmService;
  commentService: CommentService;
  ping: () => Promise<void>;
  logger?: Logger;
  rateLimitPerMinute?: number;
  corsOrigin?: string;
}

// body-parser and friends tag client errors with a 4xx status
function clientErrorStatus(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null || !("status" in err)) return undefined;
  const { status } = err;
  return typeof status === "number" && status >= 400 && status < 500 ? status : undefined;
}

export function createApp({
  filmService,
  commentService,
  ping,
  logger = getLogger(),
  rateLimitPerMinute = 5_000,
  corsOrigin = "*",
}: AppDeps): Express {
  const app = express();

  app.disable("x-powered-by");
  app.use(helmet());
  app.use(compression());
  app.use(cors({ origin: corsOrigin }));
  app.use(express.json({ limit: "100kb" }));

  app.use(
    rateLimit({
      windowMs: 60_000,
      limit: rateLimitPerMinute,
      standardHeaders: true,
      legacyHeaders: false,
    }),
  );

  // Request logger middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();
    res.on("finish", () => {
      logger.info({
        method: req.method,
        path: req.originalUrl,
        status: res.statusCode,
        ms: Date.now() - start,
      });
    });
    next();
  });

  const handler = new FilmHandler(filmService, commentService);
  app.use(createRouter(handler, ping));

  app.use((req: Request, res: Response) => {
    const body: ErrorResponse = {
      error: "Not found",
      details: `no route for ${req.method} ${req.path}`,
    };
    res.status(404).json(body);
  });

  // Error handler
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = clientErrorStatus(err);
    if (status !== undefined) {
      const body: ErrorResponse = { error: "Invalid request body", details: messageOf(err) };
      res.status(status).json(body);
      return;
    }

    logger.error({ err }, "Unhandled error");
    const body: ErrorResponse = { error: "Internal server error", details: messageOf(err) };
    res.status(500).json(body);
  });

  return app;
}
