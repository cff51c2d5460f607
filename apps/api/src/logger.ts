import pino, { Logger } from "pino";

export type { Logger };

export interface LoggerOptions {
  level?: string;
  env?: string;
}

// ─── Logger ───────────────────────────────────────────────
// JSON in production for log aggregators, pretty-printed elsewhere.
// Tests stay quiet unless LOG_LEVEL asks otherwise.
export function createLogger({ level, env }: LoggerOptions = {}): Logger {
  return pino({
    level: level || (env === "test" ? "silent" : "info"),
    transport:
      env !== "production" && env !== "test"
        ? { target: "pino-pretty" }
        : undefined,
  });
}

// One process-wide logger, so at most one pretty transport runs.
let shared: Logger | undefined;

/** Replaces the process-wide logger; the entry point calls this once config is loaded. */
export function initLogger(options: LoggerOptions): Logger {
  shared = createLogger(options);
  return shared;
}

/** The process-wide logger, built from the environment on first use. */
export function getLogger(): Logger {
  shared ??= createLogger({ level: process.env.LOG_LEVEL, env: process.env.NODE_ENV });
  return shared;
}
