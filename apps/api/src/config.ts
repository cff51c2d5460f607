import { z } from "zod";

// ─── Config ───────────────────────────────────────────────
// Read once at startup and passed down. An empty variable counts as unset.

const unsetIfEmpty = (value: unknown) => (value === "" ? undefined : value);

const text = (fallback: string) =>
  z.preprocess(unsetIfEmpty, z.string().default(fallback));

const positiveInt = (fallback: number) =>
  z.preprocess(unsetIfEmpty, z.coerce.number().int().positive().default(fallback));

const envSchema = z.object({
  NODE_ENV: z.preprocess(unsetIfEmpty, z.string().optional()),
  PORT: positiveInt(8080),
  DB_HOST: text("localhost"),
  DB_PORT: positiveInt(5432),
  DB_USER: text("postgres"),
  DB_PASSWORD: text("postgres"),
  DB_NAME: text("dvdrental"),
  DB_POOL_MAX: positiveInt(10),
  DB_STATEMENT_TIMEOUT_MS: z.preprocess(
    unsetIfEmpty,
    z.coerce.number().int().positive().optional(),
  ),
  MIGRATIONS_DIR: text("migrations"),
  LOG_LEVEL: text("info"),
  RATE_LIMIT_PER_MINUTE: positiveInt(5000),
  CORS_ORIGIN: text("*"),
});

export interface DbConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
  max: number;
  statementTimeoutMs?: number;
}

export interface Config {
  env?: string;
  port: number;
  db: DbConfig;
  migrationsDir: string;
  logLevel: string;
  rateLimitPerMinute: number;
  corsOrigin: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${problems}`);
  }

  const e = parsed.data;
  return {
    env: e.NODE_ENV,
    port: e.PORT,
    db: {
      host: e.DB_HOST,
      port: e.DB_PORT,
      user: e.DB_USER,
      password: e.DB_PASSWORD,
      database: e.DB_NAME,
      max: e.DB_POOL_MAX,
      statementTimeoutMs: e.DB_STATEMENT_TIMEOUT_MS,
    },
    migrationsDir: e.MIGRATIONS_DIR,
    logLevel: e.LOG_LEVEL,
    rateLimitPerMinute: e.RATE_LIMIT_PER_MINUTE,
    corsOrigin: e.CORS_ORIGIN,
  };
}
