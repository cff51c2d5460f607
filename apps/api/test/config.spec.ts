import { describe, it, expect } from "vitest";
import { loadConfig } from "../src/config";

describe("loadConfig", () => {
  it("falls back to the defaults", () => {
    expect(loadConfig({})).toEqual({
      env: undefined,
      port: 8080,
      db: {
        host: "localhost",
        port: 5432,
        user: "postgres",
        password: "postgres",
        database: "dvdrental",
        max: 10,
        statementTimeoutMs: undefined,
      },
      migrationsDir: "migrations",
      logLevel: "info",
      rateLimitPerMinute: 5000,
      corsOrigin: "*",
    });
  });

  it("reads overrides from the environment", () => {
    const config = loadConfig({
      NODE_ENV: "production",
      PORT: "3000",
      DB_HOST: "db.internal",
      DB_PORT: "6543",
      DB_USER: "rental",
      DB_PASSWORD: "test-secret",
      DB_NAME: "rentals",
      DB_POOL_MAX: "25",
      DB_STATEMENT_TIMEOUT_MS: "2000",
      MIGRATIONS_DIR: "/srv/migrations",
      LOG_LEVEL: "debug",
      RATE_LIMIT_PER_MINUTE: "100",
      CORS_ORIGIN: "https://example.test",
    });

    expect(config.env).toBe("production");
    expect(config.port).toBe(3000);
    expect(config.db).toEqual({
      host: "db.internal",
      port: 6543,
      user: "rental",
      password: "test-secret",
      database: "rentals",
      max: 25,
      statementTimeoutMs: 2000,
    });
    expect(config.migrationsDir).toBe("/srv/migrations");
    expect(config.logLevel).toBe("debug");
    expect(config.rateLimitPerMinute).toBe(100);
    expect(config.corsOrigin).toBe("https://example.test");
  });

  it("treats empty variables as unset", () => {
    const config = loadConfig({ PORT: "", DB_HOST: "", DB_STATEMENT_TIMEOUT_MS: "" });

    expect(config.port).toBe(8080);
    expect(config.db.host).toBe("localhost");
    expect(config.db.statementTimeoutMs).toBeUndefined();
  });

  it("rejects a non-numeric port", () => {
    expect(() => loadConfig({ PORT: "abc" })).toThrow("Invalid configuration: PORT: ");
  });

  it("rejects a non-positive pool size", () => {
    expect(() => loadConfig({ DB_POOL_MAX: "0" })).toThrow("Invalid configuration: DB_POOL_MAX: ");
  });
});
