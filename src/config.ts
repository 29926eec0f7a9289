import { isLogLevel, type LogLevel } from "./logger.js";

export type TransportMode = "stdio" | "http";

export const DEFAULT_USER_ID = "00000000-0000-0000-0000-000000000001";

export interface Config {
  server: {
    port: number;
    transport: TransportMode;
    corsOrigins: string[];
  };
  auth: {
    defaultUserId: string;
    tokenTtlHours: number;
  };
  rateLimit: {
    rpm: number;
  };
  dbPath: string;
  logLevel: LogLevel;
}

type Env = Record<string, string | undefined>;

export function loadConfig(
  env: Env = process.env,
  argv: readonly string[] = process.argv
): Config {
  return {
    server: {
      port: positiveInt(env, "PORT", 3200),
      transport: resolveTransport(env, argv),
      corsOrigins: (env.CORS_ORIGINS || "http://localhost:3200")
        .split(",")
        .map((origin) => origin.trim())
        .filter((origin) => origin.length > 0),
    },
    auth: {
      defaultUserId: env.DEFAULT_USER_ID || DEFAULT_USER_ID,
      tokenTtlHours: positiveInt(env, "TOKEN_TTL_HOURS", 24),
    },
    rateLimit: {
      rpm: positiveInt(env, "RATE_LIMIT_RPM", 60),
    },
    dbPath: env.DB_PATH || "ledger.db",
    logLevel: resolveLogLevel(env),
  };
}

function resolveTransport(env: Env, argv: readonly string[]): TransportMode {
  // CLI flag takes precedence
  const args = argv.slice(2);
  const transportIdx = args.indexOf("--transport");
  if (transportIdx !== -1) {
    const val = args[transportIdx + 1];
    if (val === "stdio" || val === "http") return val;
  }

  // Then env var
  const envTransport = env.TRANSPORT;
  if (envTransport === "stdio" || envTransport === "http") return envTransport;

  return "stdio";
}

function resolveLogLevel(env: Env): LogLevel {
  const raw = (env.LOG_LEVEL || "info").toLowerCase();
  if (!isLogLevel(raw)) {
    throw new Error(
      `Invalid LOG_LEVEL "${raw}". Expected one of: debug, info, warn, error`
    );
  }
  return raw;
}

function positiveInt(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw === "") return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(
      `Invalid environment variable ${key}: expected a positive integer, got "${raw}"`
    );
  }
  return value;
}
