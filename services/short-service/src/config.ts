import { DEFAULT_MAX_LEN, DEFAULT_MIN_KEY_SIZE, DIGEST_LENGTH } from "./key_store.js";

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface BuildInfo {
  service: string;
  version: string;
  commit: string;
  env: string;
}

export interface Config {
  port: number;
  host: string;
  logLevel: LogLevel;
  bodyLimitBytes: number;
  maxLen: number;
  minKeySize: number;
  rateLimitEnabled: boolean;
  createRateLimitMax: number;
  lookupRateLimitMax: number;
  rateLimitTimeWindowMs: number;
  build: BuildInfo;
}

type Env = Record<string, string | undefined>;

function positiveInt(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw === "") return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n <= 0) throw new Error(`Invalid ${name}: ${raw}`);
  return n;
}

function isLogLevel(s: string): s is LogLevel {
  return LOG_LEVELS.some((level) => level === s);
}

export function loadConfig(env: Env = process.env): Config {
  const port = positiveInt(env, "PORT", 3000);
  const host = env.HOST ?? "0.0.0.0";

  const logLevel = env.LOG_LEVEL ?? "info";
  if (!isLogLevel(logLevel)) throw new Error(`Invalid LOG_LEVEL: ${logLevel}`);

  const bodyLimitBytes = positiveInt(env, "BODY_LIMIT_BYTES", 1024 * 16); // 16KB
  const maxLen = positiveInt(env, "MAX_VALUE_LENGTH", DEFAULT_MAX_LEN);

  const minKeySize = positiveInt(env, "MIN_KEY_SIZE", DEFAULT_MIN_KEY_SIZE);
  if (minKeySize > DIGEST_LENGTH) {
    throw new Error(`Invalid MIN_KEY_SIZE: must be at most ${DIGEST_LENGTH}`);
  }

  const rateLimitEnabled = (env.RATE_LIMIT_ENABLED ?? "true") === "true";
  const createRateLimitMax = positiveInt(env, "CREATE_RATE_LIMIT_MAX", 50);
  const lookupRateLimitMax = positiveInt(env, "LOOKUP_RATE_LIMIT_MAX", 100);
  const rateLimitTimeWindowMs = positiveInt(env, "RATE_LIMIT_WINDOW_MS", 1000);

  return {
    port,
    host,
    logLevel,
    bodyLimitBytes,
    maxLen,
    minKeySize,
    rateLimitEnabled,
    createRateLimitMax,
    lookupRateLimitMax,
    rateLimitTimeWindowMs,
    build: {
      service: "short-service",
      version: env.APP_VERSION ?? "unknown",
      commit: env.GIT_SHA ?? "unknown",
      env: env.APP_ENV ?? "unknown"
    }
  };
}
