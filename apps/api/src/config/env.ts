// ═══════════════════════════════════════════════════════════════
// @edgeline/api — Environment configuration
// ═══════════════════════════════════════════════════════════════

import { DEFAULT_SCHEDULER_OPTIONS } from "@edgeline/core";
import { GAMMA_DEFAULT_BASE_URL } from "@edgeline/adapters";

export interface EnvConfig {
  /** HTTP port */
  PORT: number;
  /** Node environment */
  NODE_ENV: string;
  LOG_LEVEL: string;
  /** PostgreSQL connection string; null keeps everything in memory */
  DATABASE_URL: string | null;
  /** Gamma-compatible market data API */
  MARKET_DATA_BASE_URL: string;
  /** Probability model service (POST /predict) */
  MODEL_SERVICE_URL: string;
  MODEL_SERVICE_API_KEY: string | null;
  /** Cash the ledger starts with when there is no checkpoint */
  STARTING_CASH: number;
  SCHEDULER_CONCURRENCY: number;
  SCHEDULER_CHUNK_SIZE: number;
  SCHEDULER_TIMEOUT_MS: number;
}

type Env = Readonly<Record<string, string | undefined>>;

export function requireEnv(name: string, env: Env = process.env): string {
  const value = env[name];
  if (!value) {
    throw new Error(`Required environment variable not set: ${name}`);
  }
  return value;
}

/**
 * Reads a numeric variable. An unset or empty value gives the fallback;
 * anything that is not a finite number throws.
 */
export function readNumber(name: string, fallback: number, env: Env = process.env): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`Environment variable ${name} must be a number, got "${raw}"`);
  }
  return value;
}

export function loadEnv(env: Env = process.env): EnvConfig {
  const nodeEnv = env.NODE_ENV ?? "development";
  return {
    PORT: readNumber("PORT", 3000, env),
    NODE_ENV: nodeEnv,
    LOG_LEVEL: env.LOG_LEVEL ?? (nodeEnv === "production" ? "info" : "debug"),
    DATABASE_URL: env.DATABASE_URL || null,
    MARKET_DATA_BASE_URL: env.MARKET_DATA_BASE_URL ?? GAMMA_DEFAULT_BASE_URL,
    MODEL_SERVICE_URL: requireEnv("MODEL_SERVICE_URL", env),
    MODEL_SERVICE_API_KEY: env.MODEL_SERVICE_API_KEY || null,
    STARTING_CASH: readNumber("STARTING_CASH", 10_000, env),
    SCHEDULER_CONCURRENCY: readNumber("SCHEDULER_CONCURRENCY", DEFAULT_SCHEDULER_OPTIONS.concurrency, env),
    SCHEDULER_CHUNK_SIZE: readNumber("SCHEDULER_CHUNK_SIZE", DEFAULT_SCHEDULER_OPTIONS.chunkSize, env),
    SCHEDULER_TIMEOUT_MS: readNumber("SCHEDULER_TIMEOUT_MS", DEFAULT_SCHEDULER_OPTIONS.timeoutMs, env),
  };
}

/** Loaded config, singleton */
let _config: EnvConfig | null = null;

export function getConfig(): EnvConfig {
  if (!_config) {
    _config = loadEnv();
  }
  return _config;
}
