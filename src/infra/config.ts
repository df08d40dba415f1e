import type { LevelWithSilent } from "pino";
import { AppError } from "./app-error.js";

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

function invalidConfig(name: string, expectation: string): AppError {
  return new AppError(
    500,
    "invalid_runtime_config",
    `Environment variable '${name}' ${expectation}.`,
  );
}

function parseIntegerEnv(name: string, defaultValue: number, min: number, max: number): number {
  const raw = process.env[name];
  if (raw === undefined) {
    return defaultValue;
  }
  const parsed = Number(raw);
  if (!Number.isInteger(parsed)) {
    throw invalidConfig(name, "must be an integer");
  }
  if (parsed < min || parsed > max) {
    throw invalidConfig(name, `must be between ${min} and ${max}`);
  }
  return parsed;
}

function parseStringEnv(name: string, defaultValue: string, minLength: number): string {
  const raw = process.env[name] ?? defaultValue;
  const value = raw.trim();
  if (value.length < minLength) {
    throw invalidConfig(name, `must contain at least ${minLength} characters`);
  }
  return value;
}

function parseBooleanEnv(name: string, defaultValue: boolean): boolean {
  const raw = process.env[name];
  if (raw === undefined) {
    return defaultValue;
  }
  const normalized = raw.trim().toLowerCase();
  if (normalized === "true" || normalized === "1") {
    return true;
  }
  if (normalized === "false" || normalized === "0") {
    return false;
  }
  throw invalidConfig(name, "must be a boolean (true/false/1/0)");
}

function parseOptionalStringEnv(name: string, minLength: number): string | undefined {
  const raw = process.env[name];
  if (raw === undefined) {
    return undefined;
  }
  const value = raw.trim();
  if (value.length < minLength) {
    throw invalidConfig(name, `must contain at least ${minLength} characters`);
  }
  return value;
}

function parseEnumEnv<TValue extends string>(
  name: string,
  allowedValues: readonly TValue[],
  defaultValue: TValue,
): TValue {
  const raw = process.env[name];
  if (raw === undefined) {
    return defaultValue;
  }
  const normalized = raw.trim();
  const match = allowedValues.find((value) => value === normalized);
  if (match === undefined) {
    throw invalidConfig(name, `must be one of: ${allowedValues.join(", ")}`);
  }
  return match;
}

export interface RuntimeConfig {
  host: string;
  port: number;
  logLevel: LevelWithSilent;
  metricsEnabled: boolean;
  storeBackend: "memory" | "postgres";
  channelBackend: "memory" | "redis";
  postgresUrl?: string;
  redisUrl?: string;
  streamKey: string;
  consumerGroup: string;
  consumerName: string;
  consumerBlockMs: number;
  consumerBatchSize: number;
  reclaimIdleMs: number;
  workerEnabled: boolean;
  /** 0 means unbounded. */
  workerConcurrency: number;
  callTimeoutMs: number;
  processingTimeoutMs: number;
  /** Upper bound on waiting for in-flight payments during shutdown. */
  shutdownDrainMs: number;
  /** Probability in [0, 1]. */
  outcomeSuccessRate: number;
  outcomeMinLatencyMs: number;
  outcomeMaxLatencyMs: number;
  listDefaultLimit: number;
  listMaxLimit: number;
  seedAccounts: boolean;
}

export function loadRuntimeConfig(): RuntimeConfig {
  const host = parseStringEnv("PAYMENTS_HOST", "0.0.0.0", 1);
  const port = parseIntegerEnv("PAYMENTS_PORT", 8080, 1, 65535);
  const logLevel = parseEnumEnv("PAYMENTS_LOG_LEVEL", LOG_LEVELS, "info");
  const metricsEnabled = parseBooleanEnv("PAYMENTS_METRICS_ENABLED", true);
  const storeBackend = parseEnumEnv("PAYMENTS_STORE_BACKEND", ["memory", "postgres"] as const, "memory");
  const channelBackend = parseEnumEnv("PAYMENTS_CHANNEL_BACKEND", ["memory", "redis"] as const, "memory");
  const postgresUrl = parseOptionalStringEnv("PAYMENTS_POSTGRES_URL", 12);
  const redisUrl = parseOptionalStringEnv("PAYMENTS_REDIS_URL", 8);
  const streamKey = parseStringEnv("PAYMENTS_STREAM_KEY", "payments:created", 3);
  const consumerGroup = parseStringEnv("PAYMENTS_CONSUMER_GROUP", "payments:processor", 3);
  const consumerName = parseStringEnv("PAYMENTS_CONSUMER_NAME", `payments-${process.pid}`, 3);
  const consumerBlockMs = parseIntegerEnv("PAYMENTS_CONSUMER_BLOCK_MS", 1000, 10, 60000);
  const consumerBatchSize = parseIntegerEnv("PAYMENTS_CONSUMER_BATCH_SIZE", 10, 1, 1000);
  const reclaimIdleMs = parseIntegerEnv("PAYMENTS_RECLAIM_IDLE_MS", 60000, 1000, 3_600_000);
  const workerEnabled = parseBooleanEnv("PAYMENTS_WORKER_ENABLED", true);
  const workerConcurrency = parseIntegerEnv("PAYMENTS_WORKER_CONCURRENCY", 0, 0, 10000);
  const callTimeoutMs = parseIntegerEnv("PAYMENTS_CALL_TIMEOUT_MS", 5000, 10, 120000);
  const processingTimeoutMs = parseIntegerEnv("PAYMENTS_PROCESSING_TIMEOUT_MS", 30000, 10, 600000);
  const shutdownDrainMs = parseIntegerEnv("PAYMENTS_SHUTDOWN_DRAIN_MS", 45000, 0, 600000);
  const outcomeSuccessRatePercent = parseIntegerEnv("PAYMENTS_OUTCOME_SUCCESS_RATE", 90, 0, 100);
  const outcomeMinLatencyMs = parseIntegerEnv("PAYMENTS_OUTCOME_MIN_LATENCY_MS", 1000, 0, 600000);
  const outcomeMaxLatencyMs = parseIntegerEnv("PAYMENTS_OUTCOME_MAX_LATENCY_MS", 4000, 0, 600000);
  const listDefaultLimit = parseIntegerEnv("PAYMENTS_LIST_DEFAULT_LIMIT", 10, 1, 1000);
  const listMaxLimit = parseIntegerEnv("PAYMENTS_LIST_MAX_LIMIT", 100, 1, 5000);
  const seedAccounts = parseBooleanEnv("PAYMENTS_SEED_ACCOUNTS", true);

  if (listDefaultLimit > listMaxLimit) {
    throw invalidConfig("PAYMENTS_LIST_DEFAULT_LIMIT", "must be lower or equal to PAYMENTS_LIST_MAX_LIMIT");
  }
  if (outcomeMinLatencyMs > outcomeMaxLatencyMs) {
    throw invalidConfig(
      "PAYMENTS_OUTCOME_MIN_LATENCY_MS",
      "must be lower or equal to PAYMENTS_OUTCOME_MAX_LATENCY_MS",
    );
  }
  if (storeBackend === "postgres" && !postgresUrl) {
    throw invalidConfig("PAYMENTS_POSTGRES_URL", "is required when the postgres store backend is enabled");
  }
  if (channelBackend === "redis" && !redisUrl) {
    throw invalidConfig("PAYMENTS_REDIS_URL", "is required when the redis channel backend is enabled");
  }

  return {
    host,
    port,
    logLevel,
    metricsEnabled,
    storeBackend,
    channelBackend,
    streamKey,
    consumerGroup,
    consumerName,
    consumerBlockMs,
    consumerBatchSize,
    reclaimIdleMs,
    workerEnabled,
    workerConcurrency,
    callTimeoutMs,
    processingTimeoutMs,
    shutdownDrainMs,
    outcomeSuccessRate: outcomeSuccessRatePercent / 100,
    outcomeMinLatencyMs,
    outcomeMaxLatencyMs,
    listDefaultLimit,
    listMaxLimit,
    seedAccounts,
    ...(postgresUrl ? { postgresUrl } : {}),
    ...(redisUrl ? { redisUrl } : {}),
  };
}
