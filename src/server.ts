import Fastify, { type FastifyError, type FastifyInstance, type FastifyRequest } from "fastify";
import { Redis } from "ioredis";
import { Pool } from "pg";
import { PaymentLifecycleEngine } from "./application/payment-lifecycle.js";
import { PaymentWorker } from "./application/payment-worker.js";
import { ConcurrentTaskExecutor } from "./application/task-executor.js";
import { InMemoryAccountLedger, type AccountSeed } from "./adapters/inmemory/account-ledger.js";
import { InMemoryMessageChannel } from "./adapters/inmemory/message-channel.js";
import { InMemoryPaymentStore } from "./adapters/inmemory/payment-store.js";
import { PostgresAccountLedger } from "./adapters/postgres/account-ledger.js";
import { PostgresPaymentStore } from "./adapters/postgres/payment-store.js";
import { RedisMessageChannel } from "./adapters/redis/message-channel.js";
import { SimulatedOutcomePolicy } from "./adapters/simulated/outcome-policy.js";
import { AppError } from "./infra/app-error.js";
import { SystemClock, type ClockPort } from "./infra/clock.js";
import { loadRuntimeConfig, type RuntimeConfig } from "./infra/config.js";
import { createLogger, type Logger } from "./infra/logger.js";
import { PaymentMetricsRegistry } from "./infra/metrics.js";
import { loadSeedAccounts } from "./infra/seed-accounts.js";
import type { AccountLedgerPort } from "./ports/account-ledger.js";
import type { MessageChannelPort } from "./ports/message-channel.js";
import type { OutcomePolicyPort } from "./ports/outcome-policy.js";
import type { PaymentStorePort } from "./ports/payment-store.js";
import {
  assertCreatePaymentInput,
  normalizeLimit,
  normalizeOffset,
  normalizeResourceId,
} from "./api/validators.js";

const CORS_HEADERS: Record<string, string> = {
  "Access-Control-Allow-Origin": "*",
  "Access-Control-Allow-Credentials": "true",
  "Access-Control-Allow-Headers":
    "Content-Type, Content-Length, Accept-Encoding, X-CSRF-Token, Authorization, accept, origin, Cache-Control, X-Requested-With",
  "Access-Control-Allow-Methods": "POST, OPTIONS, GET, PUT, DELETE",
};

/** Collaborators a caller may supply instead of the configured ones. */
export interface AppOverrides {
  logger?: Logger;
  clock?: ClockPort;
  outcomePolicy?: OutcomePolicyPort;
  /** Accounts for the in-memory ledger; replaces the seed file. */
  accounts?: AccountSeed[];
  store?: PaymentStorePort;
  ledger?: AccountLedgerPort;
  channel?: MessageChannelPort;
}

export function buildApp(config: RuntimeConfig = loadRuntimeConfig(), overrides: AppOverrides = {}): FastifyInstance {
  const app = Fastify({ logger: false });
  const logger = overrides.logger ?? createLogger({ level: config.logLevel });
  const metrics = new PaymentMetricsRegistry();
  const observability = { logger, telemetry: metrics };
  const requestStarts = new WeakMap<FastifyRequest, bigint>();
  const closeActions: Array<() => Promise<void>> = [];

  const clock = overrides.clock ?? new SystemClock();
  const postgresPool =
    config.postgresUrl && config.storeBackend === "postgres"
      ? new Pool({ connectionString: config.postgresUrl })
      : null;
  if (postgresPool) {
    closeActions.push(async () => {
      await postgresPool.end();
    });
  }

  const redisClient =
    config.redisUrl && config.channelBackend === "redis"
      ? new Redis(config.redisUrl, {
        lazyConnect: false,
        maxRetriesPerRequest: 1,
      })
      : null;
  if (redisClient) {
    closeActions.push(async () => {
      await redisClient.quit();
    });
  }

  let store: PaymentStorePort;
  let ledger: AccountLedgerPort;
  let seedableLedger: InMemoryAccountLedger | null = null;
  if (config.storeBackend === "postgres") {
    if (!postgresPool) {
      throw new AppError(500, "invalid_runtime_config", "Postgres store backend requested without PostgreSQL.");
    }
    store = overrides.store ?? new PostgresPaymentStore(postgresPool);
    ledger = overrides.ledger ?? new PostgresAccountLedger(postgresPool);
  } else {
    store = overrides.store ?? new InMemoryPaymentStore();
    if (overrides.ledger) {
      ledger = overrides.ledger;
    } else {
      const memoryLedger = new InMemoryAccountLedger(overrides.accounts ?? [], clock);
      if (!overrides.accounts && config.seedAccounts) {
        seedableLedger = memoryLedger;
      }
      ledger = memoryLedger;
    }
  }

  const seedTarget = seedableLedger;

  let channel: MessageChannelPort;
  if (overrides.channel) {
    channel = overrides.channel;
  } else if (config.channelBackend === "redis") {
    if (!redisClient) {
      throw new AppError(500, "invalid_runtime_config", "Redis channel backend requested without Redis client.");
    }
    channel = new RedisMessageChannel(redisClient, {
      streamKey: config.streamKey,
      consumerGroup: config.consumerGroup,
      consumerName: config.consumerName,
      reclaimIdleMs: config.reclaimIdleMs,
    });
  } else {
    channel = new InMemoryMessageChannel({ reclaimIdleMs: config.reclaimIdleMs });
  }
  closeActions.push(async () => {
    await channel.close?.();
  });

  const outcomePolicy =
    overrides.outcomePolicy ??
    new SimulatedOutcomePolicy({
      successRate: config.outcomeSuccessRate,
      minLatencyMs: config.outcomeMinLatencyMs,
      maxLatencyMs: config.outcomeMaxLatencyMs,
    });

  const engine = new PaymentLifecycleEngine(store, ledger, channel, outcomePolicy, clock, observability, {
    callTimeoutMs: config.callTimeoutMs,
    processingTimeoutMs: config.processingTimeoutMs,
  });
  const executor = new ConcurrentTaskExecutor({
    concurrency: config.workerConcurrency,
    onTaskError: (error) => {
      logger.error({ err: error }, "payment task failed");
    },
  });
  const worker = new PaymentWorker(engine, channel, executor, observability, {
    batchSize: config.consumerBatchSize,
    waitMs: config.consumerBlockMs,
    callTimeoutMs: config.callTimeoutMs,
  });
  // Close actions run in reverse: stop dequeuing, let claimed payments settle,
  // and only then release the channel and the connections they write through.
  closeActions.push(async () => {
    const inFlight = executor.pendingCount;
    if (inFlight === 0) {
      return;
    }
    logger.info({ in_flight: inFlight }, "waiting for in-flight payments");
    const drained = await executor.drain(config.shutdownDrainMs);
    if (!drained) {
      logger.warn(
        { in_flight: executor.pendingCount, drain_ms: config.shutdownDrainMs },
        "in-flight payments still running at shutdown",
      );
    }
  });
  closeActions.push(async () => {
    await worker.stop();
  });

  app.addHook("onReady", async () => {
    if (seedTarget) {
      const seeds = await loadSeedAccounts();
      for (const seed of seeds) {
        seedTarget.upsert(seed);
      }
      logger.info({ accounts: seeds.length }, "seeded in-memory account ledger");
    }
    if (config.workerEnabled) {
      worker.start();
    }
  });

  app.addHook("onRequest", async (request, reply) => {
    requestStarts.set(request, process.hrtime.bigint());
    reply.headers(CORS_HEADERS);
    reply.header("X-Request-Id", request.id);
  });

  app.addHook("onResponse", async (request, reply) => {
    if (!config.metricsEnabled) {
      return;
    }
    const startNs = requestStarts.get(request);
    if (!startNs) {
      return;
    }
    const endNs = process.hrtime.bigint();
    const durationSeconds = Number(endNs - startNs) / 1_000_000_000;
    const route = request.routeOptions.url ?? "unmatched";
    metrics.recordHttpRequest(request.method, route, reply.statusCode, durationSeconds);
  });

  app.options("/*", async (_, reply) => {
    return reply.status(204).send();
  });

  app.get("/health", async (_, reply) => {
    return reply.status(200).send({ status: "healthy", service: "card-payments" });
  });

  app.get("/health/live", async (_, reply) => {
    return reply.status(200).send({ status: "ok" });
  });

  app.get("/health/ready", async (_, reply) => {
    return reply.status(200).send({
      status: "ready",
      worker: worker.isRunning() ? "running" : "stopped",
    });
  });

  app.post("/api/v1/payments", async (request, reply) => {
    assertCreatePaymentInput(request.body);
    const result = await engine.createPayment(request.body);
    return reply.status(201).send(result);
  });

  app.get<{ Params: { id: string } }>("/api/v1/payments/:id", async (request, reply) => {
    const id = normalizeResourceId(request.params.id, "payment_id");
    const payment = await engine.getPayment(id);
    return reply.status(200).send(payment);
  });

  app.post<{ Params: { id: string } }>("/api/v1/payments/:id/cancel", async (request, reply) => {
    const id = normalizeResourceId(request.params.id, "payment_id");
    const payment = await engine.cancelPayment(id);
    return reply.status(200).send(payment);
  });

  app.get<{ Params: { merchant_id: string }; Querystring: { limit?: string; offset?: string } }>(
    "/api/v1/merchants/:merchant_id/payments",
    async (request, reply) => {
      const merchantId = normalizeResourceId(request.params.merchant_id, "merchant_id");
      const limit = normalizeLimit(request.query.limit, config.listDefaultLimit, config.listMaxLimit);
      const offset = normalizeOffset(request.query.offset);
      const payments = await engine.listMerchantPayments(merchantId, limit, offset);
      return reply.status(200).send({
        payments,
        limit,
        offset,
        count: payments.length,
      });
    },
  );

  if (config.metricsEnabled) {
    app.get("/metrics", async (_request, reply) => {
      const payload = metrics.renderPrometheus();
      return reply
        .header("Content-Type", "text/plain; version=0.0.4; charset=utf-8")
        .status(200)
        .send(payload);
    });
  }

  app.setNotFoundHandler(async (request, reply) => {
    return reply.status(404).send({
      error: {
        code: "resource_not_found",
        message: "Route not found.",
        request_id: request.id,
      },
    });
  });

  app.setErrorHandler<FastifyError>(async (error, request, reply) => {
    if (error instanceof AppError) {
      if (error.statusCode >= 500) {
        logger.error({ err: error, request_id: request.id }, "request failed");
      }
      return reply.status(error.statusCode).send({
        error: {
          code: error.code,
          message: error.message,
          request_id: request.id,
        },
      });
    }
    // Fastify's own 4xx errors: malformed JSON, wrong content type, oversized body.
    if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
      return reply.status(error.statusCode).send({
        error: {
          code: "invalid_request_body",
          message: error.message,
          request_id: request.id,
        },
      });
    }
    logger.error({ err: error, request_id: request.id }, "Unhandled error");
    return reply.status(500).send({
      error: {
        code: "internal_server_error",
        message: "Unexpected error.",
        request_id: request.id,
      },
    });
  });

  app.addHook("onClose", async () => {
    for (const closeAction of [...closeActions].reverse()) {
      await closeAction();
    }
  });

  return app;
}
