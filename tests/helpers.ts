import { PaymentLifecycleEngine } from "../src/application/payment-lifecycle.js";
import { InMemoryAccountLedger, type AccountSeed } from "../src/adapters/inmemory/account-ledger.js";
import { InMemoryMessageChannel } from "../src/adapters/inmemory/message-channel.js";
import { InMemoryPaymentStore } from "../src/adapters/inmemory/payment-store.js";
import type { CreatePaymentInput } from "../src/domain/types.js";
import type { ClockPort } from "../src/infra/clock.js";
import type { RuntimeConfig } from "../src/infra/config.js";
import { createSilentLogger } from "../src/infra/logger.js";
import { PaymentMetricsRegistry } from "../src/infra/metrics.js";
import {
  DEFAULT_DECLINE_REASON,
  type OutcomePolicyPort,
  type ProcessingDecision,
} from "../src/ports/outcome-policy.js";
import type { Observability } from "../src/ports/telemetry.js";

export const FIXED_NOW = "2026-10-19T12:00:00.000Z";

export const FUNDED_CARD = "1234567890123456";

export class FixedClock implements ClockPort {
  constructor(private current: string = FIXED_NOW) {}

  set(iso: string): void {
    this.current = iso;
  }

  now(): Date {
    return new Date(this.current);
  }

  nowIso(): string {
    return this.current;
  }
}

/** Approves by default; ids can be declined up front or later. */
export class ScriptedOutcomePolicy implements OutcomePolicyPort {
  readonly calls: string[] = [];
  private readonly declined = new Set<string>();

  constructor(private readonly approveByDefault = true) {}

  decline(paymentId: string): void {
    this.declined.add(paymentId);
  }

  async decide(paymentId: string): Promise<ProcessingDecision> {
    this.calls.push(paymentId);
    if (!this.approveByDefault || this.declined.has(paymentId)) {
      return { approved: false, failureReason: DEFAULT_DECLINE_REASON };
    }
    return { approved: true };
  }
}

export function paymentInput(overrides: Partial<CreatePaymentInput> = {}): CreatePaymentInput {
  return {
    card_number: FUNDED_CARD,
    card_holder: "Test Holder",
    expiry_month: 12,
    expiry_year: 2027,
    cvv: "123",
    amount: 100,
    currency: "BRL",
    merchant_id: "merchant-1",
    ...overrides,
  };
}

export function silentObservability(metrics = new PaymentMetricsRegistry()): Observability {
  return { logger: createSilentLogger(), telemetry: metrics };
}

export interface HarnessOptions {
  accounts?: AccountSeed[];
  store?: InMemoryPaymentStore;
  ledger?: InMemoryAccountLedger;
  channel?: InMemoryMessageChannel;
  policy?: OutcomePolicyPort;
  clock?: FixedClock;
  callTimeoutMs?: number;
  processingTimeoutMs?: number;
  generateId?: () => string;
}

export function createHarness(options: HarnessOptions = {}) {
  const clock = options.clock ?? new FixedClock();
  const store = options.store ?? new InMemoryPaymentStore();
  const ledger =
    options.ledger ??
    new InMemoryAccountLedger(options.accounts ?? [{ card_number: FUNDED_CARD, balance: 1000, is_active: true }], clock);
  const channel = options.channel ?? new InMemoryMessageChannel();
  const policy = options.policy ?? new ScriptedOutcomePolicy();
  const metrics = new PaymentMetricsRegistry();
  const observability = silentObservability(metrics);
  const engine = new PaymentLifecycleEngine(store, ledger, channel, policy, clock, observability, {
    callTimeoutMs: options.callTimeoutMs ?? 1000,
    processingTimeoutMs: options.processingTimeoutMs ?? 1000,
    ...(options.generateId ? { generateId: options.generateId } : {}),
  });
  return { engine, store, ledger, channel, policy, metrics, observability, clock };
}

export async function balanceOf(ledger: InMemoryAccountLedger, cardNumber = FUNDED_CARD): Promise<number | undefined> {
  const account = await ledger.getByCardNumber(cardNumber);
  return account?.balance;
}

export function testConfig(overrides: Partial<RuntimeConfig> = {}): RuntimeConfig {
  return {
    host: "127.0.0.1",
    port: 8080,
    logLevel: "silent",
    metricsEnabled: true,
    storeBackend: "memory",
    channelBackend: "memory",
    streamKey: "payments:created",
    consumerGroup: "payments:processor",
    consumerName: "payments-test",
    consumerBlockMs: 20,
    consumerBatchSize: 10,
    reclaimIdleMs: 60000,
    workerEnabled: true,
    workerConcurrency: 0,
    callTimeoutMs: 1000,
    processingTimeoutMs: 1000,
    shutdownDrainMs: 2000,
    outcomeSuccessRate: 1,
    outcomeMinLatencyMs: 0,
    outcomeMaxLatencyMs: 0,
    listDefaultLimit: 10,
    listMaxLimit: 100,
    seedAccounts: false,
    ...overrides,
  };
}
