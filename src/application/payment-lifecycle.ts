import { randomUUID } from "node:crypto";
import { performance } from "node:perf_hooks";
import {
  accountNotFound,
  insufficientBalance,
  invalidCardData,
  invalidPaymentId,
  invalidPaymentRequest,
  paymentNotFound,
  persistenceError,
  transientError,
} from "../domain/errors.js";
import { addAmount, subtractAmount } from "../domain/money.js";
import {
  findCardDataViolation,
  findPaymentRequestViolation,
  hasSufficientBalance,
  toPaymentView,
} from "../domain/payment-rules.js";
import { assertTransition, isTerminalStatus } from "../domain/state-machine.js";
import type {
  AccountRecord,
  CreatePaymentInput,
  CreatePaymentResponse,
  PaymentNotification,
  PaymentRecord,
  PaymentStatus,
  PaymentView,
  ProcessPaymentResult,
} from "../domain/types.js";
import { AppError, isAppError } from "../infra/app-error.js";
import type { ClockPort } from "../infra/clock.js";
import { withDeadline } from "../infra/deadline.js";
import type { Logger } from "../infra/logger.js";
import type { AccountLedgerPort } from "../ports/account-ledger.js";
import type { MessageChannelPort } from "../ports/message-channel.js";
import { DEFAULT_DECLINE_REASON, type OutcomePolicyPort, type ProcessingDecision } from "../ports/outcome-policy.js";
import type { PaymentStorePort } from "../ports/payment-store.js";
import type { Observability, PaymentTelemetryPort } from "../ports/telemetry.js";

const PAYMENT_ID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export const PAYMENT_QUEUED_MESSAGE = "Payment created and queued for processing";

export const FAILURE_MESSAGES = {
  paymentLookup: "Failed to get payment for processing",
  accountLookup: "Failed to get account for debit",
  accountInactive: "Account is inactive",
  insufficientBalance: "Insufficient balance at processing time",
  balanceUpdate: "Failed to update account balance",
  completion: "Failed to record payment completion",
  leaseExpired: "Processing did not finish before its lease expired",
} as const;

const FAILED_WRITE_ATTEMPTS = 3;
const FAILED_WRITE_BACKOFF_MS = 50;

// Store and ledger calls a single processing run may make after its decision,
// retries of the failure write included.
const LEASE_CALL_BUDGET = 10;

export interface PaymentLifecycleOptions {
  /** Default deadline for a single store, ledger or channel call. */
  callTimeoutMs: number;
  /** Deadline for the outcome decision; exceeding it declines the payment. */
  processingTimeoutMs: number;
  /**
   * How long a payment may sit in `processing` before another caller fails it.
   * Defaults to the processing deadline plus a budget of call deadlines.
   */
  processingLeaseMs?: number;
  generateId?: () => string;
}

export interface CallOptions {
  timeoutMs?: number;
}

function isValidPaymentId(id: string): boolean {
  return PAYMENT_ID_PATTERN.test(id);
}

function toUnixSeconds(iso: string): number {
  return Math.floor(Date.parse(iso) / 1000);
}

export class PaymentLifecycleEngine {
  private readonly logger: Logger;
  private readonly telemetry: PaymentTelemetryPort;
  private readonly generateId: () => string;
  private readonly processingLeaseMs: number;
  private readonly running = new Map<string, Promise<ProcessPaymentResult>>();

  constructor(
    private readonly store: PaymentStorePort,
    private readonly ledger: AccountLedgerPort,
    private readonly channel: MessageChannelPort,
    private readonly outcomePolicy: OutcomePolicyPort,
    private readonly clock: ClockPort,
    observability: Observability,
    private readonly options: PaymentLifecycleOptions,
  ) {
    this.logger = observability.logger.child({ component: "payment_lifecycle" });
    this.telemetry = observability.telemetry;
    this.generateId = options.generateId ?? randomUUID;
    this.processingLeaseMs =
      options.processingLeaseMs ?? options.processingTimeoutMs + LEASE_CALL_BUDGET * options.callTimeoutMs;
  }

  async createPayment(input: CreatePaymentInput, options: CallOptions = {}): Promise<CreatePaymentResponse> {
    const timeoutMs = options.timeoutMs ?? this.options.callTimeoutMs;
    const now = this.clock.now();

    const requestViolation = findPaymentRequestViolation(input);
    if (requestViolation) {
      throw invalidPaymentRequest(requestViolation);
    }
    const cardViolation = findCardDataViolation(input, now);
    if (cardViolation) {
      throw invalidCardData(cardViolation);
    }

    let account: AccountRecord | null;
    try {
      account = await withDeadline(
        () => this.ledger.getByCardNumber(input.card_number),
        timeoutMs,
        () => new Error(`Account lookup exceeded ${timeoutMs}ms.`),
      );
    } catch (error) {
      this.logger.warn({ err: error }, "account lookup failed");
      throw accountNotFound(error);
    }
    if (!account) {
      throw accountNotFound();
    }
    if (!hasSufficientBalance(account, input.amount)) {
      throw insufficientBalance();
    }

    const payment: PaymentRecord = {
      id: this.generateId(),
      card_number: input.card_number,
      card_holder: input.card_holder,
      expiry_month: input.expiry_month,
      expiry_year: input.expiry_year,
      cvv: input.cvv,
      amount: input.amount,
      currency: input.currency.trim().toUpperCase(),
      merchant_id: input.merchant_id,
      status: "pending",
      created_at: now.toISOString(),
      updated_at: now.toISOString(),
      processed_at: null,
      error_message: null,
    };

    await this.storeCall("create payment", () => this.store.create(payment), timeoutMs);
    this.telemetry.recordPaymentCreated(payment.merchant_id, payment.currency, payment.amount);
    this.logger.info(
      { payment_id: payment.id, merchant_id: payment.merchant_id, amount: payment.amount, currency: payment.currency },
      "payment created",
    );

    await this.publishNotification(
      {
        payment_id: payment.id,
        amount: payment.amount,
        currency: payment.currency,
        timestamp: toUnixSeconds(payment.created_at),
      },
      timeoutMs,
    );

    return {
      id: payment.id,
      status: payment.status,
      amount: payment.amount,
      currency: payment.currency,
      created_at: payment.created_at,
      message: PAYMENT_QUEUED_MESSAGE,
    };
  }

  async getPayment(id: string, options: CallOptions = {}): Promise<PaymentView> {
    if (!isValidPaymentId(id)) {
      throw invalidPaymentId(id);
    }
    const timeoutMs = options.timeoutMs ?? this.options.callTimeoutMs;
    const payment = await this.storeCall("get payment", () => this.store.getById(id), timeoutMs);
    if (!payment) {
      throw paymentNotFound(id);
    }
    return toPaymentView(payment);
  }

  async listMerchantPayments(
    merchantId: string,
    limit: number,
    offset: number,
    options: CallOptions = {},
  ): Promise<PaymentView[]> {
    const timeoutMs = options.timeoutMs ?? this.options.callTimeoutMs;
    const payments = await this.storeCall(
      "list merchant payments",
      () => this.store.listByMerchant(merchantId, limit, offset),
      timeoutMs,
    );
    return payments.map(toPaymentView);
  }

  async cancelPayment(id: string, options: CallOptions = {}): Promise<PaymentView> {
    if (!isValidPaymentId(id)) {
      throw invalidPaymentId(id);
    }
    const timeoutMs = options.timeoutMs ?? this.options.callTimeoutMs;
    const cancelled = await this.storeCall(
      "cancel payment",
      () => this.store.updateStatus(id, { status: "cancelled", expectedStatus: "pending", at: this.clock.nowIso() }),
      timeoutMs,
    );
    if (cancelled) {
      this.logger.info({ payment_id: id }, "payment cancelled");
      return toPaymentView(cancelled);
    }

    const current = await this.storeCall("get payment", () => this.store.getById(id), timeoutMs);
    if (!current) {
      throw paymentNotFound(id);
    }
    if (current.status === "cancelled") {
      return toPaymentView(current);
    }
    assertTransition(current.status, "cancelled");
    // Still pending here means another writer claimed it between the two reads.
    throw new AppError(409, "invalid_state_transition", `Payment '${id}' changed while cancelling.`);
  }

  /**
   * Moves a pending payment to a terminal status. Only the caller whose
   * `pending -> processing` write applies gets past the claim; everyone else
   * observes `skipped`, so the balance is debited at most once. A skipped
   * caller in the same process waits for the claimant and reports its status.
   */
  async processPayment(paymentId: string, options: CallOptions = {}): Promise<ProcessPaymentResult> {
    if (!isValidPaymentId(paymentId)) {
      throw invalidPaymentId(paymentId);
    }
    const timeoutMs = options.timeoutMs ?? this.options.callTimeoutMs;
    const startedAt = performance.now();

    const claimed = await this.storeCall(
      "claim payment",
      () =>
        this.store.updateStatus(paymentId, {
          status: "processing",
          expectedStatus: "pending",
          at: this.clock.nowIso(),
        }),
      timeoutMs,
    );
    if (!claimed) {
      return this.observeClaimed(paymentId, timeoutMs);
    }

    const run = this.runClaimed(claimed, startedAt, timeoutMs);
    this.running.set(paymentId, run);
    try {
      return await run;
    } finally {
      this.running.delete(paymentId);
    }
  }

  private async runClaimed(claimed: PaymentRecord, startedAt: number, timeoutMs: number): Promise<ProcessPaymentResult> {
    const decision = await this.decide(claimed.id);
    if (!decision.approved) {
      return this.markFailed(claimed, decision.failureReason ?? DEFAULT_DECLINE_REASON, startedAt, timeoutMs);
    }
    return this.settle(claimed, startedAt, timeoutMs);
  }

  private async observeClaimed(paymentId: string, timeoutMs: number): Promise<ProcessPaymentResult> {
    const current = await this.storeCall("get payment", () => this.store.getById(paymentId), timeoutMs);
    if (!current) {
      throw paymentNotFound(paymentId);
    }

    if (current.status === "processing") {
      const running = this.running.get(paymentId);
      if (running) {
        const settled = await running.then(
          (result) => result.status,
          () => null,
        );
        if (settled && isTerminalStatus(settled)) {
          return { payment_id: paymentId, outcome: "skipped", status: settled };
        }
      } else if (this.isLeaseExpired(current)) {
        this.logger.warn(
          { payment_id: paymentId, updated_at: current.updated_at, lease_ms: this.processingLeaseMs },
          "processing lease expired, failing payment",
        );
        return this.markFailed(current, FAILURE_MESSAGES.leaseExpired, performance.now(), timeoutMs);
      }
    }

    this.logger.info({ payment_id: paymentId, status: current.status }, "payment already claimed, skipping");
    return { payment_id: paymentId, outcome: "skipped", status: current.status };
  }

  private isLeaseExpired(payment: PaymentRecord): boolean {
    const claimedAt = Date.parse(payment.updated_at);
    return this.clock.now().getTime() - claimedAt >= this.processingLeaseMs;
  }

  private async decide(paymentId: string): Promise<ProcessingDecision> {
    const timeoutMs = this.options.processingTimeoutMs;
    try {
      return await withDeadline(
        () => this.outcomePolicy.decide(paymentId),
        timeoutMs,
        () => new Error(`Outcome decision exceeded ${timeoutMs}ms.`),
      );
    } catch (error) {
      this.logger.warn({ err: error, payment_id: paymentId }, "outcome decision failed, declining");
      return { approved: false, failureReason: DEFAULT_DECLINE_REASON };
    }
  }

  private async settle(claimed: PaymentRecord, startedAt: number, timeoutMs: number): Promise<ProcessPaymentResult> {
    let refreshed: PaymentRecord | null;
    try {
      refreshed = await this.storeCall("get payment", () => this.store.getById(claimed.id), timeoutMs);
    } catch (error) {
      this.logger.error({ err: error, payment_id: claimed.id }, FAILURE_MESSAGES.paymentLookup);
      return this.markFailed(claimed, FAILURE_MESSAGES.paymentLookup, startedAt, timeoutMs);
    }
    if (!refreshed) {
      return this.markFailed(claimed, FAILURE_MESSAGES.paymentLookup, startedAt, timeoutMs);
    }
    const payment = refreshed;

    let account: AccountRecord | null;
    try {
      account = await this.storeCall(
        "get account",
        () => this.ledger.getByCardNumber(payment.card_number),
        timeoutMs,
      );
    } catch (error) {
      this.logger.error({ err: error, payment_id: payment.id }, FAILURE_MESSAGES.accountLookup);
      return this.markFailed(payment, FAILURE_MESSAGES.accountLookup, startedAt, timeoutMs);
    }
    if (!account) {
      return this.markFailed(payment, FAILURE_MESSAGES.accountLookup, startedAt, timeoutMs);
    }
    if (!account.is_active) {
      return this.markFailed(payment, FAILURE_MESSAGES.accountInactive, startedAt, timeoutMs);
    }

    const newBalance = subtractAmount(account.balance, payment.amount);
    if (newBalance < 0) {
      return this.markFailed(payment, FAILURE_MESSAGES.insufficientBalance, startedAt, timeoutMs);
    }

    try {
      await this.storeCall(
        "update balance",
        () => this.ledger.updateBalance(payment.card_number, newBalance),
        timeoutMs,
      );
    } catch (error) {
      this.logger.error({ err: error, payment_id: payment.id }, FAILURE_MESSAGES.balanceUpdate);
      return this.markFailed(payment, FAILURE_MESSAGES.balanceUpdate, startedAt, timeoutMs);
    }

    let completed: PaymentRecord | null = null;
    try {
      completed = await this.storeCall(
        "complete payment",
        () =>
          this.store.updateStatus(payment.id, {
            status: "completed",
            expectedStatus: "processing",
            at: this.clock.nowIso(),
          }),
        timeoutMs,
      );
    } catch (error) {
      this.logger.error({ err: error, payment_id: payment.id }, FAILURE_MESSAGES.completion);
    }

    if (!completed) {
      await this.reverseDebit(payment, timeoutMs);
      return this.markFailed(payment, FAILURE_MESSAGES.completion, startedAt, timeoutMs);
    }

    this.recordProcessed(completed, startedAt);
    this.logger.info(
      { payment_id: completed.id, amount: completed.amount, new_balance: newBalance },
      "payment completed",
    );
    return { payment_id: completed.id, outcome: "completed", status: completed.status };
  }

  private async reverseDebit(payment: PaymentRecord, timeoutMs: number): Promise<void> {
    try {
      const latest = await this.storeCall(
        "get account",
        () => this.ledger.getByCardNumber(payment.card_number),
        timeoutMs,
      );
      if (!latest) {
        throw new AppError(404, "account_not_found", "Account disappeared before the debit could be reversed.");
      }
      await this.storeCall(
        "update balance",
        () => this.ledger.updateBalance(payment.card_number, addAmount(latest.balance, payment.amount)),
        timeoutMs,
      );
      this.logger.warn({ payment_id: payment.id, amount: payment.amount }, "debit reversed");
    } catch (error) {
      this.logger.error({ err: error, payment_id: payment.id, amount: payment.amount }, "debit reversal failed");
    }
  }

  private async markFailed(
    payment: PaymentRecord,
    errorMessage: string,
    startedAt: number,
    timeoutMs: number,
  ): Promise<ProcessPaymentResult> {
    const failed = await this.writeFailed(payment.id, errorMessage, timeoutMs);

    let status: PaymentStatus = "failed";
    if (failed) {
      this.recordProcessed(failed, startedAt);
    } else {
      const current = await this.storeCall("get payment", () => this.store.getById(payment.id), timeoutMs);
      status = current?.status ?? "failed";
    }
    this.logger.warn({ payment_id: payment.id, reason: errorMessage }, "payment failed");
    return { payment_id: payment.id, outcome: "failed", status };
  }

  private async writeFailed(id: string, errorMessage: string, timeoutMs: number): Promise<PaymentRecord | null> {
    for (let attempt = 1; ; attempt += 1) {
      try {
        return await this.storeCall(
          "fail payment",
          () =>
            this.store.updateStatus(id, {
              status: "failed",
              expectedStatus: "processing",
              errorMessage,
              at: this.clock.nowIso(),
            }),
          timeoutMs,
        );
      } catch (error) {
        if (attempt >= FAILED_WRITE_ATTEMPTS) {
          throw error;
        }
        this.logger.warn({ err: error, payment_id: id, attempt }, "failure write did not land, retrying");
        await new Promise<void>((resolve) => setTimeout(resolve, attempt * FAILED_WRITE_BACKOFF_MS));
      }
    }
  }

  private recordProcessed(payment: PaymentRecord, startedAt: number): void {
    const durationSeconds = (performance.now() - startedAt) / 1000;
    this.telemetry.recordPaymentProcessed(payment.status, payment.merchant_id, durationSeconds);
  }

  private async publishNotification(notification: PaymentNotification, timeoutMs: number): Promise<void> {
    try {
      await withDeadline(
        () => this.channel.publish(notification),
        timeoutMs,
        () => transientError("publish notification", new Error(`Publish exceeded ${timeoutMs}ms.`)),
      );
      this.telemetry.recordNotification("publish", "success");
    } catch (error) {
      this.telemetry.recordNotification("publish", "failure");
      const failure = isAppError(error, "transient_error") ? error : transientError("publish notification", error);
      this.logger.error(
        { err: failure, payment_id: notification.payment_id },
        "payment notification not published; payment stays pending",
      );
    }
  }

  /** Store and ledger calls share one deadline and one failure code. */
  private async storeCall<T>(operation: string, call: () => Promise<T>, timeoutMs: number): Promise<T> {
    try {
      return await withDeadline(call, timeoutMs, () =>
        persistenceError(operation, new Error(`Deadline of ${timeoutMs}ms exceeded.`)),
      );
    } catch (error) {
      if (isAppError(error, "duplicate_payment") || isAppError(error, "persistence_error")) {
        throw error;
      }
      throw persistenceError(operation, error);
    }
  }
}
