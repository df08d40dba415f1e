import { isTerminalStatus } from "../domain/state-machine.js";
import { isAppError } from "../infra/app-error.js";
import type { Logger } from "../infra/logger.js";
import type { MessageChannelPort, ReceivedNotification } from "../ports/message-channel.js";
import type { Observability, PaymentTelemetryPort } from "../ports/telemetry.js";
import type { PaymentLifecycleEngine } from "./payment-lifecycle.js";
import type { ConcurrentTaskExecutor } from "./task-executor.js";

export interface PaymentWorkerOptions {
  batchSize: number;
  waitMs: number;
  /** Per-call deadline handed to processPayment. */
  callTimeoutMs: number;
  receiveRetryDelayMs?: number;
}

// Retrying these can never succeed; the notification is acknowledged and dropped.
const POISON_CODES = ["invalid_payment_id", "payment_not_found"];

function pause(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise<void>((resolve) => {
    const done = (): void => {
      clearTimeout(timer);
      signal.removeEventListener("abort", done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal.addEventListener("abort", done, { once: true });
  });
}

/**
 * Pulls payment notifications and hands each one to the executor. The loop
 * never waits for a processing task before the next receive.
 */
export class PaymentWorker {
  private readonly logger: Logger;
  private readonly telemetry: PaymentTelemetryPort;
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;

  constructor(
    private readonly engine: Pick<PaymentLifecycleEngine, "processPayment">,
    private readonly channel: MessageChannelPort,
    private readonly executor: ConcurrentTaskExecutor,
    observability: Observability,
    private readonly options: PaymentWorkerOptions,
  ) {
    this.logger = observability.logger.child({ component: "payment_worker" });
    this.telemetry = observability.telemetry;
  }

  isRunning(): boolean {
    return this.loop !== null;
  }

  start(): void {
    if (this.loop) {
      return;
    }
    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.run(controller.signal);
  }

  /** Stops dequeuing. In-flight tasks keep running on the executor. */
  async stop(): Promise<void> {
    if (!this.loop) {
      return;
    }
    this.controller?.abort();
    await this.loop;
    this.loop = null;
    this.controller = null;
  }

  private async run(signal: AbortSignal): Promise<void> {
    this.logger.info({ batch_size: this.options.batchSize }, "payment worker started");
    while (!signal.aborted) {
      let batch: ReceivedNotification[];
      try {
        batch = await this.channel.receive({
          maxMessages: this.options.batchSize,
          waitMs: this.options.waitMs,
          signal,
        });
      } catch (error) {
        this.telemetry.recordNotification("consume", "failure");
        this.logger.error({ err: error }, "failed to receive payment notifications");
        await pause(this.options.receiveRetryDelayMs ?? 200, signal);
        continue;
      }

      for (const item of batch) {
        this.telemetry.recordNotification("consume", "success");
        this.executor.submit(() => this.handle(item));
      }
    }
    this.logger.info("payment worker stopped");
  }

  private async handle(item: ReceivedNotification): Promise<void> {
    const paymentId = item.notification.payment_id;
    try {
      const result = await this.engine.processPayment(paymentId, { timeoutMs: this.options.callTimeoutMs });
      if (!isTerminalStatus(result.status)) {
        // Claimed by a run that has not finished; the redelivery settles it or fails it once its lease expires.
        this.logger.info(
          { payment_id: paymentId, status: result.status, redelivered: item.redelivered },
          "payment still in progress, leaving for redelivery",
        );
        return;
      }
      this.logger.info(
        { payment_id: paymentId, outcome: result.outcome, status: result.status, redelivered: item.redelivered },
        "payment notification handled",
      );
    } catch (error) {
      if (!POISON_CODES.some((code) => isAppError(error, code))) {
        this.logger.error({ err: error, payment_id: paymentId }, "payment processing failed, leaving for redelivery");
        return;
      }
      this.logger.warn({ err: error, payment_id: paymentId }, "dropping unprocessable payment notification");
    }
    await this.acknowledge(item);
  }

  private async acknowledge(item: ReceivedNotification): Promise<void> {
    try {
      await this.channel.acknowledge(item.receipt);
      this.telemetry.recordNotification("acknowledge", "success");
    } catch (error) {
      this.telemetry.recordNotification("acknowledge", "failure");
      this.logger.error(
        { err: error, payment_id: item.notification.payment_id },
        "failed to acknowledge payment notification",
      );
    }
  }
}
