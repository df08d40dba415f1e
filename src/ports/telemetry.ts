import type { Logger } from "pino";
import type { PaymentStatus } from "../domain/types.js";

export type NotificationOperation = "publish" | "consume" | "acknowledge";

export interface PaymentTelemetryPort {
  recordPaymentCreated(merchantId: string, currency: string, amount: number): void;
  recordPaymentProcessed(status: PaymentStatus, merchantId: string, durationSeconds: number): void;
  recordNotification(operation: NotificationOperation, outcome: "success" | "failure"): void;
}

export interface Observability {
  logger: Logger;
  telemetry: PaymentTelemetryPort;
}
