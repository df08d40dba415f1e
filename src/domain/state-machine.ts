import type { PaymentStatus } from "./types.js";
import { AppError } from "../infra/app-error.js";

const ALLOWED_TRANSITIONS: Record<PaymentStatus, PaymentStatus[]> = {
  pending: ["processing", "cancelled"],
  processing: ["completed", "failed"],
  completed: [],
  failed: [],
  cancelled: [],
};

const TERMINAL_STATUSES: Set<PaymentStatus> = new Set(["completed", "failed", "cancelled"]);

export const PAYMENT_STATUSES: readonly PaymentStatus[] = [
  "pending",
  "processing",
  "completed",
  "failed",
  "cancelled",
];

export function canTransition(current: PaymentStatus, next: PaymentStatus): boolean {
  const allowed = ALLOWED_TRANSITIONS[current];
  return allowed.includes(next);
}

export function isTerminalStatus(status: PaymentStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

export function isPaymentStatus(value: unknown): value is PaymentStatus {
  return typeof value === "string" && PAYMENT_STATUSES.some((status) => status === value);
}

export function assertTransition(current: PaymentStatus, next: PaymentStatus): void {
  if (canTransition(current, next)) {
    return;
  }
  throw new AppError(
    409,
    "invalid_state_transition",
    `Transition from '${current}' to '${next}' is not allowed.`,
  );
}
