import { AppError } from "../infra/app-error.js";

export type PaymentErrorCode =
  | "invalid_card_data"
  | "invalid_payment_request"
  | "invalid_payment_id"
  | "account_not_found"
  | "insufficient_balance"
  | "payment_not_found"
  | "duplicate_payment"
  | "persistence_error"
  | "transient_error";

export function invalidCardData(reason: string): AppError {
  return new AppError(422, "invalid_card_data", `Invalid card data: ${reason}`);
}

export function invalidPaymentRequest(reason: string): AppError {
  return new AppError(422, "invalid_payment_request", reason);
}

export function invalidPaymentId(id: string): AppError {
  return new AppError(422, "invalid_payment_id", `Payment id '${id}' is not a valid UUID.`);
}

export function accountNotFound(cause?: unknown): AppError {
  return new AppError(422, "account_not_found", "Account not found or invalid.", { cause });
}

export function insufficientBalance(): AppError {
  return new AppError(422, "insufficient_balance", "Insufficient balance.");
}

export function paymentNotFound(id: string): AppError {
  return new AppError(404, "payment_not_found", `Payment '${id}' not found.`);
}

export function duplicatePayment(id: string): AppError {
  return new AppError(409, "duplicate_payment", `Payment '${id}' already exists.`);
}

export function persistenceError(operation: string, cause?: unknown): AppError {
  return new AppError(503, "persistence_error", `Storage call failed: ${operation}.`, { cause });
}

export function transientError(operation: string, cause?: unknown): AppError {
  return new AppError(503, "transient_error", `Message channel call failed: ${operation}.`, { cause });
}
