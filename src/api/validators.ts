import type { CreatePaymentInput } from "../domain/types.js";
import { AppError } from "../infra/app-error.js";

function isObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function isString(value: unknown): value is string {
  return typeof value === "string" && value.length > 0;
}

function isInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value);
}

/**
 * Shape checks only. Card and amount rules live in the domain so that every
 * caller of the engine gets the same verdict.
 */
export function assertCreatePaymentInput(payload: unknown): asserts payload is CreatePaymentInput {
  if (!isObject(payload)) {
    throw new AppError(400, "invalid_request_body", "Request body must be an object.");
  }

  const { card_number, card_holder, expiry_month, expiry_year, cvv, amount, currency, merchant_id } = payload;

  if (!isString(card_number)) {
    throw new AppError(422, "invalid_card_number", "card_number is required.");
  }
  if (!isString(card_holder)) {
    throw new AppError(422, "invalid_card_holder", "card_holder is required.");
  }
  if (!isInteger(expiry_month)) {
    throw new AppError(422, "invalid_expiry_month", "expiry_month must be an integer.");
  }
  if (!isInteger(expiry_year)) {
    throw new AppError(422, "invalid_expiry_year", "expiry_year must be an integer.");
  }
  if (!isString(cvv)) {
    throw new AppError(422, "invalid_cvv", "cvv is required.");
  }
  if (typeof amount !== "number") {
    throw new AppError(422, "invalid_amount", "amount must be a number.");
  }
  if (!isString(currency) || currency.length !== 3) {
    throw new AppError(422, "invalid_currency", "Currency must be a 3-letter ISO code.");
  }
  if (!isString(merchant_id)) {
    throw new AppError(422, "invalid_merchant_id", "merchant_id is required.");
  }
}

/** Missing or unparsable values fall back instead of failing the request. */
export function normalizeLimit(value: unknown, fallback: number, max: number): number {
  const parsed = typeof value === "string" ? Number(value) : Number.NaN;
  if (!Number.isInteger(parsed) || parsed <= 0) {
    return fallback;
  }
  return Math.min(parsed, max);
}

export function normalizeOffset(value: unknown): number {
  const parsed = typeof value === "string" ? Number(value) : Number.NaN;
  if (!Number.isInteger(parsed) || parsed < 0) {
    return 0;
  }
  return parsed;
}

export function normalizeResourceId(value: unknown, fieldName: string): string {
  if (typeof value !== "string") {
    throw new AppError(422, `invalid_${fieldName}`, `${fieldName} must be a string.`);
  }

  const normalized = value.trim();
  if (normalized.length === 0 || normalized.length > 255) {
    throw new AppError(
      422,
      `invalid_${fieldName}`,
      `${fieldName} length must be between 1 and 255 characters.`,
    );
  }
  return normalized;
}
