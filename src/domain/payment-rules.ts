import type { AccountRecord, CreatePaymentInput, PaymentRecord, PaymentView } from "./types.js";
import { isValidAmount, toMinorUnits } from "./money.js";

const CARD_NUMBER_LENGTH = 16;
const CVV_LENGTH = 3;

type CardFields = Pick<CreatePaymentInput, "card_number" | "expiry_month" | "expiry_year" | "cvv">;

/**
 * Structural and temporal card checks. Expiry is compared against the UTC
 * calendar month of `now`; a card expiring this month is still valid.
 * Returns the first failing rule, or undefined when the card passes.
 */
export function findCardDataViolation(card: CardFields, now: Date): string | undefined {
  if (card.card_number.length !== CARD_NUMBER_LENGTH) {
    return `card_number must be exactly ${CARD_NUMBER_LENGTH} characters.`;
  }
  if (card.cvv.length !== CVV_LENGTH) {
    return `cvv must be exactly ${CVV_LENGTH} characters.`;
  }
  if (!Number.isInteger(card.expiry_month) || card.expiry_month < 1 || card.expiry_month > 12) {
    return "expiry_month must be between 1 and 12.";
  }
  if (!Number.isInteger(card.expiry_year)) {
    return "expiry_year must be an integer.";
  }

  const currentYear = now.getUTCFullYear();
  const currentMonth = now.getUTCMonth() + 1;
  if (card.expiry_year < currentYear) {
    return "card is expired.";
  }
  if (card.expiry_year === currentYear && card.expiry_month < currentMonth) {
    return "card is expired.";
  }
  return undefined;
}

export function findPaymentRequestViolation(
  input: Pick<CreatePaymentInput, "amount" | "currency" | "merchant_id">,
): string | undefined {
  if (!isValidAmount(input.amount)) {
    return "amount must be greater than zero with at most two decimal places.";
  }
  if (input.currency.trim().length === 0) {
    return "currency is required.";
  }
  if (input.merchant_id.trim().length === 0) {
    return "merchant_id is required.";
  }
  return undefined;
}

// Inactive accounts are rejected even when the balance would cover the amount.
export function hasSufficientBalance(account: AccountRecord, amount: number): boolean {
  return account.is_active && toMinorUnits(account.balance) >= toMinorUnits(amount);
}

export function maskCardNumber(cardNumber: string): string {
  const visible = cardNumber.slice(-4);
  return `${"*".repeat(Math.max(0, cardNumber.length - visible.length))}${visible}`;
}

export function toPaymentView(payment: PaymentRecord): PaymentView {
  return {
    id: payment.id,
    card_number: maskCardNumber(payment.card_number),
    card_holder: payment.card_holder,
    expiry_month: payment.expiry_month,
    expiry_year: payment.expiry_year,
    amount: payment.amount,
    currency: payment.currency,
    merchant_id: payment.merchant_id,
    status: payment.status,
    created_at: payment.created_at,
    updated_at: payment.updated_at,
    processed_at: payment.processed_at,
    error_message: payment.error_message,
  };
}
