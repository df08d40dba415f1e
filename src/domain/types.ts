export type PaymentStatus = "pending" | "processing" | "completed" | "failed" | "cancelled";

export interface PaymentRecord {
  id: string;
  card_number: string;
  card_holder: string;
  expiry_month: number;
  expiry_year: number;
  cvv: string;
  amount: number;
  currency: string;
  merchant_id: string;
  status: PaymentStatus;
  created_at: string;
  updated_at: string;
  processed_at: string | null;
  error_message: string | null;
}

export interface AccountRecord {
  card_number: string;
  balance: number;
  is_active: boolean;
  created_at: string;
  updated_at: string;
}

export interface CreatePaymentInput {
  card_number: string;
  card_holder: string;
  expiry_month: number;
  expiry_year: number;
  cvv: string;
  amount: number;
  currency: string;
  merchant_id: string;
}

export interface CreatePaymentResponse {
  id: string;
  status: PaymentStatus;
  amount: number;
  currency: string;
  created_at: string;
  message: string;
}

/** Payment as exposed outside the service: no cvv, masked card number. */
export interface PaymentView {
  id: string;
  card_number: string;
  card_holder: string;
  expiry_month: number;
  expiry_year: number;
  amount: number;
  currency: string;
  merchant_id: string;
  status: PaymentStatus;
  created_at: string;
  updated_at: string;
  processed_at: string | null;
  error_message: string | null;
}

export interface PaymentNotification {
  payment_id: string;
  amount: number;
  currency: string;
  /** Payment creation time, Unix seconds. */
  timestamp: number;
}

export type ProcessOutcome = "completed" | "failed" | "skipped";

export interface ProcessPaymentResult {
  payment_id: string;
  outcome: ProcessOutcome;
  status: PaymentStatus;
}
