import type { PaymentRecord, PaymentStatus } from "../domain/types.js";

export interface PaymentStatusUpdate {
  status: PaymentStatus;
  /** When set, the write applies only if the stored status equals this value. */
  expectedStatus?: PaymentStatus;
  errorMessage?: string | null;
  at: string;
}

export interface PaymentStorePort {
  /** Throws `duplicate_payment` when the id is already taken. */
  create(payment: PaymentRecord): Promise<void>;
  getById(id: string): Promise<PaymentRecord | null>;
  /**
   * Atomically moves a payment to a new status, stamping `updated_at` and
   * `processed_at`. Resolves to null when the payment is missing or the
   * expected status did not match.
   */
  updateStatus(id: string, update: PaymentStatusUpdate): Promise<PaymentRecord | null>;
  /** Newest first. */
  listByMerchant(merchantId: string, limit: number, offset: number): Promise<PaymentRecord[]>;
  close?(): Promise<void>;
}
