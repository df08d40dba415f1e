import type { PaymentRecord } from "../../domain/types.js";
import { duplicatePayment } from "../../domain/errors.js";
import type { PaymentStatusUpdate, PaymentStorePort } from "../../ports/payment-store.js";

export class InMemoryPaymentStore implements PaymentStorePort {
  private readonly payments = new Map<string, PaymentRecord>();

  async create(payment: PaymentRecord): Promise<void> {
    if (this.payments.has(payment.id)) {
      throw duplicatePayment(payment.id);
    }
    this.payments.set(payment.id, { ...payment });
  }

  async getById(id: string): Promise<PaymentRecord | null> {
    const payment = this.payments.get(id);
    return payment ? { ...payment } : null;
  }

  async updateStatus(id: string, update: PaymentStatusUpdate): Promise<PaymentRecord | null> {
    const current = this.payments.get(id);
    if (!current) {
      return null;
    }
    if (update.expectedStatus && current.status !== update.expectedStatus) {
      return null;
    }

    const next: PaymentRecord = {
      ...current,
      status: update.status,
      updated_at: update.at,
      processed_at: update.at,
      error_message: update.errorMessage ?? null,
    };
    this.payments.set(id, next);
    return { ...next };
  }

  async listByMerchant(merchantId: string, limit: number, offset: number): Promise<PaymentRecord[]> {
    return [...this.payments.values()]
      .filter((payment) => payment.merchant_id === merchantId)
      .sort((a, b) => {
        const byCreatedAt = b.created_at.localeCompare(a.created_at);
        if (byCreatedAt !== 0) {
          return byCreatedAt;
        }
        return b.id.localeCompare(a.id);
      })
      .slice(Math.max(0, offset), Math.max(0, offset) + Math.max(0, limit))
      .map((payment) => ({ ...payment }));
  }
}
