import type { Pool } from "pg";
import type { PaymentRecord, PaymentStatus } from "../../domain/types.js";
import { duplicatePayment } from "../../domain/errors.js";
import { isPaymentStatus } from "../../domain/state-machine.js";
import { AppError } from "../../infra/app-error.js";
import type { PaymentStatusUpdate, PaymentStorePort } from "../../ports/payment-store.js";

const UNIQUE_VIOLATION = "23505";

const PAYMENT_COLUMNS = `
  id,
  card_number,
  card_holder,
  expiry_month,
  expiry_year,
  cvv,
  amount,
  currency,
  merchant_id,
  status,
  created_at,
  updated_at,
  processed_at,
  error_msg
`;

interface PaymentRow {
  id: string;
  card_number: string;
  card_holder: string;
  expiry_month: unknown;
  expiry_year: unknown;
  cvv: string;
  amount: unknown;
  currency: string;
  merchant_id: string;
  status: string;
  created_at: unknown;
  updated_at: unknown;
  processed_at: unknown;
  error_msg: string | null;
}

export function mapTimestamp(value: unknown): string {
  if (value instanceof Date) {
    return value.toISOString();
  }
  return String(value);
}

export function toNumber(value: unknown, field: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new AppError(500, "persistence_mapping_error", `Unable to map numeric field '${field}'.`);
  }
  return parsed;
}

function toStatus(value: string): PaymentStatus {
  if (!isPaymentStatus(value)) {
    throw new AppError(500, "persistence_mapping_error", `Unknown payment status '${value}'.`);
  }
  return value;
}

function mapPaymentRow(row: PaymentRow): PaymentRecord {
  return {
    id: row.id,
    card_number: row.card_number,
    card_holder: row.card_holder,
    expiry_month: toNumber(row.expiry_month, "expiry_month"),
    expiry_year: toNumber(row.expiry_year, "expiry_year"),
    cvv: row.cvv,
    amount: toNumber(row.amount, "amount"),
    currency: row.currency,
    merchant_id: row.merchant_id,
    status: toStatus(row.status),
    created_at: mapTimestamp(row.created_at),
    updated_at: mapTimestamp(row.updated_at),
    processed_at: row.processed_at === null ? null : mapTimestamp(row.processed_at),
    error_message: row.error_msg,
  };
}

function isUniqueViolation(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === UNIQUE_VIOLATION;
}

export class PostgresPaymentStore implements PaymentStorePort {
  constructor(private readonly pool: Pool) {}

  async create(payment: PaymentRecord): Promise<void> {
    try {
      await this.pool.query(
        `
          INSERT INTO payments (
            id,
            card_number,
            card_holder,
            expiry_month,
            expiry_year,
            cvv,
            amount,
            currency,
            merchant_id,
            status,
            created_at,
            updated_at
          )
          VALUES ($1::uuid, $2, $3, $4, $5, $6, $7::numeric, $8, $9, $10, $11::timestamptz, $12::timestamptz)
        `,
        [
          payment.id,
          payment.card_number,
          payment.card_holder,
          payment.expiry_month,
          payment.expiry_year,
          payment.cvv,
          payment.amount,
          payment.currency,
          payment.merchant_id,
          payment.status,
          payment.created_at,
          payment.updated_at,
        ],
      );
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw duplicatePayment(payment.id);
      }
      throw error;
    }
  }

  async getById(id: string): Promise<PaymentRecord | null> {
    const result = await this.pool.query<PaymentRow>(
      `
        SELECT ${PAYMENT_COLUMNS}
        FROM payments
        WHERE id = $1::uuid
      `,
      [id],
    );
    const row = result.rows[0];
    return row ? mapPaymentRow(row) : null;
  }

  async updateStatus(id: string, update: PaymentStatusUpdate): Promise<PaymentRecord | null> {
    const result = await this.pool.query<PaymentRow>(
      `
        UPDATE payments
        SET status = $2,
            updated_at = $3::timestamptz,
            processed_at = $3::timestamptz,
            error_msg = $4
        WHERE id = $1::uuid
          AND ($5::text IS NULL OR status = $5::text)
        RETURNING ${PAYMENT_COLUMNS}
      `,
      [id, update.status, update.at, update.errorMessage ?? null, update.expectedStatus ?? null],
    );
    const row = result.rows[0];
    return row ? mapPaymentRow(row) : null;
  }

  async listByMerchant(merchantId: string, limit: number, offset: number): Promise<PaymentRecord[]> {
    const result = await this.pool.query<PaymentRow>(
      `
        SELECT ${PAYMENT_COLUMNS}
        FROM payments
        WHERE merchant_id = $1
        ORDER BY created_at DESC, id DESC
        LIMIT $2 OFFSET $3
      `,
      [merchantId, Math.max(0, limit), Math.max(0, offset)],
    );
    return result.rows.map(mapPaymentRow);
  }
}
