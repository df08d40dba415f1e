import type { Pool } from "pg";
import type { AccountRecord } from "../../domain/types.js";
import { AppError } from "../../infra/app-error.js";
import type { AccountLedgerPort } from "../../ports/account-ledger.js";
import { mapTimestamp, toNumber } from "./payment-store.js";

export class PostgresAccountLedger implements AccountLedgerPort {
  constructor(private readonly pool: Pool) {}

  async getByCardNumber(cardNumber: string): Promise<AccountRecord | null> {
    const result = await this.pool.query<{
      card_number: string;
      balance: unknown;
      is_active: boolean;
      created_at: unknown;
      updated_at: unknown;
    }>(
      `
        SELECT card_number, balance, is_active, created_at, updated_at
        FROM accounts
        WHERE card_number = $1
      `,
      [cardNumber],
    );
    const row = result.rows[0];
    if (!row) {
      return null;
    }

    return {
      card_number: row.card_number,
      balance: toNumber(row.balance, "balance"),
      is_active: row.is_active,
      created_at: mapTimestamp(row.created_at),
      updated_at: mapTimestamp(row.updated_at),
    };
  }

  // The accounts table CHECK (balance >= 0) rejects negative writes.
  async updateBalance(cardNumber: string, newBalance: number): Promise<void> {
    const result = await this.pool.query(
      `
        UPDATE accounts
        SET balance = $2::numeric,
            updated_at = NOW()
        WHERE card_number = $1
      `,
      [cardNumber, newBalance],
    );
    if (result.rowCount === 0) {
      throw new AppError(404, "account_not_found", `Account '${cardNumber.slice(-4)}' not found.`);
    }
  }
}
