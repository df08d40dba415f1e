import type { AccountRecord } from "../domain/types.js";

export interface AccountLedgerPort {
  getByCardNumber(cardNumber: string): Promise<AccountRecord | null>;
  /**
   * Writes an absolute balance computed by the caller. Implementations reject
   * negative balances but do not re-check the arithmetic.
   */
  updateBalance(cardNumber: string, newBalance: number): Promise<void>;
}
