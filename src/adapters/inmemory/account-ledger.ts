import type { AccountRecord } from "../../domain/types.js";
import { AppError } from "../../infra/app-error.js";
import { SystemClock, type ClockPort } from "../../infra/clock.js";
import type { AccountLedgerPort } from "../../ports/account-ledger.js";

export interface AccountSeed {
  card_number: string;
  balance: number;
  is_active: boolean;
}

export class InMemoryAccountLedger implements AccountLedgerPort {
  private readonly accounts = new Map<string, AccountRecord>();
  private readonly clock: ClockPort;

  constructor(seeds: AccountSeed[] = [], clock: ClockPort = new SystemClock()) {
    this.clock = clock;
    for (const seed of seeds) {
      this.upsert(seed);
    }
  }

  upsert(seed: AccountSeed): void {
    const timestamp = this.clock.nowIso();
    const existing = this.accounts.get(seed.card_number);
    this.accounts.set(seed.card_number, {
      card_number: seed.card_number,
      balance: seed.balance,
      is_active: seed.is_active,
      created_at: existing?.created_at ?? timestamp,
      updated_at: timestamp,
    });
  }

  async getByCardNumber(cardNumber: string): Promise<AccountRecord | null> {
    const account = this.accounts.get(cardNumber);
    return account ? { ...account } : null;
  }

  async updateBalance(cardNumber: string, newBalance: number): Promise<void> {
    const account = this.accounts.get(cardNumber);
    if (!account) {
      throw new AppError(404, "account_not_found", `Account '${cardNumber.slice(-4)}' not found.`);
    }
    if (!Number.isFinite(newBalance) || newBalance < 0) {
      throw new AppError(422, "negative_balance", "Account balance must not be negative.");
    }
    account.balance = newBalance;
    account.updated_at = this.clock.nowIso();
  }
}
