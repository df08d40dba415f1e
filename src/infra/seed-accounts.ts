import { readFile } from "node:fs/promises";
import type { AccountSeed } from "../adapters/inmemory/account-ledger.js";
import { AppError } from "./app-error.js";

const DEFAULT_SEED_FILE = new URL("../../data/seed-accounts.json", import.meta.url);

function isAccountSeed(value: unknown): value is AccountSeed {
  if (typeof value !== "object" || value === null) {
    return false;
  }
  return (
    "card_number" in value &&
    typeof value.card_number === "string" &&
    "balance" in value &&
    typeof value.balance === "number" &&
    value.balance >= 0 &&
    "is_active" in value &&
    typeof value.is_active === "boolean"
  );
}

export async function loadSeedAccounts(file: URL = DEFAULT_SEED_FILE): Promise<AccountSeed[]> {
  const parsed: unknown = JSON.parse(await readFile(file, "utf8"));
  if (!Array.isArray(parsed) || !parsed.every(isAccountSeed)) {
    throw new AppError(500, "invalid_runtime_config", `Seed file '${file.pathname}' is not a list of accounts.`);
  }
  return parsed;
}
