import { readFile, readdir } from "node:fs/promises";
import { Pool } from "pg";
import { createLogger } from "../src/infra/logger.js";

const SQL_DIR = new URL("../sql/", import.meta.url);

async function main(): Promise<void> {
  const logger = createLogger({ level: "info", service: "card-payments-migrate" });
  const connectionString = process.env.PAYMENTS_POSTGRES_URL?.trim();
  if (!connectionString) {
    throw new Error("PAYMENTS_POSTGRES_URL is required.");
  }

  const files = (await readdir(SQL_DIR)).filter((name) => name.endsWith(".sql")).sort();
  const pool = new Pool({ connectionString });

  try {
    for (const file of files) {
      const sql = await readFile(new URL(file, SQL_DIR), "utf8");
      await pool.query(sql);
      logger.info({ file }, "migration applied");
    }
  } finally {
    await pool.end();
  }
}

await main();
