import type { Pool } from "pg";
import { logger } from "../logger";
import { createPool } from "./client";

export const PAYMENTS_DDL = `
  CREATE TABLE IF NOT EXISTS payments (
    id SERIAL PRIMARY KEY,
    user_id INTEGER NOT NULL,
    amount NUMERIC(12, 2) NOT NULL CHECK (amount > 0),
    currency VARCHAR(8) NOT NULL DEFAULT 'INR',
    status VARCHAR(32) NOT NULL DEFAULT 'PAID',
    description TEXT,
    created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
  );
  CREATE INDEX IF NOT EXISTS idx_payments_user_id ON payments(user_id);
  CREATE INDEX IF NOT EXISTS idx_payments_created_at ON payments(created_at);
`;

export async function runMigration(pool: Pool): Promise<void> {
  const client = await pool.connect();
  try {
    await client.query(PAYMENTS_DDL);
    logger.info("DB migration completed");
  } finally {
    client.release();
  }
}

if (require.main === module) {
  const pool = createPool();
  runMigration(pool)
    .then(() => pool.end())
    .then(() => process.exit(0))
    .catch((err: unknown) => {
      logger.error("DB migration failed", { error: String(err) });
      process.exit(1);
    });
}
