import { Pool } from "pg";
import { config } from "../config";
import { formatAmount, parseAmount } from "../validation";
import type { PaymentRecord, PaymentStatus } from "../types";
import type { NewPayment, PaymentStore } from "./store";

export function createPool(connectionString: string = config.DATABASE_URL): Pool {
  return new Pool({ connectionString });
}

export type PaymentRow = {
  id: number;
  user_id: number;
  // NUMERIC comes back from pg as a string
  amount: string;
  currency: string;
  status: PaymentStatus;
  description: string | null;
  created_at: Date;
};

const COLUMNS = "id, user_id, amount, currency, status, description, created_at";

export function rowToRecord(row: PaymentRow): PaymentRecord {
  return {
    id: Number(row.id),
    userId: Number(row.user_id),
    amountCents: parseAmount(row.amount),
    currency: row.currency,
    status: row.status,
    description: row.description,
    createdAt: row.created_at,
  };
}

export class PgPaymentStore implements PaymentStore {
  constructor(private readonly pool: Pool) {}

  async insertPayment(payment: NewPayment): Promise<PaymentRecord> {
    const result = await this.pool.query<PaymentRow>(
      `INSERT INTO payments (user_id, amount, currency, status, description, created_at)
       VALUES ($1, $2, $3, $4, $5, NOW())
       RETURNING ${COLUMNS}`,
      [payment.userId, formatAmount(payment.amountCents), payment.currency, payment.status, payment.description]
    );
    const row = result.rows[0];
    if (!row) throw new Error("INSERT INTO payments returned no row");
    return rowToRecord(row);
  }

  async getPaymentById(id: number): Promise<PaymentRecord | null> {
    const result = await this.pool.query<PaymentRow>(`SELECT ${COLUMNS} FROM payments WHERE id = $1`, [id]);
    const row = result.rows[0];
    return row ? rowToRecord(row) : null;
  }

  async listPaymentsByUser(userId: number): Promise<PaymentRecord[]> {
    const result = await this.pool.query<PaymentRow>(
      `SELECT ${COLUMNS} FROM payments WHERE user_id = $1 ORDER BY created_at DESC, id DESC`,
      [userId]
    );
    return result.rows.map(rowToRecord);
  }

  async listLatestPayments(limit: number): Promise<PaymentRecord[]> {
    const result = await this.pool.query<PaymentRow>(
      `SELECT ${COLUMNS} FROM payments ORDER BY created_at DESC, id DESC LIMIT $1`,
      [limit]
    );
    return result.rows.map(rowToRecord);
  }
}
