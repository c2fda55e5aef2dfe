import type { PaymentIntent, PaymentRecord, PaymentStatus } from "../types";

export interface NewPayment extends PaymentIntent {
  status: PaymentStatus;
}

/** Durable table of payment attempts. Ids are assigned by the store. */
export interface PaymentStore {
  insertPayment(payment: NewPayment): Promise<PaymentRecord>;
  getPaymentById(id: number): Promise<PaymentRecord | null>;
  listPaymentsByUser(userId: number): Promise<PaymentRecord[]>;
  listLatestPayments(limit: number): Promise<PaymentRecord[]>;
}
