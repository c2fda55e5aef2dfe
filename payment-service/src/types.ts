export type PaymentStatus = "PAID" | "PENDING" | "FAILED";

export const DEFAULT_CURRENCY = "INR";
export const DEFAULT_STATUS: PaymentStatus = "PAID";

/** A validated payment request. The amount is held in minor units (paise, cents). */
export interface PaymentIntent {
  userId: number;
  amountCents: number;
  currency: string;
  description: string | null;
}

export interface PaymentRecord extends PaymentIntent {
  id: number;
  status: PaymentStatus;
  createdAt: Date;
}

/** Body accepted by the submit and enqueue endpoints, before validation. */
export interface PaymentIntentBody {
  user_id?: unknown;
  amount?: unknown;
  currency?: unknown;
  description?: unknown;
}

/** JSON payload put on the intents queue. */
export interface QueuedPaymentMessage {
  traceId: string;
  userId: number;
  amount: number;
  currency: string;
  description: string | null;
  enqueuedAt: string;
}

export interface PaymentCreatedEvent {
  traceId: string;
  paymentId: number;
  userId: number;
  amount: number;
  currency: string;
  status: PaymentStatus;
}
