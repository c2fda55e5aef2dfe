import { trace } from "@opentelemetry/api";
import { logger } from "./logger";
import { PaymentError, storeUnavailable } from "./errors";
import { DEFAULT_STATUS, type PaymentCreatedEvent, type PaymentIntent, type PaymentRecord } from "./types";
import { parseId, parsePaymentIntent, toAmount } from "./validation";
import type { PaymentStore } from "./db/store";

export const MAX_LATEST_LIMIT = 1000;

export type PaymentEventPublisher = (event: "payment_created", payload: PaymentCreatedEvent) => Promise<void>;

export interface RequestContext {
  traceId: string;
}

export class PaymentSubmissionService {
  constructor(
    private readonly store: PaymentStore,
    private readonly publishEvent?: PaymentEventPublisher
  ) {}

  /**
   * Validates and stores one payment. Exactly one insert per call; a store failure
   * is reported as StoreUnavailable and is not retried.
   */
  async submit(input: unknown, ctx: RequestContext): Promise<PaymentRecord> {
    const { traceId } = ctx;
    let intent: PaymentIntent;
    try {
      intent = parsePaymentIntent(input);
    } catch (err) {
      logger.warn("Payment validation failed", { traceId, error: String(err) });
      throw err;
    }

    let record: PaymentRecord;
    try {
      record = await this.store.insertPayment({ ...intent, status: DEFAULT_STATUS });
    } catch (err) {
      logger.error("DB error storing payment", { traceId, userId: intent.userId, error: String(err) });
      throw storeUnavailable(err);
    }

    trace.getActiveSpan()?.setAttribute("paymentId", record.id);
    logger.info("Payment stored", {
      traceId,
      paymentId: record.id,
      userId: record.userId,
      amount: toAmount(record.amountCents),
      currency: record.currency,
    });

    if (this.publishEvent) {
      await this.publishEvent("payment_created", {
        traceId,
        paymentId: record.id,
        userId: record.userId,
        amount: toAmount(record.amountCents),
        currency: record.currency,
        status: record.status,
      });
    }
    return record;
  }

  async fetch(rawId: unknown, ctx: RequestContext): Promise<PaymentRecord> {
    const id = parseId(rawId);
    if (id === null) {
      logger.info("Payment not found (malformed id)", { traceId: ctx.traceId, id: String(rawId) });
      throw new PaymentError("NotFound", `Payment ${String(rawId)} not found`);
    }
    let record: PaymentRecord | null;
    try {
      record = await this.store.getPaymentById(id);
    } catch (err) {
      logger.error("DB error fetching payment", { traceId: ctx.traceId, paymentId: id, error: String(err) });
      throw storeUnavailable(err);
    }
    if (!record) {
      logger.info("Payment not found", { traceId: ctx.traceId, paymentId: id });
      throw new PaymentError("NotFound", `Payment ${id} not found`);
    }
    return record;
  }

  /** A user's payments, newest first. */
  async history(rawUserId: unknown, ctx: RequestContext): Promise<PaymentRecord[]> {
    const userId = parseId(rawUserId);
    if (userId === null) {
      throw new PaymentError("ValidationFailed", "user_id: user_id must be a positive integer");
    }
    try {
      return await this.store.listPaymentsByUser(userId);
    } catch (err) {
      logger.error("DB error listing payment history", { traceId: ctx.traceId, userId, error: String(err) });
      throw storeUnavailable(err);
    }
  }

  /** Newest payments across all users; the limit is clamped to 1..1000. */
  async latest(rawLimit: unknown, ctx: RequestContext): Promise<PaymentRecord[]> {
    const limit = clampLimit(rawLimit);
    try {
      return await this.store.listLatestPayments(limit);
    } catch (err) {
      logger.error("DB error listing latest payments", { traceId: ctx.traceId, limit, error: String(err) });
      throw storeUnavailable(err);
    }
  }
}

export function clampLimit(raw: unknown): number {
  if (raw === undefined || raw === null || raw === "") return MAX_LATEST_LIMIT;
  const parsed = typeof raw === "number" ? raw : Number(raw);
  if (!Number.isFinite(parsed)) {
    throw new PaymentError("ValidationFailed", "limit: limit must be a number");
  }
  return Math.min(MAX_LATEST_LIMIT, Math.max(1, Math.trunc(parsed)));
}
