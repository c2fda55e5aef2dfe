import type { Channel } from "amqplib";
import { logger } from "../logger";
import { isPaymentError } from "../errors";
import type { PaymentSubmissionService } from "../payment-service";
import type { PaymentIntentBody } from "../types";
import { isRecord } from "../validation";

export type Disposition = "ack" | "drop" | "requeue";

/** Maps a queued message back onto the body shape that `submit` validates. */
export function queuedMessageToBody(message: Record<string, unknown>): PaymentIntentBody {
  return {
    user_id: message.userId,
    amount: message.amount,
    currency: message.currency,
    description: message.description,
  };
}

/**
 * Runs one queued intent through `submit`. Store outages go back to the broker for
 * redelivery; anything that can never be stored is dropped.
 */
export function createPaymentIntentHandler(service: PaymentSubmissionService) {
  return async (content: Buffer, fallbackTraceId: string): Promise<Disposition> => {
    let parsed: unknown;
    try {
      parsed = JSON.parse(content.toString());
    } catch (err) {
      logger.error("Malformed payment intent message", { traceId: fallbackTraceId, error: String(err) });
      return "drop";
    }
    if (!isRecord(parsed)) {
      logger.error("Payment intent message is not an object", { traceId: fallbackTraceId });
      return "drop";
    }
    const traceId = typeof parsed.traceId === "string" && parsed.traceId !== "" ? parsed.traceId : fallbackTraceId;

    try {
      const record = await service.submit(queuedMessageToBody(parsed), { traceId });
      logger.info("Queued payment stored", { traceId, paymentId: record.id });
      return "ack";
    } catch (err) {
      if (isPaymentError(err, "ValidationFailed")) {
        logger.warn("Dropping invalid queued payment", { traceId, error: err.message });
        return "drop";
      }
      logger.error("Queued payment not stored, requeueing", { traceId, error: String(err) });
      return "requeue";
    }
  };
}

type ConsumeChannel = Pick<Channel, "prefetch" | "consume" | "ack" | "nack">;

export async function consumePaymentIntents(
  ch: ConsumeChannel,
  queue: string,
  handle: (content: Buffer, fallbackTraceId: string) => Promise<Disposition>
): Promise<void> {
  await ch.prefetch(1);
  await ch.consume(queue, async (raw) => {
    if (!raw) return;
    const header = raw.properties.headers?.traceId;
    const traceId = typeof header === "string" ? header : String(raw.properties.messageId ?? "unknown");
    let disposition: Disposition;
    try {
      disposition = await handle(raw.content, traceId);
    } catch (err) {
      logger.error("Payment intent handler failed, requeueing", { traceId, error: String(err) });
      disposition = "requeue";
    }
    try {
      if (disposition === "ack") ch.ack(raw);
      else ch.nack(raw, false, disposition === "requeue");
    } catch (err) {
      // Channel is gone; the broker redelivers unsettled messages when it closes.
      logger.error("Failed to settle payment intent message", { traceId, error: String(err) });
    }
  });
}
