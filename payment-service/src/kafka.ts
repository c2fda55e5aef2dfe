import { Kafka, type Producer } from "kafkajs";
import { config } from "./config";
import { logger } from "./logger";
import type { PaymentCreatedEvent } from "./types";

export const TOPIC_PAYMENT_EVENTS = "payment-events";

let producer: Producer | null = null;

export async function connectKafka(): Promise<void> {
  try {
    const kafka = new Kafka({
      clientId: config.SERVICE_NAME,
      brokers: config.KAFKA_BROKERS.split(","),
    });
    const candidate = kafka.producer();
    await candidate.connect();
    producer = candidate;
    logger.info("Kafka producer connected");
  } catch (err) {
    logger.warn("Kafka unavailable, payment events will not be published", { error: String(err) });
  }
}

/** Best-effort: a failed publish is logged and never reaches the caller. */
export async function publishPaymentEvent(event: "payment_created", payload: PaymentCreatedEvent): Promise<void> {
  if (!producer) return;
  try {
    await producer.send({
      topic: TOPIC_PAYMENT_EVENTS,
      messages: [
        {
          key: String(payload.paymentId),
          value: JSON.stringify({ event, ...payload, timestamp: new Date().toISOString() }),
          headers: { traceId: payload.traceId },
        },
      ],
    });
    logger.debug("Kafka event published", { event, paymentId: payload.paymentId });
  } catch (err) {
    logger.warn("Failed to publish Kafka event", { event, paymentId: payload.paymentId, error: String(err) });
  }
}

export async function disconnectKafka(): Promise<void> {
  if (!producer) return;
  try {
    await producer.disconnect();
  } catch (err) {
    logger.warn("Kafka disconnect failed", { error: String(err) });
  } finally {
    producer = null;
  }
}
