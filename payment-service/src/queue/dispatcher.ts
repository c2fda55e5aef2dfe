import { v4 as uuidv4 } from "uuid";
import { logger } from "../logger";
import { PaymentError, isPaymentError, queueUnavailable, type PaymentErrorCode } from "../errors";
import { parsePaymentIntent, toAmount } from "../validation";
import type { PaymentIntent, QueuedPaymentMessage } from "../types";
import type { OutgoingMessage, QueueCounts, QueueTransport } from "./transport";

export const MAX_DELAY_SECONDS = 900;

export interface EnqueueOptions {
  traceId: string;
  /** Seconds before the message becomes visible, 0 to 900. Checked on enqueue. */
  delaySeconds?: unknown;
}

export interface AcceptedItem {
  index: number;
  messageId: string;
}

export interface RejectedItem {
  index: number;
  code: PaymentErrorCode;
  message: string;
}

export interface BatchOutcome {
  accepted: AcceptedItem[];
  rejected: RejectedItem[];
  /** Size of every chunk handed to the transport, in send order. */
  chunks: number[];
}

export function toQueuedMessage(intent: PaymentIntent, traceId: string, now: Date = new Date()): QueuedPaymentMessage {
  return {
    traceId,
    userId: intent.userId,
    amount: toAmount(intent.amountCents),
    currency: intent.currency,
    description: intent.description,
    enqueuedAt: now.toISOString(),
  };
}

function checkDelay(delaySeconds: unknown): number | undefined {
  if (delaySeconds === undefined || delaySeconds === null) return undefined;
  if (
    typeof delaySeconds !== "number" ||
    !Number.isInteger(delaySeconds) ||
    delaySeconds < 0 ||
    delaySeconds > MAX_DELAY_SECONDS
  ) {
    throw new PaymentError(
      "ValidationFailed",
      `delay_seconds: delay_seconds must be an integer between 0 and ${MAX_DELAY_SECONDS}`
    );
  }
  return delaySeconds;
}

export function chunk<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

/**
 * Hands payment intents to the external queue. Returns once the broker has accepted
 * the message; delivery to consumers is the queue's concern. Nothing is retried here.
 */
export class QueueDispatcher {
  constructor(private readonly transport: QueueTransport) {}

  private buildMessage(input: unknown, traceId: string, delaySeconds?: number): OutgoingMessage {
    const intent = parsePaymentIntent(input);
    return {
      id: uuidv4(),
      body: JSON.stringify(toQueuedMessage(intent, traceId)),
      traceId,
      ...(delaySeconds ? { delaySeconds } : {}),
    };
  }

  async enqueue(input: unknown, options: EnqueueOptions): Promise<string> {
    const { traceId } = options;
    const delaySeconds = checkDelay(options.delaySeconds);
    const message = this.buildMessage(input, traceId, delaySeconds);
    try {
      const messageId = await this.transport.send(message);
      logger.info("Payment intent queued", { traceId, messageId, delaySeconds });
      return messageId;
    } catch (err) {
      logger.error("Failed to queue payment intent", { traceId, messageId: message.id, error: String(err) });
      throw queueUnavailable(err);
    }
  }

  /**
   * Validates every item, then sends the valid ones in transport-sized chunks.
   * Each item succeeds or fails on its own; a chunk that fails as a whole rejects
   * all of its items with QueueUnavailable.
   */
  async enqueueBatch(inputs: unknown[], options: EnqueueOptions): Promise<BatchOutcome> {
    const { traceId } = options;
    const outcome: BatchOutcome = { accepted: [], rejected: [], chunks: [] };
    const pending: { index: number; message: OutgoingMessage }[] = [];

    inputs.forEach((input, index) => {
      try {
        pending.push({ index, message: this.buildMessage(input, traceId) });
      } catch (err) {
        if (!isPaymentError(err)) throw err;
        outcome.rejected.push({ index, code: err.code, message: err.message });
      }
    });

    for (const group of chunk(pending, this.transport.maxBatchSize)) {
      outcome.chunks.push(group.length);
      const indexById = new Map(group.map((item) => [item.message.id, item.index]));
      try {
        const result = await this.transport.sendBatch(group.map((item) => item.message));
        for (const id of result.successful) {
          const index = indexById.get(id);
          if (index !== undefined) outcome.accepted.push({ index, messageId: id });
        }
        for (const failure of result.failed) {
          const index = indexById.get(failure.id);
          if (index !== undefined) {
            outcome.rejected.push({ index, code: "QueueUnavailable", message: failure.message });
          }
        }
      } catch (err) {
        const error = queueUnavailable(err);
        logger.error("Batch chunk failed", { traceId, size: group.length, error: error.message });
        for (const item of group) {
          outcome.rejected.push({ index: item.index, code: error.code, message: error.message });
        }
      }
    }

    outcome.accepted.sort((a, b) => a.index - b.index);
    outcome.rejected.sort((a, b) => a.index - b.index);
    logger.info("Payment intent batch queued", {
      traceId,
      total: inputs.length,
      accepted: outcome.accepted.length,
      rejected: outcome.rejected.length,
      chunks: outcome.chunks.length,
    });
    return outcome;
  }

  async metrics(): Promise<QueueCounts> {
    try {
      return await this.transport.counts();
    } catch (err) {
      logger.error("Failed to read queue metrics", { error: String(err) });
      throw queueUnavailable(err);
    }
  }
}
