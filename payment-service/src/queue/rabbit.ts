import amqp from "amqplib";
import { z } from "zod";
import { config } from "../config";
import { logger } from "../logger";
import type { BatchSendResult, OutgoingMessage, QueueCounts, QueueTransport } from "./transport";

/** Messages per batch send. */
export const RABBIT_MAX_BATCH_SIZE = 10;

interface AmqpConnection {
  createConfirmChannel(): Promise<amqp.ConfirmChannel>;
  close(): Promise<void>;
}

export type PublishChannel = Pick<amqp.ConfirmChannel, "sendToQueue" | "checkQueue">;

export interface RabbitQueueOptions {
  queue: string;
  delayQueue: string;
  managementUrl?: string;
  vhost: string;
  fetchFn?: typeof fetch;
}

let connection: AmqpConnection | null = null;
let channel: amqp.ConfirmChannel | null = null;

export function delayQueueName(queue: string): string {
  return `${queue}.delay`;
}

export function vhostFromUrl(amqpUrl: string): string {
  const path = new URL(amqpUrl).pathname;
  return path === "" || path === "/" ? "/" : decodeURIComponent(path.slice(1));
}

/** Declares the intents queue and the delay queue that dead-letters into it. */
export async function assertPaymentQueues(ch: Pick<amqp.Channel, "assertQueue">, queue: string): Promise<void> {
  await ch.assertQueue(queue, { durable: true });
  await ch.assertQueue(delayQueueName(queue), {
    durable: true,
    deadLetterExchange: "",
    deadLetterRoutingKey: queue,
  });
}

export async function connectRabbit(): Promise<amqp.ConfirmChannel> {
  connection = (await amqp.connect(config.RABBITMQ_URL)) as unknown as AmqpConnection;
  const ch = await connection.createConfirmChannel();
  await assertPaymentQueues(ch, config.PAYMENT_QUEUE);
  channel = ch;
  logger.info("RabbitMQ connected", { queue: config.PAYMENT_QUEUE });
  return ch;
}

export async function closeRabbit(): Promise<void> {
  try {
    if (channel) await channel.close();
  } catch (err) {
    logger.warn("RabbitMQ channel close failed", { error: String(err) });
  }
  try {
    if (connection) await connection.close();
  } catch (err) {
    logger.warn("RabbitMQ connection close failed", { error: String(err) });
  }
  channel = null;
  connection = null;
}

const managementQueueSchema = z.object({
  messages_unacknowledged: z.number().int().nonnegative().default(0),
});

export class RabbitQueueTransport implements QueueTransport {
  readonly maxBatchSize = RABBIT_MAX_BATCH_SIZE;

  constructor(
    private readonly ch: PublishChannel,
    private readonly options: RabbitQueueOptions
  ) {}

  private publish(message: OutgoingMessage): Promise<string> {
    const delayed = message.delaySeconds !== undefined && message.delaySeconds > 0;
    const target = delayed ? this.options.delayQueue : this.options.queue;
    return new Promise<string>((resolve, reject) => {
      this.ch.sendToQueue(
        target,
        Buffer.from(message.body),
        {
          persistent: true,
          messageId: message.id,
          contentType: "application/json",
          timestamp: Math.floor(Date.now() / 1000),
          headers: { traceId: message.traceId },
          ...(delayed ? { expiration: String((message.delaySeconds ?? 0) * 1000) } : {}),
        },
        (err: unknown) => {
          if (err) reject(err instanceof Error ? err : new Error(`Broker nacked message ${message.id}`));
          else resolve(message.id);
        }
      );
    });
  }

  send(message: OutgoingMessage): Promise<string> {
    return this.publish(message);
  }

  async sendBatch(messages: OutgoingMessage[]): Promise<BatchSendResult> {
    if (messages.length > this.maxBatchSize) {
      throw new Error(`Batch of ${messages.length} exceeds ${this.maxBatchSize} messages`);
    }
    const settled = await Promise.allSettled(messages.map((message) => this.publish(message)));
    const result: BatchSendResult = { successful: [], failed: [] };
    settled.forEach((outcome, i) => {
      const id = messages[i].id;
      if (outcome.status === "fulfilled") result.successful.push(id);
      else {
        const reason: unknown = outcome.reason;
        result.failed.push({ id, message: reason instanceof Error ? reason.message : String(reason) });
      }
    });
    return result;
  }

  async counts(): Promise<QueueCounts> {
    const main = await this.ch.checkQueue(this.options.queue);
    const delay = await this.ch.checkQueue(this.options.delayQueue);
    return {
      visible: main.messageCount,
      inFlight: await this.unacknowledged(),
      delayed: delay.messageCount,
    };
  }

  /** Unacked count from the management HTTP API; AMQP itself does not report it. */
  private async unacknowledged(): Promise<number | null> {
    if (!this.options.managementUrl) return null;
    const base = new URL(this.options.managementUrl);
    const headers: Record<string, string> = { Accept: "application/json" };
    if (base.username) {
      const credentials = `${decodeURIComponent(base.username)}:${decodeURIComponent(base.password)}`;
      headers.Authorization = `Basic ${Buffer.from(credentials).toString("base64")}`;
      base.username = "";
      base.password = "";
    }
    const url = `${base.toString().replace(/\/$/, "")}/api/queues/${encodeURIComponent(
      this.options.vhost
    )}/${encodeURIComponent(this.options.queue)}`;
    const fetchFn = this.options.fetchFn ?? fetch;
    const res = await fetchFn(url, { headers });
    if (!res.ok) {
      throw new Error(`RabbitMQ management API responded ${res.status}`);
    }
    return managementQueueSchema.parse(await res.json()).messages_unacknowledged;
  }
}

export function createRabbitTransport(ch: PublishChannel): RabbitQueueTransport {
  return new RabbitQueueTransport(ch, {
    queue: config.PAYMENT_QUEUE,
    delayQueue: delayQueueName(config.PAYMENT_QUEUE),
    managementUrl: config.RABBITMQ_MANAGEMENT_URL,
    vhost: vhostFromUrl(config.RABBITMQ_URL),
  });
}
