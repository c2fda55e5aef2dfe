import { shutdownTracing } from "./tracing";
import { config } from "./config";
import { logger } from "./logger";
import { createPool, PgPaymentStore } from "./db/client";
import { connectKafka, disconnectKafka, publishPaymentEvent } from "./kafka";
import { connectRabbit, closeRabbit } from "./queue/rabbit";
import { consumePaymentIntents, createPaymentIntentHandler } from "./queue/worker";
import { PaymentSubmissionService } from "./payment-service";

const pool = createPool();

async function main(): Promise<void> {
  const channel = await connectRabbit();
  await connectKafka();

  const payments = new PaymentSubmissionService(new PgPaymentStore(pool), publishPaymentEvent);
  await consumePaymentIntents(channel, config.PAYMENT_QUEUE, createPaymentIntentHandler(payments));

  logger.info("Payment worker started", { queue: config.PAYMENT_QUEUE });
}

async function shutdown(): Promise<void> {
  await disconnectKafka();
  await closeRabbit();
  await pool.end();
  await shutdownTracing();
}

main().catch((err) => {
  logger.error("Payment worker startup failed", { error: String(err) });
  process.exit(1);
});

process.on("SIGTERM", () => {
  shutdown()
    .catch((err) => logger.error("Shutdown failed", { error: String(err) }))
    .finally(() => process.exit(0));
});
