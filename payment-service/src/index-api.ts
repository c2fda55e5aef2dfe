import { shutdownTracing } from "./tracing";
import { config } from "./config";
import { logger } from "./logger";
import { createApp } from "./app";
import { createPool, PgPaymentStore } from "./db/client";
import { runMigration } from "./db/migrate";
import { connectKafka, disconnectKafka, publishPaymentEvent } from "./kafka";
import { connectRabbit, closeRabbit, createRabbitTransport } from "./queue/rabbit";
import { QueueDispatcher } from "./queue/dispatcher";
import { PaymentSubmissionService } from "./payment-service";

const pool = createPool();

async function main(): Promise<void> {
  await runMigration(pool);
  const channel = await connectRabbit();
  await connectKafka();

  const payments = new PaymentSubmissionService(new PgPaymentStore(pool), publishPaymentEvent);
  const dispatcher = new QueueDispatcher(createRabbitTransport(channel));
  const app = createApp({ payments, dispatcher });

  app.listen(config.PORT, () => {
    logger.info("Payment API listening", { port: config.PORT });
  });
}

async function shutdown(): Promise<void> {
  await disconnectKafka();
  await closeRabbit();
  await pool.end();
  await shutdownTracing();
}

main().catch((err) => {
  logger.error("Payment API startup failed", { error: String(err) });
  process.exit(1);
});

process.on("SIGTERM", () => {
  shutdown()
    .catch((err) => logger.error("Shutdown failed", { error: String(err) }))
    .finally(() => process.exit(0));
});
