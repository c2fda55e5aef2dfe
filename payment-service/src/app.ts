import express, { type NextFunction, type Request, type Response } from "express";
import cors from "cors";
import { v4 as uuidv4 } from "uuid";
import { trace } from "@opentelemetry/api";
import swaggerUi from "swagger-ui-express";
import { logger } from "./logger";
import { PaymentError, isPaymentError } from "./errors";
import { isRecord, toAmount } from "./validation";
import { openApiDocument } from "./swagger";
import type { PaymentSubmissionService } from "./payment-service";
import type { QueueDispatcher } from "./queue/dispatcher";
import type { PaymentRecord } from "./types";

export interface AppDependencies {
  payments: PaymentSubmissionService;
  dispatcher: QueueDispatcher;
}

function getTraceId(res: Response): string {
  const traceId: unknown = res.locals.traceId;
  return typeof traceId === "string" ? traceId : "unknown";
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

// Express 4 does not forward rejected promises to the error middleware on its own.
function asyncRoute(handler: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next);
  };
}

export function recordToResponse(record: PaymentRecord): object {
  return {
    id: record.id,
    user_id: record.userId,
    amount: toAmount(record.amountCents),
    currency: record.currency,
    status: record.status,
    description: record.description,
    created_at: record.createdAt.toISOString(),
  };
}

function errorBody(err: PaymentError, traceId: string): object {
  return {
    code: err.code,
    message: err.message,
    ...(err.details ? { details: err.details } : {}),
    traceId,
  };
}

function isBodyParseError(err: unknown): boolean {
  return err instanceof SyntaxError && "body" in err;
}

export function createApp({ payments, dispatcher }: AppDependencies): express.Express {
  const app = express();

  app.use(cors());

  app.use((req, res, next) => {
    const traceId = req.header("x-trace-id") || uuidv4();
    res.locals.traceId = traceId;
    res.setHeader("X-Trace-Id", traceId);
    const span = trace.getActiveSpan();
    if (span) span.setAttribute("traceId", traceId);
    next();
  });

  app.use(express.json());

  app.use("/api-docs", swaggerUi.serve, swaggerUi.setup(openApiDocument));
  app.get("/api-docs.json", (_req, res) => res.json(openApiDocument));

  app.get("/", (_req, res) => res.json({ status: "ok" }));
  app.get("/health", (_req, res) => res.json({ status: "ok" }));

  app.post(
    "/payments/",
    asyncRoute(async (req, res) => {
      const traceId = getTraceId(res);
      logger.info("Submit payment request", { traceId });
      try {
        const record = await payments.submit(req.body, { traceId });
        res.status(201).json({
          success: true,
          payment_id: record.id,
          message: "Payment recorded",
        });
      } catch (err) {
        if (!isPaymentError(err)) throw err;
        res.status(err.status).json({ success: false, payment_id: null, ...errorBody(err, traceId) });
      }
    })
  );

  app.post(
    "/payments/enqueue",
    asyncRoute(async (req, res) => {
      const traceId = getTraceId(res);
      const body: unknown = req.body;
      const delaySeconds = isRecord(body) ? body.delay_seconds : undefined;
      const messageId = await dispatcher.enqueue(body, { traceId, delaySeconds });
      res.status(202).json({ status: "queued", message_id: messageId });
    })
  );

  app.post(
    "/payments/enqueue/batch",
    asyncRoute(async (req, res) => {
      const traceId = getTraceId(res);
      const body: unknown = req.body;
      const items = isRecord(body) ? body.payments : undefined;
      if (!Array.isArray(items)) {
        throw new PaymentError("ValidationFailed", "payments: payments must be an array");
      }
      const outcome = await dispatcher.enqueueBatch(items, { traceId });
      res.status(202).json({
        accepted: outcome.accepted.map((item) => ({ index: item.index, message_id: item.messageId })),
        rejected: outcome.rejected,
        chunks: outcome.chunks,
      });
    })
  );

  app.get(
    "/payments/history/:userId",
    asyncRoute(async (req, res) => {
      const records = await payments.history(req.params.userId, { traceId: getTraceId(res) });
      res.json(records.map(recordToResponse));
    })
  );

  app.get(
    "/payments/:id",
    asyncRoute(async (req, res) => {
      const record = await payments.fetch(req.params.id, { traceId: getTraceId(res) });
      res.json(recordToResponse(record));
    })
  );

  app.get(
    "/latest-payments/",
    asyncRoute(async (req, res) => {
      const records = await payments.latest(req.query.limit, { traceId: getTraceId(res) });
      res.json(records.map(recordToResponse));
    })
  );

  app.get(
    "/queue/metrics",
    asyncRoute(async (_req, res) => {
      const counts = await dispatcher.metrics();
      res.json({ visible: counts.visible, in_flight: counts.inFlight, delayed: counts.delayed });
    })
  );

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const traceId = getTraceId(res);
    if (isPaymentError(err)) {
      res.status(err.status).json({ success: false, ...errorBody(err, traceId) });
      return;
    }
    if (isBodyParseError(err)) {
      res.status(400).json({ success: false, code: "ValidationFailed", message: "Malformed JSON body", traceId });
      return;
    }
    logger.error("Unhandled request error", { traceId, error: String(err) });
    res.status(500).json({ success: false, message: "Internal server error", traceId });
  });

  return app;
}
