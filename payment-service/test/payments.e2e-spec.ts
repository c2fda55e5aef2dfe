import request from "supertest";
import type { Express } from "express";
import { createApp } from "../src/app";
import { PaymentSubmissionService } from "../src/payment-service";
import { QueueDispatcher } from "../src/queue/dispatcher";
import { FakeQueueTransport, InMemoryPaymentStore, intentBody } from "./fakes";

describe("Payments API (e2e)", () => {
  let app: Express;
  let store: InMemoryPaymentStore;
  let transport: FakeQueueTransport;

  beforeEach(() => {
    store = new InMemoryPaymentStore();
    transport = new FakeQueueTransport();
    app = createApp({
      payments: new PaymentSubmissionService(store),
      dispatcher: new QueueDispatcher(transport),
    });
  });

  it("GET /health", async () => {
    const res = await request(app).get("/health").expect(200);
    expect(res.body).toEqual({ status: "ok" });
    expect(res.headers["x-trace-id"]).toEqual(expect.any(String));
  });

  it("echoes the caller's trace id", async () => {
    const res = await request(app).get("/health").set("X-Trace-Id", "trace-abc").expect(200);
    expect(res.headers["x-trace-id"]).toBe("trace-abc");
  });

  describe("POST /payments/", () => {
    it("stores the payment and reports its id", async () => {
      const res = await request(app)
        .post("/payments/")
        .send({ user_id: 32, amount: 100.0, currency: "INR" })
        .expect(201);

      expect(res.body).toEqual({ success: true, payment_id: 1, message: "Payment recorded" });
    });

    it("then GET /payments/:id returns the full record", async () => {
      const created = await request(app).post("/payments/").send({ user_id: 32, amount: 100.0, currency: "INR" });

      const res = await request(app).get(`/payments/${created.body.payment_id}`).expect(200);

      expect(res.body).toEqual({
        id: 1,
        user_id: 32,
        amount: 100,
        currency: "INR",
        status: "PAID",
        description: null,
        created_at: "2026-01-01T00:00:00.000Z",
      });
    });

    it("rejects a zero amount with ValidationFailed", async () => {
      const res = await request(app)
        .post("/payments/")
        .set("X-Trace-Id", "trace-v")
        .send(intentBody({ amount: 0 }))
        .expect(400);

      expect(res.body).toEqual({
        success: false,
        payment_id: null,
        code: "ValidationFailed",
        message: "amount: amount must be greater than 0",
        details: { fields: { amount: ["amount must be greater than 0"] } },
        traceId: "trace-v",
      });
      expect(store.rows).toHaveLength(0);
    });

    it("answers 503 when the store is down", async () => {
      store.unavailable = new Error("connection refused");

      const res = await request(app).post("/payments/").send(intentBody()).expect(503);

      expect(res.body).toMatchObject({ success: false, payment_id: null, code: "StoreUnavailable" });
    });

    it("rejects malformed JSON", async () => {
      const res = await request(app)
        .post("/payments/")
        .set("Content-Type", "application/json")
        .send("{bad")
        .expect(400);

      expect(res.body).toMatchObject({ success: false, code: "ValidationFailed", message: "Malformed JSON body" });
    });
  });

  describe("GET /payments/:id", () => {
    it("returns 404 for an id never issued", async () => {
      const res = await request(app).get("/payments/77").set("X-Trace-Id", "trace-n").expect(404);

      expect(res.body).toEqual({
        success: false,
        code: "NotFound",
        message: "Payment 77 not found",
        traceId: "trace-n",
      });
    });

    it("returns 404 for an id beyond the INTEGER range", async () => {
      const res = await request(app).get("/payments/3000000000").expect(404);

      expect(res.body).toMatchObject({ success: false, code: "NotFound", message: "Payment 3000000000 not found" });
    });
  });

  describe("GET /payments/history/:userId", () => {
    it("lists the user's payments newest first", async () => {
      await request(app).post("/payments/").send(intentBody({ user_id: 4, amount: 10 }));
      await request(app).post("/payments/").send(intentBody({ user_id: 5, amount: 20 }));
      await request(app).post("/payments/").send(intentBody({ user_id: 4, amount: 30 }));

      const res = await request(app).get("/payments/history/4").expect(200);

      expect(res.body.map((p: { id: number; amount: number }) => [p.id, p.amount])).toEqual([
        [3, 30],
        [1, 10],
      ]);
    });
  });

  describe("GET /latest-payments/", () => {
    it("honours the limit", async () => {
      for (const amount of [1, 2, 3]) {
        await request(app).post("/payments/").send(intentBody({ amount }));
      }

      const res = await request(app).get("/latest-payments/").query({ limit: 2 }).expect(200);

      expect(res.body.map((p: { id: number }) => p.id)).toEqual([3, 2]);
    });
  });

  describe("POST /payments/enqueue", () => {
    it("queues the intent", async () => {
      const res = await request(app).post("/payments/enqueue").send(intentBody()).expect(202);

      expect(res.body).toEqual({ status: "queued", message_id: transport.sent[0].id });
      expect(store.rows).toHaveLength(0);
    });

    it("takes an optional delay", async () => {
      await request(app)
        .post("/payments/enqueue")
        .send({ ...intentBody(), delay_seconds: 60 })
        .expect(202);

      expect(transport.sent[0].delaySeconds).toBe(60);
    });

    it("rejects a delay that is not a whole number of seconds", async () => {
      const res = await request(app)
        .post("/payments/enqueue")
        .send({ ...intentBody(), delay_seconds: "soon" })
        .expect(400);

      expect(res.body).toMatchObject({
        code: "ValidationFailed",
        message: "delay_seconds: delay_seconds must be an integer between 0 and 900",
      });
      expect(transport.sent).toHaveLength(0);
    });

    it("answers 503 when the queue is down", async () => {
      transport.unavailable = new Error("channel closed");

      const res = await request(app).post("/payments/enqueue").send(intentBody()).expect(503);

      expect(res.body).toMatchObject({
        success: false,
        code: "QueueUnavailable",
        message: "Payment queue unavailable: channel closed",
      });
    });
  });

  describe("POST /payments/enqueue/batch", () => {
    it("reports per-item outcomes across chunks", async () => {
      const payments = Array.from({ length: 25 }, (_, i) => intentBody({ user_id: i + 1 }));
      payments[7] = intentBody({ amount: -3 });

      const res = await request(app).post("/payments/enqueue/batch").send({ payments }).expect(202);

      expect(res.body.chunks).toEqual([10, 10, 4]);
      expect(res.body.accepted).toHaveLength(24);
      expect(res.body.accepted[0]).toEqual({ index: 0, message_id: transport.batches[0][0].id });
      expect(res.body.rejected).toEqual([
        { index: 7, code: "ValidationFailed", message: "amount: amount must be greater than 0" },
      ]);
    });

    it("requires a payments array", async () => {
      const res = await request(app).post("/payments/enqueue/batch").send({ payments: "nope" }).expect(400);

      expect(res.body).toMatchObject({ code: "ValidationFailed", message: "payments: payments must be an array" });
    });
  });

  describe("GET /queue/metrics", () => {
    it("returns the queue counts", async () => {
      transport.queueCounts = { visible: 5, inFlight: null, delayed: 1 };

      const res = await request(app).get("/queue/metrics").expect(200);

      expect(res.body).toEqual({ visible: 5, in_flight: null, delayed: 1 });
    });
  });

  it("serves the OpenAPI document", async () => {
    const res = await request(app).get("/api-docs.json").expect(200);
    expect(res.body.info.title).toBe("Payment Intake API");
  });
});
