/// <reference types="vitest" />
/**
 * Webhook dispatcher: signature checks, exactly-once processing, handler
 * semantics, exception capture and replay. Signatures are real Stripe HMACs
 * over the test secret; no request leaves the process.
 */

import { beforeEach, describe, expect, it } from "vitest";
import type { OrderWithLines } from "../../domain/commerce";
import { NotFoundError } from "../../domain/errors";
import {
  checkoutTickets,
  createTestContext,
  must,
  seedConference,
  seedTicketType,
  signPayload,
  stripeEventPayload,
  type TestContext,
} from "../../test/fixtures";

describe("WebhookDispatcher", () => {
  let t: TestContext;
  let conferenceId: number;
  let ttId: number;

  beforeEach(() => {
    t = createTestContext();
    conferenceId = seedConference(t.db, { slug: "devconf" });
    ttId = seedTicketType(t.db, conferenceId, { priceCents: 10000 });
  });

  const deliver = (eventId: string, type: string, object: Record<string, unknown>, secret?: string) => {
    const payload = stripeEventPayload(eventId, type, object);
    return t.ctx.webhookDispatcher.handleDelivery("devconf", payload, signPayload(payload, secret));
  };

  const intentSucceeded = (order: OrderWithLines, intentId = "pi_test_1") => ({
    id: intentId,
    object: "payment_intent",
    amount: order.total,
    amount_received: order.total,
    metadata: { order_id: String(order.id), reference: order.reference },
    latest_charge: "ch_test_1",
  });

  const placeAndStartPayment = async () => {
    const order = checkoutTickets(t.ctx, "user-a", conferenceId, ttId, 1);
    await t.ctx.paymentService.initiatePayment(order.id);
    return order;
  };

  const eventCount = () => t.db.prepare<[], { n: number }>("SELECT COUNT(*) AS n FROM stripe_events").get()?.n ?? 0;

  describe("payment_intent.succeeded", () => {
    it("settles the pending payment and pays the order", async () => {
      const order = await placeAndStartPayment();

      const result = await deliver("evt_1", "payment_intent.succeeded", intentSucceeded(order));

      expect(result).toEqual({ outcome: "processed", eventId: "evt_1", eventType: "payment_intent.succeeded" });
      expect(t.ctx.orders.listPayments(order.id)).toMatchObject([
        {
          method: "stripe",
          status: "succeeded",
          amount: 10000,
          stripe_payment_intent_id: "pi_test_1",
          stripe_charge_id: "ch_test_1",
        },
      ]);
      expect(must(t.ctx.orders.get(order.id))).toMatchObject({ status: "paid", hold_expires_at: null });
      expect(must(t.ctx.stripeEvents.findByStripeId("evt_1")).processed).toBe(1);
      expect(t.notifier.notified).toEqual([order.reference]);
    });

    it("processes a redelivered event exactly once", async () => {
      const order = await placeAndStartPayment();
      const payload = stripeEventPayload("evt_1", "payment_intent.succeeded", intentSucceeded(order));

      const first = await t.ctx.webhookDispatcher.handleDelivery("devconf", payload, signPayload(payload));
      const second = await t.ctx.webhookDispatcher.handleDelivery("devconf", payload, signPayload(payload));

      expect(first.outcome).toBe("processed");
      expect(second.outcome).toBe("duplicate");
      expect(t.ctx.orders.listPayments(order.id).filter((p) => p.status === "succeeded")).toHaveLength(1);
      expect(eventCount()).toBe(1);
      expect(t.notifier.notified).toEqual([order.reference]);
    });

    it("converges when a second event reports the same intent", async () => {
      const order = await placeAndStartPayment();
      await deliver("evt_1", "payment_intent.succeeded", intentSucceeded(order));

      const result = await deliver("evt_2", "payment_intent.succeeded", intentSucceeded(order));

      expect(result.outcome).toBe("processed");
      expect(t.ctx.orders.listPayments(order.id)).toHaveLength(1);
      expect(t.notifier.notified).toEqual([order.reference]);
    });

    it("inserts the payment when no pending one was recorded", async () => {
      const order = checkoutTickets(t.ctx, "user-a", conferenceId, ttId, 1);

      await deliver("evt_1", "payment_intent.succeeded", intentSucceeded(order, "pi_external"));

      expect(t.ctx.orders.listPayments(order.id)).toMatchObject([
        { method: "stripe", status: "succeeded", stripe_payment_intent_id: "pi_external" },
      ]);
      expect(must(t.ctx.orders.get(order.id)).status).toBe("paid");
    });

    it("captures an illegal transition and rolls the payment back", async () => {
      const order = await placeAndStartPayment();
      t.ctx.orderLedger.cancelOrder(order.id);

      const result = await deliver("evt_1", "payment_intent.succeeded", intentSucceeded(order));

      expect(result.outcome).toBe("failed");
      const event = must(t.ctx.stripeEvents.findByStripeId("evt_1"));
      expect(event.processed).toBe(0);
      expect(t.ctx.stripeEvents.listExceptionsForEvent(event.id).map((x) => x.message)).toEqual([
        "Cannot transition order from 'cancelled' to 'paid'",
      ]);
      expect(t.ctx.orders.listPayments(order.id).map((p) => p.status)).toEqual(["pending"]);
      expect(must(t.ctx.orders.get(order.id)).status).toBe("cancelled");
    });
  });

  describe("other payment events", () => {
    it("marks the open payment failed and leaves the order pending", async () => {
      const order = await placeAndStartPayment();

      await deliver("evt_f", "payment_intent.payment_failed", {
        id: "pi_test_1",
        amount: order.total,
        metadata: {},
        last_payment_error: { message: "Your card was declined." },
      });

      expect(t.ctx.orders.listPayments(order.id).map((p) => p.status)).toEqual(["failed"]);
      expect(must(t.ctx.orders.get(order.id)).status).toBe("pending");
    });

    it("moves a fully refunded charge to refunded", async () => {
      const order = await placeAndStartPayment();
      await deliver("evt_1", "payment_intent.succeeded", intentSucceeded(order));

      await deliver("evt_r", "charge.refunded", {
        id: "ch_test_1",
        amount: 10000,
        amount_refunded: 10000,
        payment_intent: "pi_test_1",
      });

      expect(must(t.ctx.orders.get(order.id)).status).toBe("refunded");
      expect(t.ctx.orders.listPayments(order.id).map((p) => p.status)).toEqual(["refunded"]);
    });

    it("refunds the settled retry, not the failed first attempt on the same intent", async () => {
      const order = await placeAndStartPayment();
      await deliver("evt_f", "payment_intent.payment_failed", { id: "pi_test_1", amount: order.total, metadata: {} });
      await deliver("evt_1", "payment_intent.succeeded", intentSucceeded(order));
      expect(t.ctx.orders.listPayments(order.id).map((p) => p.status)).toEqual(["failed", "succeeded"]);

      await deliver("evt_r", "charge.refunded", {
        id: "ch_test_1",
        amount: 10000,
        amount_refunded: 10000,
        payment_intent: "pi_test_1",
      });

      expect(t.ctx.orders.listPayments(order.id).map((p) => p.status)).toEqual(["failed", "refunded"]);
      expect(must(t.ctx.orders.get(order.id)).status).toBe("refunded");
    });

    it("moves a partial refund to partially_refunded and treats a repeat as a no-op", async () => {
      const order = await placeAndStartPayment();
      await deliver("evt_1", "payment_intent.succeeded", intentSucceeded(order));
      const charge = { id: "ch_test_1", amount: 10000, amount_refunded: 3000, payment_intent: "pi_test_1" };

      const first = await deliver("evt_r1", "charge.refunded", charge);
      const again = await deliver("evt_r2", "charge.refunded", charge);

      expect([first.outcome, again.outcome]).toEqual(["processed", "processed"]);
      expect(must(t.ctx.orders.get(order.id)).status).toBe("partially_refunded");
      expect(t.ctx.orders.listPayments(order.id).map((p) => p.status)).toEqual(["succeeded"]);
    });

    it("logs disputes without touching the ledger", async () => {
      const order = await placeAndStartPayment();
      await deliver("evt_1", "payment_intent.succeeded", intentSucceeded(order));

      const result = await deliver("evt_d", "charge.dispute.created", {
        id: "dp_test_1",
        amount: 10000,
        reason: "fraudulent",
        charge: "ch_test_1",
      });

      expect(result.outcome).toBe("processed");
      expect(must(t.ctx.orders.get(order.id)).status).toBe("paid");
    });

    it("stores but ignores event types without a handler", async () => {
      const result = await deliver("evt_c", "customer.created", { id: "cus_test_1" });

      expect(result.outcome).toBe("ignored");
      expect(must(t.ctx.stripeEvents.findByStripeId("evt_c")).processed).toBe(0);
    });

    it("captures payloads that do not match the expected shape", async () => {
      const result = await deliver("evt_bad", "charge.refunded", { id: "ch_test_1" });

      expect(result.outcome).toBe("failed");
      const event = must(t.ctx.stripeEvents.findByStripeId("evt_bad"));
      expect(t.ctx.stripeEvents.listExceptionsForEvent(event.id)).toHaveLength(1);
    });
  });

  describe("delivery checks", () => {
    it("rejects a signature made with another secret and stores nothing", async () => {
      const result = await deliver("evt_1", "customer.created", { id: "cus_1" }, "whsec_other_secret");

      expect(result).toEqual({ outcome: "invalid_signature" });
      expect(eventCount()).toBe(0);
    });

    it("rejects a missing signature header", async () => {
      const payload = stripeEventPayload("evt_1", "customer.created", { id: "cus_1" });

      const result = await t.ctx.webhookDispatcher.handleDelivery("devconf", payload, undefined);

      expect(result.outcome).toBe("invalid_signature");
    });

    it("reports unknown and unconfigured conferences", async () => {
      seedConference(t.db, { slug: "nostripe", stripe: false });
      const payload = stripeEventPayload("evt_1", "customer.created", { id: "cus_1" });

      const unknown = await t.ctx.webhookDispatcher.handleDelivery("missing", payload, signPayload(payload));
      const unconfigured = await t.ctx.webhookDispatcher.handleDelivery("nostripe", payload, signPayload(payload));

      expect(unknown.outcome).toBe("unknown_conference");
      expect(unconfigured.outcome).toBe("not_configured");
    });
  });

  describe("replayEvent", () => {
    it("re-runs a failed event once its cause is fixed", async () => {
      // Payment arrives for order 1 before the order exists.
      const early = await deliver("evt_early", "payment_intent.succeeded", {
        id: "pi_early",
        amount: 10000,
        metadata: { order_id: "1" },
      });
      expect(early.outcome).toBe("failed");

      const order = checkoutTickets(t.ctx, "user-a", conferenceId, ttId, 1);
      expect(order.id).toBe(1);

      const replayed = await t.ctx.webhookDispatcher.replayEvent("evt_early");

      expect(replayed.outcome).toBe("processed");
      expect(must(t.ctx.orders.get(order.id)).status).toBe("paid");
      expect(t.ctx.webhookDispatcher.listExceptions().map((x) => x.stripe_id)).toEqual(["evt_early"]);
    });

    it("reports an already processed event as a duplicate", async () => {
      const order = await placeAndStartPayment();
      await deliver("evt_1", "payment_intent.succeeded", intentSucceeded(order));

      expect((await t.ctx.webhookDispatcher.replayEvent("evt_1")).outcome).toBe("duplicate");
    });

    it("throws NotFoundError for an unknown event", async () => {
      await expect(t.ctx.webhookDispatcher.replayEvent("evt_missing")).rejects.toThrow(NotFoundError);
    });
  });
});
