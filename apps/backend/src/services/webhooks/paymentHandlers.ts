/**
 * Stripe payment event handlers.
 *
 * Each handler runs inside the dispatcher's immediate transaction and
 * re-derives state from the current rows, so redelivered or out-of-order
 * events converge on the same result. Orders that reach `paid` are collected
 * on the context and notified by the dispatcher after commit.
 */

import type { Logger } from "pino";
import type { OrderRow, PaymentRow } from "../../domain/commerce";
import type { Clock } from "../../domain/clock";
import { NotFoundError } from "../../domain/errors";
import type { OrderRepository } from "../../repositories/orderRepository";
import type { OrderLedger } from "../orderLedger";
import { chargeSchema, disputeSchema, idOf, paymentIntentSchema, type PaymentIntentObject } from "./eventSchemas";

export interface HandlerContext {
  eventId: string;
  paidOrders: OrderRow[];
}

export type EventHandler = (object: unknown, context: HandlerContext) => void;

export const HANDLED_EVENT_TYPES = [
  "payment_intent.succeeded",
  "payment_intent.payment_failed",
  "charge.refunded",
  "charge.dispute.created",
] as const;

export type HandledEventType = (typeof HANDLED_EVENT_TYPES)[number];

const OPEN_PAYMENT_STATUSES: ReadonlySet<PaymentRow["status"]> = new Set(["pending", "processing"]);
const SETTLED_PAYMENT_STATUSES: ReadonlySet<PaymentRow["status"]> = new Set(["succeeded", "refunded"]);

export class PaymentEventHandlers {
  private readonly logger: Logger;
  private readonly registry: ReadonlyMap<string, EventHandler>;

  constructor(
    private readonly orders: OrderRepository,
    private readonly ledger: OrderLedger,
    private readonly clock: Clock,
    logger: Logger
  ) {
    this.logger = logger.child({ module: "paymentEventHandlers" });
    const handlers: Record<HandledEventType, EventHandler> = {
      "payment_intent.succeeded": (object, context) => this.paymentSucceeded(object, context),
      "payment_intent.payment_failed": (object, context) => this.paymentFailed(object, context),
      "charge.refunded": (object, context) => this.chargeRefunded(object, context),
      "charge.dispute.created": (object, context) => this.disputeCreated(object, context),
    };
    this.registry = new Map(Object.entries(handlers));
  }

  lookup(eventType: string): EventHandler | undefined {
    return this.registry.get(eventType);
  }

  private paymentSucceeded(object: unknown, context: HandlerContext): void {
    const intent = paymentIntentSchema.parse(object);
    const order = this.findOrderForIntent(intent);
    const now = this.clock.now();
    const amount = intent.amount_received ?? intent.amount;
    const chargeId = idOf(intent.latest_charge);

    const payments = this.orders.listPaymentsByIntent(intent.id);
    if (!payments.some((p) => p.status === "succeeded")) {
      const open = payments.find((p) => OPEN_PAYMENT_STATUSES.has(p.status));
      if (open) {
        this.orders.updatePayment(open.id, { status: "succeeded", amount, stripeChargeId: chargeId }, now);
      } else {
        this.orders.insertPayment(
          {
            orderId: order.id,
            method: "stripe",
            status: "succeeded",
            amount,
            stripePaymentIntentId: intent.id,
            stripeChargeId: chargeId,
          },
          now
        );
      }
    }

    if (order.status === "paid") {
      this.logger.info({ eventId: context.eventId, orderId: order.id }, "Order already paid; payment reconciled");
      return;
    }
    // Anything but pending throws IllegalTransitionError and is captured by the dispatcher.
    context.paidOrders.push(this.ledger.transition(order, "paid"));
  }

  private paymentFailed(object: unknown, context: HandlerContext): void {
    const intent = paymentIntentSchema.parse(object);
    const now = this.clock.now();
    let updated = 0;
    for (const payment of this.orders.listPaymentsByIntent(intent.id)) {
      if (!OPEN_PAYMENT_STATUSES.has(payment.status)) continue;
      this.orders.updatePayment(payment.id, { status: "failed" }, now);
      updated++;
    }
    this.logger.warn(
      {
        eventId: context.eventId,
        paymentIntentId: intent.id,
        updated,
        failure: intent.last_payment_error?.message ?? null,
      },
      "Stripe payment failed"
    );
  }

  private chargeRefunded(object: unknown, context: HandlerContext): void {
    const charge = chargeSchema.parse(object);
    const intentId = idOf(charge.payment_intent);
    if (!intentId) {
      throw new NotFoundError(`Charge ${charge.id} has no payment_intent.`);
    }
    const payment = this.refundablePayment(this.orders.listPaymentsByIntent(intentId), charge.id);
    if (!payment) {
      throw new NotFoundError(`No settled payment recorded for PaymentIntent ${intentId}.`);
    }
    const order = this.orders.get(payment.order_id);
    if (!order) {
      throw new NotFoundError(`Order ${payment.order_id} not found.`);
    }

    const fullRefund = charge.amount_refunded >= charge.amount;
    const target = fullRefund ? "refunded" : "partially_refunded";
    if (fullRefund && payment.status !== "refunded") {
      this.orders.updatePayment(payment.id, { status: "refunded", stripeChargeId: charge.id }, this.clock.now());
    }
    if (order.status === target) {
      this.logger.info({ eventId: context.eventId, orderId: order.id, status: target }, "Refund already reflected");
      return;
    }
    this.ledger.transition(order, target);
    this.logger.info(
      { eventId: context.eventId, orderId: order.id, amountRefunded: charge.amount_refunded, status: target },
      "Charge refunded"
    );
  }

  private disputeCreated(object: unknown, context: HandlerContext): void {
    const dispute = disputeSchema.parse(object);
    this.logger.warn(
      {
        eventId: context.eventId,
        disputeId: dispute.id,
        chargeId: idOf(dispute.charge),
        amount: dispute.amount,
        reason: dispute.reason,
      },
      "Charge dispute created"
    );
  }

  /** The settled row a refund applies to; failed and open attempts on the same intent are never picked. */
  private refundablePayment(payments: PaymentRow[], chargeId: string): PaymentRow | undefined {
    const settled = payments.filter((p) => SETTLED_PAYMENT_STATUSES.has(p.status));
    return (
      settled.find((p) => p.status === "succeeded" && p.stripe_charge_id === chargeId) ??
      settled.find((p) => p.status === "succeeded") ??
      settled.find((p) => p.stripe_charge_id === chargeId) ??
      settled[0]
    );
  }

  private findOrderForIntent(intent: PaymentIntentObject): OrderRow {
    const rawOrderId = intent.metadata.order_id;
    if (rawOrderId !== undefined && /^\d+$/.test(rawOrderId)) {
      const order = this.orders.get(Number(rawOrderId));
      if (order) return order;
    }
    const existing = this.orders.listPaymentsByIntent(intent.id)[0];
    if (existing) {
      const order = this.orders.get(existing.order_id);
      if (order) return order;
    }
    throw new NotFoundError(`No order found for PaymentIntent ${intent.id}.`);
  }
}
