/**
 * Payment Service
 *
 * Starts a Stripe payment for a pending order: creates a PaymentIntent through
 * the conference's gateway and records a pending stripe Payment carrying the
 * intent id. The webhook dispatcher settles it later.
 */

import type { Database } from "better-sqlite3";
import type { Logger } from "pino";
import type { Clock } from "../domain/clock";
import { NotFoundError, ValidationError } from "../domain/errors";
import type { CatalogRepository } from "../repositories/catalogRepository";
import type { OrderRepository } from "../repositories/orderRepository";
import type { PaymentGateway } from "./stripeGateway";

export interface InitiatedPayment {
  paymentId: number;
  paymentIntentId: string;
  clientSecret: string;
}

export class PaymentService {
  private readonly logger: Logger;

  constructor(
    private readonly db: Database,
    private readonly orders: OrderRepository,
    private readonly catalog: CatalogRepository,
    private readonly gateway: PaymentGateway,
    private readonly clock: Clock,
    logger: Logger,
    private readonly options: { currency: string }
  ) {
    this.logger = logger.child({ module: "paymentService" });
  }

  async initiatePayment(orderId: number): Promise<InitiatedPayment> {
    const order = this.orders.get(orderId);
    if (!order) throw new NotFoundError(`Order ${orderId} not found.`);
    if (order.status !== "pending") {
      throw new ValidationError(`Payment can only be initiated for pending orders (order is '${order.status}').`);
    }
    if (order.total <= 0) {
      throw new ValidationError("Order total is zero; record it as a comp instead.");
    }
    const conference = this.catalog.getConference(order.conference_id);
    if (!conference) throw new NotFoundError(`Conference ${order.conference_id} not found.`);
    if (!this.gateway.isConfigured(conference)) {
      throw new ValidationError("Online payments are not configured for this conference.", "STRIPE_NOT_CONFIGURED", 503);
    }

    const balance = order.total - this.orders.sumSucceededPayments(order.id);
    if (balance <= 0) {
      throw new ValidationError("Order has no outstanding balance.");
    }

    const attempt = this.orders.countPayments(order.id);
    const intent = await this.gateway.createPaymentIntent(conference, {
      amount: balance,
      currency: this.options.currency,
      description: `${conference.name} order ${order.reference}`,
      metadata: { order_id: String(order.id), reference: order.reference },
      idempotencyKey: `order-${order.reference}-${attempt}`,
    });

    const payment = this.db
      .transaction(() => {
        const current = this.orders.get(order.id);
        if (!current || current.status !== "pending") {
          throw new ValidationError("Order changed while starting payment; please retry.");
        }
        // A concurrent call with the same idempotency key got the same intent back.
        const recorded = this.orders.listPaymentsByIntent(intent.id).find((p) => p.status === "pending");
        if (recorded) return recorded;
        return this.orders.insertPayment(
          {
            orderId: order.id,
            method: "stripe",
            status: "pending",
            amount: balance,
            stripePaymentIntentId: intent.id,
          },
          this.clock.now()
        );
      })
      .immediate();

    this.logger.info(
      { orderId: order.id, reference: order.reference, paymentIntentId: intent.id, amount: balance },
      "Initiated Stripe payment"
    );

    return { paymentId: payment.id, paymentIntentId: intent.id, clientSecret: intent.clientSecret };
  }
}
