/**
 * Order/Payment Ledger
 *
 * The durable record of money owed and received. All order status writes go
 * through `transition`, which enforces:
 *
 *   pending → paid | cancelled
 *   paid    → refunded | partially_refunded
 *
 * Anything else throws IllegalTransitionError and changes nothing. Operations
 * that can pay an order notify the OrderPaidNotifier only after commit.
 */

import type { Database } from "better-sqlite3";
import type { Logger } from "pino";
import type { CreditRow, OrderRow, OrderStatus, OrderWithLines, PaymentRow } from "../domain/commerce";
import type { Clock } from "../domain/clock";
import { NotFoundError, ValidationError } from "../domain/errors";
import { assertTransition } from "../domain/orderStateMachine";
import type { CreditRepository, NewCredit } from "../repositories/creditRepository";
import type { OrderRepository } from "../repositories/orderRepository";
import { deliverOrderPaid, type OrderPaidNotifier } from "./notifications";
import type { VoucherService } from "./voucherService";

export interface PaymentOutcome {
  payment: PaymentRow;
  order: OrderRow;
}

export interface ManualPaymentInput {
  amount: number;
  reference?: string | null;
  note?: string | null;
}

export class OrderLedger {
  private readonly logger: Logger;

  constructor(
    private readonly db: Database,
    private readonly orders: OrderRepository,
    private readonly credits: CreditRepository,
    private readonly voucherService: VoucherService,
    private readonly notifier: OrderPaidNotifier,
    private readonly clock: Clock,
    logger: Logger
  ) {
    this.logger = logger.child({ module: "orderLedger" });
  }

  getOrder(id: number): OrderWithLines {
    const order = this.orders.getWithLines(id);
    if (!order) throw new NotFoundError(`Order ${id} not found.`);
    return order;
  }

  getOrderByReference(reference: string): OrderWithLines {
    const row = this.orders.getByReference(reference);
    if (!row) throw new NotFoundError(`Order ${reference} not found.`);
    return this.getOrder(row.id);
  }

  listPayments(orderId: number): PaymentRow[] {
    return this.orders.listPayments(orderId);
  }

  /**
   * Move an order to `to`. Must run inside the caller's transaction.
   * Reaching `paid` clears the inventory hold.
   */
  transition(order: OrderRow, to: OrderStatus): OrderRow {
    assertTransition(order.status, to);
    const now = this.clock.now();
    const clearHold = to === "paid" || to === "cancelled";
    this.orders.updateStatus(order.id, to, now, { clearHold });
    this.logger.info({ orderId: order.id, reference: order.reference, from: order.status, to }, "Order transitioned");
    return { ...order, status: to, hold_expires_at: clearHold ? null : order.hold_expires_at, updated_at: now };
  }

  /**
   * Pending only. Clears the hold, releases the voucher use and hands any
   * consumed store credit back to its owner.
   */
  cancelOrder(orderId: number): OrderRow {
    return this.db
      .transaction(() => {
        const order = this.requireOrder(orderId);
        assertTransition(order.status, "cancelled");
        const now = this.clock.now();

        for (const payment of this.orders.listPayments(order.id)) {
          if (payment.method !== "credit" || payment.status !== "succeeded" || payment.credit_id === null) continue;
          const credit = this.credits.get(payment.credit_id);
          if (credit) {
            this.credits.update(
              credit.id,
              { remainingAmount: credit.remaining_amount + payment.amount, status: "available", appliedToOrderId: null },
              now
            );
          }
          this.orders.updatePayment(payment.id, { status: "refunded" }, now);
        }

        const cancelled = this.transition(order, "cancelled");

        if (order.voucher_code) {
          const released = this.voucherService.release(order.conference_id, order.voucher_code);
          if (!released) {
            this.logger.warn({ orderId, voucherCode: order.voucher_code }, "Voucher usage already at zero on cancel");
          }
        }
        return cancelled;
      })
      .immediate();
  }

  /**
   * Apply an available store credit to a pending order of the same user and
   * conference. Uses min(credit remaining, order balance).
   */
  async applyCredit(orderId: number, creditId: number): Promise<PaymentOutcome> {
    const outcome = this.db
      .transaction(() => {
        const order = this.requireOrder(orderId);
        const credit = this.credits.get(creditId);
        if (!credit) throw new NotFoundError(`Credit ${creditId} not found.`);
        if (order.status !== "pending") {
          throw new ValidationError(`Credit can only be applied to pending orders (order is '${order.status}').`);
        }
        assertCreditUsable(credit, order);

        const balance = order.total - this.orders.sumSucceededPayments(order.id);
        const amount = Math.min(credit.remaining_amount, balance);
        if (amount <= 0) {
          throw new ValidationError("Order has no outstanding balance to apply credit to.");
        }

        const now = this.clock.now();
        const payment = this.orders.insertPayment(
          { orderId: order.id, method: "credit", status: "succeeded", amount, creditId: credit.id },
          now
        );
        const remaining = credit.remaining_amount - amount;
        this.credits.update(
          credit.id,
          {
            remainingAmount: remaining,
            status: remaining === 0 ? "applied" : "available",
            appliedToOrderId: order.id,
          },
          now
        );
        this.logger.info({ orderId, creditId, amount }, "Store credit applied");

        return { payment, order: this.settleIfFullyPaid(order) };
      })
      .immediate();

    await this.notifyIfPaid(outcome.order);
    return outcome;
  }

  /** Collaborator entry for the refund workflow: issue store credit. */
  issueCredit(input: NewCredit): CreditRow {
    if (!Number.isInteger(input.amount) || input.amount <= 0) {
      throw new ValidationError("Credit amount must be a positive number of cents.");
    }
    const credit = this.credits.insert(input, this.clock.now());
    this.logger.info({ creditId: credit.id, userId: input.userId, amount: input.amount }, "Store credit issued");
    return credit;
  }

  /** Zero-total orders (comp vouchers, speaker comps) are settled without a provider. */
  async recordComp(orderId: number): Promise<PaymentOutcome> {
    const outcome = this.db
      .transaction(() => {
        const order = this.requireOrder(orderId);
        if (order.status !== "pending") {
          throw new ValidationError(`Comp payments can only be recorded for pending orders (order is '${order.status}').`);
        }
        if (order.total > 0) {
          throw new ValidationError("Comp payments are only valid for orders with a zero total.");
        }
        const payment = this.orders.insertPayment(
          { orderId: order.id, method: "comp", status: "succeeded", amount: 0 },
          this.clock.now()
        );
        return { payment, order: this.transition(order, "paid") };
      })
      .immediate();

    await this.notifyIfPaid(outcome.order);
    return outcome;
  }

  /** Staff-entered payment (cash at the door, wire transfer). */
  async recordManual(orderId: number, input: ManualPaymentInput): Promise<PaymentOutcome> {
    const outcome = this.db
      .transaction(() => {
        const order = this.requireOrder(orderId);
        if (order.status !== "pending") {
          throw new ValidationError(`Manual payments can only be recorded for pending orders (order is '${order.status}').`);
        }
        if (!Number.isInteger(input.amount) || input.amount <= 0) {
          throw new ValidationError("Payment amount must be greater than zero.");
        }
        const payment = this.orders.insertPayment(
          {
            orderId: order.id,
            method: "manual",
            status: "succeeded",
            amount: input.amount,
            reference: input.reference ?? null,
            note: input.note ?? null,
          },
          this.clock.now()
        );
        this.logger.info({ orderId, amount: input.amount }, "Manual payment recorded");
        return { payment, order: this.settleIfFullyPaid(order) };
      })
      .immediate();

    await this.notifyIfPaid(outcome.order);
    return outcome;
  }

  async notifyIfPaid(order: OrderRow): Promise<void> {
    if (order.status !== "paid") return;
    await deliverOrderPaid(this.notifier, [order], this.logger);
  }

  private settleIfFullyPaid(order: OrderRow): OrderRow {
    if (this.orders.sumSucceededPayments(order.id) >= order.total) {
      return this.transition(order, "paid");
    }
    return order;
  }

  private requireOrder(orderId: number): OrderRow {
    const order = this.orders.get(orderId);
    if (!order) throw new NotFoundError(`Order ${orderId} not found.`);
    return order;
  }
}

function assertCreditUsable(credit: CreditRow, order: OrderRow): void {
  if (credit.status !== "available" || credit.remaining_amount <= 0) {
    throw new ValidationError("Only available credits can be applied.");
  }
  if (credit.user_id !== order.user_id || credit.conference_id !== order.conference_id) {
    throw new ValidationError("Credit belongs to a different user or conference.");
  }
}
