/**
 * Order Repository
 *
 * Orders, their immutable line items, and the payments recorded against them.
 * Order status writes go through OrderLedger so the state machine is enforced;
 * this class only persists what it is told.
 */

import type { Database } from "better-sqlite3";
import type {
  OrderLineItemRow,
  OrderRow,
  OrderStatus,
  OrderWithLines,
  PaymentMethod,
  PaymentRow,
  PaymentStatus,
} from "../domain/commerce";

export interface NewOrder {
  conferenceId: number;
  userId: string;
  subtotal: number;
  discountAmount: number;
  total: number;
  voucherCode: string | null;
  voucherDetails: string | null;
  reference: string;
  holdExpiresAt: number | null;
}

export interface NewLineItem {
  description: string;
  quantity: number;
  unitPrice: number;
  discountAmount: number;
  lineTotal: number;
  ticketTypeId: number | null;
  addonId: number | null;
}

export interface NewPayment {
  orderId: number;
  method: PaymentMethod;
  status: PaymentStatus;
  amount: number;
  stripePaymentIntentId?: string | null;
  stripeChargeId?: string | null;
  creditId?: number | null;
  reference?: string | null;
  note?: string | null;
}

export class OrderRepository {
  constructor(private readonly db: Database) {}

  get(id: number): OrderRow | undefined {
    return this.db.prepare<[number], OrderRow>("SELECT * FROM orders WHERE id = ?").get(id);
  }

  getByReference(reference: string): OrderRow | undefined {
    return this.db.prepare<[string], OrderRow>("SELECT * FROM orders WHERE reference = ?").get(reference);
  }

  getWithLines(id: number): OrderWithLines | undefined {
    const order = this.get(id);
    return order ? { ...order, line_items: this.listLineItems(id) } : undefined;
  }

  referenceExists(reference: string): boolean {
    return this.db.prepare("SELECT 1 FROM orders WHERE reference = ?").get(reference) !== undefined;
  }

  /** Throws a UNIQUE constraint error on reference collision. */
  insert(order: NewOrder, now: number): OrderRow {
    const result = this.db
      .prepare(
        `INSERT INTO orders (
           conference_id, user_id, status, subtotal, discount_amount, total,
           voucher_code, voucher_details, reference, hold_expires_at, created_at, updated_at
         ) VALUES (
           @conferenceId, @userId, 'pending', @subtotal, @discountAmount, @total,
           @voucherCode, @voucherDetails, @reference, @holdExpiresAt, @now, @now
         )`
      )
      .run({ ...order, now });
    const row = this.get(Number(result.lastInsertRowid));
    if (!row) {
      throw new Error(`order ${order.reference} vanished after insert`);
    }
    return row;
  }

  insertLineItem(orderId: number, line: NewLineItem): void {
    this.db
      .prepare(
        `INSERT INTO order_line_items (
           order_id, description, quantity, unit_price, discount_amount, line_total, ticket_type_id, addon_id
         ) VALUES (
           @orderId, @description, @quantity, @unitPrice, @discountAmount, @lineTotal, @ticketTypeId, @addonId
         )`
      )
      .run({ orderId, ...line });
  }

  listLineItems(orderId: number): OrderLineItemRow[] {
    return this.db
      .prepare<[number], OrderLineItemRow>("SELECT * FROM order_line_items WHERE order_id = ? ORDER BY id")
      .all(orderId);
  }

  updateStatus(id: number, status: OrderStatus, now: number, options: { clearHold?: boolean } = {}): void {
    if (options.clearHold) {
      this.db
        .prepare("UPDATE orders SET status = ?, hold_expires_at = NULL, updated_at = ? WHERE id = ?")
        .run(status, now, id);
      return;
    }
    this.db.prepare("UPDATE orders SET status = ?, updated_at = ? WHERE id = ?").run(status, now, id);
  }

  // ---------------------------------------------------------------------------
  // Payments
  // ---------------------------------------------------------------------------

  insertPayment(payment: NewPayment, now: number): PaymentRow {
    const result = this.db
      .prepare(
        `INSERT INTO payments (
           order_id, method, status, amount, stripe_payment_intent_id, stripe_charge_id,
           credit_id, reference, note, created_at, updated_at
         ) VALUES (
           @orderId, @method, @status, @amount, @stripePaymentIntentId, @stripeChargeId,
           @creditId, @reference, @note, @now, @now
         )`
      )
      .run({
        orderId: payment.orderId,
        method: payment.method,
        status: payment.status,
        amount: payment.amount,
        stripePaymentIntentId: payment.stripePaymentIntentId ?? null,
        stripeChargeId: payment.stripeChargeId ?? null,
        creditId: payment.creditId ?? null,
        reference: payment.reference ?? null,
        note: payment.note ?? null,
        now,
      });
    const row = this.getPayment(Number(result.lastInsertRowid));
    if (!row) {
      throw new Error(`payment for order ${payment.orderId} vanished after insert`);
    }
    return row;
  }

  getPayment(id: number): PaymentRow | undefined {
    return this.db.prepare<[number], PaymentRow>("SELECT * FROM payments WHERE id = ?").get(id);
  }

  listPayments(orderId: number): PaymentRow[] {
    return this.db.prepare<[number], PaymentRow>("SELECT * FROM payments WHERE order_id = ? ORDER BY id").all(orderId);
  }

  countPayments(orderId: number): number {
    const row = this.db
      .prepare<[number], { count: number }>("SELECT COUNT(*) AS count FROM payments WHERE order_id = ?")
      .get(orderId);
    return row?.count ?? 0;
  }

  listPaymentsByIntent(paymentIntentId: string): PaymentRow[] {
    return this.db
      .prepare<[string], PaymentRow>(
        "SELECT * FROM payments WHERE method = 'stripe' AND stripe_payment_intent_id = ? ORDER BY id"
      )
      .all(paymentIntentId);
  }

  sumSucceededPayments(orderId: number): number {
    const row = this.db
      .prepare<[number], { total: number }>(
        "SELECT COALESCE(SUM(amount), 0) AS total FROM payments WHERE order_id = ? AND status = 'succeeded'"
      )
      .get(orderId);
    return row?.total ?? 0;
  }

  updatePayment(
    id: number,
    changes: { status: PaymentStatus; amount?: number; stripeChargeId?: string | null },
    now: number
  ): void {
    this.db
      .prepare(
        `UPDATE payments
         SET status = @status,
             amount = COALESCE(@amount, amount),
             stripe_charge_id = COALESCE(@stripeChargeId, stripe_charge_id),
             updated_at = @now
         WHERE id = @id`
      )
      .run({
        id,
        status: changes.status,
        amount: changes.amount ?? null,
        stripeChargeId: changes.stripeChargeId ?? null,
        now,
      });
  }
}
