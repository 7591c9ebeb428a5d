/**
 * Checkout Service
 *
 * The single atomic Cart → Order transition. Inside one immediate transaction:
 * revalidate every line against the Inventory Ledger, re-read the voucher,
 * price fresh, write the pending order with its inventory hold and immutable
 * line items, close the cart, and consume one voucher use. Any failure rolls
 * the whole thing back; no partial order is ever visible.
 */

import type { Database } from "better-sqlite3";
import type { Logger } from "pino";
import type { CartRow, OrderRow, OrderWithLines, Voucher } from "../domain/commerce";
import type { Clock } from "../domain/clock";
import { NotFoundError, ValidationError } from "../domain/errors";
import { isUniqueViolation } from "../db/connection";
import type { CartRepository } from "../repositories/cartRepository";
import type { NewOrder, OrderRepository } from "../repositories/orderRepository";
import { generateOrderReference } from "../utils/orderReference";
import type { CartService } from "./cartService";
import { calculateDiscount, type DiscountResult } from "./discountEngine";
import { snapshotVoucher, toPricingVoucher, type VoucherService } from "./voucherService";

const MAX_REFERENCE_ATTEMPTS = 10;

export interface CheckoutOptions {
  holdMinutes: number;
  referencePrefix: string;
  /** Swappable for tests that need to force a reference collision. */
  generateReference?: (prefix: string) => string;
}

export class CheckoutService {
  private readonly logger: Logger;
  private readonly generateReference: (prefix: string) => string;

  constructor(
    private readonly db: Database,
    private readonly carts: CartRepository,
    private readonly orders: OrderRepository,
    private readonly cartService: CartService,
    private readonly voucherService: VoucherService,
    private readonly clock: Clock,
    logger: Logger,
    private readonly options: CheckoutOptions
  ) {
    this.logger = logger.child({ module: "checkoutService" });
    this.generateReference = options.generateReference ?? generateOrderReference;
  }

  checkout(cartId: number): OrderWithLines {
    const order = this.db
      .transaction(() => {
        const cart = this.carts.get(cartId);
        if (!cart) throw new NotFoundError(`Cart ${cartId} not found.`);
        this.assertCheckoutable(cart);

        const items = this.carts.listItems(cart.id);
        if (items.length === 0) {
          throw new ValidationError("Cannot check out an empty cart.");
        }

        const voucher = this.reloadVoucher(cart);
        this.cartService.revalidateLines(cart, items, voucher);

        const pricing = calculateDiscount(
          this.cartService.pricingLines(cart, items),
          voucher ? toPricingVoucher(voucher) : null
        );

        const now = this.clock.now();
        const created = this.insertOrder(cart, pricing, voucher, now);
        for (const line of pricing.lines) {
          this.orders.insertLineItem(created.id, {
            description: line.description,
            quantity: line.quantity,
            unitPrice: line.unitPrice,
            discountAmount: line.discount,
            lineTotal: line.netTotal,
            ticketTypeId: line.kind === "ticket" ? line.skuId : null,
            addonId: line.kind === "addon" ? line.skuId : null,
          });
        }

        this.carts.setStatus(cart.id, "checked_out", now);

        if (voucher) {
          this.voucherService.consume(voucher);
        }

        return created;
      })
      .immediate();

    this.logger.info(
      { orderId: order.id, reference: order.reference, cartId, total: order.total, voucherCode: order.voucher_code },
      "Checkout completed"
    );

    const withLines = this.orders.getWithLines(order.id);
    if (!withLines) throw new NotFoundError(`Order ${order.reference} not found after checkout.`);
    return withLines;
  }

  private assertCheckoutable(cart: CartRow): void {
    if (cart.status !== "open") {
      throw new ValidationError(`Cart is ${cart.status}; only open carts can be checked out.`);
    }
    if (cart.expires_at < this.clock.now()) {
      throw new ValidationError("Cart has expired; please start again.");
    }
  }

  private reloadVoucher(cart: CartRow): Voucher | null {
    if (cart.voucher_id === null) return null;
    const voucher = this.voucherService.reloadValid(cart.voucher_id);
    if (voucher.conference_id !== cart.conference_id) {
      throw new ValidationError(`Voucher '${voucher.code}' is not valid for this conference.`);
    }
    return voucher;
  }

  private insertOrder(cart: CartRow, pricing: DiscountResult, voucher: Voucher | null, now: number): OrderRow {
    const base: Omit<NewOrder, "reference"> = {
      conferenceId: cart.conference_id,
      userId: cart.user_id,
      subtotal: pricing.subtotal,
      discountAmount: pricing.discountAmount,
      total: pricing.total,
      voucherCode: voucher?.code ?? null,
      voucherDetails: voucher ? JSON.stringify(snapshotVoucher(voucher)) : null,
      holdExpiresAt: now + this.options.holdMinutes * 60,
    };

    for (let attempt = 1; attempt <= MAX_REFERENCE_ATTEMPTS; attempt++) {
      const reference = this.generateReference(this.options.referencePrefix);
      try {
        return this.orders.insert({ ...base, reference }, now);
      } catch (error) {
        if (!isUniqueViolation(error)) throw error;
        this.logger.warn({ reference, attempt }, "Order reference collision; regenerating");
      }
    }
    throw new Error(`Could not generate a unique order reference after ${MAX_REFERENCE_ATTEMPTS} attempts`);
  }
}
