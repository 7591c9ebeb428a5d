/**
 * Cart Service
 *
 * CRUD over a user's single open cart per conference, enforcing:
 * - availability windows and the Inventory Ledger's capacity and per-user limits
 * - voucher gating for requires_voucher ticket types
 * - add-on prerequisites (at least one required ticket type already in the cart)
 *
 * Every mutation runs in an immediate transaction, first asserts the cart is
 * still open and unexpired, and slides the cart's expiry forward by the TTL.
 */

import type { Database } from "better-sqlite3";
import type { Logger } from "pino";
import type {
  AddOn,
  CartItemRow,
  CartRow,
  ConferenceRow,
  SellableRow,
  TicketTypeRow,
  Voucher,
} from "../domain/commerce";
import type { Clock } from "../domain/clock";
import { CartNotOpenError, NotFoundError, ValidationError } from "../domain/errors";
import { isUniqueViolation } from "../db/connection";
import type { CatalogRepository } from "../repositories/catalogRepository";
import type { CartLineRef, CartRepository } from "../repositories/cartRepository";
import type { VoucherRepository } from "../repositories/voucherRepository";
import { calculateDiscount, type DiscountResult, type PricingLine } from "./discountEngine";
import type { InventoryLedger } from "./inventoryLedger";
import { toPricingVoucher, unlocksTicketType, type VoucherService } from "./voucherService";

export interface CartServiceOptions {
  cartTtlMinutes: number;
}

export interface CartSummary extends DiscountResult {
  cartId: number;
  conferenceId: number;
  status: CartRow["status"];
  expiresAt: number;
  /** true when a voucher is attached but no longer usable, so pricing ignores it */
  voucherInvalid: boolean;
}

export interface RemoveResult {
  removedItemId: number;
  cascadedItemIds: number[];
}

type ResolvedLine =
  | { kind: "ticket"; item: CartItemRow; sku: TicketTypeRow }
  | { kind: "addon"; item: CartItemRow; sku: AddOn };

export class CartService {
  private readonly logger: Logger;

  constructor(
    private readonly db: Database,
    private readonly carts: CartRepository,
    private readonly catalog: CatalogRepository,
    private readonly vouchers: VoucherRepository,
    private readonly voucherService: VoucherService,
    private readonly ledger: InventoryLedger,
    private readonly clock: Clock,
    logger: Logger,
    private readonly options: CartServiceOptions
  ) {
    this.logger = logger.child({ module: "cartService" });
  }

  getOrCreateOpenCart(userId: string, conferenceId: number): CartRow {
    return this.db
      .transaction(() => {
        const now = this.clock.now();
        const expired = this.carts.expireStale(now, { userId, conferenceId });
        if (expired > 0) {
          this.logger.info({ userId, conferenceId, expired }, "Expired stale open cart");
        }

        const existing = this.carts.findOpen(userId, conferenceId);
        if (existing) return existing;

        try {
          return this.carts.insert(userId, conferenceId, this.expiryFrom(now), now);
        } catch (error) {
          if (!isUniqueViolation(error)) throw error;
          const winner = this.carts.findOpen(userId, conferenceId);
          if (!winner) throw new ValidationError("Could not open a cart; please retry.");
          return winner;
        }
      })
      .immediate();
  }

  addTicket(cartId: number, ticketTypeId: number, quantity: number): CartItemRow {
    return this.mutate(cartId, (cart) => {
      assertPositiveQuantity(quantity);
      const conference = this.requireConference(cart.conference_id);
      const ticketType = this.catalog.getTicketType(ticketTypeId);
      if (!ticketType || ticketType.conference_id !== cart.conference_id) {
        throw new NotFoundError(`Ticket type ${ticketTypeId} not found for this conference.`);
      }
      this.assertSellable(ticketType);
      this.assertVoucherUnlocks(cart, ticketType);

      const purchased = this.ledger.purchasedByUser(cart.user_id, "ticket", ticketType.id);
      const ticketsInCart = countTickets(this.carts.listItems(cart.id));

      const item = this.upsertLine(cart, { ticketTypeId: ticketType.id }, quantity, (inCart) => {
        this.ledger.validateAdd(ticketType, quantity, inCart, purchased);
        this.ledger.validateGlobalCapacity(conference, ticketsInCart + quantity);
      });
      this.logger.info({ cartId, ticketTypeId, quantity }, "Ticket added to cart");
      return item;
    });
  }

  addAddon(cartId: number, addonId: number, quantity: number): CartItemRow {
    return this.mutate(cartId, (cart) => {
      assertPositiveQuantity(quantity);
      const addon = this.catalog.getAddon(addonId);
      if (!addon || addon.conference_id !== cart.conference_id) {
        throw new NotFoundError(`Add-on ${addonId} not found for this conference.`);
      }
      this.assertSellable(addon);

      if (addon.required_ticket_type_ids.length > 0) {
        const ticketIds = ticketTypeIdsIn(this.carts.listItems(cart.id));
        if (!addon.required_ticket_type_ids.some((id) => ticketIds.has(id))) {
          throw new ValidationError(`'${addon.name}' requires a qualifying ticket in your cart.`);
        }
      }

      const purchased = this.ledger.purchasedByUser(cart.user_id, "addon", addon.id);
      const item = this.upsertLine(cart, { addonId: addon.id }, quantity, (inCart) => {
        this.ledger.validateAddAddon(addon, quantity, inCart, purchased);
      });
      this.logger.info({ cartId, addonId, quantity }, "Add-on added to cart");
      return item;
    });
  }

  /**
   * Delete a line. Removing a ticket also removes every add-on whose whole
   * required set is no longer represented by the remaining tickets.
   */
  removeItem(cartId: number, itemId: number): RemoveResult {
    return this.mutate(cartId, (cart) => this.removeWithCascade(cart, itemId));
  }

  /** quantity <= 0 is a remove; increases revalidate capacity for the delta. */
  updateQuantity(cartId: number, itemId: number, quantity: number): RemoveResult | CartItemRow {
    if (!Number.isInteger(quantity)) {
      throw new ValidationError("Quantity must be a whole number.");
    }
    return this.mutate(cartId, (cart) => {
      if (quantity <= 0) {
        return this.removeWithCascade(cart, itemId);
      }

      const item = this.carts.getItem(cart.id, itemId);
      if (!item) throw new NotFoundError(`Cart item ${itemId} not found.`);

      const delta = quantity - item.quantity;
      if (delta > 0) {
        const line = this.resolveLine(cart, item);
        this.assertSellable(line.sku);
        const purchased = this.ledger.purchasedByUser(cart.user_id, line.kind, line.sku.id);
        if (line.kind === "ticket") {
          this.ledger.validateAdd(line.sku, delta, item.quantity, purchased);
          const conference = this.requireConference(cart.conference_id);
          this.ledger.validateGlobalCapacity(conference, countTickets(this.carts.listItems(cart.id)) + delta);
        } else {
          this.ledger.validateAddAddon(line.sku, delta, item.quantity, purchased);
        }
      }

      this.carts.setItemQuantity(item.id, quantity);
      return { ...item, quantity };
    });
  }

  applyVoucher(cartId: number, code: string): Voucher {
    return this.mutate(cartId, (cart) => {
      const voucher = this.voucherService.resolveValid(cart.conference_id, code);
      this.carts.setVoucher(cart.id, voucher.id, this.clock.now());
      this.logger.info({ cartId, voucherCode: voucher.code }, "Voucher applied to cart");
      return voucher;
    });
  }

  removeVoucher(cartId: number): void {
    this.mutate(cartId, (cart) => {
      this.carts.setVoucher(cart.id, null, this.clock.now());
    });
  }

  getSummary(cartId: number): CartSummary {
    const cart = this.carts.get(cartId);
    if (!cart) throw new NotFoundError(`Cart ${cartId} not found.`);

    const items = this.carts.listItems(cart.id);
    const voucher = cart.voucher_id !== null ? this.vouchers.getById(cart.voucher_id) : undefined;
    const usable = voucher !== undefined && this.voucherService.isValid(voucher);
    const pricing = calculateDiscount(
      this.pricingLines(cart, items),
      voucher && usable ? toPricingVoucher(voucher) : null
    );

    return {
      ...pricing,
      cartId: cart.id,
      conferenceId: cart.conference_id,
      status: cart.status,
      expiresAt: cart.expires_at,
      voucherInvalid: voucher !== undefined && !usable,
    };
  }

  pricingLines(cart: CartRow, items: readonly CartItemRow[]): PricingLine[] {
    return items.map((item) => {
      const line = this.resolveLine(cart, item);
      return {
        key: item.id,
        kind: line.kind,
        skuId: line.sku.id,
        description: line.sku.name,
        unitPrice: line.sku.price_cents,
        quantity: item.quantity,
      };
    });
  }

  /**
   * Checkout-time revalidation of every line against the catalog, voucher
   * gating and the Inventory Ledger. Approval given when the item was added is
   * not trusted.
   */
  revalidateLines(cart: CartRow, items: readonly CartItemRow[], voucher: Voucher | null): void {
    const conference = this.requireConference(cart.conference_id);

    for (const item of items) {
      const line = this.resolveLine(cart, item);
      this.assertSellable(line.sku);
      const purchased = this.ledger.purchasedByUser(cart.user_id, line.kind, line.sku.id);
      if (line.kind === "ticket") {
        if (line.sku.requires_voucher && !(voucher && unlocksTicketType(voucher, line.sku.id))) {
          throw new ValidationError(`'${line.sku.name}' requires a voucher that unlocks it.`);
        }
        this.ledger.validateAdd(line.sku, item.quantity, 0, purchased);
      } else {
        this.ledger.validateAddAddon(line.sku, item.quantity, 0, purchased);
      }
    }

    this.ledger.validateGlobalCapacity(conference, countTickets(items));
  }

  assertOpen(cart: CartRow): void {
    if (cart.status !== "open") {
      throw new CartNotOpenError(`Cart is ${cart.status}, not open.`);
    }
    if (cart.expires_at < this.clock.now()) {
      throw new CartNotOpenError("Cart has expired.");
    }
  }

  // ---------------------------------------------------------------------------

  private mutate<T>(cartId: number, operation: (cart: CartRow) => T): T {
    return this.db
      .transaction(() => {
        const cart = this.carts.get(cartId);
        if (!cart) throw new NotFoundError(`Cart ${cartId} not found.`);
        this.assertOpen(cart);

        const result = operation(cart);
        const now = this.clock.now();
        this.carts.extendExpiry(cart.id, this.expiryFrom(now), now);
        return result;
      })
      .immediate();
  }

  /**
   * Increment the line for `ref`, or insert it. Two concurrent adds can both
   * miss the existing line and race on insert; the loser hits the UNIQUE
   * constraint, re-reads the winner's line, revalidates and increments once.
   */
  private upsertLine(
    cart: CartRow,
    ref: CartLineRef,
    quantity: number,
    validate: (alreadyInCart: number) => void
  ): CartItemRow {
    const existing = this.carts.findItem(cart.id, ref);
    validate(existing?.quantity ?? 0);

    if (existing) {
      this.carts.setItemQuantity(existing.id, existing.quantity + quantity);
      return { ...existing, quantity: existing.quantity + quantity };
    }

    try {
      return this.carts.insertItem(cart.id, ref, quantity, this.clock.now());
    } catch (error) {
      if (!isUniqueViolation(error)) throw error;

      const winner = this.carts.findItem(cart.id, ref);
      if (!winner) {
        throw new ValidationError("Cart changed while adding the item; please retry.");
      }
      this.logger.warn({ cartId: cart.id, itemId: winner.id }, "Cart line insert raced; retrying as increment");
      validate(winner.quantity);
      this.carts.setItemQuantity(winner.id, winner.quantity + quantity);
      return { ...winner, quantity: winner.quantity + quantity };
    }
  }

  private removeWithCascade(cart: CartRow, itemId: number): RemoveResult {
    const item = this.carts.getItem(cart.id, itemId);
    if (!item) throw new NotFoundError(`Cart item ${itemId} not found.`);

    const cascadedItemIds: number[] = [];
    if (item.ticket_type_id !== null) {
      const remaining = this.carts.listItems(cart.id).filter((other) => other.id !== item.id);
      const remainingTicketIds = ticketTypeIdsIn(remaining);

      for (const other of remaining) {
        if (other.addon_id === null) continue;
        const required = this.catalog.listRequiredTicketTypeIds(other.addon_id);
        if (required.length > 0 && !required.some((id) => remainingTicketIds.has(id))) {
          cascadedItemIds.push(other.id);
        }
      }
    }

    this.carts.deleteItems([item.id, ...cascadedItemIds]);
    if (cascadedItemIds.length > 0) {
      this.logger.info({ cartId: cart.id, itemId, cascadedItemIds }, "Removed dependent add-ons with ticket");
    }
    return { removedItemId: item.id, cascadedItemIds };
  }

  private resolveLine(cart: CartRow, item: CartItemRow): ResolvedLine {
    if (item.ticket_type_id !== null) {
      const sku = this.catalog.getTicketType(item.ticket_type_id);
      if (!sku || sku.conference_id !== cart.conference_id) {
        throw new ValidationError(`Ticket type ${item.ticket_type_id} is no longer available.`);
      }
      return { kind: "ticket", item, sku };
    }
    if (item.addon_id !== null) {
      const sku = this.catalog.getAddon(item.addon_id);
      if (!sku || sku.conference_id !== cart.conference_id) {
        throw new ValidationError(`Add-on ${item.addon_id} is no longer available.`);
      }
      return { kind: "addon", item, sku };
    }
    throw new ValidationError(`Cart item ${item.id} references neither a ticket type nor an add-on.`);
  }

  private assertSellable(sku: SellableRow): void {
    const now = this.clock.now();
    if (!sku.is_active) {
      throw new ValidationError(`'${sku.name}' is not available.`);
    }
    if (sku.available_from !== null && now < sku.available_from) {
      throw new ValidationError(`'${sku.name}' is not on sale yet.`);
    }
    if (sku.available_until !== null && now > sku.available_until) {
      throw new ValidationError(`'${sku.name}' is no longer on sale.`);
    }
  }

  private assertVoucherUnlocks(cart: CartRow, ticketType: TicketTypeRow): void {
    if (!ticketType.requires_voucher) return;
    const voucher = cart.voucher_id !== null ? this.vouchers.getById(cart.voucher_id) : undefined;
    if (!voucher || !this.voucherService.isValid(voucher) || !unlocksTicketType(voucher, ticketType.id)) {
      throw new ValidationError(`'${ticketType.name}' requires a voucher that unlocks it.`);
    }
  }

  private requireConference(conferenceId: number): ConferenceRow {
    const conference = this.catalog.getConference(conferenceId);
    if (!conference) throw new NotFoundError(`Conference ${conferenceId} not found.`);
    return conference;
  }

  private expiryFrom(now: number): number {
    return now + this.options.cartTtlMinutes * 60;
  }
}

function assertPositiveQuantity(quantity: number): void {
  if (!Number.isInteger(quantity) || quantity < 1) {
    throw new ValidationError("Quantity must be a whole number of at least 1.");
  }
}

function countTickets(items: readonly CartItemRow[]): number {
  return items.reduce((sum, item) => (item.ticket_type_id !== null ? sum + item.quantity : sum), 0);
}

function ticketTypeIdsIn(items: readonly CartItemRow[]): Set<number> {
  const ids = new Set<number>();
  for (const item of items) {
    if (item.ticket_type_id !== null) ids.add(item.ticket_type_id);
  }
  return ids;
}
