/**
 * Inventory Ledger
 *
 * Answers "how many units of X are committed right now" and rejects adds that
 * would oversell. A unit is committed when it sits on an order that is paid or
 * partially refunded, or on a pending order whose hold has not lapsed yet.
 *
 * Holds expire by predicate: every query compares hold_expires_at against the
 * clock, so nothing has to sweep them. Nothing is cached.
 */

import type { Database } from "better-sqlite3";
import type { Logger } from "pino";
import type { ConferenceRow, SellableRow, TicketTypeRow } from "../domain/commerce";
import type { Clock } from "../domain/clock";
import { CapacityExceededError, PerUserLimitExceededError } from "../domain/errors";
import type { LineKind } from "./discountEngine";

const COMMITTED_ORDER_PREDICATE = `(
  o.status IN ('paid', 'partially_refunded')
  OR (o.status = 'pending' AND o.hold_expires_at IS NOT NULL AND o.hold_expires_at > @now)
)`;

const PURCHASED_ORDER_PREDICATE = "o.status IN ('paid', 'partially_refunded')";

export class InventoryLedger {
  private readonly logger: Logger;

  constructor(
    private readonly db: Database,
    private readonly clock: Clock,
    logger: Logger
  ) {
    this.logger = logger.child({ module: "inventoryLedger" });
  }

  committed(kind: LineKind, skuId: number): number {
    const column = kind === "ticket" ? "ticket_type_id" : "addon_id";
    const row = this.db
      .prepare<{ id: number; now: number }, { qty: number }>(
        `SELECT COALESCE(SUM(li.quantity), 0) AS qty
         FROM order_line_items li
         JOIN orders o ON o.id = li.order_id
         WHERE li.${column} = @id AND ${COMMITTED_ORDER_PREDICATE}`
      )
      .get({ id: skuId, now: this.clock.now() });
    return row?.qty ?? 0;
  }

  /** Tickets only; add-ons do not take venue seats. */
  committedForConference(conferenceId: number): number {
    const row = this.db
      .prepare<{ conferenceId: number; now: number }, { qty: number }>(
        `SELECT COALESCE(SUM(li.quantity), 0) AS qty
         FROM order_line_items li
         JOIN orders o ON o.id = li.order_id
         WHERE o.conference_id = @conferenceId
           AND li.ticket_type_id IS NOT NULL
           AND ${COMMITTED_ORDER_PREDICATE}`
      )
      .get({ conferenceId, now: this.clock.now() });
    return row?.qty ?? 0;
  }

  /** null means unlimited (total_quantity = 0). */
  remaining(ticketType: TicketTypeRow): number | null {
    return this.remainingFor("ticket", ticketType);
  }

  remainingGlobal(conference: ConferenceRow): number | null {
    if (conference.total_capacity === 0) return null;
    return Math.max(conference.total_capacity - this.committedForConference(conference.id), 0);
  }

  purchasedByUser(userId: string, kind: LineKind, skuId: number): number {
    const column = kind === "ticket" ? "ticket_type_id" : "addon_id";
    const row = this.db
      .prepare<{ id: number; userId: string }, { qty: number }>(
        `SELECT COALESCE(SUM(li.quantity), 0) AS qty
         FROM order_line_items li
         JOIN orders o ON o.id = li.order_id
         WHERE li.${column} = @id AND o.user_id = @userId AND ${PURCHASED_ORDER_PREDICATE}`
      )
      .get({ id: skuId, userId });
    return row?.qty ?? 0;
  }

  validateAdd(ticketType: TicketTypeRow, requestedQty: number, alreadyInCart: number, alreadyPurchased: number): void {
    this.validateSellable("ticket", ticketType, requestedQty, alreadyInCart, alreadyPurchased);
  }

  validateAddAddon(addon: SellableRow, requestedQty: number, alreadyInCart: number, alreadyPurchased: number): void {
    this.validateSellable("addon", addon, requestedQty, alreadyInCart, alreadyPurchased);
  }

  /** `desiredTickets` is every ticket the cart would hold after the change. */
  validateGlobalCapacity(conference: ConferenceRow, desiredTickets: number): void {
    const remaining = this.remainingGlobal(conference);
    if (remaining !== null && desiredTickets > remaining) {
      this.logger.info(
        { conferenceId: conference.id, desiredTickets, remaining },
        "Global capacity check rejected add"
      );
      throw new CapacityExceededError(
        `Only ${remaining} tickets remaining for this conference (venue capacity: ${conference.total_capacity}).`
      );
    }
  }

  private remainingFor(kind: LineKind, item: SellableRow): number | null {
    if (item.total_quantity === 0) return null;
    return Math.max(item.total_quantity - this.committed(kind, item.id), 0);
  }

  private validateSellable(
    kind: LineKind,
    item: SellableRow,
    requestedQty: number,
    alreadyInCart: number,
    alreadyPurchased: number
  ): void {
    const remaining = this.remainingFor(kind, item);
    if (remaining !== null && remaining < requestedQty + alreadyInCart) {
      this.logger.info(
        { kind, skuId: item.id, requestedQty, alreadyInCart, remaining },
        "Capacity check rejected add"
      );
      throw new CapacityExceededError(`Only ${remaining} of '${item.name}' remaining.`);
    }

    if (alreadyInCart + alreadyPurchased + requestedQty > item.limit_per_user) {
      throw new PerUserLimitExceededError(
        `Limit of ${item.limit_per_user} per user for '${item.name}' ` +
          `(${alreadyPurchased} purchased, ${alreadyInCart} in cart).`
      );
    }
  }
}
