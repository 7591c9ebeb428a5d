/**
 * Cart Repository
 *
 * Persistence for carts and cart lines. Callers are expected to run mutations
 * inside an immediate transaction; nothing here opens one itself.
 */

import type { Database } from "better-sqlite3";
import type { CartItemRow, CartRow, CartStatus } from "../domain/commerce";

export type CartLineRef = { ticketTypeId: number; addonId?: undefined } | { addonId: number; ticketTypeId?: undefined };

export class CartRepository {
  constructor(private readonly db: Database) {}

  get(id: number): CartRow | undefined {
    return this.db.prepare<[number], CartRow>("SELECT * FROM carts WHERE id = ?").get(id);
  }

  findOpen(userId: string, conferenceId: number): CartRow | undefined {
    return this.db
      .prepare<[string, number], CartRow>(
        "SELECT * FROM carts WHERE user_id = ? AND conference_id = ? AND status = 'open'"
      )
      .get(userId, conferenceId);
  }

  insert(userId: string, conferenceId: number, expiresAt: number, now: number): CartRow {
    const result = this.db
      .prepare(
        `INSERT INTO carts (user_id, conference_id, status, expires_at, created_at, updated_at)
         VALUES (?, ?, 'open', ?, ?, ?)`
      )
      .run(userId, conferenceId, expiresAt, now, now);
    return this.require(Number(result.lastInsertRowid));
  }

  /** Mark open carts past their expiry as expired. Scoped to one user/conference when given. */
  expireStale(now: number, scope?: { userId: string; conferenceId: number }): number {
    if (scope) {
      return this.db
        .prepare(
          `UPDATE carts SET status = 'expired', updated_at = @now
           WHERE status = 'open' AND expires_at < @now AND user_id = @userId AND conference_id = @conferenceId`
        )
        .run({ now, userId: scope.userId, conferenceId: scope.conferenceId }).changes;
    }
    return this.db
      .prepare("UPDATE carts SET status = 'expired', updated_at = @now WHERE status = 'open' AND expires_at < @now")
      .run({ now }).changes;
  }

  setStatus(id: number, status: CartStatus, now: number): void {
    this.db.prepare("UPDATE carts SET status = ?, updated_at = ? WHERE id = ?").run(status, now, id);
  }

  setVoucher(id: number, voucherId: number | null, now: number): void {
    this.db.prepare("UPDATE carts SET voucher_id = ?, updated_at = ? WHERE id = ?").run(voucherId, now, id);
  }

  extendExpiry(id: number, expiresAt: number, now: number): void {
    this.db.prepare("UPDATE carts SET expires_at = ?, updated_at = ? WHERE id = ?").run(expiresAt, now, id);
  }

  listItems(cartId: number): CartItemRow[] {
    return this.db
      .prepare<[number], CartItemRow>("SELECT * FROM cart_items WHERE cart_id = ? ORDER BY id")
      .all(cartId);
  }

  getItem(cartId: number, itemId: number): CartItemRow | undefined {
    return this.db
      .prepare<[number, number], CartItemRow>("SELECT * FROM cart_items WHERE cart_id = ? AND id = ?")
      .get(cartId, itemId);
  }

  findItem(cartId: number, ref: CartLineRef): CartItemRow | undefined {
    if (ref.ticketTypeId !== undefined) {
      return this.db
        .prepare<[number, number], CartItemRow>("SELECT * FROM cart_items WHERE cart_id = ? AND ticket_type_id = ?")
        .get(cartId, ref.ticketTypeId);
    }
    return this.db
      .prepare<[number, number], CartItemRow>("SELECT * FROM cart_items WHERE cart_id = ? AND addon_id = ?")
      .get(cartId, ref.addonId);
  }

  /** Throws a UNIQUE constraint error when the line already exists. */
  insertItem(cartId: number, ref: CartLineRef, quantity: number, now: number): CartItemRow {
    const result = this.db
      .prepare(
        `INSERT INTO cart_items (cart_id, ticket_type_id, addon_id, quantity, created_at)
         VALUES (?, ?, ?, ?, ?)`
      )
      .run(cartId, ref.ticketTypeId ?? null, ref.addonId ?? null, quantity, now);
    const item = this.getItem(cartId, Number(result.lastInsertRowid));
    if (!item) {
      throw new Error(`cart item ${String(result.lastInsertRowid)} vanished after insert`);
    }
    return item;
  }

  setItemQuantity(itemId: number, quantity: number): void {
    this.db.prepare("UPDATE cart_items SET quantity = ? WHERE id = ?").run(quantity, itemId);
  }

  deleteItems(itemIds: readonly number[]): void {
    const stmt = this.db.prepare("DELETE FROM cart_items WHERE id = ?");
    for (const id of itemIds) {
      stmt.run(id);
    }
  }

  private require(id: number): CartRow {
    const cart = this.get(id);
    if (!cart) {
      throw new Error(`cart ${id} vanished after insert`);
    }
    return cart;
  }
}
