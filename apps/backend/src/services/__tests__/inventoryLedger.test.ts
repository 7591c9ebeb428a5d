/// <reference types="vitest" />
/**
 * Inventory ledger: committed quantities, hold expiry by predicate, capacity
 * and per-user limit checks.
 */

import { beforeEach, describe, expect, it } from "vitest";
import { CapacityExceededError, PerUserLimitExceededError } from "../../domain/errors";
import {
  checkoutTickets,
  createTestContext,
  must,
  seedConference,
  seedTicketType,
  type TestContext,
} from "../../test/fixtures";

describe("InventoryLedger", () => {
  let t: TestContext;
  let conferenceId: number;

  beforeEach(() => {
    t = createTestContext();
    conferenceId = seedConference(t.db);
  });

  const ticketType = (id: number) => must(t.ctx.catalog.getTicketType(id), "ticket type");

  describe("committed / remaining", () => {
    it("counts units on pending orders while their hold is live", () => {
      const ttId = seedTicketType(t.db, conferenceId, { totalQuantity: 5 });
      checkoutTickets(t.ctx, "user-a", conferenceId, ttId, 2);

      expect(t.ctx.inventoryLedger.committed("ticket", ttId)).toBe(2);
      expect(t.ctx.inventoryLedger.remaining(ticketType(ttId))).toBe(3);
    });

    it("drops a lapsed hold without any sweep", () => {
      const ttId = seedTicketType(t.db, conferenceId, { totalQuantity: 5 });
      checkoutTickets(t.ctx, "user-a", conferenceId, ttId, 2);

      t.clock.advanceMinutes(15);
      // hold_expires_at == now is no longer "> now"
      expect(t.ctx.inventoryLedger.committed("ticket", ttId)).toBe(0);
      expect(t.ctx.inventoryLedger.remaining(ticketType(ttId))).toBe(5);
    });

    it("keeps paid orders committed after the hold window", async () => {
      const ttId = seedTicketType(t.db, conferenceId, { totalQuantity: 5 });
      const order = checkoutTickets(t.ctx, "user-a", conferenceId, ttId, 2);
      await t.ctx.orderLedger.recordManual(order.id, { amount: order.total });

      t.clock.advanceMinutes(60);
      expect(t.ctx.inventoryLedger.committed("ticket", ttId)).toBe(2);
    });

    it("does not count cancelled orders", () => {
      const ttId = seedTicketType(t.db, conferenceId, { totalQuantity: 5 });
      const order = checkoutTickets(t.ctx, "user-a", conferenceId, ttId, 2);
      t.ctx.orderLedger.cancelOrder(order.id);

      expect(t.ctx.inventoryLedger.committed("ticket", ttId)).toBe(0);
    });

    it("reports unlimited stock as null", () => {
      const ttId = seedTicketType(t.db, conferenceId, { totalQuantity: 0 });
      checkoutTickets(t.ctx, "user-a", conferenceId, ttId, 3);

      expect(t.ctx.inventoryLedger.remaining(ticketType(ttId))).toBeNull();
    });
  });

  describe("purchasedByUser", () => {
    it("counts only paid orders of that user", async () => {
      const ttId = seedTicketType(t.db, conferenceId);
      const pending = checkoutTickets(t.ctx, "user-a", conferenceId, ttId, 1);
      expect(t.ctx.inventoryLedger.purchasedByUser("user-a", "ticket", ttId)).toBe(0);

      await t.ctx.orderLedger.recordManual(pending.id, { amount: pending.total });
      checkoutTickets(t.ctx, "user-b", conferenceId, ttId, 2);

      expect(t.ctx.inventoryLedger.purchasedByUser("user-a", "ticket", ttId)).toBe(1);
      expect(t.ctx.inventoryLedger.purchasedByUser("user-b", "ticket", ttId)).toBe(0);
    });
  });

  describe("validateAdd", () => {
    it("rejects when remaining < requested + already in cart", () => {
      const ttId = seedTicketType(t.db, conferenceId, { totalQuantity: 3 });
      const tt = ticketType(ttId);

      expect(() => t.ctx.inventoryLedger.validateAdd(tt, 1, 2, 0)).not.toThrow();
      expect(() => t.ctx.inventoryLedger.validateAdd(tt, 2, 2, 0)).toThrow(CapacityExceededError);
    });

    it("rejects when cart + purchased + requested exceeds the per-user limit", () => {
      const ttId = seedTicketType(t.db, conferenceId, { limitPerUser: 2 });
      const tt = ticketType(ttId);

      expect(() => t.ctx.inventoryLedger.validateAdd(tt, 1, 0, 1)).not.toThrow();
      expect(() => t.ctx.inventoryLedger.validateAdd(tt, 1, 1, 1)).toThrow(PerUserLimitExceededError);
    });

    it("checks capacity before the per-user limit", () => {
      const ttId = seedTicketType(t.db, conferenceId, { totalQuantity: 1, limitPerUser: 1 });

      expect(() => t.ctx.inventoryLedger.validateAdd(ticketType(ttId), 2, 0, 0)).toThrow(CapacityExceededError);
    });
  });

  describe("global capacity", () => {
    it("counts tickets across ticket types against the venue cap", () => {
      const cappedConference = seedConference(t.db, { slug: "smallconf", totalCapacity: 3 });
      const early = seedTicketType(t.db, cappedConference, { name: "Early Bird" });
      const regular = seedTicketType(t.db, cappedConference, { name: "Regular" });
      checkoutTickets(t.ctx, "user-a", cappedConference, early, 1);
      checkoutTickets(t.ctx, "user-b", cappedConference, regular, 1);

      const conference = must(t.ctx.catalog.getConference(cappedConference));
      expect(t.ctx.inventoryLedger.remainingGlobal(conference)).toBe(1);
      expect(() => t.ctx.inventoryLedger.validateGlobalCapacity(conference, 1)).not.toThrow();
      expect(() => t.ctx.inventoryLedger.validateGlobalCapacity(conference, 2)).toThrow(
        "Only 1 tickets remaining for this conference (venue capacity: 3)."
      );
    });

    it("treats total_capacity 0 as unlimited", () => {
      const conference = must(t.ctx.catalog.getConference(conferenceId));

      expect(t.ctx.inventoryLedger.remainingGlobal(conference)).toBeNull();
      expect(() => t.ctx.inventoryLedger.validateGlobalCapacity(conference, 10_000)).not.toThrow();
    });
  });
});
