/// <reference types="vitest" />
/**
 * Discount engine: per-line voucher allocation over integer cents.
 */

import { describe, it, expect } from "vitest";
import {
  allocateFixedBudget,
  calculateDiscount,
  type PricingLine,
  type PricingVoucher,
} from "../discountEngine";

const ticket = (key: number, skuId: number, unitPrice: number, quantity = 1): PricingLine => ({
  key,
  kind: "ticket",
  skuId,
  description: `Ticket ${skuId}`,
  unitPrice,
  quantity,
});

const addon = (key: number, skuId: number, unitPrice: number, quantity = 1): PricingLine => ({
  key,
  kind: "addon",
  skuId,
  description: `Add-on ${skuId}`,
  unitPrice,
  quantity,
});

const voucher = (overrides: Partial<PricingVoucher> = {}): PricingVoucher => ({
  code: "SAVE",
  type: "percentage",
  value: 0,
  ticketTypeIds: [],
  addonIds: [],
  ...overrides,
});

describe("discountEngine", () => {
  describe("calculateDiscount - no voucher", () => {
    it("sums line totals without discount", () => {
      const result = calculateDiscount([ticket(1, 1, 10000), addon(2, 5, 2500, 2)], null);

      expect(result.subtotal).toBe(15000);
      expect(result.discountAmount).toBe(0);
      expect(result.total).toBe(15000);
      expect(result.voucherCode).toBeNull();
      expect(result.lines.map((line) => line.applicable)).toEqual([false, false]);
    });

    it("empty cart prices to zero", () => {
      const result = calculateDiscount([], voucher({ type: "comp" }));

      expect(result).toEqual({ lines: [], subtotal: 0, discountAmount: 0, total: 0, voucherCode: "SAVE" });
    });
  });

  describe("calculateDiscount - comp", () => {
    it("$100 ticket with unscoped comp → discount $100, total $0", () => {
      const result = calculateDiscount([ticket(1, 1, 10000)], voucher({ type: "comp" }));

      expect(result.discountAmount).toBe(10000);
      expect(result.total).toBe(0);
      expect(result.lines[0].netTotal).toBe(0);
    });
  });

  describe("calculateDiscount - percentage", () => {
    it("$100 ticket at 20% → discount $20, total $80", () => {
      const result = calculateDiscount([ticket(1, 1, 10000)], voucher({ type: "percentage", value: 2000 }));

      expect(result.discountAmount).toBe(2000);
      expect(result.total).toBe(8000);
      expect(result.lines[0]).toMatchObject({ lineTotal: 10000, discount: 2000, netTotal: 8000 });
    });

    it("rounds half-cents up per line", () => {
      // 15% of $10.10 = 151.5 cents
      const result = calculateDiscount([ticket(1, 1, 1010)], voucher({ type: "percentage", value: 1500 }));

      expect(result.lines[0].discount).toBe(152);
    });

    it("ticket scope restricts tickets but leaves unscoped add-ons applicable", () => {
      const result = calculateDiscount(
        [ticket(1, 1, 10000), ticket(2, 2, 5000), addon(3, 7, 2000, 2)],
        voucher({ type: "percentage", value: 5000, ticketTypeIds: [1] })
      );

      expect(result.lines.map((line) => line.applicable)).toEqual([true, false, true]);
      expect(result.lines.map((line) => line.discount)).toEqual([5000, 0, 2000]);
      expect(result.subtotal).toBe(19000);
      expect(result.discountAmount).toBe(7000);
      expect(result.total).toBe(12000);
    });
  });

  describe("calculateDiscount - fixed_amount", () => {
    it("$10 split over three $10 lines → 333, 333, 334", () => {
      const result = calculateDiscount(
        [ticket(1, 1, 1000), ticket(2, 2, 1000), ticket(3, 3, 1000)],
        voucher({ type: "fixed_amount", value: 1000 })
      );

      expect(result.lines.map((line) => line.discount)).toEqual([333, 333, 334]);
      expect(result.discountAmount).toBe(1000);
      expect(result.total).toBe(2000);
    });

    it("splits proportionally to line totals", () => {
      const result = calculateDiscount(
        [ticket(1, 1, 100), ticket(2, 2, 200)],
        voucher({ type: "fixed_amount", value: 100 })
      );

      expect(result.lines.map((line) => line.discount)).toEqual([33, 67]);
    });

    it("caps the budget at the applicable subtotal", () => {
      const result = calculateDiscount(
        [ticket(1, 1, 1000), ticket(2, 2, 1000), ticket(3, 3, 1000)],
        voucher({ type: "fixed_amount", value: 5000 })
      );

      expect(result.lines.map((line) => line.discount)).toEqual([1000, 1000, 1000]);
      expect(result.total).toBe(0);
    });

    it("only spends the budget on scoped lines", () => {
      const result = calculateDiscount(
        [ticket(1, 1, 1500), ticket(2, 2, 1000)],
        voucher({ type: "fixed_amount", value: 2000, ticketTypeIds: [1] })
      );

      expect(result.lines.map((line) => line.discount)).toEqual([1500, 0]);
      expect(result.discountAmount).toBe(1500);
      expect(result.total).toBe(1000);
    });
  });

  describe("allocateFixedBudget", () => {
    it("always sums to the budget", () => {
      for (const budget of [1, 7, 100, 999, 1000]) {
        const shares = allocateFixedBudget(budget, [333, 333, 334, 1]);
        expect(shares.reduce((sum, share) => sum + share, 0)).toBe(budget);
      }
    });

    it("returns nothing for no lines", () => {
      expect(allocateFixedBudget(500, [])).toEqual([]);
    });
  });

  it("is pure: repeated calls give identical results", () => {
    const lines = [ticket(1, 1, 1234, 3), addon(2, 9, 999)];
    const input = voucher({ type: "fixed_amount", value: 777 });

    expect(calculateDiscount(lines, input)).toEqual(calculateDiscount(lines, input));
  });
});
