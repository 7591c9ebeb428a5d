/**
 * Discount Engine
 *
 * Pure pricing over value types: (cart lines, voucher) -> per-line discounts and
 * totals. No database access and no clock; identical input always yields
 * identical output, so the cart preview and the checkout snapshot agree.
 *
 * fixed_amount vouchers split one budget across the applicable lines in
 * proportion to line totals. Every line but the last rounds half-up; the last
 * applicable line takes whatever budget is left, so the discounts always sum to
 * exactly min(value, applicable subtotal).
 */

import type { VoucherType } from "../domain/commerce";
import { roundHalfUpDiv } from "../utils/money";

export type LineKind = "ticket" | "addon";

export interface PricingLine {
  /** Caller-side identifier echoed back on the result (cart item id). */
  key: number;
  kind: LineKind;
  /** ticket_type_id or addon_id depending on kind */
  skuId: number;
  description: string;
  unitPrice: number;
  quantity: number;
}

export interface PricingVoucher {
  code: string;
  type: VoucherType;
  /** cents for fixed_amount, hundredths of a percent for percentage */
  value: number;
  ticketTypeIds: readonly number[];
  addonIds: readonly number[];
}

export interface LineDiscount {
  key: number;
  kind: LineKind;
  skuId: number;
  description: string;
  unitPrice: number;
  quantity: number;
  /** unitPrice x quantity, before discount */
  lineTotal: number;
  applicable: boolean;
  discount: number;
  /** lineTotal - discount, floored at zero */
  netTotal: number;
}

export interface DiscountResult {
  lines: LineDiscount[];
  subtotal: number;
  discountAmount: number;
  total: number;
  voucherCode: string | null;
}

const PERCENT_SCALE = 100 * 100; // value is percent with two implied decimals

interface VoucherScope {
  ticketTypeIds: ReadonlySet<number> | null;
  addonIds: ReadonlySet<number> | null;
}

/** Empty scope sets mean the voucher applies to everything. */
function resolveScope(voucher: PricingVoucher): VoucherScope {
  return {
    ticketTypeIds: voucher.ticketTypeIds.length > 0 ? new Set(voucher.ticketTypeIds) : null,
    addonIds: voucher.addonIds.length > 0 ? new Set(voucher.addonIds) : null,
  };
}

function isApplicable(line: PricingLine, scope: VoucherScope): boolean {
  const allowed = line.kind === "ticket" ? scope.ticketTypeIds : scope.addonIds;
  return allowed === null || allowed.has(line.skuId);
}

/** Distribute `budget` over `lineTotals`; the last entry absorbs rounding drift. */
export function allocateFixedBudget(budget: number, lineTotals: readonly number[]): number[] {
  if (lineTotals.length === 0) return [];
  const applicableSubtotal = lineTotals.reduce((sum, value) => sum + value, 0);
  let remaining = budget;

  return lineTotals.map((lineTotal, index) => {
    if (index === lineTotals.length - 1) {
      return remaining;
    }
    const share =
      applicableSubtotal > 0
        ? Math.min(roundHalfUpDiv(budget * lineTotal, applicableSubtotal), remaining)
        : 0;
    remaining -= share;
    return share;
  });
}

export function calculateDiscount(lines: readonly PricingLine[], voucher: PricingVoucher | null): DiscountResult {
  const priced = lines.map((line) => ({ line, lineTotal: line.unitPrice * line.quantity }));
  const subtotal = priced.reduce((sum, entry) => sum + entry.lineTotal, 0);

  const scope = voucher ? resolveScope(voucher) : null;
  const applicable = priced.map((entry) => scope !== null && isApplicable(entry.line, scope));
  const discounts = new Array<number>(priced.length).fill(0);

  if (voucher) {
    const applicableIndexes = applicable.flatMap((flag, index) => (flag ? [index] : []));

    switch (voucher.type) {
      case "comp":
        for (const index of applicableIndexes) {
          discounts[index] = priced[index].lineTotal;
        }
        break;
      case "percentage":
        for (const index of applicableIndexes) {
          const lineTotal = priced[index].lineTotal;
          discounts[index] = Math.min(roundHalfUpDiv(lineTotal * voucher.value, PERCENT_SCALE), lineTotal);
        }
        break;
      case "fixed_amount": {
        const lineTotals = applicableIndexes.map((index) => priced[index].lineTotal);
        const applicableSubtotal = lineTotals.reduce((sum, value) => sum + value, 0);
        const budget = Math.min(voucher.value, applicableSubtotal);
        allocateFixedBudget(budget, lineTotals).forEach((share, position) => {
          discounts[applicableIndexes[position]] = share;
        });
        break;
      }
    }
  }

  const discountAmount = discounts.reduce((sum, value) => sum + value, 0);

  return {
    lines: priced.map(({ line, lineTotal }, index) => ({
      key: line.key,
      kind: line.kind,
      skuId: line.skuId,
      description: line.description,
      unitPrice: line.unitPrice,
      quantity: line.quantity,
      lineTotal,
      applicable: applicable[index],
      discount: discounts[index],
      netTotal: Math.max(lineTotal - discounts[index], 0),
    })),
    subtotal,
    discountAmount,
    total: Math.max(subtotal - discountAmount, 0),
    voucherCode: voucher?.code ?? null,
  };
}
