/**
 * Voucher rules: validity, scope and the pricing view handed to the
 * discount engine. Lookup is by normalized (uppercase) code.
 */

import type { Voucher, VoucherSnapshot } from "../domain/commerce";
import type { Clock } from "../domain/clock";
import { ValidationError } from "../domain/errors";
import type { VoucherRepository } from "../repositories/voucherRepository";
import type { PricingVoucher } from "./discountEngine";

export type VoucherValidity =
  | { valid: true }
  | { valid: false; reason: "inactive" | "exhausted" | "not_yet_valid" | "expired" };

export function checkVoucher(voucher: Voucher, now: number): VoucherValidity {
  if (!voucher.is_active) return { valid: false, reason: "inactive" };
  if (voucher.times_used >= voucher.max_uses) return { valid: false, reason: "exhausted" };
  if (voucher.valid_from !== null && now < voucher.valid_from) return { valid: false, reason: "not_yet_valid" };
  if (voucher.valid_until !== null && now > voucher.valid_until) return { valid: false, reason: "expired" };
  return { valid: true };
}

const INVALID_MESSAGES: Record<Exclude<VoucherValidity, { valid: true }>["reason"], string> = {
  inactive: "is no longer active",
  exhausted: "has reached its usage limit",
  not_yet_valid: "is not valid yet",
  expired: "has expired",
};

/** Does the voucher unlock a requires_voucher ticket type? */
export function unlocksTicketType(voucher: Voucher, ticketTypeId: number): boolean {
  if (!voucher.unlocks_hidden_tickets) return false;
  return voucher.applicable_ticket_type_ids.length === 0 || voucher.applicable_ticket_type_ids.includes(ticketTypeId);
}

export function toPricingVoucher(voucher: Voucher): PricingVoucher {
  return {
    code: voucher.code,
    type: voucher.voucher_type,
    value: voucher.discount_value,
    ticketTypeIds: voucher.applicable_ticket_type_ids,
    addonIds: voucher.applicable_addon_ids,
  };
}

export function snapshotVoucher(voucher: Voucher): VoucherSnapshot {
  return { code: voucher.code, type: voucher.voucher_type, value: voucher.discount_value };
}

export class VoucherService {
  constructor(
    private readonly vouchers: VoucherRepository,
    private readonly clock: Clock
  ) {}

  /** Case-insensitive lookup; throws ValidationError unless the voucher is usable now. */
  resolveValid(conferenceId: number, code: string): Voucher {
    const voucher = this.vouchers.findByCode(conferenceId, code);
    if (!voucher) {
      throw new ValidationError(`Voucher code '${code.trim()}' is not valid for this conference.`);
    }
    this.assertValid(voucher);
    return voucher;
  }

  /** Fresh re-read by id, for checkout-time revalidation. */
  reloadValid(voucherId: number): Voucher {
    const voucher = this.vouchers.getById(voucherId);
    if (!voucher) {
      throw new ValidationError("The voucher attached to this cart no longer exists.");
    }
    this.assertValid(voucher);
    return voucher;
  }

  isValid(voucher: Voucher): boolean {
    return checkVoucher(voucher, this.clock.now()).valid;
  }

  consume(voucher: Voucher): void {
    if (!this.vouchers.incrementUsage(voucher.id, this.clock.now())) {
      throw new ValidationError(`Voucher '${voucher.code}' ${INVALID_MESSAGES.exhausted}.`);
    }
  }

  release(conferenceId: number, code: string): boolean {
    return this.vouchers.decrementUsageByCode(conferenceId, code);
  }

  private assertValid(voucher: Voucher): void {
    const validity = checkVoucher(voucher, this.clock.now());
    if (!validity.valid) {
      throw new ValidationError(`Voucher '${voucher.code}' ${INVALID_MESSAGES[validity.reason]}.`);
    }
  }
}
