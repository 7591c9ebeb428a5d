/**
 * Voucher Repository
 *
 * Codes are stored uppercase; lookups uppercase their input so matching is
 * case-insensitive. Usage counters only ever move through single conditional
 * UPDATE statements, never read-modify-write.
 */

import type { Database } from "better-sqlite3";
import type { Voucher, VoucherRow } from "../domain/commerce";

export const normalizeVoucherCode = (code: string): string => code.trim().toUpperCase();

export class VoucherRepository {
  constructor(private readonly db: Database) {}

  getById(id: number): Voucher | undefined {
    const row = this.db.prepare<[number], VoucherRow>("SELECT * FROM vouchers WHERE id = ?").get(id);
    return row ? this.withScope(row) : undefined;
  }

  findByCode(conferenceId: number, code: string): Voucher | undefined {
    const row = this.db
      .prepare<[number, string], VoucherRow>("SELECT * FROM vouchers WHERE conference_id = ? AND code = ?")
      .get(conferenceId, normalizeVoucherCode(code));
    return row ? this.withScope(row) : undefined;
  }

  /**
   * Atomically consume one use. Returns false when the voucher is inactive,
   * exhausted or outside its validity window at `now`.
   */
  incrementUsage(id: number, now: number): boolean {
    const result = this.db
      .prepare(
        `UPDATE vouchers
         SET times_used = times_used + 1
         WHERE id = @id
           AND is_active = 1
           AND times_used < max_uses
           AND (valid_from IS NULL OR valid_from <= @now)
           AND (valid_until IS NULL OR valid_until >= @now)`
      )
      .run({ id, now });
    return result.changes === 1;
  }

  /** Release one use, floored at zero. */
  decrementUsageByCode(conferenceId: number, code: string): boolean {
    const result = this.db
      .prepare(
        `UPDATE vouchers
         SET times_used = times_used - 1
         WHERE conference_id = ? AND code = ? AND times_used > 0`
      )
      .run(conferenceId, normalizeVoucherCode(code));
    return result.changes === 1;
  }

  private withScope(row: VoucherRow): Voucher {
    const ticketTypeIds = this.db
      .prepare<[number], { ticket_type_id: number }>(
        "SELECT ticket_type_id FROM voucher_ticket_types WHERE voucher_id = ? ORDER BY ticket_type_id"
      )
      .all(row.id)
      .map((scope) => scope.ticket_type_id);
    const addonIds = this.db
      .prepare<[number], { addon_id: number }>(
        "SELECT addon_id FROM voucher_addons WHERE voucher_id = ? ORDER BY addon_id"
      )
      .all(row.id)
      .map((scope) => scope.addon_id);

    return { ...row, applicable_ticket_type_ids: ticketTypeIds, applicable_addon_ids: addonIds };
  }
}
