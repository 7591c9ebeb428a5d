import type { Database } from "better-sqlite3";
import type { CreditRow, CreditStatus } from "../domain/commerce";

export interface NewCredit {
  userId: string;
  conferenceId: number;
  amount: number;
  sourceOrderId?: number | null;
  note?: string | null;
}

export class CreditRepository {
  constructor(private readonly db: Database) {}

  get(id: number): CreditRow | undefined {
    return this.db.prepare<[number], CreditRow>("SELECT * FROM credits WHERE id = ?").get(id);
  }

  insert(credit: NewCredit, now: number): CreditRow {
    const result = this.db
      .prepare(
        `INSERT INTO credits (
           user_id, conference_id, amount, remaining_amount, status, source_order_id, note, created_at, updated_at
         ) VALUES (?, ?, ?, ?, 'available', ?, ?, ?, ?)`
      )
      .run(
        credit.userId,
        credit.conferenceId,
        credit.amount,
        credit.amount,
        credit.sourceOrderId ?? null,
        credit.note ?? null,
        now,
        now
      );
    const row = this.get(Number(result.lastInsertRowid));
    if (!row) {
      throw new Error("credit vanished after insert");
    }
    return row;
  }

  listAvailable(userId: string, conferenceId: number): CreditRow[] {
    return this.db
      .prepare<[string, number], CreditRow>(
        "SELECT * FROM credits WHERE user_id = ? AND conference_id = ? AND status = 'available' ORDER BY id"
      )
      .all(userId, conferenceId);
  }

  update(
    id: number,
    changes: { remainingAmount: number; status: CreditStatus; appliedToOrderId: number | null },
    now: number
  ): void {
    this.db
      .prepare(
        `UPDATE credits
         SET remaining_amount = ?, status = ?, applied_to_order_id = ?, updated_at = ?
         WHERE id = ?`
      )
      .run(changes.remainingAmount, changes.status, changes.appliedToOrderId, now, id);
  }
}
