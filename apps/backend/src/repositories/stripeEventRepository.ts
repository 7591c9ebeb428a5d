/**
 * Stripe Event Repository
 *
 * The webhook dedup ledger: one row per distinct Stripe event id, written
 * before any side effect, with a processed flag flipped exactly once.
 * Handler failures land in event_processing_exceptions for replay.
 */

import type { Database } from "better-sqlite3";

export interface StripeEventRow {
  id: number;
  stripe_id: string;
  kind: string;
  conference_id: number | null;
  payload: string;
  processed: number;
  created_at: number;
  processed_at: number | null;
}

export interface EventProcessingExceptionRow {
  id: number;
  stripe_event_id: number | null;
  message: string;
  traceback: string | null;
  created_at: number;
}

export interface ExceptionWithEvent extends EventProcessingExceptionRow {
  stripe_id: string | null;
  kind: string | null;
}

const MAX_MESSAGE_LENGTH = 500;

export class StripeEventRepository {
  constructor(private readonly db: Database) {}

  findByStripeId(stripeId: string): StripeEventRow | undefined {
    return this.db.prepare<[string], StripeEventRow>("SELECT * FROM stripe_events WHERE stripe_id = ?").get(stripeId);
  }

  /** Throws a UNIQUE constraint error when the event id is already recorded. */
  insert(event: { stripeId: string; kind: string; conferenceId: number | null; payload: string }, now: number): StripeEventRow {
    this.db
      .prepare(
        `INSERT INTO stripe_events (stripe_id, kind, conference_id, payload, processed, created_at)
         VALUES (?, ?, ?, ?, 0, ?)`
      )
      .run(event.stripeId, event.kind, event.conferenceId, event.payload, now);
    const row = this.findByStripeId(event.stripeId);
    if (!row) {
      throw new Error(`stripe event ${event.stripeId} vanished after insert`);
    }
    return row;
  }

  isProcessed(id: number): boolean {
    const row = this.db
      .prepare<[number], { processed: number }>("SELECT processed FROM stripe_events WHERE id = ?")
      .get(id);
    return row?.processed === 1;
  }

  markProcessed(id: number, now: number): void {
    this.db.prepare("UPDATE stripe_events SET processed = 1, processed_at = ? WHERE id = ?").run(now, id);
  }

  recordException(eventId: number, error: unknown, now: number): void {
    const message = error instanceof Error ? error.message : String(error);
    const traceback = error instanceof Error ? (error.stack ?? null) : null;
    this.db
      .prepare(
        `INSERT INTO event_processing_exceptions (stripe_event_id, message, traceback, created_at)
         VALUES (?, ?, ?, ?)`
      )
      .run(eventId, message.slice(0, MAX_MESSAGE_LENGTH), traceback, now);
  }

  listExceptions(limit = 100): ExceptionWithEvent[] {
    return this.db
      .prepare<[number], ExceptionWithEvent>(
        `SELECT x.*, e.stripe_id, e.kind
         FROM event_processing_exceptions x
         LEFT JOIN stripe_events e ON e.id = x.stripe_event_id
         ORDER BY x.id DESC
         LIMIT ?`
      )
      .all(limit);
  }

  listExceptionsForEvent(eventId: number): EventProcessingExceptionRow[] {
    return this.db
      .prepare<[number], EventProcessingExceptionRow>(
        "SELECT * FROM event_processing_exceptions WHERE stripe_event_id = ? ORDER BY id"
      )
      .all(eventId);
  }
}
