/**
 * Webhook Dispatcher
 *
 * Turns Stripe deliveries into ledger mutations exactly once:
 *
 *   verify signature → dedup on event id → persist raw event (processed = 0)
 *   → registry lookup → [immediate txn: re-check processed, handle, mark processed]
 *
 * A handler failure rolls back its own writes, leaves the event unprocessed and
 * lands in event_processing_exceptions for replay. The HTTP caller always gets
 * a 200 so Stripe stops retrying; the audit row is the record.
 */

import type { Database } from "better-sqlite3";
import type { Logger } from "pino";
import type { Clock } from "../../domain/clock";
import { NotFoundError } from "../../domain/errors";
import { isUniqueViolation } from "../../db/connection";
import type { CatalogRepository } from "../../repositories/catalogRepository";
import type { ExceptionWithEvent, StripeEventRepository, StripeEventRow } from "../../repositories/stripeEventRepository";
import { deliverOrderPaid, type OrderPaidNotifier } from "../notifications";
import type { PaymentGateway, VerifiedWebhookEvent } from "../stripeGateway";
import { eventEnvelopeSchema } from "./eventSchemas";
import type { HandlerContext, PaymentEventHandlers } from "./paymentHandlers";

export type DeliveryOutcome =
  | "unknown_conference"
  | "not_configured"
  | "invalid_signature"
  | "duplicate"
  | "ignored"
  | "processed"
  | "failed";

export interface DeliveryResult {
  outcome: DeliveryOutcome;
  eventId?: string;
  eventType?: string;
}

export class WebhookDispatcher {
  private readonly logger: Logger;

  constructor(
    private readonly db: Database,
    private readonly catalog: CatalogRepository,
    private readonly events: StripeEventRepository,
    private readonly gateway: PaymentGateway,
    private readonly handlers: PaymentEventHandlers,
    private readonly notifier: OrderPaidNotifier,
    private readonly clock: Clock,
    logger: Logger
  ) {
    this.logger = logger.child({ module: "webhookDispatcher" });
  }

  async handleDelivery(
    conferenceSlug: string,
    rawBody: Buffer | string,
    signature: string | undefined
  ): Promise<DeliveryResult> {
    const conference = this.catalog.getConferenceBySlug(conferenceSlug);
    if (!conference) {
      this.logger.warn({ conferenceSlug }, "Webhook for unknown conference");
      return { outcome: "unknown_conference" };
    }
    if (!this.gateway.isConfigured(conference)) {
      this.logger.warn({ conferenceSlug }, "Webhook received but Stripe is not configured for conference");
      return { outcome: "not_configured" };
    }
    if (!signature) {
      this.logger.warn({ conferenceSlug }, "Webhook missing stripe-signature header");
      return { outcome: "invalid_signature" };
    }

    let verified: VerifiedWebhookEvent;
    try {
      verified = this.gateway.verifyWebhookEvent(conference, rawBody, signature);
    } catch (error) {
      this.logger.warn({ err: error, conferenceSlug }, "Webhook signature verification failed");
      return { outcome: "invalid_signature" };
    }

    const base = { eventId: verified.id, eventType: verified.type };
    if (this.events.findByStripeId(verified.id)) {
      this.logger.info(base, "Webhook event already recorded (duplicate delivery)");
      return { outcome: "duplicate", ...base };
    }

    let row: StripeEventRow;
    try {
      row = this.events.insert(
        { stripeId: verified.id, kind: verified.type, conferenceId: conference.id, payload: verified.payload },
        this.clock.now()
      );
    } catch (error) {
      if (!isUniqueViolation(error)) throw error;
      this.logger.info(base, "Webhook event recorded concurrently (duplicate delivery)");
      return { outcome: "duplicate", ...base };
    }

    return this.process(row);
  }

  /** Re-run an unprocessed stored event, e.g. after fixing the cause of a captured exception. */
  async replayEvent(stripeId: string): Promise<DeliveryResult> {
    const row = this.events.findByStripeId(stripeId);
    if (!row) throw new NotFoundError(`Stripe event ${stripeId} not found.`);
    if (row.processed === 1) {
      return { outcome: "duplicate", eventId: row.stripe_id, eventType: row.kind };
    }
    this.logger.info({ eventId: row.stripe_id, eventType: row.kind }, "Replaying stored webhook event");
    return this.process(row);
  }

  listExceptions(limit?: number): ExceptionWithEvent[] {
    return this.events.listExceptions(limit);
  }

  private async process(row: StripeEventRow): Promise<DeliveryResult> {
    const base = { eventId: row.stripe_id, eventType: row.kind };
    const handler = this.handlers.lookup(row.kind);
    if (!handler) {
      this.logger.debug(base, "Unhandled webhook event type");
      return { outcome: "ignored", ...base };
    }

    const context: HandlerContext = { eventId: row.stripe_id, paidOrders: [] };
    try {
      const alreadyProcessed = this.db
        .transaction(() => {
          if (this.events.isProcessed(row.id)) return true;
          const envelope = eventEnvelopeSchema.parse(JSON.parse(row.payload));
          handler(envelope.data.object, context);
          this.events.markProcessed(row.id, this.clock.now());
          return false;
        })
        .immediate();
      if (alreadyProcessed) {
        return { outcome: "duplicate", ...base };
      }
    } catch (error) {
      this.events.recordException(row.id, error, this.clock.now());
      this.logger.error({ err: error, ...base }, "Webhook processing failed");
      return { outcome: "failed", ...base };
    }

    this.logger.info(base, "Webhook event processed");
    await deliverOrderPaid(this.notifier, context.paidOrders, this.logger);
    return { outcome: "processed", ...base };
  }
}
