/**
 * Webhook Routes
 *
 * Stripe deliveries arrive per conference, since each conference has its own
 * signing secret. The endpoint always answers 200 { received: true }: a bad
 * signature or a handler failure is our problem to inspect (logs, exception
 * audit rows, replay), not Stripe's to retry.
 *
 * Raw body parsing for /webhooks/stripe is configured in app/http.ts.
 */

import type { Express, Request, Response } from "express";
import { z } from "zod";
import type { AppContext } from "../app/context";
import { createAdminAuth } from "../middleware/adminAuth";
import { sendError } from "./errors";

const exceptionsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(100),
});

export function registerWebhookRoutes(app: Express, ctx: AppContext): void {
  const { webhookDispatcher } = ctx;
  const log = ctx.logger.child({ module: "webhook-routes" });
  const requireAdminAuth = createAdminAuth(ctx.config.adminApiKey, ctx.logger);

  /**
   * POST /webhooks/stripe/:conferenceSlug/
   * req.body is the raw Buffer (express.raw) so the signature can be checked.
   */
  app.post("/webhooks/stripe/:conferenceSlug", async (req: Request, res: Response) => {
    const rawBody: unknown = req.body;
    const payload = Buffer.isBuffer(rawBody) ? rawBody : Buffer.alloc(0);
    try {
      const result = await webhookDispatcher.handleDelivery(
        req.params.conferenceSlug,
        payload,
        req.get("stripe-signature")
      );
      log.debug({ conferenceSlug: req.params.conferenceSlug, ...result }, "Stripe webhook handled");
    } catch (error) {
      log.error({ err: error, conferenceSlug: req.params.conferenceSlug }, "Stripe webhook delivery errored");
    }
    res.json({ received: true });
  });

  /**
   * POST /api/admin/webhooks/events/:stripeId/replay
   * Re-run an unprocessed stored event after fixing whatever made it fail.
   */
  app.post("/api/admin/webhooks/events/:stripeId/replay", requireAdminAuth, async (req: Request, res: Response) => {
    try {
      const result = await webhookDispatcher.replayEvent(req.params.stripeId);
      res.json({ ok: true, ...result });
    } catch (error) {
      sendError(res, error, log);
    }
  });

  app.get("/api/admin/webhooks/exceptions", requireAdminAuth, (req: Request, res: Response) => {
    const parsed = exceptionsQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json({ error: "VALIDATION_ERROR", message: "limit must be an integer between 1 and 500" });
      return;
    }
    res.json({ ok: true, exceptions: webhookDispatcher.listExceptions(parsed.data.limit) });
  });
}
