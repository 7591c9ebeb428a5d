/**
 * Admin Routes
 *
 * Staff operations behind requireAdminAuth: manual payments recorded at the
 * desk and store credits issued by the refund workflow.
 */

import type { Express, Request, Response } from "express";
import { z } from "zod";
import type { AppContext } from "../app/context";
import { NotFoundError } from "../domain/errors";
import { createAdminAuth } from "../middleware/adminAuth";
import { parseBody, sendError } from "./errors";

const manualPaymentSchema = z.object({
  amount: z.number().int().positive(),
  reference: z.string().trim().max(200).optional(),
  note: z.string().trim().max(1000).optional(),
});

const issueCreditSchema = z.object({
  userId: z.string().trim().min(1).max(128),
  conferenceSlug: z.string().trim().min(1),
  amount: z.number().int().positive(),
  sourceOrderReference: z.string().trim().min(1).optional(),
  note: z.string().trim().max(1000).optional(),
});

export function registerAdminRoutes(app: Express, ctx: AppContext): void {
  const { catalog, orderLedger } = ctx;
  const log = ctx.logger.child({ module: "admin-routes" });
  const requireAdminAuth = createAdminAuth(ctx.config.adminApiKey, ctx.logger);

  /**
   * POST /api/admin/orders/:reference/manual-payment
   * Cash at the door, bank transfer, etc. Settles the order once fully paid.
   */
  app.post("/api/admin/orders/:reference/manual-payment", requireAdminAuth, async (req: Request, res: Response) => {
    try {
      const body = parseBody(manualPaymentSchema, req.body);
      const order = orderLedger.getOrderByReference(req.params.reference);
      const outcome = await orderLedger.recordManual(order.id, body);
      log.info({ reference: order.reference, amount: body.amount }, "Admin recorded manual payment");
      res.status(201).json({ ok: true, ...outcome });
    } catch (error) {
      sendError(res, error, log);
    }
  });

  app.post("/api/admin/credits", requireAdminAuth, (req: Request, res: Response) => {
    try {
      const body = parseBody(issueCreditSchema, req.body);
      const conference = catalog.getConferenceBySlug(body.conferenceSlug);
      if (!conference) {
        throw new NotFoundError(`Conference '${body.conferenceSlug}' not found.`);
      }
      const sourceOrderId = body.sourceOrderReference
        ? orderLedger.getOrderByReference(body.sourceOrderReference).id
        : null;
      const credit = orderLedger.issueCredit({
        userId: body.userId,
        conferenceId: conference.id,
        amount: body.amount,
        sourceOrderId,
        note: body.note ?? null,
      });
      res.status(201).json({ ok: true, credit });
    } catch (error) {
      sendError(res, error, log);
    }
  });
}
