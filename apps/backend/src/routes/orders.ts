/**
 * Order Routes (customer-facing)
 *
 * Orders are addressed by their public reference and are only visible to the
 * user who placed them; anyone else gets a 404. Store credits are listed per
 * conference for the calling user.
 */

import type { Express, Request, Response } from "express";
import type { AppContext } from "../app/context";
import type { OrderWithLines } from "../domain/commerce";
import { NotFoundError } from "../domain/errors";
import { createRequireUser, currentUserId } from "../middleware/userIdentity";
import { parseIdParam, sendError } from "./errors";

export function registerOrderRoutes(app: Express, ctx: AppContext): void {
  const { catalog, credits, orderLedger, paymentService } = ctx;
  const log = ctx.logger.child({ module: "order-routes" });
  const requireUser = createRequireUser(ctx.config.userIdHeader);

  function ownOrder(req: Request, res: Response): OrderWithLines {
    const order = orderLedger.getOrderByReference(req.params.reference);
    if (order.user_id !== currentUserId(res)) {
      throw new NotFoundError(`Order ${req.params.reference} not found.`);
    }
    return order;
  }

  app.get("/api/orders/:reference", requireUser, (req: Request, res: Response) => {
    try {
      const order = ownOrder(req, res);
      res.json({ ok: true, order, payments: orderLedger.listPayments(order.id) });
    } catch (error) {
      sendError(res, error, log);
    }
  });

  app.post("/api/orders/:reference/cancel", requireUser, (req: Request, res: Response) => {
    try {
      const order = ownOrder(req, res);
      const cancelled = orderLedger.cancelOrder(order.id);
      res.json({ ok: true, order: cancelled });
    } catch (error) {
      sendError(res, error, log);
    }
  });

  /**
   * POST /api/orders/:reference/pay
   * Creates a Stripe PaymentIntent for the outstanding balance.
   */
  app.post("/api/orders/:reference/pay", requireUser, async (req: Request, res: Response) => {
    try {
      const order = ownOrder(req, res);
      const payment = await paymentService.initiatePayment(order.id);
      res.status(201).json({ ok: true, ...payment });
    } catch (error) {
      sendError(res, error, log);
    }
  });

  app.post("/api/orders/:reference/comp", requireUser, async (req: Request, res: Response) => {
    try {
      const order = ownOrder(req, res);
      const outcome = await orderLedger.recordComp(order.id);
      res.json({ ok: true, ...outcome });
    } catch (error) {
      sendError(res, error, log);
    }
  });

  /**
   * GET /api/conferences/:slug/credits
   * The caller's store credits that can still be applied at this conference.
   */
  app.get("/api/conferences/:slug/credits", requireUser, (req: Request, res: Response) => {
    try {
      const conference = catalog.getConferenceBySlug(req.params.slug);
      if (!conference) {
        throw new NotFoundError(`Conference '${req.params.slug}' not found.`);
      }
      res.json({ ok: true, credits: credits.listAvailable(currentUserId(res), conference.id) });
    } catch (error) {
      sendError(res, error, log);
    }
  });

  app.post("/api/orders/:reference/credits/:creditId", requireUser, async (req: Request, res: Response) => {
    try {
      const creditId = parseIdParam(req.params.creditId, "creditId");
      const order = ownOrder(req, res);
      const outcome = await orderLedger.applyCredit(order.id, creditId);
      res.json({ ok: true, ...outcome });
    } catch (error) {
      sendError(res, error, log);
    }
  });
}
