/**
 * Cart Routes
 *
 * One open cart per (user, conference). Every response returns the freshly
 * priced cart summary so the client never prices locally.
 *
 *   GET    /api/conferences/:slug/cart
 *   POST   /api/conferences/:slug/cart/tickets        { ticketTypeId, quantity }
 *   POST   /api/conferences/:slug/cart/addons         { addonId, quantity }
 *   PATCH  /api/conferences/:slug/cart/items/:itemId  { quantity }
 *   DELETE /api/conferences/:slug/cart/items/:itemId
 *   POST   /api/conferences/:slug/cart/voucher        { code }
 *   DELETE /api/conferences/:slug/cart/voucher
 *   POST   /api/conferences/:slug/checkout
 */

import type { Express, Request, Response } from "express";
import { z } from "zod";
import type { AppContext } from "../app/context";
import type { CartRow, ConferenceRow } from "../domain/commerce";
import { NotFoundError, ValidationError } from "../domain/errors";
import { createRequireUser, currentUserId } from "../middleware/userIdentity";
import { parseBody, parseIdParam, sendError } from "./errors";

const addTicketSchema = z.object({
  ticketTypeId: z.number().int().positive(),
  quantity: z.number().int().positive().default(1),
});

const addAddonSchema = z.object({
  addonId: z.number().int().positive(),
  quantity: z.number().int().positive().default(1),
});

const updateQuantitySchema = z.object({
  quantity: z.number().int(),
});

const voucherSchema = z.object({
  code: z.string().trim().min(1).max(100),
});

export function registerCartRoutes(app: Express, ctx: AppContext): void {
  const { catalog, carts, cartService, checkoutService } = ctx;
  const log = ctx.logger.child({ module: "cart-routes" });
  const requireUser = createRequireUser(ctx.config.userIdHeader);

  function requireConference(slug: string): ConferenceRow {
    const conference = catalog.getConferenceBySlug(slug);
    if (!conference || !conference.is_active) {
      throw new NotFoundError(`Conference '${slug}' not found.`);
    }
    return conference;
  }

  function openCart(req: Request, res: Response): CartRow {
    const conference = requireConference(req.params.slug);
    return cartService.getOrCreateOpenCart(currentUserId(res), conference.id);
  }

  app.get("/api/conferences/:slug/cart", requireUser, (req: Request, res: Response) => {
    try {
      const cart = openCart(req, res);
      res.json({ ok: true, cart: cartService.getSummary(cart.id) });
    } catch (error) {
      sendError(res, error, log);
    }
  });

  app.post("/api/conferences/:slug/cart/tickets", requireUser, (req: Request, res: Response) => {
    try {
      const body = parseBody(addTicketSchema, req.body);
      const cart = openCart(req, res);
      const item = cartService.addTicket(cart.id, body.ticketTypeId, body.quantity);
      res.status(201).json({ ok: true, item, cart: cartService.getSummary(cart.id) });
    } catch (error) {
      sendError(res, error, log);
    }
  });

  app.post("/api/conferences/:slug/cart/addons", requireUser, (req: Request, res: Response) => {
    try {
      const body = parseBody(addAddonSchema, req.body);
      const cart = openCart(req, res);
      const item = cartService.addAddon(cart.id, body.addonId, body.quantity);
      res.status(201).json({ ok: true, item, cart: cartService.getSummary(cart.id) });
    } catch (error) {
      sendError(res, error, log);
    }
  });

  app.patch("/api/conferences/:slug/cart/items/:itemId", requireUser, (req: Request, res: Response) => {
    try {
      const itemId = parseIdParam(req.params.itemId, "itemId");
      const body = parseBody(updateQuantitySchema, req.body);
      const cart = openCart(req, res);
      const result = cartService.updateQuantity(cart.id, itemId, body.quantity);
      res.json({ ok: true, result, cart: cartService.getSummary(cart.id) });
    } catch (error) {
      sendError(res, error, log);
    }
  });

  app.delete("/api/conferences/:slug/cart/items/:itemId", requireUser, (req: Request, res: Response) => {
    try {
      const itemId = parseIdParam(req.params.itemId, "itemId");
      const cart = openCart(req, res);
      const removed = cartService.removeItem(cart.id, itemId);
      res.json({ ok: true, ...removed, cart: cartService.getSummary(cart.id) });
    } catch (error) {
      sendError(res, error, log);
    }
  });

  app.post("/api/conferences/:slug/cart/voucher", requireUser, (req: Request, res: Response) => {
    try {
      const body = parseBody(voucherSchema, req.body);
      const cart = openCart(req, res);
      const voucher = cartService.applyVoucher(cart.id, body.code);
      res.json({ ok: true, voucherCode: voucher.code, cart: cartService.getSummary(cart.id) });
    } catch (error) {
      sendError(res, error, log);
    }
  });

  app.delete("/api/conferences/:slug/cart/voucher", requireUser, (req: Request, res: Response) => {
    try {
      const cart = openCart(req, res);
      cartService.removeVoucher(cart.id);
      res.json({ ok: true, cart: cartService.getSummary(cart.id) });
    } catch (error) {
      sendError(res, error, log);
    }
  });

  /**
   * POST /api/conferences/:slug/checkout
   * Freezes the user's open cart into a pending order. Does not create a cart
   * when none is open.
   */
  app.post("/api/conferences/:slug/checkout", requireUser, (req: Request, res: Response) => {
    try {
      const conference = requireConference(req.params.slug);
      const cart = carts.findOpen(currentUserId(res), conference.id);
      if (!cart) {
        throw new ValidationError("No open cart to check out.");
      }
      const order = checkoutService.checkout(cart.id);
      res.status(201).json({ ok: true, order });
    } catch (error) {
      sendError(res, error, log);
    }
  });
}
