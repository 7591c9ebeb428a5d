/**
 * HTTP Application Factory
 *
 * Creates the Express app with core middleware and registers feature routers.
 */

import express, { type Express, type NextFunction, type Request, type Response } from "express";
import type { AppContext } from "./context";

import { registerCartRoutes } from "../routes/cart";
import { registerOrderRoutes } from "../routes/orders";
import { registerAdminRoutes } from "../routes/admin";
import { registerWebhookRoutes } from "../routes/webhooks";

const STRIPE_WEBHOOK_PREFIX = "/webhooks/stripe";

export function createApp(ctx: AppContext): Express {
  const app = express();

  // Trust the first proxy hop so req.ip reflects the real client IP.
  app.set("trust proxy", 1);

  // Raw body parser for Stripe webhooks (must come before the json parser):
  // signature verification needs the unparsed body.
  app.use(STRIPE_WEBHOOK_PREFIX, express.raw({ type: "*/*", limit: "1mb" }));
  const jsonParser = express.json({ limit: "1mb" });
  app.use((req: Request, res: Response, next: NextFunction) => {
    if (req.path.startsWith(STRIPE_WEBHOOK_PREFIX)) {
      return next();
    }
    return jsonParser(req, res, next);
  });

  // Keep /api/* dark to crawlers
  app.use("/api", (_req: Request, res: Response, next: NextFunction) => {
    res.setHeader("X-Robots-Tag", "noindex, nofollow");
    next();
  });

  // Refuse new work while draining
  app.use((_req: Request, res: Response, next: NextFunction) => {
    if (ctx.isShuttingDown()) {
      res.setHeader("Connection", "close");
      res.status(503).json({ error: "SHUTTING_DOWN", message: "Server is shutting down" });
      return;
    }
    next();
  });

  app.get("/health", (_req: Request, res: Response) => {
    res.json({ status: "ok", cartExpiryJob: ctx.cartExpiryJob.isActive() });
  });

  registerCartRoutes(app, ctx);
  registerOrderRoutes(app, ctx);
  registerAdminRoutes(app, ctx);
  registerWebhookRoutes(app, ctx);

  // Malformed JSON bodies and other middleware errors
  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: "INVALID_JSON", message: "Request body is not valid JSON" });
      return;
    }
    ctx.logger.error({ err }, "Unhandled middleware error");
    res.status(500).json({ error: "INTERNAL_ERROR", message: "Internal server error" });
  });

  return app;
}
