/**
 * Admin Authentication Middleware
 *
 * Bearer token authentication for admin API endpoints (manual payments,
 * credits, webhook replay).
 *
 * Usage:
 *   const requireAdminAuth = createAdminAuth(ctx.config.adminApiKey, ctx.logger);
 *   app.post("/api/admin/...", requireAdminAuth, handler);
 */

import { timingSafeEqual } from "node:crypto";
import type { Request, Response, NextFunction, RequestHandler } from "express";
import type { Logger } from "pino";

/**
 * Extract Bearer token from Authorization header.
 * Returns null if header is missing or malformed.
 */
function extractBearerToken(req: Request): string | null {
  const authHeader = req.headers.authorization;
  if (!authHeader) return null;

  const [scheme, token, ...rest] = authHeader.split(" ");
  if (rest.length > 0 || !token || scheme.toLowerCase() !== "bearer") {
    return null;
  }
  return token;
}

function tokensMatch(provided: string, expected: string): boolean {
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  if (a.length !== b.length) return false;
  return timingSafeEqual(a, b);
}

/**
 * Checks Authorization: Bearer <ADMIN_API_KEY>.
 * Fails closed with 503 when no key is configured; 401 on a missing or wrong token.
 * Logs attempts without leaking token values.
 */
export function createAdminAuth(configuredKey: string, baseLogger: Logger): RequestHandler {
  const logger = baseLogger.child({ module: "adminAuth" });

  return (req: Request, res: Response, next: NextFunction): void => {
    if (!configuredKey) {
      logger.warn(
        { path: req.path, method: req.method, ip: req.ip },
        "Admin auth rejected: ADMIN_API_KEY not configured"
      );
      res.status(503).json({
        error: "ADMIN_AUTH_NOT_CONFIGURED",
        message: "Admin API authentication is not configured on this server",
      });
      return;
    }

    const providedToken = extractBearerToken(req);
    if (!providedToken) {
      logger.warn(
        { path: req.path, method: req.method, ip: req.ip },
        "Admin auth rejected: missing or malformed Authorization header"
      );
      res.status(401).json({
        error: "UNAUTHORIZED",
        message: "Missing or malformed Authorization header. Expected: Bearer <token>",
      });
      return;
    }

    if (!tokensMatch(providedToken, configuredKey)) {
      logger.warn({ path: req.path, method: req.method, ip: req.ip }, "Admin auth rejected: invalid token");
      res.status(401).json({
        error: "UNAUTHORIZED",
        message: "Invalid admin API key",
      });
      return;
    }

    next();
  };
}
