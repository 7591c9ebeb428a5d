/**
 * User identity middleware.
 *
 * Authentication happens upstream (gateway / session layer); by the time a
 * request reaches us the authenticated user id is in a trusted header. This
 * middleware only requires it to be present and exposes it to handlers.
 */

import type { NextFunction, Request, RequestHandler, Response } from "express";

const USER_ID_PATTERN = /^[A-Za-z0-9_.:@-]{1,128}$/;

export function createRequireUser(headerName: string): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const value = req.get(headerName)?.trim();
    if (!value || !USER_ID_PATTERN.test(value)) {
      res.status(401).json({
        error: "UNAUTHENTICATED",
        message: `Missing or invalid ${headerName} header`,
      });
      return;
    }
    res.locals.userId = value;
    next();
  };
}

/** The user id set by createRequireUser. Throws if the middleware did not run. */
export function currentUserId(res: Response): string {
  const value: unknown = res.locals.userId;
  if (typeof value !== "string") {
    throw new Error("currentUserId called on a route without requireUser");
  }
  return value;
}
