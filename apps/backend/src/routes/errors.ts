import type { Response } from "express";
import type { Logger } from "pino";
import type { ZodType, ZodTypeDef } from "zod";
import { isCommerceError, ValidationError } from "../domain/errors";

/**
 * Map an error onto the JSON error body. CommerceErrors carry their own status
 * and code; anything else is logged and reported as a generic 500.
 */
export function sendError(res: Response, error: unknown, logger: Logger): void {
  if (isCommerceError(error)) {
    if (error.status >= 500) {
      logger.error({ err: error, code: error.code }, error.message);
    }
    res.status(error.status).json({ error: error.code, message: error.message });
    return;
  }
  logger.error({ err: error }, "Unhandled error in request");
  res.status(500).json({ error: "INTERNAL_ERROR", message: "Internal server error" });
}

/** Validate a request body; failures become a 400 ValidationError listing the offending fields. */
export function parseBody<T>(schema: ZodType<T, ZodTypeDef, unknown>, body: unknown): T {
  const result = schema.safeParse(body ?? {});
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
      .join("; ");
    throw new ValidationError(`Invalid request body: ${detail}`);
  }
  return result.data;
}

/** Positive integer route parameter (ids). */
export function parseIdParam(value: string, name: string): number {
  if (!/^\d+$/.test(value)) {
    throw new ValidationError(`${name} must be a positive integer.`);
  }
  return Number(value);
}
