import { NextFunction, Request, Response } from "express";
import { ZodError } from "zod";
import { isAppError } from "../utils/errors";
import { logger } from "../utils/logger";
import { sendError } from "../utils/response";

/** Unknown paths get the same envelope as every other failure. */
export function notFoundMiddleware(req: Request, res: Response) {
  sendError(res, `Route ${req.method} ${req.path} not found`, 404);
}

export function errorMiddleware(
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction
) {
  if (isAppError(err)) {
    if (err.status >= 500) {
      logger.error(err.message, err);
    } else {
      logger.warn(`${err.name}: ${err.message}`);
    }
    return sendError(res, err.message, err.status, err.name);
  }

  if (err instanceof ZodError) {
    const message = err.errors.map((e) => e.message).join(", ");
    return sendError(res, message, 400, "ValidationError");
  }

  // body-parser marks malformed JSON with a 400 status
  if (err instanceof SyntaxError && "status" in err && err.status === 400) {
    return sendError(res, "Malformed JSON body", 400, "ValidationError");
  }

  logger.error("Unhandled error", err);
  const detail =
    process.env.NODE_ENV === "development" && err instanceof Error ? err.message : undefined;
  return sendError(res, "Internal Server Error", 500, detail);
}
