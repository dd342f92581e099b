import { Request, Response, NextFunction } from "express";
import { ZodTypeAny } from "zod";
import { sendError } from "../utils/response";

type Schemas = {
  body?: ZodTypeAny;
  query?: ZodTypeAny;
  params?: ZodTypeAny;
};

/**
 * Validates and normalises body, query and params in place. Handlers read
 * the parsed values (coerced ids, trimmed strings, defaults applied).
 */
export const validateRequest =
  (schemas: Schemas) => (req: Request, res: Response, next: NextFunction) => {
    if (schemas.params) {
      const parsed = schemas.params.safeParse(req.params);
      if (!parsed.success) {
        const message = parsed.error.errors.map((e) => e.message).join(", ");
        return sendError(res, message, 400, "ValidationError");
      }
      req.params = parsed.data;
    }

    if (schemas.query) {
      const parsed = schemas.query.safeParse(req.query);
      if (!parsed.success) {
        const message = parsed.error.errors.map((e) => e.message).join(", ");
        return sendError(res, message, 400, "ValidationError");
      }
      req.query = parsed.data;
    }

    if (schemas.body) {
      const parsed = schemas.body.safeParse(req.body);
      if (!parsed.success) {
        const message = parsed.error.errors.map((e) => e.message).join(", ");
        return sendError(res, message, 400, "ValidationError");
      }
      req.body = parsed.data;
    }

    return next();
  };
