import { rateLimit } from "express-rate-limit";
import { Request, Response, NextFunction } from "express";
import { AppConfig } from "../configs/environment";

export const createRateLimiter = (config: AppConfig["api"]["rateLimit"]) =>
  rateLimit({
    windowMs: config.windowMs,
    limit: config.max,
    message: {
      success: false,
      error: "Too Many Requests",
      message: "Rate limit exceeded. Please try again later.",
    },
    standardHeaders: true,
    legacyHeaders: false,
  });

export const validateContentType = (
  req: Request,
  res: Response,
  next: NextFunction
): void => {
  const hasBody = req.headers["content-length"] !== "0" && req.headers["content-length"] !== undefined;
  if (["POST", "PUT", "PATCH"].includes(req.method) && hasBody) {
    if (!req.is("application/json")) {
      res.status(415).json({
        success: false,
        error: "Invalid Content-Type",
        message: "Content-Type must be application/json",
      });
      return;
    }
  }
  next();
};
