import { rateLimit } from "express-rate-limit";
import { Request, Response, NextFunction } from "express";
import type { AppConfig } from "../configs/environment";
import { sendError } from "../utils/response";

export const createRateLimiter = ({ windowMs, max }: AppConfig["api"]["rateLimit"]) =>
  rateLimit({
    windowMs,
    limit: max,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (_req, res) => {
      sendError(res, "Too many plan requests, slow down", 429, "Too Many Requests");
    },
  });

/** Plan creation only accepts JSON bodies. */
export const requireJsonBody = (req: Request, res: Response, next: NextFunction): void => {
  if (req.method !== "GET" && !req.is("application/json")) {
    sendError(res, "Content-Type must be application/json", 415, "Invalid Content-Type");
    return;
  }
  next();
};
