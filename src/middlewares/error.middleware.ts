import { Request, Response, NextFunction } from "express";
import { AppError } from "../utils/errors";
import { logger } from "../utils/logger";
import { exposeError, sendError } from "../utils/response";

export function errorMiddleware(
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction
) {
  const status = err instanceof AppError ? err.status : 500;
  logger.error("Unhandled error", err);
  sendError(
    res,
    err instanceof Error && err.message ? err.message : "Internal Server Error",
    status,
    exposeError(err)
  );
}
