import { Request, Response, NextFunction } from "express";
import { logger } from "../utils/logger";
import { CoachError, errorMessage } from "../utils/errors";
import { sendError } from "../utils/response";

export function errorMiddleware(
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
) {
  if (err instanceof CoachError) {
    const log: (message: string) => typeof logger = err.status >= 500 ? logger.error : logger.warn;
    log.call(logger, `${req.method} ${req.originalUrl} failed (${err.kind}): ${err.message}`);
    return sendError(
      res,
      err.message,
      err.status,
      err.kind,
      err.hints.length > 0 ? err.hints : undefined
    );
  }

  logger.error("Unhandled error", err);
  return sendError(res, errorMessage(err) || "Internal Server Error", 500);
}
