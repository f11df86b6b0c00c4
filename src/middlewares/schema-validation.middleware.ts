import { Request, Response, NextFunction } from "express";
import { ZodError, ZodType } from "zod";
import { InputValidationError } from "../utils/errors";

type RequestSchemas = {
  body?: ZodType<unknown>;
  params?: ZodType<Record<string, string>>;
};

const joinIssues = (error: ZodError) =>
  error.issues.map((issue) => issue.message).join(", ");

/**
 * Replaces `req.body` and `req.params` with their parsed values. Problems are
 * forwarded to the error middleware as an `InputValidationError`.
 */
export const validateRequest =
  (schemas: RequestSchemas) => (req: Request, _res: Response, next: NextFunction) => {
    if (schemas.body) {
      const parsed = schemas.body.safeParse(req.body);
      if (!parsed.success) {
        return next(new InputValidationError(joinIssues(parsed.error)));
      }
      req.body = parsed.data;
    }

    if (schemas.params) {
      const parsed = schemas.params.safeParse(req.params);
      if (!parsed.success) {
        return next(new InputValidationError(joinIssues(parsed.error)));
      }
      req.params = parsed.data;
    }

    return next();
  };
