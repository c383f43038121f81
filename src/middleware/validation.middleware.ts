import { Request, Response, NextFunction, RequestHandler } from "express";
import { ZodError, ZodSchema } from "zod";

type RequestPart = "body" | "query" | "params";

const FAILURE_MESSAGES: Record<RequestPart, string> = {
  body: "Validation failed",
  query: "Query validation failed",
  params: "Path validation failed",
};

const toDetails = (error: ZodError) =>
  error.issues.map((issue) => ({
    field: issue.path.join("."),
    message: issue.message,
  }));

/**
 * Parse one part of the request with `schema`. Parsed bodies replace
 * `req.body`, parsed queries land on `req.validatedQuery`; path
 * parameters are only checked.
 */
const validatePart = (part: RequestPart, schema: ZodSchema): RequestHandler => {
  return (req: Request, res: Response, next: NextFunction): void => {
    schema
      .safeParseAsync(req[part] ?? {})
      .then((result) => {
        if (!result.success) {
          res.status(400).json({
            error: FAILURE_MESSAGES[part],
            details: toDetails(result.error),
          });
          return;
        }

        if (part === "body") req.body = result.data;
        if (part === "query") req.validatedQuery = result.data;
        next();
      })
      .catch(next);
  };
};

export const validate = (schema: ZodSchema): RequestHandler => validatePart("body", schema);

export const validateQuery = (schema: ZodSchema): RequestHandler =>
  validatePart("query", schema);

export const validateParams = (schema: ZodSchema): RequestHandler =>
  validatePart("params", schema);
