import { NextFunction, Request, Response } from "express";
import { z, ZodError, ZodSchema } from "zod";

export function sendValidationError(res: Response, error: ZodError) {
  const flattened = error.flatten();
  const firstMessage =
    flattened.formErrors[0] ??
    Object.values(flattened.fieldErrors).flat()[0] ??
    "Invalid request";
  res.status(400).json({
    isSuccess: false,
    error: {
      kind: "ValidationError",
      message: firstMessage,
      details: flattened,
    },
  });
}

/**
 * Validates the request body against `schema` and replaces it with the
 * parsed value, so handlers see trimmed strings and applied defaults.
 */
export const requestValidator =
  (schema: ZodSchema) => (req: Request, res: Response, next: NextFunction) => {
    const result = schema.safeParse(req.body);
    if (!result.success) {
      sendValidationError(res, result.error);
      return;
    }
    req.body = result.data;
    next();
  };

/**
 * Parses query-string or path values inside a handler. Answers 400 and
 * returns undefined when they do not match.
 */
export function parseRequestPart<S extends ZodSchema>(
  schema: S,
  value: unknown,
  res: Response
): z.infer<S> | undefined {
  const result = schema.safeParse(value);
  if (!result.success) {
    sendValidationError(res, result.error);
    return undefined;
  }
  return result.data;
}
