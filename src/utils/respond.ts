import { Request, Response } from "express";
import { ServiceErrorKind, ServiceResult } from "../types/result";

const STATUS_BY_KIND: Record<ServiceErrorKind, number> = {
  NotFound: 404,
  ValidationError: 400,
  OutOfStock: 409,
  StateConflict: 409,
  Unauthorized: 401,
  Forbidden: 403,
};

export function sendResult<T>(
  res: Response,
  result: ServiceResult<T>,
  successStatus = 200
) {
  if (result.isSuccess) {
    res.status(successStatus).json(result);
    return;
  }
  res.status(STATUS_BY_KIND[result.error.kind]).json(result);
}

/**
 * Wraps an async route so unexpected failures are logged and answered with
 * a generic message instead of leaking internals to the client.
 */
export const routeHandler =
  <R extends Request>(
    failureMessage: string,
    handler: (req: R, res: Response) => Promise<void>
  ) =>
  async (req: R, res: Response) => {
    try {
      await handler(req, res);
    } catch (err) {
      console.error(`${failureMessage}:`, err);
      if (!res.headersSent) {
        res.status(500).json({
          isSuccess: false,
          error: { kind: "Unexpected", message: failureMessage },
        });
      }
    }
  };

export function parseId(value: string | undefined): number | undefined {
  if (!value || !/^\d+$/.test(value)) {
    return undefined;
  }
  return Number(value);
}
