import { Request, Response, NextFunction } from "express";

const MASKED_FIELDS = new Set(["password", "confirmPassword"]);

function maskBody(body: Record<string, unknown>) {
  return Object.fromEntries(
    Object.entries(body).map(([key, value]) => [
      key,
      MASKED_FIELDS.has(key) ? "***" : value,
    ])
  );
}

export const requestLogger = (
  req: Request,
  res: Response,
  next: NextFunction
) => {
  const { method, url, body } = req;
  const timestamp = new Date().toISOString();

  const logParts = [`[${timestamp}]`, method, url];

  if (
    ["POST", "PUT", "PATCH"].includes(method.toUpperCase()) &&
    body &&
    typeof body === "object" &&
    Object.keys(body).length
  ) {
    logParts.push(`Body: ${JSON.stringify(maskBody(body))}`);
  }

  console.log(logParts.join(" | "));
  next();
};
