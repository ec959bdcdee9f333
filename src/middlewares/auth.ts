import { Request, Response, NextFunction } from "express";
import { resolvePrincipal, verifyToken } from "../services/auth";
import {
  AdminPrincipal,
  CustomerPrincipal,
  Principal,
  Role,
  VendorPrincipal,
} from "../types/auth";

export interface AuthRequest extends Request {
  principal?: Principal;
}

const deny = (res: Response, status: number, kind: string, message: string) => {
  res.status(status).json({ isSuccess: false, error: { kind, message } });
};

export const authenticate = async (
  req: AuthRequest,
  res: Response,
  next: NextFunction
): Promise<void> => {
  try {
    const token = req.headers.authorization?.replace(/^Bearer\s+/i, "");

    if (!token) {
      deny(res, 401, "Unauthorized", "Authentication required");
      return;
    }

    const userId = verifyToken(token);
    const principal = userId === undefined ? undefined : await resolvePrincipal(userId);

    if (!principal) {
      deny(res, 401, "Unauthorized", "Invalid token");
      return;
    }

    req.principal = principal;
    next();
  } catch (err) {
    console.error("Error authenticating request:", err);
    deny(res, 500, "Unexpected", "Could not authenticate request");
  }
};

export const requireRole = (...roles: Role[]) => {
  return (req: AuthRequest, res: Response, next: NextFunction): void => {
    if (!req.principal) {
      deny(res, 401, "Unauthorized", "Authentication required");
      return;
    }

    if (!roles.includes(req.principal.role)) {
      deny(res, 403, "Forbidden", "Access denied");
      return;
    }

    next();
  };
};

/**
 * Vendor-only routes. Pending vendors are told to wait for approval,
 * rejected or blocked vendors are turned away.
 */
export const requireApprovedVendor = (
  req: AuthRequest,
  res: Response,
  next: NextFunction
): void => {
  const principal = req.principal;

  if (!principal) {
    deny(res, 401, "Unauthorized", "Authentication required");
    return;
  }
  if (principal.role !== "vendor") {
    deny(res, 403, "Forbidden", "You need to register as a vendor first");
    return;
  }
  if (principal.vendorStatus === "pending") {
    deny(res, 403, "Forbidden", "Your vendor account is pending approval");
    return;
  }
  if (principal.vendorStatus !== "approved") {
    deny(res, 403, "Forbidden", `Your vendor account is ${principal.vendorStatus}`);
    return;
  }

  next();
};

// The guards above run first, so a mismatch here is a wiring mistake.
export function customerOf(req: AuthRequest): CustomerPrincipal {
  if (req.principal?.role !== "customer") {
    throw new Error("Route is missing the customer guard");
  }
  return req.principal;
}

export function vendorOf(req: AuthRequest): VendorPrincipal {
  if (req.principal?.role !== "vendor") {
    throw new Error("Route is missing the vendor guard");
  }
  return req.principal;
}

export function adminOf(req: AuthRequest): AdminPrincipal {
  if (req.principal?.role !== "admin") {
    throw new Error("Route is missing the admin guard");
  }
  return req.principal;
}
