import bcrypt from "bcryptjs";
import jwt from "jsonwebtoken";
import { z } from "zod";
import { getSQLClient } from "../db";
import { config } from "../config";
import { BCRYPT_ROUNDS } from "../types/constants";
import { Principal } from "../types/auth";
import { fail, ok, ServiceResult } from "../types/result";
import { LoginRequest, RegisterRequest } from "../validations/auth";
import { notify, welcomeEmail } from "./notifications";

const ZTokenPayload = z.object({ userId: z.number().int().positive() });

export interface AuthSession {
  token: string;
  principal: Principal;
}

export function issueToken(userId: number): string {
  return jwt.sign({ userId }, config.jwtSecret, {
    expiresIn: config.jwtExpiresInSeconds,
  });
}

export function verifyToken(token: string): number | undefined {
  try {
    const parsed = ZTokenPayload.safeParse(jwt.verify(token, config.jwtSecret));
    return parsed.success ? parsed.data.userId : undefined;
  } catch (err) {
    console.warn("Rejected bearer token:", err instanceof Error ? err.message : err);
    return undefined;
  }
}

export function hashPassword(password: string): Promise<string> {
  return bcrypt.hash(password, BCRYPT_ROUNDS);
}

/**
 * Resolves the role of an account once per request: the admin flag wins,
 * then a vendor profile, otherwise the account is a customer.
 */
export async function resolvePrincipal(userId: number): Promise<Principal | undefined> {
  const user = await getSQLClient()
    .selectFrom("users")
    .leftJoin("vendors", "vendors.user_id", "users.id")
    .select([
      "users.id",
      "users.username",
      "users.email",
      "users.is_admin",
      "vendors.id as vendor_id",
      "vendors.status as vendor_status",
    ])
    .where("users.id", "=", userId)
    .executeTakeFirst();

  if (!user) {
    return undefined;
  }

  const identity = { userId: user.id, username: user.username, email: user.email };

  if (user.is_admin) {
    return { role: "admin", ...identity };
  }
  if (user.vendor_id !== null && user.vendor_status !== null) {
    return {
      role: "vendor",
      ...identity,
      vendorId: user.vendor_id,
      vendorStatus: user.vendor_status,
    };
  }
  return { role: "customer", ...identity };
}

export async function findRegistrationConflicts(
  username: string,
  email: string
): Promise<string[]> {
  const errors: string[] = [];

  const existingUsername = await getSQLClient()
    .selectFrom("users")
    .select("id")
    .where("username", "=", username)
    .executeTakeFirst();
  if (existingUsername) {
    errors.push("Username already exists");
  }

  if (email) {
    const existingEmail = await getSQLClient()
      .selectFrom("users")
      .select("id")
      .where("email", "=", email)
      .executeTakeFirst();
    if (existingEmail) {
      errors.push("Email already registered");
    }
  }

  return errors;
}

export async function registerCustomer(
  request: RegisterRequest
): Promise<ServiceResult<AuthSession>> {
  const { username, email, password } = request;

  const conflicts = await findRegistrationConflicts(username, email);
  if (conflicts.length > 0) {
    return fail("ValidationError", conflicts[0], conflicts);
  }

  const user = await getSQLClient()
    .insertInto("users")
    .values({
      username,
      email,
      password_hash: await hashPassword(password),
      full_name: request.fullName ?? null,
    })
    .returning(["id", "username", "email"])
    .executeTakeFirstOrThrow();

  console.log(`Registered customer ${user.username} (#${user.id})`);

  if (user.email) {
    await notify(welcomeEmail(user.username, user.email));
  }

  return ok({
    token: issueToken(user.id),
    principal: {
      role: "customer",
      userId: user.id,
      username: user.username,
      email: user.email,
    },
  });
}

export async function login(request: LoginRequest): Promise<ServiceResult<AuthSession>> {
  const user = await getSQLClient()
    .selectFrom("users")
    .select(["id", "password_hash"])
    .where("username", "=", request.username)
    .executeTakeFirst();

  if (!user || !(await bcrypt.compare(request.password, user.password_hash))) {
    return fail("Unauthorized", "Invalid username or password");
  }

  const principal = await resolvePrincipal(user.id);
  if (!principal) {
    return fail("Unauthorized", "Invalid username or password");
  }

  if (
    principal.role === "vendor" &&
    (principal.vendorStatus === "rejected" || principal.vendorStatus === "blocked")
  ) {
    return fail("Forbidden", `Your vendor account is ${principal.vendorStatus}`);
  }

  return ok({ token: issueToken(user.id), principal });
}
