// backend/services/shared/src/middleware/authenticate.ts
/**
 * Purpose:
 * - Verify the caller's bearer token (HS256) and attach the verified claims to
 *   `req.user`. Tenant and role come from the token only; `X-Tenant-ID` /
 *   `X-Role` style headers are never consulted.
 *
 * Invariants:
 * - Fails closed: missing, malformed, badly signed or expired token → 401.
 * - `user_id` and `tenant_id` claims are required; `role` defaults to Viewer.
 */

import type { RequestHandler } from "express";
import jwt, { type JwtPayload, TokenExpiredError } from "jsonwebtoken";
import { z } from "zod";
import { ForbiddenError, UnauthorizedError } from "../problem/problem";

export const ROLES = ["Owner", "Admin", "Editor", "Viewer"] as const;
export type Role = (typeof ROLES)[number];

/** What lives on req.user after authenticate(). */
export interface AuthUser {
  userId: string;
  tenantId: string;
  role: Role;
}

declare module "express-serve-static-core" {
  interface Request {
    user?: AuthUser;
  }
}

const claimsSchema = z.object({
  user_id: z.string().min(1),
  tenant_id: z.string().min(1),
  role: z.enum(ROLES).default("Viewer"),
});

export type AuthenticateOptions = {
  secret: string;
  /** Clock skew tolerance for exp/nbf, seconds. */
  clockToleranceSec?: number;
};

export function verifyBearer(
  header: string | undefined,
  opts: AuthenticateOptions
): AuthUser {
  if (!header || !header.startsWith("Bearer ")) {
    throw new UnauthorizedError("Missing or malformed Authorization header");
  }
  const token = header.slice(7).trim();
  if (!token) throw new UnauthorizedError("Missing bearer token");

  let decoded: string | JwtPayload;
  try {
    decoded = jwt.verify(token, opts.secret, {
      algorithms: ["HS256"],
      clockTolerance: opts.clockToleranceSec ?? 0,
    });
  } catch (err) {
    if (err instanceof TokenExpiredError) {
      throw new UnauthorizedError("Token has expired");
    }
    throw new UnauthorizedError("Invalid token");
  }

  if (typeof decoded === "string") {
    throw new UnauthorizedError("Invalid token payload");
  }

  const parsed = claimsSchema.safeParse(decoded);
  if (!parsed.success) {
    throw new UnauthorizedError("Invalid token: missing user_id or tenant_id");
  }

  return {
    userId: parsed.data.user_id,
    tenantId: parsed.data.tenant_id,
    role: parsed.data.role,
  };
}

export function authenticate(opts: AuthenticateOptions): RequestHandler {
  if (!opts.secret) {
    throw new Error("authenticate: secret is required");
  }
  return (req, _res, next) => {
    try {
      req.user = verifyBearer(req.headers.authorization, opts);
      next();
    } catch (err) {
      next(err);
    }
  };
}

/** Must run after authenticate(). */
export function requireRole(...roles: Role[]): RequestHandler {
  const allowed = new Set<Role>(roles);
  return (req, _res, next) => {
    const user = req.user;
    if (!user) {
      next(new UnauthorizedError());
      return;
    }
    if (!allowed.has(user.role)) {
      next(
        new ForbiddenError(
          `Insufficient permissions. Required roles: ${roles.join(", ")}; user role: ${user.role}`
        )
      );
      return;
    }
    next();
  };
}

/** Narrow req.user for handlers mounted behind authenticate(). */
export function requireUser(user: AuthUser | undefined): AuthUser {
  if (!user) throw new UnauthorizedError();
  return user;
}
