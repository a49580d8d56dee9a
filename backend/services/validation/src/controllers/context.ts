// backend/services/validation/src/controllers/context.ts
import type { Request } from "express";
import { ForbiddenError } from "@shared/problem/problem";
import { requireUser, type AuthUser } from "@shared/middleware/authenticate";

export function requestIdOf(req: Request): string {
  return req.id !== undefined ? String(req.id) : "";
}

/**
 * The caller's verified identity. A `tenant_id` echoed in the query or body
 * must match the token's tenant.
 */
export function callerOf(req: Request, echoedTenant?: string): AuthUser {
  const user = requireUser(req.user);
  if (echoedTenant !== undefined && echoedTenant !== user.tenantId) {
    throw new ForbiddenError("tenant_id does not match the authenticated tenant");
  }
  return user;
}
