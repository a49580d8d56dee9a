// backend/services/shared/src/utils/s2s/mintS2S.ts
/**
 * Service-to-service bearer tokens.
 *
 * Notes:
 * - HS256, same secret and claim set that authenticate() verifies, so the
 *   receiving service scopes the call to `tenant_id` like any user call.
 * - Role is Viewer: S2S reads only.
 * - TTL clamped to [10, 3600] seconds; default 60.
 */

import jwt from "jsonwebtoken";

export interface MintS2SOptions {
  secret: string;
  /** Caller identity, stamped into `user_id` (e.g. "svc:validation"). */
  subject: string;
  tenantId: string;
  ttlSec?: number;
}

function clampTtl(ttl: number | undefined): number {
  const n = ttl ?? 60;
  return Math.min(3600, Math.max(10, Math.floor(n)));
}

export function mintS2S(opts: MintS2SOptions): string {
  return jwt.sign(
    { user_id: opts.subject, tenant_id: opts.tenantId, role: "Viewer" },
    opts.secret,
    { algorithm: "HS256", expiresIn: clampTtl(opts.ttlSec) }
  );
}

export function s2sAuthHeader(opts: MintS2SOptions): Record<string, string> {
  return { Authorization: `Bearer ${mintS2S(opts)}` };
}
