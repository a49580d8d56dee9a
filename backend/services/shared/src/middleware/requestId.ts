// backend/services/shared/src/middleware/requestId.ts

/**
 * Shared Request ID middleware.
 *
 * Notes:
 * - Order matters. This must run before any logger or error formatter so every
 *   line carries the same correlation key.
 * - Idempotent: never overwrite a caller-supplied ID. A UUID is minted only
 *   when the request lacks all recognized headers.
 * - Headers honored: `x-request-id`, `x-correlation-id`, `x-amzn-trace-id`.
 *   The response always echoes `x-request-id`.
 */

import type { RequestHandler } from "express";
import { randomUUID } from "node:crypto";

export function requestIdMiddleware(): RequestHandler {
  return (req, res, next) => {
    const hdr =
      req.headers["x-request-id"] ||
      req.headers["x-correlation-id"] ||
      req.headers["x-amzn-trace-id"];

    const id = String((Array.isArray(hdr) ? hdr[0] : hdr) || randomUUID());

    req.id = id;
    res.setHeader("x-request-id", id);

    next();
  };
}
