// backend/services/shared/src/app/createServiceApp.ts

/**
 * Purpose:
 * - Assemble the internal service stack in one place:
 *   requestId → http logger → health (open) → json/urlencoded parsers →
 *   routes → 404 → problem+json error handler.
 *
 * Notes:
 * - Authentication is mounted by the service's router, not here, so health
 *   stays open and each route can pick its role guard.
 * - No rate limiting, CORS or proxying here; those belong to the edge.
 */

import express, { type Express } from "express";
import { requestIdMiddleware } from "../middleware/requestId";
import { makeHttpLogger } from "../middleware/httpLogger";
import {
  notFoundProblemJson,
  errorProblemJson,
} from "../middleware/problemJson";
import { createHealthRouter, type ReadinessFn } from "../health";

export type CreateServiceAppOptions = {
  /** Service slug (e.g., "validation"). Used in logs & health payloads. */
  serviceName: string;
  /** API base path (e.g., "/validation"). */
  apiPrefix: string;
  /** Mounts the service's routes onto the provided Router. */
  mountRoutes: (router: express.Router) => void;
  /** Health readiness hook (optional). */
  readiness?: ReadinessFn;
  version?: string;
};

export function createServiceApp(opts: CreateServiceAppOptions): Express {
  const { serviceName, apiPrefix, mountRoutes, readiness, version } = opts;

  const app = express();
  app.disable("x-powered-by");

  // ── Transport & Telemetry ──────────────────────────────────────────────────
  app.use(requestIdMiddleware());
  app.use(makeHttpLogger(serviceName));

  // ── Health (public, no auth) ───────────────────────────────────────────────
  app.use(createHealthRouter({ service: serviceName, readiness, version }));

  // ── Body parsers ───────────────────────────────────────────────────────────
  app.use(express.json({ limit: "1mb" }));
  app.use(express.urlencoded({ extended: false }));

  // ── Routes ─────────────────────────────────────────────────────────────────
  const api = express.Router();
  mountRoutes(api);
  app.use(apiPrefix, api);

  // ── Tails: 404 + error formatter ───────────────────────────────────────────
  app.use(
    notFoundProblemJson([
      apiPrefix,
      "/health",
      "/healthz",
      "/readyz",
      "/live",
      "/ready",
    ])
  );
  app.use(errorProblemJson());

  return app;
}
