// backend/services/shared/src/health.ts

/**
 * Purpose:
 * - Liveness and readiness at stable, public URLs with a compact shape.
 * - Liveness answers "is the process up?" (no dependencies).
 * - Readiness answers "can this instance take traffic?"; a throwing readiness
 *   hook turns into 503 with the failing dependency's message.
 *
 * Exposes:
 *   GET /health         -> liveness
 *   GET /health/live    -> liveness
 *   GET /health/ready   -> readiness
 *   GET /healthz        -> k8s-style liveness
 *   GET /readyz         -> k8s-style readiness
 *   GET /live, /ready   -> relative forms
 */

import express from "express";

export type ReadinessDetails = Record<string, unknown>;
export type ReadinessFn = () => Promise<ReadinessDetails> | ReadinessDetails;

type Options = {
  service: string;
  env?: string;
  version?: string;
  readiness?: ReadinessFn;
};

export function createHealthRouter(opts: Options): express.Router {
  const router = express.Router();

  const base = {
    service: opts.service,
    env: opts.env ?? process.env.NODE_ENV,
    version: opts.version,
  };

  const liveness: express.RequestHandler = (req, res) => {
    res.json({ ...base, ok: true, instance: req.id });
  };

  const readiness: express.RequestHandler = (req, res, next) => {
    Promise.resolve(opts.readiness ? opts.readiness() : {})
      .then((details) => {
        res.json({ ...base, ok: true, instance: req.id, ...details });
      })
      .catch((err: unknown) => {
        res.status(503).json({
          ...base,
          ok: false,
          instance: req.id,
          error: err instanceof Error ? err.message : String(err),
        });
      })
      .catch(next);
  };

  router.get("/health", liveness);
  router.get("/health/live", liveness);
  router.get("/health/ready", readiness);
  router.get("/healthz", liveness);
  router.get("/readyz", readiness);
  router.get("/live", liveness);
  router.get("/ready", readiness);

  return router;
}
