// backend/services/validation/src/routes/validationRoutes.ts
import { Router } from "express";
import { authenticate, requireRole } from "@shared/middleware/authenticate";
import type { ValidationDeps } from "../deps";
import { cycleHandlers } from "../controllers/cycleHandlers";
import { issueHandlers } from "../controllers/issueHandlers";
import { exceptionHandlers } from "../controllers/exceptionHandlers";
import { ruleHandlers } from "../controllers/ruleHandlers";
import { reportHandlers } from "../controllers/reportHandlers";

export type ValidationRouterOptions = {
  jwtSecret: string;
};

/**
 * Policy:
 * - /health and /metrics are open; everything else needs a bearer token.
 * - Starting/cancelling cycles, exceptions, rule writes and matrix rebuilds
 *   are Admin/Owner only. Resolving issues is open to every role but Viewer.
 */
export function validationRoutes(
  deps: ValidationDeps,
  opts: ValidationRouterOptions
): Router {
  const router = Router();
  const auth = authenticate({ secret: opts.jwtSecret });
  const admin = requireRole("Admin", "Owner");
  const editor = requireRole("Owner", "Admin", "Editor");

  const cycles = cycleHandlers(deps);
  const issues = issueHandlers(deps);
  const exceptions = exceptionHandlers(deps);
  const rules = ruleHandlers(deps);
  const reports = reportHandlers(deps);

  // one-liners only — no logic here
  router.get("/health", reports.health);
  router.get("/metrics", reports.metrics);

  router.post("/run", auth, admin, cycles.run);
  router.get("/cycles/:id", auth, cycles.get);
  router.post("/cycles/:id/cancel", auth, admin, cycles.cancel);

  router.get("/issues", auth, issues.list);
  router.post("/issues/:id/resolve", auth, editor, issues.resolve);

  router.get("/scorecard", auth, reports.scorecard);
  router.get("/traceability-matrix", auth, reports.matrix);
  router.post("/traceability-matrix/rebuild", auth, admin, reports.rebuildMatrix);
  router.get("/history", auth, reports.history);

  router.post("/exceptions", auth, admin, exceptions.create);
  router.get("/exceptions", auth, exceptions.list);
  router.delete("/exceptions/:id", auth, admin, exceptions.revoke);

  router.get("/rules", auth, rules.list);
  router.post("/rules", auth, admin, rules.create);
  router.get("/rules/:id", auth, rules.get);
  router.patch("/rules/:id", auth, admin, rules.toggle);

  return router;
}
