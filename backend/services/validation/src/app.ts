// backend/services/validation/src/app.ts
/**
 * Assembled via the shared builder: requestId → httpLogger → health (open) →
 * parsers → /validation routes → 404 → problem+json.
 */

import type { Express } from "express";
import { createServiceApp } from "@shared/app/createServiceApp";
import type { ReadinessDetails } from "@shared/health";
import type { ValidationDeps } from "./deps";
import { validationRoutes } from "./routes/validationRoutes";
import { SERVICE_NAME } from "./serviceName";

export type CreateAppOptions = {
  jwtSecret: string;
  version?: string;
};

export function createApp(deps: ValidationDeps, opts: CreateAppOptions): Express {
  // Readiness: every probe must pass; the first failure becomes the 503 message.
  async function readiness(): Promise<ReadinessDetails> {
    const details: ReadinessDetails = {};
    for (const [name, probe] of Object.entries(deps.probes)) {
      try {
        await probe();
        details[name] = "ok";
      } catch (err) {
        throw new Error(
          `${name} unavailable: ${err instanceof Error ? err.message : String(err)}`
        );
      }
    }
    return details;
  }

  return createServiceApp({
    serviceName: SERVICE_NAME,
    apiPrefix: "/validation",
    readiness,
    version: opts.version,
    mountRoutes: (api) => {
      api.use(validationRoutes(deps, { jwtSecret: opts.jwtSecret }));
    },
  });
}
