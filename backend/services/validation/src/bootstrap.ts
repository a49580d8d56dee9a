// backend/services/validation/src/bootstrap.ts
/**
 * Load envs via the shared cascade (repo → family → service) and assert the
 * minimum required variables before anything else imports config.
 */

import { loadEnvCascadeForService, assertEnv } from "@shared/env";

export { SERVICE_NAME } from "./serviceName";

// 1) Shared env cascade (later wins)
loadEnvCascadeForService(__dirname);

// 2) Fail fast on required envs
assertEnv([
  "LOG_LEVEL",
  "VALIDATION_PORT",
  "VALIDATION_JWT_SECRET",
  "VALIDATION_STORE",
]);
