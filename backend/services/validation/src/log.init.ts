// backend/services/validation/src/log.init.ts
import { initLogger } from "@shared/utils/logger";
import { SERVICE_NAME } from "./bootstrap";

/**
 * Side-effect module: tags the shared logger with this service's name.
 * Import once, right after ./bootstrap, at the top of index.ts.
 */
initLogger(SERVICE_NAME);
