// backend/services/shared/src/utils/logger.ts
/**
 * Shared Logger (authoritative)
 *
 * Each service MUST call `initLogger(SERVICE_NAME)` at bootstrap
 * BEFORE creating any request loggers (pino-http).
 *
 * Usage:
 *   import { initLogger } from "@shared/utils/logger";
 *   initLogger("validation");
 */

import type { Request } from "express";
import pino, {
  type Logger,
  type LoggerOptions,
  type LevelWithSilent,
  stdTimeFunctions,
} from "pino";

const validLevels = new Set<string>([
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
]);

function isLevel(v: string): v is LevelWithSilent {
  return validLevels.has(v);
}

function requireLevel(): LevelWithSilent {
  const raw = (process.env.LOG_LEVEL ?? "").trim();
  if (!raw) throw new Error("Missing required env var: LOG_LEVEL");
  if (!isLevel(raw)) throw new Error(`Invalid LOG_LEVEL: "${raw}"`);
  return raw;
}

// NOTE: no base.service until initLogger() runs; avoids stamping "unknown".
let SERVICE_NAME = "";

const pinoOptions: LoggerOptions = {
  level: requireLevel(),
  base: {},
  timestamp: stdTimeFunctions.isoTime,
  redact: {
    remove: true,
    paths: ["req.headers.authorization", "req.headers.cookie"],
  },
};

export let logger: Logger = pino(pinoOptions);

/** Initialize the shared logger for this running service. Call once at bootstrap. */
export function initLogger(serviceName: string): void {
  SERVICE_NAME = String(serviceName || "").trim();
  if (!SERVICE_NAME) throw new Error("initLogger requires serviceName");
  logger = pino({ ...pinoOptions, base: { service: SERVICE_NAME } });
}

export function currentServiceName(): string {
  return SERVICE_NAME || "uninitialized";
}

/** Set level dynamically (tests, ops toggles). */
export function setLogLevel(level: string): void {
  if (!isLevel(level)) throw new Error(`Invalid LOG_LEVEL: "${level}"`);
  logger.level = level;
}

export type LogContext = {
  requestId: string | null;
  path: string;
  method: string;
  userId: string | null;
  tenantId: string | null;
  entityId?: string;
  ip?: string;
  service?: string;
};

/** Request context for structured error/audit lines. */
export function extractLogContext(req: Request): LogContext {
  const hdr = req.headers["x-request-id"];
  const hdrId = Array.isArray(hdr) ? hdr[0] : hdr;
  return {
    requestId: req.id !== undefined ? String(req.id) : hdrId ?? null,
    path: req.originalUrl,
    method: req.method,
    userId: req.user?.userId ?? null,
    tenantId: req.user?.tenantId ?? null,
    entityId: req.params?.id,
    ip: req.ip,
    service: SERVICE_NAME || undefined,
  };
}
