// backend/services/shared/src/middleware/problemJson.ts

/**
 * Purpose:
 * - Standardize error responses as RFC 7807 Problem+JSON so clients/tests
 *   can rely on a stable shape across services.
 * - 404s are only formatted as Problem+JSON under known prefixes; anything
 *   else gets a bare 404.
 *
 * Notes:
 * - Transport-level formatting only, no business logic.
 * - 5xx detail is always sanitized; the real message goes to the log with
 *   request context.
 */

import type { ErrorRequestHandler, Request, RequestHandler } from "express";
import { ZodError } from "zod";
import { extractLogContext, logger } from "../utils/logger";
import { HttpError, type ProblemJson } from "../problem/problem";

const SANITIZED_DETAIL = "An unexpected error occurred.";

function instanceOf(req: Request): string | undefined {
  return req.id !== undefined ? String(req.id) : undefined;
}

/** Body-parser and similar libraries tag errors with a numeric status. */
function statusOf(err: unknown): number | null {
  if (typeof err !== "object" || err === null) return null;
  const raw =
    "statusCode" in err ? err.statusCode : "status" in err ? err.status : null;
  const n = typeof raw === "number" ? raw : Number(raw);
  if (!Number.isInteger(n) || n < 400 || n > 599) return null;
  return n;
}

export function toProblem(err: unknown, instance?: string): ProblemJson {
  if (err instanceof HttpError) return err.toProblem(instance);

  if (err instanceof ZodError) {
    return {
      type: "about:blank",
      title: "Unprocessable Entity",
      status: 422,
      detail: "Request validation failed",
      code: "UNPROCESSABLE_ENTITY",
      instance,
      errors: err.flatten(),
    };
  }

  const status = statusOf(err) ?? 500;
  if (status >= 500) {
    return {
      type: "about:blank",
      title: "Internal Server Error",
      status,
      detail: SANITIZED_DETAIL,
      code: "INTERNAL_ERROR",
      instance,
    };
  }
  return {
    type: "about:blank",
    title: "Request Error",
    status,
    detail: err instanceof Error ? err.message : "Request error",
    code: "BAD_REQUEST",
    instance,
  };
}

/**
 * 404 formatter: only emits Problem+JSON for known API/health prefixes.
 */
export function notFoundProblemJson(validPrefixes: string[]): RequestHandler {
  return (req, res) => {
    if (validPrefixes.some((p) => req.path.startsWith(p))) {
      res
        .status(404)
        .type("application/problem+json")
        .json({
          type: "about:blank",
          title: "Not Found",
          status: 404,
          detail: "Route not found",
          code: "ROUTE_NOT_FOUND",
          instance: instanceOf(req),
        } satisfies ProblemJson);
      return;
    }
    res.status(404).end();
  };
}

/**
 * Error formatter: converts any thrown/next(err) into Problem+JSON.
 */
export function errorProblemJson(): ErrorRequestHandler {
  return (err: unknown, req, res, _next) => {
    const problem = toProblem(err, instanceOf(req));
    const ctx = extractLogContext(req);

    if (problem.status >= 500) {
      logger.error(
        {
          ...ctx,
          status: problem.status,
          err:
            err instanceof Error
              ? { type: err.name, msg: err.message, stack: err.stack }
              : err,
        },
        "request error"
      );
    } else {
      logger.debug(
        { ...ctx, status: problem.status, code: problem.code },
        "request rejected"
      );
    }

    res
      .status(problem.status)
      .type("application/problem+json")
      .json(problem);
  };
}
