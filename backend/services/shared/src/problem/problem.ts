// backend/services/shared/src/problem/problem.ts
/**
 * Purpose:
 * - Transport-agnostic Problem primitives (RFC 7807).
 * - Single source of truth for:
 *   - ProblemJson wire shape
 *   - HttpError classes thrown by handlers/services and rendered by
 *     errorProblemJson()
 *
 * Invariants:
 * - No Express imports.
 * - No process.env access.
 */

export type ProblemJson = {
  type: string;
  title: string;
  status: number;
  detail?: string;
  code?: string;
  instance?: string;
  errors?: unknown;
};

export class HttpError extends Error {
  public readonly status: number;
  public readonly code: string;
  public readonly title: string;
  public readonly errors?: unknown;

  public constructor(opts: {
    status: number;
    code: string;
    title: string;
    detail: string;
    errors?: unknown;
  }) {
    super(opts.detail);
    this.name = new.target.name;
    this.status = opts.status;
    this.code = opts.code;
    this.title = opts.title;
    this.errors = opts.errors;
  }

  public toProblem(instance?: string): ProblemJson {
    return {
      type: "about:blank",
      title: this.title,
      status: this.status,
      detail: this.message,
      code: this.code,
      instance,
      ...(this.errors !== undefined ? { errors: this.errors } : {}),
    };
  }
}

export class UnauthorizedError extends HttpError {
  public constructor(detail = "Authentication required") {
    super({ status: 401, code: "UNAUTHORIZED", title: "Unauthorized", detail });
  }
}

export class ForbiddenError extends HttpError {
  public constructor(detail = "Insufficient permissions") {
    super({ status: 403, code: "FORBIDDEN", title: "Forbidden", detail });
  }
}

export class NotFoundError extends HttpError {
  public constructor(detail = "Resource not found") {
    super({ status: 404, code: "NOT_FOUND", title: "Not Found", detail });
  }
}

export class ConflictError extends HttpError {
  public constructor(detail: string) {
    super({ status: 409, code: "CONFLICT", title: "Conflict", detail });
  }
}

export class UnprocessableError extends HttpError {
  public constructor(detail: string, errors?: unknown) {
    super({
      status: 422,
      code: "UNPROCESSABLE_ENTITY",
      title: "Unprocessable Entity",
      detail,
      errors,
    });
  }
}

export class ServiceUnavailableError extends HttpError {
  public constructor(detail = "Dependency unavailable") {
    super({
      status: 503,
      code: "SERVICE_UNAVAILABLE",
      title: "Service Unavailable",
      detail,
    });
  }
}

export function isHttpError(err: unknown): err is HttpError {
  return err instanceof HttpError;
}
