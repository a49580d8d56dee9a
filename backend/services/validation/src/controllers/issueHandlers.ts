// backend/services/validation/src/controllers/issueHandlers.ts
import type { NextFunction, Request, RequestHandler, Response } from "express";
import { logger } from "@shared/utils/logger";
import type { ValidationDeps } from "../deps";
import { idParamDto, listIssuesQueryDto } from "../validators/validation.dto";
import { callerOf, requestIdOf } from "./context";

export function issueHandlers(deps: ValidationDeps): {
  list: RequestHandler;
  resolve: RequestHandler;
} {
  async function list(req: Request, res: Response, next: NextFunction) {
    const requestId = requestIdOf(req);
    logger.debug({ requestId }, "[IssueHandlers.list] enter");
    try {
      const q = listIssuesQueryDto.parse(req.query);
      const user = callerOf(req, q.tenant_id);
      const page = await deps.issues.list(user.tenantId, {
        skip: q.skip,
        limit: q.limit,
        include_resolved: q.include_resolved,
        severity: q.severity,
        cycle_id: q.cycle_id,
      });
      logger.debug(
        { requestId, count: page.issues.length, total: page.total_count },
        "[IssueHandlers.list] exit"
      );
      res.json(page);
    } catch (err) {
      logger.debug({ requestId, err }, "[IssueHandlers.list] error");
      next(err);
    }
  }

  async function resolve(req: Request, res: Response, next: NextFunction) {
    const requestId = requestIdOf(req);
    logger.debug({ requestId }, "[IssueHandlers.resolve] enter");
    try {
      const { id } = idParamDto.parse(req.params);
      const user = callerOf(req);
      res.json(await deps.issues.resolve(user.tenantId, id, user.userId));
    } catch (err) {
      logger.debug({ requestId, err }, "[IssueHandlers.resolve] error");
      next(err);
    }
  }

  return { list, resolve };
}
