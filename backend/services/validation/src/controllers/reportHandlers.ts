// backend/services/validation/src/controllers/reportHandlers.ts
import type { NextFunction, Request, RequestHandler, Response } from "express";
import { logger } from "@shared/utils/logger";
import type { ValidationDeps } from "../deps";
import { SERVICE_NAME } from "../serviceName";
import {
  historyQueryDto,
  matrixQueryDto,
  scorecardQueryDto,
} from "../validators/validation.dto";
import { callerOf, requestIdOf } from "./context";

export function reportHandlers(deps: ValidationDeps): {
  scorecard: RequestHandler;
  matrix: RequestHandler;
  rebuildMatrix: RequestHandler;
  history: RequestHandler;
  metrics: RequestHandler;
  health: RequestHandler;
} {
  async function scorecard(req: Request, res: Response, next: NextFunction) {
    const requestId = requestIdOf(req);
    logger.debug({ requestId }, "[ReportHandlers.scorecard] enter");
    try {
      const q = scorecardQueryDto.parse(req.query);
      const user = callerOf(req, q.tenant_id);
      res.json(
        await deps.reports.scorecard(
          user.tenantId,
          q.validation_cycle_id ?? q.cycle_id
        )
      );
    } catch (err) {
      logger.debug({ requestId, err }, "[ReportHandlers.scorecard] error");
      next(err);
    }
  }

  async function matrix(req: Request, res: Response, next: NextFunction) {
    const requestId = requestIdOf(req);
    logger.debug({ requestId }, "[ReportHandlers.matrix] enter");
    try {
      const { tenant_id, ...filter } = matrixQueryDto.parse(req.query);
      const user = callerOf(req, tenant_id);
      res.json(await deps.reports.matrix(user.tenantId, filter));
    } catch (err) {
      logger.debug({ requestId, err }, "[ReportHandlers.matrix] error");
      next(err);
    }
  }

  async function rebuildMatrix(req: Request, res: Response, next: NextFunction) {
    const requestId = requestIdOf(req);
    logger.debug({ requestId }, "[ReportHandlers.rebuildMatrix] enter");
    try {
      const user = callerOf(req);
      const rows = await deps.reports.rebuildMatrix(user.tenantId);
      logger.info(
        { requestId, tenantId: user.tenantId, rows: rows.length },
        "[ReportHandlers.rebuildMatrix] rebuilt"
      );
      res.json(rows);
    } catch (err) {
      logger.debug({ requestId, err }, "[ReportHandlers.rebuildMatrix] error");
      next(err);
    }
  }

  async function history(req: Request, res: Response, next: NextFunction) {
    const requestId = requestIdOf(req);
    logger.debug({ requestId }, "[ReportHandlers.history] enter");
    try {
      const q = historyQueryDto.parse(req.query);
      const user = callerOf(req, q.tenant_id);
      res.json(await deps.reports.history(user.tenantId, q.skip, q.limit));
    } catch (err) {
      logger.debug({ requestId, err }, "[ReportHandlers.history] error");
      next(err);
    }
  }

  async function metrics(_req: Request, res: Response, next: NextFunction) {
    try {
      res.json(await deps.reports.metrics());
    } catch (err) {
      next(err);
    }
  }

  function health(_req: Request, res: Response) {
    res.json({
      status: "healthy",
      service: SERVICE_NAME,
      timestamp: deps.clock().toISOString(),
    });
  }

  return { scorecard, matrix, rebuildMatrix, history, metrics, health };
}
