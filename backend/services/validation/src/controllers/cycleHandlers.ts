// backend/services/validation/src/controllers/cycleHandlers.ts
import type { NextFunction, Request, RequestHandler, Response } from "express";
import { logger } from "@shared/utils/logger";
import type { ValidationDeps } from "../deps";
import { idParamDto, runBodyDto, runQueryDto } from "../validators/validation.dto";
import { callerOf, requestIdOf } from "./context";

export function cycleHandlers(deps: ValidationDeps): {
  run: RequestHandler;
  get: RequestHandler;
  cancel: RequestHandler;
} {
  async function run(req: Request, res: Response, next: NextFunction) {
    const requestId = requestIdOf(req);
    logger.debug({ requestId }, "[CycleHandlers.run] enter");
    try {
      const query = runQueryDto.parse(req.query);
      const body = runBodyDto.parse(req.body);
      const user = callerOf(req, body.tenant_id ?? query.tenant_id);

      const cycle = await deps.cycles.run(
        {
          tenant_id: user.tenantId,
          triggered_by: user.userId,
          rule_set_id: body.rule_set_id ?? null,
        },
        { wait: query.wait }
      );

      res.status(query.wait ? 200 : 202).json({
        validation_cycle_id: cycle.id,
        status: cycle.execution_status,
        message: query.wait
          ? `Validation cycle ${cycle.id} ${cycle.execution_status}`
          : `Validation cycle ${cycle.id} started successfully`,
        cycle,
      });
    } catch (err) {
      logger.debug({ requestId, err }, "[CycleHandlers.run] error");
      next(err);
    }
  }

  async function get(req: Request, res: Response, next: NextFunction) {
    const requestId = requestIdOf(req);
    logger.debug({ requestId }, "[CycleHandlers.get] enter");
    try {
      const { id } = idParamDto.parse(req.params);
      const user = callerOf(req);
      res.json(await deps.cycles.get(user.tenantId, id));
    } catch (err) {
      logger.debug({ requestId, err }, "[CycleHandlers.get] error");
      next(err);
    }
  }

  async function cancel(req: Request, res: Response, next: NextFunction) {
    const requestId = requestIdOf(req);
    logger.debug({ requestId }, "[CycleHandlers.cancel] enter");
    try {
      const { id } = idParamDto.parse(req.params);
      const user = callerOf(req);
      const cycle = await deps.cycles.cancel(user.tenantId, id);
      logger.info(
        { requestId, tenantId: user.tenantId, cycleId: id, userId: user.userId },
        "[CycleHandlers.cancel] cancelled"
      );
      res.json(cycle);
    } catch (err) {
      logger.debug({ requestId, err }, "[CycleHandlers.cancel] error");
      next(err);
    }
  }

  return { run, get, cancel };
}
