// backend/services/validation/src/controllers/exceptionHandlers.ts
import type { NextFunction, Request, RequestHandler, Response } from "express";
import { logger } from "@shared/utils/logger";
import type { ValidationDeps } from "../deps";
import {
  createExceptionDto,
  idParamDto,
  listExceptionsQueryDto,
} from "../validators/validation.dto";
import { callerOf, requestIdOf } from "./context";

export function exceptionHandlers(deps: ValidationDeps): {
  create: RequestHandler;
  list: RequestHandler;
  revoke: RequestHandler;
} {
  async function create(req: Request, res: Response, next: NextFunction) {
    const requestId = requestIdOf(req);
    logger.debug({ requestId }, "[ExceptionHandlers.create] enter");
    try {
      const body = createExceptionDto.parse(req.body);
      const user = callerOf(req, body.tenant_id);
      const exception = await deps.exceptions.create(user.tenantId, user.userId, {
        entity_type: body.entity_type,
        entity_id: body.entity_id,
        reason: body.reason,
        rule_id: body.rule_id,
        expires_at: body.expires_at,
      });
      res.status(201).json({
        message: "Validation exception created successfully",
        exception_id: exception.id,
        exception,
      });
    } catch (err) {
      logger.debug({ requestId, err }, "[ExceptionHandlers.create] error");
      next(err);
    }
  }

  async function list(req: Request, res: Response, next: NextFunction) {
    const requestId = requestIdOf(req);
    logger.debug({ requestId }, "[ExceptionHandlers.list] enter");
    try {
      const q = listExceptionsQueryDto.parse(req.query);
      const user = callerOf(req, q.tenant_id);
      res.json(
        await deps.exceptions.list(user.tenantId, {
          include_inactive: q.include_inactive,
        })
      );
    } catch (err) {
      logger.debug({ requestId, err }, "[ExceptionHandlers.list] error");
      next(err);
    }
  }

  async function revoke(req: Request, res: Response, next: NextFunction) {
    const requestId = requestIdOf(req);
    logger.debug({ requestId }, "[ExceptionHandlers.revoke] enter");
    try {
      const { id } = idParamDto.parse(req.params);
      const user = callerOf(req);
      res.json(await deps.exceptions.revoke(user.tenantId, id));
    } catch (err) {
      logger.debug({ requestId, err }, "[ExceptionHandlers.revoke] error");
      next(err);
    }
  }

  return { create, list, revoke };
}
