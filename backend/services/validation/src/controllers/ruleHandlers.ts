// backend/services/validation/src/controllers/ruleHandlers.ts
import type { NextFunction, Request, RequestHandler, Response } from "express";
import { logger } from "@shared/utils/logger";
import type { ValidationDeps } from "../deps";
import {
  createRuleDto,
  idParamDto,
  listRulesQueryDto,
  toggleRuleDto,
} from "../validators/validation.dto";
import { callerOf, requestIdOf } from "./context";

export function ruleHandlers(deps: ValidationDeps): {
  list: RequestHandler;
  get: RequestHandler;
  create: RequestHandler;
  toggle: RequestHandler;
} {
  async function list(req: Request, res: Response, next: NextFunction) {
    const requestId = requestIdOf(req);
    logger.debug({ requestId }, "[RuleHandlers.list] enter");
    try {
      const q = listRulesQueryDto.parse(req.query);
      res.json(await deps.rules.list(q));
    } catch (err) {
      logger.debug({ requestId, err }, "[RuleHandlers.list] error");
      next(err);
    }
  }

  async function get(req: Request, res: Response, next: NextFunction) {
    const requestId = requestIdOf(req);
    logger.debug({ requestId }, "[RuleHandlers.get] enter");
    try {
      const { id } = idParamDto.parse(req.params);
      res.json(await deps.rules.get(id));
    } catch (err) {
      logger.debug({ requestId, err }, "[RuleHandlers.get] error");
      next(err);
    }
  }

  async function create(req: Request, res: Response, next: NextFunction) {
    const requestId = requestIdOf(req);
    logger.debug({ requestId }, "[RuleHandlers.create] enter");
    try {
      const body = createRuleDto.parse(req.body);
      res.status(201).json(await deps.rules.create(body));
    } catch (err) {
      logger.debug({ requestId, err }, "[RuleHandlers.create] error");
      next(err);
    }
  }

  async function toggle(req: Request, res: Response, next: NextFunction) {
    const requestId = requestIdOf(req);
    logger.debug({ requestId }, "[RuleHandlers.toggle] enter");
    try {
      const { id } = idParamDto.parse(req.params);
      const { is_active } = toggleRuleDto.parse(req.body);
      const user = callerOf(req);
      const rule = await deps.rules.toggle(id, is_active);
      const action = is_active ? "activated" : "deactivated";
      logger.info(
        { requestId, ruleId: id, userId: user.userId, action },
        "[RuleHandlers.toggle] rule toggled"
      );
      res.json({
        message: `Validation rule ${action} successfully`,
        rule_id: rule.id,
        is_active: rule.is_active,
        rule,
      });
    } catch (err) {
      logger.debug({ requestId, err }, "[RuleHandlers.toggle] error");
      next(err);
    }
  }

  return { list, get, create, toggle };
}
