// backend/services/validation/src/services/ruleService.ts
import { logger } from "@shared/utils/logger";
import {
  ConflictError,
  NotFoundError,
  UnprocessableError,
} from "@shared/problem/problem";
import type { NewRule, ValidationRule } from "../contracts/rule.contract";
import { parseRuleLogic } from "../engine/ruleLogic";
import type { RuleFilter, ValidationRepos } from "../repo/types";

export class RuleService {
  public constructor(private readonly repos: ValidationRepos) {}

  public list(filter: RuleFilter = {}): Promise<ValidationRule[]> {
    return this.repos.rules.list(filter);
  }

  public async get(ruleId: string): Promise<ValidationRule> {
    const rule = await this.repos.rules.get(ruleId);
    if (!rule) throw new NotFoundError("Validation rule not found");
    return rule;
  }

  public async create(input: NewRule): Promise<ValidationRule> {
    const parsed = parseRuleLogic(input.rule_logic);
    if (!parsed.ok) {
      throw new UnprocessableError(`Invalid rule_logic: ${parsed.error}`);
    }
    if (await this.repos.rules.findByName(input.name)) {
      throw new ConflictError(`Rule "${input.name}" already exists`);
    }
    const rule = await this.repos.rules.create(input);
    logger.info(
      { ruleId: rule.id, name: rule.name, ruleType: rule.rule_type },
      "[RuleService.create] rule created"
    );
    return rule;
  }

  /** Existing issues raised by the rule are left as they are. */
  public async toggle(ruleId: string, isActive: boolean): Promise<ValidationRule> {
    const rule = await this.repos.rules.setActive(ruleId, isActive);
    if (!rule) throw new NotFoundError("Validation rule not found");
    logger.info(
      { ruleId, isActive },
      "[RuleService.toggle] rule activation changed"
    );
    return rule;
  }
}
