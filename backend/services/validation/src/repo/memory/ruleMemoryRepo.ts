// backend/services/validation/src/repo/memory/ruleMemoryRepo.ts
import { randomUUID } from "node:crypto";
import { ConflictError } from "@shared/problem/problem";
import type { NewRule, ValidationRule } from "../../contracts/rule.contract";
import type { RuleFilter, RuleRepo } from "../types";
import { systemClock, type Clock } from "../../utils/clock";
import { clone } from "./clone";

function matches(rule: ValidationRule, f: RuleFilter): boolean {
  return (
    (f.rule_type === undefined || rule.rule_type === f.rule_type) &&
    (f.scope === undefined || rule.scope === f.scope) &&
    (f.is_active === undefined || rule.is_active === f.is_active) &&
    (f.rule_set_id === undefined || rule.rule_set_id === f.rule_set_id)
  );
}

export class RuleMemoryRepo implements RuleRepo {
  private readonly rows = new Map<string, ValidationRule>();

  public constructor(private readonly now: Clock = systemClock) {}

  public async list(filter: RuleFilter): Promise<ValidationRule[]> {
    return [...this.rows.values()]
      .filter((r) => matches(r, filter))
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
      .map(clone);
  }

  public async get(id: string): Promise<ValidationRule | null> {
    const row = this.rows.get(id);
    return row ? clone(row) : null;
  }

  public async findByName(name: string): Promise<ValidationRule | null> {
    for (const r of this.rows.values()) if (r.name === name) return clone(r);
    return null;
  }

  public async create(input: NewRule): Promise<ValidationRule> {
    if (await this.findByName(input.name)) {
      throw new ConflictError(`Rule "${input.name}" already exists`);
    }
    const at = this.now();
    const rule: ValidationRule = {
      ...input,
      id: randomUUID(),
      is_active: input.is_active ?? true,
      created_at: at,
      updated_at: at,
    };
    this.rows.set(rule.id, clone(rule));
    return rule;
  }

  public async setActive(
    id: string,
    isActive: boolean
  ): Promise<ValidationRule | null> {
    const row = this.rows.get(id);
    if (!row) return null;
    const next = { ...row, is_active: isActive, updated_at: this.now() };
    this.rows.set(id, next);
    return clone(next);
  }

  public async count(filter: RuleFilter): Promise<number> {
    return [...this.rows.values()].filter((r) => matches(r, filter)).length;
  }
}
