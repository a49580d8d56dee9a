// backend/services/validation/src/repo/mongo/ruleMongoRepo.ts
import type { FilterQuery } from "mongoose";
import { ConflictError } from "@shared/problem/problem";
import type { NewRule, ValidationRule } from "../../contracts/rule.contract";
import { ruleToDomain } from "../../mappers/validation.mapper";
import {
  ValidationRuleModel,
  type ValidationRuleDoc,
} from "../../models/ValidationRule";
import type { RuleFilter, RuleRepo } from "../types";
import { isDuplicateKeyError } from "./errors";

function toFilter(f: RuleFilter): FilterQuery<ValidationRuleDoc> {
  const filter: FilterQuery<ValidationRuleDoc> = {};
  if (f.rule_type !== undefined) filter.rule_type = f.rule_type;
  if (f.scope !== undefined) filter.scope = f.scope;
  if (f.is_active !== undefined) filter.is_active = f.is_active;
  if (f.rule_set_id !== undefined) filter.rule_set_id = f.rule_set_id;
  return filter;
}

export class RuleMongoRepo implements RuleRepo {
  public async list(filter: RuleFilter): Promise<ValidationRule[]> {
    const docs = await ValidationRuleModel.find(toFilter(filter))
      .sort({ name: 1 })
      .lean<ValidationRuleDoc[]>()
      .exec();
    return docs.map(ruleToDomain);
  }

  public async get(id: string): Promise<ValidationRule | null> {
    const doc = await ValidationRuleModel.findById(id)
      .lean<ValidationRuleDoc>()
      .exec();
    return doc ? ruleToDomain(doc) : null;
  }

  public async findByName(name: string): Promise<ValidationRule | null> {
    const doc = await ValidationRuleModel.findOne({ name })
      .lean<ValidationRuleDoc>()
      .exec();
    return doc ? ruleToDomain(doc) : null;
  }

  public async create(input: NewRule): Promise<ValidationRule> {
    try {
      const doc = await ValidationRuleModel.create({
        ...input,
        is_active: input.is_active ?? true,
      });
      return ruleToDomain(doc.toObject());
    } catch (err) {
      if (isDuplicateKeyError(err)) {
        throw new ConflictError(`Rule "${input.name}" already exists`);
      }
      throw err;
    }
  }

  public async setActive(
    id: string,
    isActive: boolean
  ): Promise<ValidationRule | null> {
    const doc = await ValidationRuleModel.findByIdAndUpdate(
      id,
      { $set: { is_active: isActive } },
      { new: true }
    )
      .lean<ValidationRuleDoc>()
      .exec();
    return doc ? ruleToDomain(doc) : null;
  }

  public async count(filter: RuleFilter): Promise<number> {
    return ValidationRuleModel.countDocuments(toFilter(filter)).exec();
  }
}
