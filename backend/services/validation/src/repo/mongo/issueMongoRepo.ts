// backend/services/validation/src/repo/mongo/issueMongoRepo.ts
import type { FilterQuery } from "mongoose";
import type { Severity } from "../../contracts/common";
import type {
  IssueCandidate,
  IssuesPage,
  ValidationIssue,
} from "../../contracts/issue.contract";
import {
  SEVERITY_COUNT_KEY,
  countBySeverity,
} from "../../contracts/issue.contract";
import { issueToDomain } from "../../mappers/validation.mapper";
import {
  ValidationIssueModel,
  type ValidationIssueDoc,
} from "../../models/ValidationIssue";
import type { IssueQuery, IssueRepo } from "../types";

function toFilter(
  tenantId: string,
  q: IssueQuery
): FilterQuery<ValidationIssueDoc> {
  const filter: FilterQuery<ValidationIssueDoc> = { tenant_id: tenantId };
  if (!q.include_resolved) filter.is_resolved = false;
  if (q.severity) filter.severity = q.severity;
  if (q.cycle_id) filter.validation_cycle_id = q.cycle_id;
  if (q.exclude.length > 0) {
    filter.$nor = q.exclude.map((k) =>
      k.rule_id === null
        ? { entity_type: k.entity_type, entity_id: k.entity_id }
        : { entity_type: k.entity_type, entity_id: k.entity_id, rule_id: k.rule_id }
    );
  }
  return filter;
}

export class IssueMongoRepo implements IssueRepo {
  public async insertMany(
    tenantId: string,
    cycleId: string,
    candidates: IssueCandidate[],
    timestamp: Date
  ): Promise<ValidationIssue[]> {
    if (candidates.length === 0) return [];
    const docs = await ValidationIssueModel.insertMany(
      candidates.map((c) => ({
        ...c,
        tenant_id: tenantId,
        validation_cycle_id: cycleId,
        timestamp,
        is_resolved: false,
        resolved_at: null,
        resolved_by: null,
      }))
    );
    return docs.map((d) => issueToDomain(d.toObject()));
  }

  public async page(
    tenantId: string,
    query: IssueQuery,
    skip: number,
    limit: number
  ): Promise<IssuesPage> {
    const filter = toFilter(tenantId, query);
    const [docs, total, grouped] = await Promise.all([
      ValidationIssueModel.find(filter)
        .sort({ timestamp: -1, _id: 1 })
        .skip(skip)
        .limit(limit)
        .lean<ValidationIssueDoc[]>()
        .exec(),
      ValidationIssueModel.countDocuments(filter).exec(),
      ValidationIssueModel.aggregate<{ _id: Severity; n: number }>([
        { $match: filter },
        { $group: { _id: "$severity", n: { $sum: 1 } } },
      ]).exec(),
    ]);

    const counts = countBySeverity([]);
    for (const g of grouped) counts[SEVERITY_COUNT_KEY[g._id]] = g.n;
    return { issues: docs.map(issueToDomain), total_count: total, ...counts };
  }

  public async get(tenantId: string, id: string): Promise<ValidationIssue | null> {
    const doc = await ValidationIssueModel.findOne({ _id: id, tenant_id: tenantId })
      .lean<ValidationIssueDoc>()
      .exec();
    return doc ? issueToDomain(doc) : null;
  }

  public async markResolved(
    tenantId: string,
    id: string,
    resolvedBy: string,
    at: Date
  ): Promise<ValidationIssue | null> {
    const doc = await ValidationIssueModel.findOneAndUpdate(
      { _id: id, tenant_id: tenantId, is_resolved: false },
      { $set: { is_resolved: true, resolved_at: at, resolved_by: resolvedBy } },
      { new: true }
    )
      .lean<ValidationIssueDoc>()
      .exec();
    return doc ? issueToDomain(doc) : null;
  }

  public async countAll(): Promise<number> {
    return ValidationIssueModel.estimatedDocumentCount().exec();
  }

  public async deleteForCycle(tenantId: string, cycleId: string): Promise<void> {
    await ValidationIssueModel.deleteMany({
      tenant_id: tenantId,
      validation_cycle_id: cycleId,
    }).exec();
  }
}
