// backend/services/validation/src/repo/memory/issueMemoryRepo.ts
import { randomUUID } from "node:crypto";
import type {
  IssueCandidate,
  IssuesPage,
  ValidationIssue,
} from "../../contracts/issue.contract";
import { countBySeverity } from "../../contracts/issue.contract";
import type { IssueQuery, IssueRepo, SuppressionKey } from "../types";
import { clone } from "./clone";

function excluded(issue: ValidationIssue, keys: SuppressionKey[]): boolean {
  return keys.some(
    (k) =>
      k.entity_type === issue.entity_type &&
      k.entity_id === issue.entity_id &&
      (k.rule_id === null || k.rule_id === issue.rule_id)
  );
}

export class IssueMemoryRepo implements IssueRepo {
  private readonly rows = new Map<string, ValidationIssue>();

  public async insertMany(
    tenantId: string,
    cycleId: string,
    candidates: IssueCandidate[],
    timestamp: Date
  ): Promise<ValidationIssue[]> {
    const out: ValidationIssue[] = [];
    for (const c of candidates) {
      const issue: ValidationIssue = {
        ...c,
        id: randomUUID(),
        tenant_id: tenantId,
        validation_cycle_id: cycleId,
        timestamp,
        is_resolved: false,
        resolved_at: null,
        resolved_by: null,
      };
      this.rows.set(issue.id, clone(issue));
      out.push(issue);
    }
    return out;
  }

  public async page(
    tenantId: string,
    query: IssueQuery,
    skip: number,
    limit: number
  ): Promise<IssuesPage> {
    const matching = [...this.rows.values()]
      .filter(
        (i) =>
          i.tenant_id === tenantId &&
          (query.include_resolved || !i.is_resolved) &&
          (query.severity === undefined || i.severity === query.severity) &&
          (query.cycle_id === undefined ||
            i.validation_cycle_id === query.cycle_id) &&
          !excluded(i, query.exclude)
      )
      .sort(
        (a, b) =>
          b.timestamp.getTime() - a.timestamp.getTime() ||
          (a.id < b.id ? -1 : a.id > b.id ? 1 : 0)
      );

    return {
      issues: matching.slice(skip, skip + limit).map(clone),
      total_count: matching.length,
      ...countBySeverity(matching),
    };
  }

  public async get(tenantId: string, id: string): Promise<ValidationIssue | null> {
    const row = this.rows.get(id);
    return row && row.tenant_id === tenantId ? clone(row) : null;
  }

  public async markResolved(
    tenantId: string,
    id: string,
    resolvedBy: string,
    at: Date
  ): Promise<ValidationIssue | null> {
    const row = this.rows.get(id);
    if (!row || row.tenant_id !== tenantId || row.is_resolved) return null;
    const next: ValidationIssue = {
      ...row,
      is_resolved: true,
      resolved_at: at,
      resolved_by: resolvedBy,
    };
    this.rows.set(id, next);
    return clone(next);
  }

  public async countAll(): Promise<number> {
    return this.rows.size;
  }

  public async deleteForCycle(tenantId: string, cycleId: string): Promise<void> {
    for (const [id, row] of this.rows) {
      if (row.tenant_id === tenantId && row.validation_cycle_id === cycleId) {
        this.rows.delete(id);
      }
    }
  }
}
