// backend/services/validation/src/services/issueService.ts
import { NotFoundError } from "@shared/problem/problem";
import type { Severity } from "../contracts/common";
import type { IssuesPage, ValidationIssue } from "../contracts/issue.contract";
import type { Clock } from "../utils/clock";
import type { ValidationRepos } from "../repo/types";
import { SuppressionSet } from "./exceptionOverlay";

export type ListIssuesOptions = {
  skip: number;
  limit: number;
  include_resolved?: boolean;
  severity?: Severity;
  cycle_id?: string;
};

export class IssueService {
  public constructor(
    private readonly repos: ValidationRepos,
    private readonly clock: Clock
  ) {}

  /** Issues hidden by an effective exception are left out of page and counts. */
  public async list(tenantId: string, opts: ListIssuesOptions): Promise<IssuesPage> {
    const exceptions = await this.repos.exceptions.list(tenantId, {
      include_inactive: false,
    });
    const overlay = new SuppressionSet(exceptions, this.clock());
    return this.repos.issues.page(
      tenantId,
      {
        include_resolved: opts.include_resolved ?? false,
        severity: opts.severity,
        cycle_id: opts.cycle_id,
        exclude: overlay.keys(),
      },
      opts.skip,
      opts.limit
    );
  }

  /** Idempotent: resolving twice returns the first resolution unchanged. */
  public async resolve(
    tenantId: string,
    issueId: string,
    resolvedBy: string
  ): Promise<ValidationIssue> {
    const existing = await this.repos.issues.get(tenantId, issueId);
    if (!existing) throw new NotFoundError("Validation issue not found");
    if (existing.is_resolved) return existing;

    const resolved = await this.repos.issues.markResolved(
      tenantId,
      issueId,
      resolvedBy,
      this.clock()
    );
    if (resolved) return resolved;

    // Lost a race with a concurrent resolve; the stored state is authoritative.
    const current = await this.repos.issues.get(tenantId, issueId);
    if (!current) throw new NotFoundError("Validation issue not found");
    return current;
  }
}
