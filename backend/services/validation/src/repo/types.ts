// backend/services/validation/src/repo/types.ts
/**
 * Repository seams for the validation service.
 *
 * Two implementations satisfy each interface: `repo/mongo/*` (mongoose) and
 * `repo/memory/*` (VALIDATION_STORE=memory, tests). Every tenant-owned read
 * and write takes the tenant id explicitly; a row of another tenant is
 * indistinguishable from a missing row.
 */

import type {
  ExecutionStatus,
  Layer,
  RuleType,
  Severity,
} from "../contracts/common";
import type {
  CycleOutcome,
  ValidationCycle,
} from "../contracts/cycle.contract";
import type {
  IssueCandidate,
  IssuesPage,
  ValidationIssue,
} from "../contracts/issue.contract";
import type { NewRule, ValidationRule } from "../contracts/rule.contract";
import type {
  NewException,
  ValidationException,
} from "../contracts/exception.contract";
import type {
  LayerScore,
  ValidationScorecard,
} from "../contracts/scorecard.contract";
import type {
  MatrixCell,
  MatrixFilter,
  TraceabilityMatrixRow,
} from "../contracts/matrix.contract";

export type FinalStatus = Exclude<ExecutionStatus, "running">;

export type NewCycle = {
  tenant_id: string;
  triggered_by: string;
  rule_set_id: string | null;
};

export interface CycleRepo {
  create(input: NewCycle): Promise<ValidationCycle>;
  get(tenantId: string, id: string): Promise<ValidationCycle | null>;
  /**
   * Moves a `running` cycle to a terminal state. Returns null when the cycle
   * is unknown or already terminal, so the first transition wins.
   */
  finish(
    tenantId: string,
    id: string,
    status: FinalStatus,
    outcome: CycleOutcome,
    endTime: Date
  ): Promise<ValidationCycle | null>;
  /** Newest first by start_time. */
  page(
    tenantId: string,
    skip: number,
    limit: number
  ): Promise<{ cycles: ValidationCycle[]; total: number }>;
  latestCompleted(tenantId: string): Promise<ValidationCycle | null>;
  countAll(): Promise<number>;
  /** Mean maturity over every completed cycle, all tenants; null when none. */
  averageMaturity(): Promise<number | null>;
  ping(): Promise<void>;
}

/** An (entity, rule?) pair whose issues are hidden from listings. */
export type SuppressionKey = {
  entity_type: string;
  entity_id: string;
  rule_id: string | null;
};

export type IssueQuery = {
  include_resolved: boolean;
  severity?: Severity;
  cycle_id?: string;
  exclude: SuppressionKey[];
};

export interface IssueRepo {
  insertMany(
    tenantId: string,
    cycleId: string,
    candidates: IssueCandidate[],
    timestamp: Date
  ): Promise<ValidationIssue[]>;
  /** Ordered by timestamp desc, then id; counts cover every match. */
  page(
    tenantId: string,
    query: IssueQuery,
    skip: number,
    limit: number
  ): Promise<IssuesPage>;
  get(tenantId: string, id: string): Promise<ValidationIssue | null>;
  /** Resolves an unresolved issue; null when it is missing or already resolved. */
  markResolved(
    tenantId: string,
    id: string,
    resolvedBy: string,
    at: Date
  ): Promise<ValidationIssue | null>;
  countAll(): Promise<number>;
  /** Drops every issue a cycle wrote. */
  deleteForCycle(tenantId: string, cycleId: string): Promise<void>;
}

export type RuleFilter = {
  rule_type?: RuleType;
  scope?: Layer;
  is_active?: boolean;
  rule_set_id?: string;
};

export interface RuleRepo {
  /** Ordered by name. */
  list(filter: RuleFilter): Promise<ValidationRule[]>;
  get(id: string): Promise<ValidationRule | null>;
  findByName(name: string): Promise<ValidationRule | null>;
  /** Throws ConflictError when the name is taken. */
  create(input: NewRule): Promise<ValidationRule>;
  setActive(id: string, isActive: boolean): Promise<ValidationRule | null>;
  count(filter: RuleFilter): Promise<number>;
}

export interface ExceptionRepo {
  create(tenantId: string, input: NewException): Promise<ValidationException>;
  /** Newest first. */
  list(
    tenantId: string,
    opts: { include_inactive: boolean }
  ): Promise<ValidationException[]>;
  get(tenantId: string, id: string): Promise<ValidationException | null>;
  deactivate(tenantId: string, id: string): Promise<ValidationException | null>;
  countAll(): Promise<number>;
}

export interface ScorecardRepo {
  insertMany(
    tenantId: string,
    cycleId: string,
    scores: LayerScore[]
  ): Promise<ValidationScorecard[]>;
  /** Layer reporting order. */
  listForCycle(tenantId: string, cycleId: string): Promise<ValidationScorecard[]>;
  deleteForCycle(tenantId: string, cycleId: string): Promise<void>;
}

export interface MatrixRepo {
  /** Replaces the tenant's rows as a set. */
  replace(
    tenantId: string,
    cells: MatrixCell[],
    at: Date
  ): Promise<TraceabilityMatrixRow[]>;
  list(tenantId: string, filter: MatrixFilter): Promise<TraceabilityMatrixRow[]>;
}

export interface ValidationRepos {
  cycles: CycleRepo;
  issues: IssueRepo;
  rules: RuleRepo;
  exceptions: ExceptionRepo;
  scorecards: ScorecardRepo;
  matrix: MatrixRepo;
}
