// backend/services/validation/src/services/reportService.ts
/**
 * Read-side reports: scorecards, traceability matrix, history, metrics.
 */

import { NotFoundError } from "@shared/problem/problem";
import type { ValidationCycle } from "../contracts/cycle.contract";
import type {
  MatrixFilter,
  TraceabilityMatrixRow,
} from "../contracts/matrix.contract";
import type { ScorecardResponse } from "../contracts/scorecard.contract";
import type { ElementSource } from "../elements/elementSource";
import type { Clock } from "../utils/clock";
import type { ValidationRepos } from "../repo/types";
import type { CycleRegistry } from "./cycleRegistry";
import { buildMatrix } from "./matrixBuilder";
import { round4, toScorecardResponse } from "./scoring";

export type HistoryPage = {
  cycles: ValidationCycle[];
  total_cycles: number;
  average_maturity_score: number;
  last_validation_date: Date | null;
};

export type ValidationMetrics = {
  validation_cycles_total: number;
  validation_issues_total: number;
  validation_rules_active: number;
  validation_exceptions_total: number;
  average_maturity_score: number;
  cycles_in_flight: number;
};

export type ReportServiceDeps = {
  repos: ValidationRepos;
  elements: ElementSource;
  registry: CycleRegistry;
  clock: Clock;
};

export class ReportService {
  public constructor(private readonly deps: ReportServiceDeps) {}

  /**
   * Latest completed cycle unless a cycle id is given. Only completed cycles
   * have a scorecard.
   */
  public async scorecard(
    tenantId: string,
    cycleId?: string
  ): Promise<ScorecardResponse> {
    const { cycles, scorecards } = this.deps.repos;
    const cycle = cycleId
      ? await cycles.get(tenantId, cycleId)
      : await cycles.latestCompleted(tenantId);
    if (!cycle) {
      throw new NotFoundError(
        cycleId
          ? "Validation cycle not found"
          : "No completed validation cycle for this tenant"
      );
    }
    if (cycle.execution_status !== "completed") {
      throw new NotFoundError("No scorecard for this cycle");
    }
    const layers = await scorecards.listForCycle(tenantId, cycle.id);
    return toScorecardResponse(tenantId, cycle.id, cycle.maturity_score, layers);
  }

  public matrix(
    tenantId: string,
    filter: MatrixFilter
  ): Promise<TraceabilityMatrixRow[]> {
    return this.deps.repos.matrix.list(tenantId, filter);
  }

  public async rebuildMatrix(tenantId: string): Promise<TraceabilityMatrixRow[]> {
    const elements = await this.deps.elements.fetchElements(tenantId);
    return this.deps.repos.matrix.replace(
      tenantId,
      buildMatrix(elements),
      this.deps.clock()
    );
  }

  public async history(
    tenantId: string,
    skip: number,
    limit: number
  ): Promise<HistoryPage> {
    const { cycles } = this.deps.repos;
    const [page, latest] = await Promise.all([
      cycles.page(tenantId, skip, limit),
      cycles.latestCompleted(tenantId),
    ]);
    const scores = page.cycles
      .filter((c) => c.execution_status === "completed")
      .map((c) => c.maturity_score)
      .filter((s): s is number => s !== null);
    return {
      cycles: page.cycles,
      total_cycles: page.total,
      average_maturity_score:
        scores.length > 0
          ? round4(scores.reduce((s, v) => s + v, 0) / scores.length)
          : 0,
      last_validation_date: latest?.end_time ?? null,
    };
  }

  public async metrics(): Promise<ValidationMetrics> {
    const { cycles, issues, rules, exceptions } = this.deps.repos;
    const [cycleCount, issueCount, activeRules, exceptionCount, avg] =
      await Promise.all([
        cycles.countAll(),
        issues.countAll(),
        rules.count({ is_active: true }),
        exceptions.countAll(),
        cycles.averageMaturity(),
      ]);
    return {
      validation_cycles_total: cycleCount,
      validation_issues_total: issueCount,
      validation_rules_active: activeRules,
      validation_exceptions_total: exceptionCount,
      average_maturity_score: avg === null ? 0 : round4(avg),
      cycles_in_flight: this.deps.registry.size,
    };
  }
}
