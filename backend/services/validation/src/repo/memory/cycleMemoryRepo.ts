// backend/services/validation/src/repo/memory/cycleMemoryRepo.ts
import { randomUUID } from "node:crypto";
import type {
  CycleOutcome,
  ValidationCycle,
} from "../../contracts/cycle.contract";
import type { CycleRepo, FinalStatus, NewCycle } from "../types";
import { systemClock, type Clock } from "../../utils/clock";
import { clone } from "./clone";

export class CycleMemoryRepo implements CycleRepo {
  private readonly rows = new Map<string, ValidationCycle>();

  public constructor(private readonly now: Clock = systemClock) {}

  public async create(input: NewCycle): Promise<ValidationCycle> {
    const at = this.now();
    const cycle: ValidationCycle = {
      id: randomUUID(),
      tenant_id: input.tenant_id,
      start_time: at,
      end_time: null,
      triggered_by: input.triggered_by,
      rule_set_id: input.rule_set_id,
      total_issues_found: 0,
      suppressed_issues: 0,
      rules_evaluated: 0,
      elements_checked: 0,
      execution_status: "running",
      maturity_score: null,
      error: null,
      created_at: at,
      updated_at: at,
    };
    this.rows.set(cycle.id, clone(cycle));
    return cycle;
  }

  public async get(tenantId: string, id: string): Promise<ValidationCycle | null> {
    const row = this.rows.get(id);
    return row && row.tenant_id === tenantId ? clone(row) : null;
  }

  public async finish(
    tenantId: string,
    id: string,
    status: FinalStatus,
    outcome: CycleOutcome,
    endTime: Date
  ): Promise<ValidationCycle | null> {
    const row = this.rows.get(id);
    if (!row || row.tenant_id !== tenantId) return null;
    if (row.execution_status !== "running") return null;
    const next: ValidationCycle = {
      ...row,
      ...outcome,
      execution_status: status,
      end_time: endTime,
      updated_at: this.now(),
    };
    this.rows.set(id, next);
    return clone(next);
  }

  public async page(
    tenantId: string,
    skip: number,
    limit: number
  ): Promise<{ cycles: ValidationCycle[]; total: number }> {
    const all = this.forTenant(tenantId).sort(
      (a, b) => b.start_time.getTime() - a.start_time.getTime()
    );
    return { cycles: all.slice(skip, skip + limit).map(clone), total: all.length };
  }

  public async latestCompleted(tenantId: string): Promise<ValidationCycle | null> {
    const done = this.forTenant(tenantId)
      .filter((c) => c.execution_status === "completed")
      .sort(
        (a, b) => (b.end_time?.getTime() ?? 0) - (a.end_time?.getTime() ?? 0)
      );
    return done[0] ? clone(done[0]) : null;
  }

  public async countAll(): Promise<number> {
    return this.rows.size;
  }

  public async averageMaturity(): Promise<number | null> {
    const scores: number[] = [];
    for (const c of this.rows.values()) {
      if (c.execution_status === "completed" && c.maturity_score !== null) {
        scores.push(c.maturity_score);
      }
    }
    if (scores.length === 0) return null;
    return scores.reduce((s, v) => s + v, 0) / scores.length;
  }

  public async ping(): Promise<void> {}

  private forTenant(tenantId: string): ValidationCycle[] {
    return [...this.rows.values()].filter((c) => c.tenant_id === tenantId);
  }
}
