// backend/services/validation/src/services/cycleController.ts
/**
 * Validation cycle lifecycle.
 *
 * run(): persist a `running` cycle, start the task in the background and
 * return at once (or await the terminal state with `wait`).
 *
 * Task: active rules → elements → evaluate → exception overlay → persist
 * issues → scorecards + maturity → matrix → `completed`.
 *
 * Terminal states:
 * - completed
 * - failed: any error, or the cycle timeout firing
 * - cancelled: cancel() while running
 * The first terminal transition wins (CycleRepo.finish is conditional).
 *
 * Once evaluation is done the cycle commits: the timeout is cleared, cancel()
 * answers 409, and issues + scorecards are written. If the cycle was ended
 * elsewhere in the meantime, the written rows are deleted again, so only a
 * completed cycle ever owns issues or scorecards.
 */

import { logger } from "@shared/utils/logger";
import { ConflictError, NotFoundError } from "@shared/problem/problem";
import { TERMINAL_STATUSES } from "../contracts/common";
import type { CycleOutcome, ValidationCycle } from "../contracts/cycle.contract";
import type { IssueCandidate, ValidationIssue } from "../contracts/issue.contract";
import type { MatrixCell } from "../contracts/matrix.contract";
import type { LayerScore } from "../contracts/scorecard.contract";
import type { ElementSource } from "../elements/elementSource";
import { evaluate } from "../engine/ruleEvaluator";
import {
  publishSafely,
  type EventPublisher,
  type ValidationEventType,
} from "../events/publisher";
import type { Clock } from "../utils/clock";
import type { FinalStatus, ValidationRepos } from "../repo/types";
import { SuppressionSet } from "./exceptionOverlay";
import { buildMatrix } from "./matrixBuilder";
import { computeLayerScores, maturityOf } from "./scoring";
import {
  CycleCancelledError,
  CycleRegistry,
  CycleTimeoutError,
} from "./cycleRegistry";

export type RunCycleInput = {
  tenant_id: string;
  triggered_by: string;
  rule_set_id?: string | null;
};

export type CycleControllerDeps = {
  repos: ValidationRepos;
  elements: ElementSource;
  events: EventPublisher;
  registry: CycleRegistry;
  clock: Clock;
  timeoutMs: number;
};

/** Everything a cycle writes once it commits. */
type CyclePlan = {
  kept: IssueCandidate[];
  layerScores: LayerScore[];
  cells: MatrixCell[];
  outcome: CycleOutcome;
};

const EVENT_BY_STATUS: Record<FinalStatus, ValidationEventType> = {
  completed: "validation.completed",
  failed: "validation.failed",
  cancelled: "validation.cancelled",
};

export class CycleController {
  public constructor(private readonly deps: CycleControllerDeps) {}

  public async run(
    input: RunCycleInput,
    opts: { wait?: boolean } = {}
  ): Promise<ValidationCycle> {
    const { repos, registry } = this.deps;
    const cycle = await repos.cycles.create({
      tenant_id: input.tenant_id,
      triggered_by: input.triggered_by,
      rule_set_id: input.rule_set_id ?? null,
    });
    logger.info(
      { tenantId: cycle.tenant_id, cycleId: cycle.id, triggeredBy: cycle.triggered_by },
      "[CycleController.run] started"
    );

    const controller = new AbortController();
    const done = this.execute(cycle, controller).finally(() =>
      registry.delete(cycle.id)
    );
    registry.add({
      cycleId: cycle.id,
      tenantId: cycle.tenant_id,
      controller,
      committing: false,
      done,
    });

    if (opts.wait) return done;

    void done.catch((err: unknown) => {
      logger.error(
        {
          tenantId: cycle.tenant_id,
          cycleId: cycle.id,
          err: err instanceof Error ? err.message : String(err),
        },
        "[CycleController.run] background task failed"
      );
    });
    return cycle;
  }

  public async get(tenantId: string, cycleId: string): Promise<ValidationCycle> {
    const cycle = await this.deps.repos.cycles.get(tenantId, cycleId);
    if (!cycle) throw new NotFoundError("Validation cycle not found");
    return cycle;
  }

  public async cancel(tenantId: string, cycleId: string): Promise<ValidationCycle> {
    const cycle = await this.get(tenantId, cycleId);
    if (TERMINAL_STATUSES.has(cycle.execution_status)) {
      throw new ConflictError(
        `Validation cycle is already ${cycle.execution_status}`
      );
    }

    const entry = this.deps.registry.get(cycleId);
    if (entry && entry.tenantId === tenantId) {
      if (entry.committing) {
        throw new ConflictError("Validation cycle is already saving its results");
      }
      entry.controller.abort(new CycleCancelledError(cycleId));
      return entry.done;
    }

    // Running in the store but not in this process (e.g. after a restart).
    const finished = await this.finish(cycle, "cancelled", {
      error: "Cancelled; no task was running",
    });
    return finished;
  }

  /** Cancels every in-flight cycle that has not committed and waits for all. */
  public async shutdown(): Promise<void> {
    const entries = this.deps.registry.entries();
    for (const e of entries) {
      if (!e.committing) e.controller.abort(new CycleCancelledError(e.cycleId));
    }
    await Promise.allSettled(entries.map((e) => e.done));
  }

  private async execute(
    cycle: ValidationCycle,
    controller: AbortController
  ): Promise<ValidationCycle> {
    const { timeoutMs, registry } = this.deps;
    const timer = setTimeout(
      () => controller.abort(new CycleTimeoutError(timeoutMs)),
      timeoutMs
    );
    const aborted = new Promise<never>((_, reject) => {
      controller.signal.addEventListener(
        "abort",
        () => reject(controller.signal.reason),
        { once: true }
      );
    });
    // Keep an unobserved rejection from surfacing when the race already settled.
    aborted.catch(() => undefined);

    let committed = false;
    try {
      const plan = await Promise.race([
        this.prepare(cycle, controller.signal),
        aborted,
      ]);
      controller.signal.throwIfAborted();
      clearTimeout(timer);
      registry.markCommitting(cycle.id);
      committed = true;
      return await this.commit(cycle, plan);
    } catch (err) {
      if (committed) await this.discardResults(cycle);
      if (err instanceof CycleCancelledError) {
        return this.finish(cycle, "cancelled", { error: null });
      }
      const message = err instanceof Error ? err.message : String(err);
      logger.warn(
        { tenantId: cycle.tenant_id, cycleId: cycle.id, err: message },
        "[CycleController.execute] cycle failed"
      );
      return this.finish(cycle, "failed", { error: message });
    } finally {
      clearTimeout(timer);
    }
  }

  /** Reads and evaluates; writes nothing, so an abort here leaves no trace. */
  private async prepare(
    cycle: ValidationCycle,
    signal: AbortSignal
  ): Promise<CyclePlan> {
    const { repos, elements: source, clock } = this.deps;
    const tenantId = cycle.tenant_id;

    const rules = await repos.rules.list({
      is_active: true,
      ...(cycle.rule_set_id ? { rule_set_id: cycle.rule_set_id } : {}),
    });
    signal.throwIfAborted();

    const elements = await source.fetchElements(tenantId, { signal });
    signal.throwIfAborted();

    const results = evaluate(rules, elements, cycle.start_time);
    for (const r of results) {
      if (r.status === "failed") {
        logger.warn(
          { tenantId, cycleId: cycle.id, ruleId: r.rule_id, err: r.error },
          "[CycleController.prepare] rule skipped"
        );
      }
    }

    const exceptions = await repos.exceptions.list(tenantId, {
      include_inactive: false,
    });
    const overlay = new SuppressionSet(exceptions, clock());
    const { kept, suppressed } = overlay.partition(
      results.flatMap((r) => r.candidates)
    );

    const layerScores = computeLayerScores(elements, rules, kept);
    return {
      kept,
      layerScores,
      cells: buildMatrix(elements),
      outcome: {
        total_issues_found: kept.length,
        suppressed_issues: suppressed.length,
        rules_evaluated: results.filter((r) => r.status !== "failed").length,
        elements_checked: elements.length,
        maturity_score: maturityOf(layerScores),
        error: null,
      },
    };
  }

  private async commit(
    cycle: ValidationCycle,
    plan: CyclePlan
  ): Promise<ValidationCycle> {
    const { repos, clock } = this.deps;
    const tenantId = cycle.tenant_id;

    const issues = await repos.issues.insertMany(tenantId, cycle.id, plan.kept, clock());
    await repos.scorecards.insertMany(tenantId, cycle.id, plan.layerScores);

    const finished = await repos.cycles.finish(
      tenantId,
      cycle.id,
      "completed",
      plan.outcome,
      clock()
    );
    if (!finished) {
      logger.warn(
        { tenantId, cycleId: cycle.id },
        "[CycleController.commit] cycle ended elsewhere; discarding results"
      );
      await this.discardResults(cycle);
      return this.get(tenantId, cycle.id);
    }

    try {
      await repos.matrix.replace(tenantId, plan.cells, clock());
    } catch (err) {
      // The cycle stands; the matrix can be rebuilt on demand.
      logger.error(
        { tenantId, cycleId: cycle.id, err: err instanceof Error ? err.message : String(err) },
        "[CycleController.commit] traceability matrix not rebuilt"
      );
    }

    await this.publishIssues(finished, issues);
    await this.announce(finished);
    return finished;
  }

  private async discardResults(cycle: ValidationCycle): Promise<void> {
    const { repos } = this.deps;
    await Promise.all([
      repos.issues.deleteForCycle(cycle.tenant_id, cycle.id),
      repos.scorecards.deleteForCycle(cycle.tenant_id, cycle.id),
    ]);
  }

  private async finish(
    cycle: ValidationCycle,
    status: FinalStatus,
    outcome: CycleOutcome
  ): Promise<ValidationCycle> {
    const { repos, clock } = this.deps;
    const finished = await repos.cycles.finish(
      cycle.tenant_id,
      cycle.id,
      status,
      outcome,
      clock()
    );
    if (!finished) {
      // Another transition won; report what is stored.
      return this.get(cycle.tenant_id, cycle.id);
    }
    await this.announce(finished);
    return finished;
  }

  private async publishIssues(
    cycle: ValidationCycle,
    issues: ValidationIssue[]
  ): Promise<void> {
    for (const issue of issues) {
      await publishSafely(this.deps.events, {
        type: "validation.issue_detected",
        tenant_id: cycle.tenant_id,
        validation_cycle_id: cycle.id,
        occurred_at: issue.timestamp.toISOString(),
        payload: {
          issue_id: issue.id,
          entity_type: issue.entity_type,
          entity_id: issue.entity_id,
          issue_type: issue.issue_type,
          severity: issue.severity,
        },
      });
    }
  }

  private async announce(finished: ValidationCycle): Promise<void> {
    const status = finished.execution_status;
    if (status === "running") return;
    logger.info(
      {
        tenantId: finished.tenant_id,
        cycleId: finished.id,
        status,
        issues: finished.total_issues_found,
        maturity: finished.maturity_score,
      },
      "[CycleController.finish] cycle ended"
    );
    await publishSafely(this.deps.events, {
      type: EVENT_BY_STATUS[status],
      tenant_id: finished.tenant_id,
      validation_cycle_id: finished.id,
      occurred_at: (finished.end_time ?? this.deps.clock()).toISOString(),
      payload: {
        execution_status: finished.execution_status,
        total_issues_found: finished.total_issues_found,
        suppressed_issues: finished.suppressed_issues,
        maturity_score: finished.maturity_score,
        error: finished.error,
      },
    });
  }
}
