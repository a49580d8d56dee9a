// backend/services/validation/src/deps.ts
/**
 * Everything a running validation service holds: repositories, element
 * source, event publisher, the in-flight cycle registry and the services built
 * on them. Created once at process start (or per test) and handed to the app.
 */

import type { ElementSource } from "./elements/elementSource";
import { NoopEventPublisher, type EventPublisher } from "./events/publisher";
import type { ValidationRepos } from "./repo/types";
import { CycleController } from "./services/cycleController";
import { CycleRegistry } from "./services/cycleRegistry";
import { ExceptionService } from "./services/exceptionService";
import { IssueService } from "./services/issueService";
import { ReportService } from "./services/reportService";
import { RuleService } from "./services/ruleService";
import { systemClock, type Clock } from "./utils/clock";

export type CreateValidationDepsOptions = {
  repos: ValidationRepos;
  elements: ElementSource;
  events?: EventPublisher;
  clock?: Clock;
  cycleTimeoutMs: number;
  /** Extra readiness probes (e.g. redis ping). */
  probes?: Record<string, () => Promise<void>>;
};

export interface ValidationDeps {
  repos: ValidationRepos;
  elements: ElementSource;
  events: EventPublisher;
  registry: CycleRegistry;
  clock: Clock;
  cycles: CycleController;
  issues: IssueService;
  exceptions: ExceptionService;
  rules: RuleService;
  reports: ReportService;
  probes: Record<string, () => Promise<void>>;
}

export function createValidationDeps(
  opts: CreateValidationDepsOptions
): ValidationDeps {
  const clock = opts.clock ?? systemClock;
  const events = opts.events ?? new NoopEventPublisher();
  const registry = new CycleRegistry();
  const { repos, elements } = opts;

  return {
    repos,
    elements,
    events,
    registry,
    clock,
    cycles: new CycleController({
      repos,
      elements,
      events,
      registry,
      clock,
      timeoutMs: opts.cycleTimeoutMs,
    }),
    issues: new IssueService(repos, clock),
    exceptions: new ExceptionService(repos, clock),
    rules: new RuleService(repos),
    reports: new ReportService({ repos, elements, registry, clock }),
    probes: { datastore: () => repos.cycles.ping(), ...opts.probes },
  };
}
