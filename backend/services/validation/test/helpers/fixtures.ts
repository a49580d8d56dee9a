// backend/services/validation/test/helpers/fixtures.ts
import type { Express } from "express";
import {
  elementContract,
  type ArchitectureElement,
  type ArchitectureElementInput,
} from "../../src/contracts/element.contract";
import type { NewRule, ValidationRule } from "../../src/contracts/rule.contract";
import { createApp } from "../../src/app";
import { createValidationDeps, type ValidationDeps } from "../../src/deps";
import {
  StaticElementSource,
  type ElementSource,
} from "../../src/elements/elementSource";
import type { EventPublisher, ValidationEvent } from "../../src/events/publisher";
import { createMemoryRepos } from "../../src/repo/memory";
import { TEST_SECRET } from "./tokens";

export const T0 = new Date("2026-01-15T12:00:00.000Z");

/** Clock the test can move. */
export function manualClock(start: Date = T0): {
  now: () => Date;
  advance: (ms: number) => void;
  set: (d: Date) => void;
} {
  let t = start.getTime();
  return {
    now: () => new Date(t),
    advance: (ms) => {
      t += ms;
    },
    set: (d) => {
      t = d.getTime();
    },
  };
}

export class RecordingPublisher implements EventPublisher {
  public readonly events: ValidationEvent[] = [];

  public async publish(event: ValidationEvent): Promise<void> {
    this.events.push(event);
  }

  public types(): string[] {
    return this.events.map((e) => e.type);
  }
}

/**
 * Six elements across all layers:
 * - G1 goal with no links; G2 goal realizes C1
 * - C1 capability serves AS1; AS1 runs_on N1
 * - W1 workpackage delivers a missing application service
 */
export function sampleElements(): ArchitectureElementInput[] {
  return [
    { id: "G1", type: "goal", name: "Grow revenue" },
    {
      id: "G2",
      type: "goal",
      name: "Reduce churn",
      relationships: [
        { target_id: "C1", target_type: "capability", relationship_type: "realizes" },
      ],
    },
    {
      id: "C1",
      type: "capability",
      name: "Payments",
      properties: { owner: "team-a", description: "Take payments" },
      relationships: [
        {
          target_id: "AS1",
          target_type: "application_service",
          relationship_type: "serves",
        },
      ],
    },
    {
      id: "AS1",
      type: "application_service",
      name: "Billing API",
      properties: { owner: "team-b" },
      relationships: [
        { target_id: "N1", target_type: "node", relationship_type: "runs_on" },
      ],
    },
    { id: "N1", type: "node", name: "k8s-prod" },
    {
      id: "W1",
      type: "workpackage",
      name: "Migrate billing",
      last_modified: new Date("2025-01-01T00:00:00.000Z"),
      relationships: [
        {
          target_id: "missing-id",
          target_type: "application_service",
          relationship_type: "delivers",
        },
      ],
    },
  ];
}

export const goalToCapabilityRule: NewRule = {
  name: "goal-realized-by-capability",
  description: "Every goal is realized by at least one capability",
  rule_type: "traceability",
  scope: "Motivation",
  severity: "high",
  rule_set_id: "core",
  rule_logic: JSON.stringify({
    source_type: "goal",
    target_type: "capability",
    relationship_type: "realizes",
    min_connections: 1,
  }),
};

export type TestHarness = {
  app: Express;
  deps: ValidationDeps;
  source: StaticElementSource;
  events: RecordingPublisher;
  clock: ReturnType<typeof manualClock>;
};

export function buildHarness(
  opts: {
    elements?: Record<string, ArchitectureElementInput[]>;
    source?: ElementSource;
    cycleTimeoutMs?: number;
  } = {}
): TestHarness {
  const clock = manualClock();
  const source = new StaticElementSource(opts.elements ?? {});
  const events = new RecordingPublisher();
  const deps = createValidationDeps({
    repos: createMemoryRepos(clock.now),
    elements: opts.source ?? source,
    events,
    clock: clock.now,
    cycleTimeoutMs: opts.cycleTimeoutMs ?? 5_000,
  });
  const app = createApp(deps, { jwtSecret: TEST_SECRET });
  return { app, deps, source, events, clock };
}

/** A promise settled from outside, for holding a fake mid-call. */
export function deferred<T = void>(): {
  promise: Promise<T>;
  resolve: (value: T) => void;
} {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

/** A stored rule, for pure engine and scoring tests. */
export function makeRule(
  overrides: Partial<ValidationRule> & Pick<ValidationRule, "id" | "rule_logic">
): ValidationRule {
  return {
    name: overrides.id,
    description: "",
    rule_type: "traceability",
    scope: "Motivation",
    is_active: true,
    severity: "medium",
    rule_set_id: null,
    created_at: T0,
    updated_at: T0,
    ...overrides,
  };
}

export function parseElements(
  inputs: ArchitectureElementInput[] = sampleElements()
): ArchitectureElement[] {
  return inputs.map((e) => elementContract.parse(e));
}
