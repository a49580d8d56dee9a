// backend/services/validation/src/engine/ruleEvaluator.ts
/**
 * Pure rule evaluation: (rules, elements, now) → per-rule results.
 *
 * - No I/O, no clock reads; the cycle start time is passed in.
 * - Targets are visited in id order so output is stable across runs.
 * - `min_count` is only checked for a tenant that has elements.
 * - A rule whose logic does not parse is reported `failed` with its error and
 *   contributes no candidates; the remaining rules still run.
 */

import type { RuleType } from "../contracts/common";
import type { ArchitectureElement } from "../contracts/element.contract";
import type { IssueCandidate } from "../contracts/issue.contract";
import type { ValidationRule } from "../contracts/rule.contract";
import { ElementGraph, holds, missingFields } from "./predicates";
import { parseRuleLogic, type RuleLogic } from "./ruleLogic";

export type RuleResult = {
  rule_id: string;
  rule_name: string;
  rule_type: RuleType;
  status: "passed" | "flagged" | "failed";
  targets_checked: number;
  candidates: IssueCandidate[];
  error: string | null;
};

function byId(a: ArchitectureElement, b: ArchitectureElement): number {
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

function render(
  template: string,
  el: ArchitectureElement,
  missing: string[]
): string {
  return template
    .replaceAll("{name}", el.name || "Unknown")
    .replaceAll("{type}", el.type)
    .replaceAll("{id}", el.id)
    .replaceAll("{missing_fields}", missing.join(", "));
}

function selectTargets(
  logic: RuleLogic,
  rule: ValidationRule,
  elements: readonly ArchitectureElement[]
): ArchitectureElement[] {
  const { element_type, layer } = logic.target;
  // With no explicit target, a rule applies to its own scope.
  const effectiveLayer =
    element_type === undefined && layer === undefined ? rule.scope : layer;
  return elements
    .filter(
      (el) =>
        (element_type === undefined || el.type === element_type) &&
        (effectiveLayer === undefined || el.layer === effectiveLayer)
    )
    .sort(byId);
}

export function evaluateRule(
  rule: ValidationRule,
  graph: ElementGraph,
  now: Date
): RuleResult {
  const base = {
    rule_id: rule.id,
    rule_name: rule.name,
    rule_type: rule.rule_type,
  };

  const parsed = parseRuleLogic(rule.rule_logic);
  if (!parsed.ok) {
    return {
      ...base,
      status: "failed",
      targets_checked: 0,
      candidates: [],
      error: parsed.error,
    };
  }

  const logic = parsed.logic;
  const targets = selectTargets(logic, rule, graph.elements);
  const candidates: IssueCandidate[] = [];

  // A tenant with no elements at all has nothing to count yet.
  if (
    logic.min_count !== undefined &&
    graph.elements.length > 0 &&
    targets.length < logic.min_count
  ) {
    const what = logic.target.element_type ?? logic.target.layer ?? rule.scope;
    candidates.push({
      rule_id: rule.id,
      entity_type: logic.target.element_type ?? "element",
      entity_id: "count_check",
      layer: logic.target.layer ?? rule.scope,
      issue_type: "missing_link",
      severity: rule.severity,
      description: `Insufficient ${what} elements: ${targets.length} found, ${logic.min_count} required`,
      recommended_fix: `Create at least ${logic.min_count} ${what} element(s)`,
      metadata: {
        rule_name: rule.name,
        actual_count: targets.length,
        required_count: logic.min_count,
      },
    });
  }

  for (const el of targets) {
    if (holds(logic.assert, el, graph, now)) continue;
    const missing = missingFields(logic.assert, el);
    candidates.push({
      rule_id: rule.id,
      entity_type: el.type,
      entity_id: el.id,
      layer: el.layer,
      issue_type: logic.issue_type,
      severity: rule.severity,
      description: render(
        logic.description ?? `{name} ({type}) violates rule "${rule.name}"`,
        el,
        missing
      ),
      recommended_fix: logic.recommended_fix
        ? render(logic.recommended_fix, el, missing)
        : null,
      metadata: {
        rule_name: rule.name,
        element_name: el.name,
        ...(missing.length > 0 ? { missing_fields: missing } : {}),
      },
    });
  }

  return {
    ...base,
    status: candidates.length > 0 ? "flagged" : "passed",
    targets_checked: targets.length,
    candidates,
    error: null,
  };
}

/** Evaluates every rule against one tenant's elements, in the order given. */
export function evaluate(
  rules: readonly ValidationRule[],
  elements: readonly ArchitectureElement[],
  now: Date
): RuleResult[] {
  const graph = new ElementGraph(elements);
  return rules.map((rule) => evaluateRule(rule, graph, now));
}
