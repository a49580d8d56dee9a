// backend/services/validation/src/services/scoring.ts
/**
 * Per-layer scorecards and cycle maturity. Pure.
 *
 * For layer L with n elements and rule type c:
 *   flagged_c = distinct entity ids in L with an issue from a rule of type c
 *   score_c   = 1 - flagged_c / max(n, flagged_c, 1)
 * overall = mean(completeness, traceability, alignment); maturity = mean of
 * the five layers' overall. All values rounded to 4 places.
 */

import { LAYERS, type Layer, type RuleType } from "../contracts/common";
import type { ArchitectureElement } from "../contracts/element.contract";
import type { IssueCandidate } from "../contracts/issue.contract";
import { countBySeverity } from "../contracts/issue.contract";
import type { ValidationRule } from "../contracts/rule.contract";
import type {
  LayerScore,
  ScorecardResponse,
  ValidationScorecard,
} from "../contracts/scorecard.contract";

export type ScoredIssue = Pick<
  IssueCandidate,
  "rule_id" | "entity_id" | "layer" | "severity"
>;

export const round4 = (v: number): number => Math.round(v * 10_000) / 10_000;

function score(n: number, flagged: number): number {
  return 1 - flagged / Math.max(n, flagged, 1);
}

export function computeLayerScores(
  elements: readonly Pick<ArchitectureElement, "layer">[],
  rules: readonly Pick<ValidationRule, "id" | "rule_type">[],
  issues: readonly ScoredIssue[]
): LayerScore[] {
  const typeOfRule = new Map<string, RuleType>(rules.map((r) => [r.id, r.rule_type]));

  return LAYERS.map((layer): LayerScore => {
    const n = elements.filter((e) => e.layer === layer).length;
    const inLayer = issues.filter((i) => i.layer === layer);

    const flagged: Record<RuleType, Set<string>> = {
      completeness: new Set(),
      traceability: new Set(),
      alignment: new Set(),
    };
    for (const i of inLayer) {
      const type = i.rule_id === null ? undefined : typeOfRule.get(i.rule_id);
      if (type) flagged[type].add(i.entity_id);
    }

    const completeness = score(n, flagged.completeness.size);
    const traceability = score(n, flagged.traceability.size);
    const alignment = score(n, flagged.alignment.size);
    const counts = countBySeverity(inLayer);

    return {
      layer,
      completeness_score: round4(completeness),
      traceability_score: round4(traceability),
      alignment_score: round4(alignment),
      overall_score: round4((completeness + traceability + alignment) / 3),
      issues_count: inLayer.length,
      critical_issues: counts.critical_count,
      high_issues: counts.high_count,
      medium_issues: counts.medium_count,
      low_issues: counts.low_count,
    };
  });
}

/** Mean overall score; 1.0 when there are no layers to average. */
export function maturityOf(scores: readonly Pick<LayerScore, "overall_score">[]): number {
  if (scores.length === 0) return 1;
  return round4(scores.reduce((s, l) => s + l.overall_score, 0) / scores.length);
}

function pick(
  scores: readonly ValidationScorecard[],
  better: (a: number, b: number) => boolean
): Layer | null {
  let best: ValidationScorecard | null = null;
  for (const s of scores) {
    if (!best || better(s.overall_score, best.overall_score)) best = s;
  }
  return best ? best.layer : null;
}

export function toScorecardResponse(
  tenantId: string,
  cycleId: string,
  maturity: number | null,
  scores: ValidationScorecard[]
): ScorecardResponse {
  const average = maturityOf(scores);
  return {
    tenant_id: tenantId,
    validation_cycle_id: cycleId,
    overall_maturity_score: maturity ?? average,
    layer_scores: scores,
    summary: {
      total_layers: scores.length,
      average_score: average,
      best_layer: pick(scores, (a, b) => a > b),
      worst_layer: pick(scores, (a, b) => a < b),
    },
  };
}
