// backend/services/validation/test/services/scoring.spec.ts
import { describe, it, expect } from "vitest";
import type { LayerScore, ValidationScorecard } from "../../src/contracts/scorecard.contract";
import {
  computeLayerScores,
  maturityOf,
  round4,
  toScorecardResponse,
  type ScoredIssue,
} from "../../src/services/scoring";
import { T0, parseElements } from "../helpers/fixtures";

const elements = parseElements();
const rules = [
  { id: "trace", rule_type: "traceability" as const },
  { id: "complete", rule_type: "completeness" as const },
];

function byLayer(scores: LayerScore[], layer: string): LayerScore | undefined {
  return scores.find((s) => s.layer === layer);
}

function stored(scores: LayerScore[]): ValidationScorecard[] {
  return scores.map((s, i) => ({
    ...s,
    id: `sc-${i}`,
    tenant_id: "t1",
    validation_cycle_id: "c1",
    created_at: T0,
  }));
}

describe("computeLayerScores", () => {
  it("scores every layer 1.0 with no issues", () => {
    const scores = computeLayerScores(elements, rules, []);
    expect(scores.map((s) => s.layer)).toEqual([
      "Motivation",
      "Business",
      "Application",
      "Technology",
      "Implementation",
    ]);
    for (const s of scores) expect(s.overall_score).toBe(1);
    expect(maturityOf(scores)).toBe(1);
  });

  it("scores an empty tenant 1.0", () => {
    expect(maturityOf(computeLayerScores([], rules, []))).toBe(1);
  });

  it("lowers the score of the rule type that flagged", () => {
    const issues: ScoredIssue[] = [
      { rule_id: "trace", entity_id: "G1", layer: "Motivation", severity: "high" },
    ];
    const scores = computeLayerScores(elements, rules, issues);
    const motivation = byLayer(scores, "Motivation");

    expect(motivation).toEqual({
      layer: "Motivation",
      completeness_score: 1,
      traceability_score: 0.5,
      alignment_score: 1,
      overall_score: 0.8333,
      issues_count: 1,
      critical_issues: 0,
      high_issues: 1,
      medium_issues: 0,
      low_issues: 0,
    });
    expect(maturityOf(scores)).toBe(0.9667);
  });

  it("counts an entity once per rule type", () => {
    const issues: ScoredIssue[] = [
      { rule_id: "trace", entity_id: "G1", layer: "Motivation", severity: "high" },
      { rule_id: "trace", entity_id: "G1", layer: "Motivation", severity: "low" },
    ];
    const motivation = byLayer(computeLayerScores(elements, rules, issues), "Motivation");
    expect(motivation?.traceability_score).toBe(0.5);
    expect(motivation?.issues_count).toBe(2);
    expect(motivation?.low_issues).toBe(1);
  });

  it("bottoms out at 0 when a layer has more flags than elements", () => {
    const issues: ScoredIssue[] = [
      {
        rule_id: "complete",
        entity_id: "count_check",
        layer: "Technology",
        severity: "medium",
      },
    ];
    const scores = computeLayerScores([], rules, issues);
    expect(byLayer(scores, "Technology")?.completeness_score).toBe(0);
    expect(byLayer(scores, "Technology")?.overall_score).toBe(0.6667);
  });

  it("ignores issues without a known rule for scoring", () => {
    const issues: ScoredIssue[] = [
      { rule_id: null, entity_id: "G1", layer: "Motivation", severity: "critical" },
      { rule_id: "gone", entity_id: "G2", layer: "Motivation", severity: "low" },
    ];
    const motivation = byLayer(computeLayerScores(elements, rules, issues), "Motivation");
    expect(motivation?.overall_score).toBe(1);
    expect(motivation?.issues_count).toBe(2);
    expect(motivation?.critical_issues).toBe(1);
  });
});

describe("round4", () => {
  it("rounds to four places", () => {
    expect(round4(2 / 3)).toBe(0.6667);
    expect(round4(1)).toBe(1);
  });
});

describe("toScorecardResponse", () => {
  it("summarizes best and worst layers, first one winning ties", () => {
    const issues: ScoredIssue[] = [
      { rule_id: "trace", entity_id: "G1", layer: "Motivation", severity: "high" },
    ];
    const scores = stored(computeLayerScores(elements, rules, issues));
    const res = toScorecardResponse("t1", "c1", 0.9667, scores);

    expect(res.overall_maturity_score).toBe(0.9667);
    expect(res.summary).toEqual({
      total_layers: 5,
      average_score: 0.9667,
      best_layer: "Business",
      worst_layer: "Motivation",
    });
  });

  it("falls back to the layer average without a stored maturity", () => {
    const res = toScorecardResponse("t1", "c1", null, []);
    expect(res.overall_maturity_score).toBe(1);
    expect(res.summary.best_layer).toBeNull();
    expect(res.summary.worst_layer).toBeNull();
  });
});
