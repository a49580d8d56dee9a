// backend/services/validation/src/contracts/scorecard.contract.ts
import { z } from "zod";
import { zId, zLayer } from "./common";

const zScore = z.number().min(0).max(1);

export const scorecardContract = z.object({
  id: zId,
  tenant_id: zId,
  validation_cycle_id: zId,
  layer: zLayer,
  completeness_score: zScore,
  traceability_score: zScore,
  alignment_score: zScore,
  overall_score: zScore,
  issues_count: z.number().int().min(0),
  critical_issues: z.number().int().min(0),
  high_issues: z.number().int().min(0),
  medium_issues: z.number().int().min(0),
  low_issues: z.number().int().min(0),
  created_at: z.date(),
});

export type ValidationScorecard = z.infer<typeof scorecardContract>;

export type LayerScore = Omit<
  ValidationScorecard,
  "id" | "tenant_id" | "validation_cycle_id" | "created_at"
>;

export type ScorecardResponse = {
  tenant_id: string;
  validation_cycle_id: string;
  overall_maturity_score: number;
  layer_scores: ValidationScorecard[];
  summary: {
    total_layers: number;
    average_score: number;
    best_layer: string | null;
    worst_layer: string | null;
  };
};
