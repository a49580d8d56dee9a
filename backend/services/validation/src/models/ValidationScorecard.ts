// backend/services/validation/src/models/ValidationScorecard.ts
import { Schema, model } from "mongoose";
import { randomUUID } from "node:crypto";
import { LAYERS, type Layer } from "../contracts/common";

export interface ValidationScorecardDoc {
  _id: string;
  tenant_id: string;
  validation_cycle_id: string;
  layer: Layer;
  completeness_score: number;
  traceability_score: number;
  alignment_score: number;
  overall_score: number;
  issues_count: number;
  critical_issues: number;
  high_issues: number;
  medium_issues: number;
  low_issues: number;
  created_at: Date;
}

const score = { type: Number, required: true, min: 0, max: 1 };
const count = { type: Number, default: 0, min: 0 };

const ValidationScorecardSchema = new Schema<ValidationScorecardDoc>(
  {
    _id: { type: String, default: () => randomUUID() },
    tenant_id: { type: String, required: true, index: true },
    validation_cycle_id: { type: String, required: true },
    layer: { type: String, enum: LAYERS, required: true },
    completeness_score: score,
    traceability_score: score,
    alignment_score: score,
    overall_score: score,
    issues_count: count,
    critical_issues: count,
    high_issues: count,
    medium_issues: count,
    low_issues: count,
  },
  {
    strict: true,
    versionKey: false,
    collection: "validation_scorecards",
    timestamps: { createdAt: "created_at", updatedAt: false },
  }
);

// One snapshot per (tenant, cycle, layer); never updated after insert.
ValidationScorecardSchema.index(
  { tenant_id: 1, validation_cycle_id: 1, layer: 1 },
  { unique: true, name: "uniq_tenant_cycle_layer" }
);

export const ValidationScorecardModel = model<ValidationScorecardDoc>(
  "ValidationScorecard",
  ValidationScorecardSchema
);
