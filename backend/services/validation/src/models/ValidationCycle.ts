// backend/services/validation/src/models/ValidationCycle.ts
import { Schema, model } from "mongoose";
import { randomUUID } from "node:crypto";
import { EXECUTION_STATUSES, type ExecutionStatus } from "../contracts/common";

export interface ValidationCycleDoc {
  _id: string;
  tenant_id: string;
  start_time: Date;
  end_time: Date | null;
  triggered_by: string;
  rule_set_id: string | null;
  total_issues_found: number;
  suppressed_issues: number;
  rules_evaluated: number;
  elements_checked: number;
  execution_status: ExecutionStatus;
  maturity_score: number | null;
  error: string | null;
  created_at: Date;
  updated_at: Date;
}

const ValidationCycleSchema = new Schema<ValidationCycleDoc>(
  {
    _id: { type: String, default: () => randomUUID() },
    tenant_id: { type: String, required: true, index: true },
    start_time: { type: Date, required: true, default: () => new Date() },
    end_time: { type: Date, default: null },
    triggered_by: { type: String, required: true },
    rule_set_id: { type: String, default: null },
    total_issues_found: { type: Number, default: 0, min: 0 },
    suppressed_issues: { type: Number, default: 0, min: 0 },
    rules_evaluated: { type: Number, default: 0, min: 0 },
    elements_checked: { type: Number, default: 0, min: 0 },
    execution_status: {
      type: String,
      enum: EXECUTION_STATUSES,
      required: true,
      default: "running",
    },
    maturity_score: { type: Number, default: null, min: 0, max: 1 },
    error: { type: String, default: null },
  },
  {
    strict: true,
    versionKey: false,
    collection: "validation_cycles",
    timestamps: { createdAt: "created_at", updatedAt: "updated_at" },
  }
);

ValidationCycleSchema.index({ tenant_id: 1, start_time: -1 });
ValidationCycleSchema.index({ tenant_id: 1, execution_status: 1, end_time: -1 });

export const ValidationCycleModel = model<ValidationCycleDoc>(
  "ValidationCycle",
  ValidationCycleSchema
);
