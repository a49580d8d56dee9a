// backend/services/validation/src/models/ValidationIssue.ts
import { Schema, model } from "mongoose";
import { randomUUID } from "node:crypto";
import {
  ISSUE_TYPES,
  LAYERS,
  SEVERITIES,
  type IssueType,
  type Layer,
  type Severity,
} from "../contracts/common";

export interface ValidationIssueDoc {
  _id: string;
  tenant_id: string;
  validation_cycle_id: string | null;
  rule_id: string | null;
  entity_type: string;
  entity_id: string;
  layer: Layer | null;
  issue_type: IssueType;
  severity: Severity;
  description: string;
  recommended_fix: string | null;
  metadata: Record<string, unknown> | null;
  timestamp: Date;
  is_resolved: boolean;
  resolved_at: Date | null;
  resolved_by: string | null;
}

const ValidationIssueSchema = new Schema<ValidationIssueDoc>(
  {
    _id: { type: String, default: () => randomUUID() },
    tenant_id: { type: String, required: true, index: true },
    validation_cycle_id: { type: String, default: null, index: true },
    rule_id: { type: String, default: null },
    entity_type: { type: String, required: true },
    entity_id: { type: String, required: true },
    layer: { type: String, enum: [...LAYERS, null], default: null },
    issue_type: { type: String, enum: ISSUE_TYPES, required: true },
    severity: { type: String, enum: SEVERITIES, required: true },
    description: { type: String, required: true },
    recommended_fix: { type: String, default: null },
    metadata: { type: Schema.Types.Mixed, default: null },
    timestamp: { type: Date, required: true, default: () => new Date() },
    is_resolved: { type: Boolean, default: false },
    resolved_at: { type: Date, default: null },
    resolved_by: { type: String, default: null },
  },
  { strict: true, versionKey: false, collection: "validation_issues" }
);

ValidationIssueSchema.index({ tenant_id: 1, timestamp: -1, _id: 1 });
ValidationIssueSchema.index({ tenant_id: 1, entity_type: 1, entity_id: 1 });

export const ValidationIssueModel = model<ValidationIssueDoc>(
  "ValidationIssue",
  ValidationIssueSchema
);
