// backend/services/validation/src/models/ValidationRule.ts
import { Schema, model } from "mongoose";
import { randomUUID } from "node:crypto";
import {
  LAYERS,
  RULE_TYPES,
  SEVERITIES,
  type Layer,
  type RuleType,
  type Severity,
} from "../contracts/common";

export interface ValidationRuleDoc {
  _id: string;
  name: string;
  description: string;
  rule_type: RuleType;
  scope: Layer;
  rule_logic: string;
  is_active: boolean;
  severity: Severity;
  rule_set_id: string | null;
  created_at: Date;
  updated_at: Date;
}

const ValidationRuleSchema = new Schema<ValidationRuleDoc>(
  {
    _id: { type: String, default: () => randomUUID() },
    name: { type: String, required: true, unique: true },
    description: { type: String, default: "" },
    rule_type: { type: String, enum: RULE_TYPES, required: true },
    scope: { type: String, enum: LAYERS, required: true },
    rule_logic: { type: String, required: true },
    is_active: { type: Boolean, default: true, index: true },
    severity: { type: String, enum: SEVERITIES, default: "medium" },
    rule_set_id: { type: String, default: null, index: true },
  },
  {
    strict: true,
    versionKey: false,
    collection: "validation_rules",
    timestamps: { createdAt: "created_at", updatedAt: "updated_at" },
  }
);

export const ValidationRuleModel = model<ValidationRuleDoc>(
  "ValidationRule",
  ValidationRuleSchema
);
