// backend/services/validation/src/models/ValidationException.ts
import { Schema, model } from "mongoose";
import { randomUUID } from "node:crypto";

export interface ValidationExceptionDoc {
  _id: string;
  tenant_id: string;
  entity_type: string;
  entity_id: string;
  rule_id: string | null;
  reason: string;
  created_by: string;
  created_at: Date;
  expires_at: Date | null;
  is_active: boolean;
}

const ValidationExceptionSchema = new Schema<ValidationExceptionDoc>(
  {
    _id: { type: String, default: () => randomUUID() },
    tenant_id: { type: String, required: true, index: true },
    entity_type: { type: String, required: true },
    entity_id: { type: String, required: true },
    rule_id: { type: String, default: null },
    reason: { type: String, required: true },
    created_by: { type: String, required: true },
    expires_at: { type: Date, default: null },
    is_active: { type: Boolean, default: true },
  },
  {
    strict: true,
    versionKey: false,
    collection: "validation_exceptions",
    timestamps: { createdAt: "created_at", updatedAt: false },
  }
);

ValidationExceptionSchema.index({ tenant_id: 1, entity_type: 1, entity_id: 1 });

export const ValidationExceptionModel = model<ValidationExceptionDoc>(
  "ValidationException",
  ValidationExceptionSchema
);
