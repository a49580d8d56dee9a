// backend/services/validation/src/models/TraceabilityMatrix.ts
import { Schema, model } from "mongoose";
import { randomUUID } from "node:crypto";
import { LAYERS, type Layer } from "../contracts/common";

export interface TraceabilityMatrixDoc {
  _id: string;
  tenant_id: string;
  source_layer: Layer;
  target_layer: Layer;
  source_entity_type: string;
  target_entity_type: string;
  relationship_type: string;
  connection_count: number;
  missing_connections: number;
  strength_score: number | null;
  last_updated: Date;
}

const TraceabilityMatrixSchema = new Schema<TraceabilityMatrixDoc>(
  {
    _id: { type: String, default: () => randomUUID() },
    tenant_id: { type: String, required: true, index: true },
    source_layer: { type: String, enum: LAYERS, required: true },
    target_layer: { type: String, enum: LAYERS, required: true },
    source_entity_type: { type: String, required: true },
    target_entity_type: { type: String, required: true },
    relationship_type: { type: String, required: true },
    connection_count: { type: Number, default: 0, min: 0 },
    missing_connections: { type: Number, default: 0, min: 0 },
    strength_score: { type: Number, default: null, min: 0, max: 1 },
    last_updated: { type: Date, required: true, default: () => new Date() },
  },
  { strict: true, versionKey: false, collection: "traceability_matrix" }
);

TraceabilityMatrixSchema.index({ tenant_id: 1, source_layer: 1, target_layer: 1 });

export const TraceabilityMatrixModel = model<TraceabilityMatrixDoc>(
  "TraceabilityMatrix",
  TraceabilityMatrixSchema
);
