// backend/services/validation/src/contracts/matrix.contract.ts
import { z } from "zod";
import { layerIndex, zId, zLayer, type Layer } from "./common";

export const matrixRowContract = z.object({
  id: zId,
  tenant_id: zId,
  source_layer: zLayer,
  target_layer: zLayer,
  source_entity_type: z.string().min(1),
  target_entity_type: z.string().min(1),
  relationship_type: z.string().min(1),
  connection_count: z.number().int().min(0),
  missing_connections: z.number().int().min(0),
  strength_score: z.number().min(0).max(1).nullable(),
  last_updated: z.date(),
});

export type TraceabilityMatrixRow = z.infer<typeof matrixRowContract>;

export type MatrixCell = Omit<
  TraceabilityMatrixRow,
  "id" | "tenant_id" | "last_updated"
>;

export type MatrixFilter = {
  source_layer?: Layer;
  target_layer?: Layer;
  entity_type?: string;
};

const cmp = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

/** Canonical row order: layers in reporting order, then type names. */
export function compareMatrixCells(a: MatrixCell, b: MatrixCell): number {
  return (
    layerIndex(a.source_layer) - layerIndex(b.source_layer) ||
    layerIndex(a.target_layer) - layerIndex(b.target_layer) ||
    cmp(a.source_entity_type, b.source_entity_type) ||
    cmp(a.target_entity_type, b.target_entity_type) ||
    cmp(a.relationship_type, b.relationship_type)
  );
}
