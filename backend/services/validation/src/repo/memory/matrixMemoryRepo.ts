// backend/services/validation/src/repo/memory/matrixMemoryRepo.ts
import { randomUUID } from "node:crypto";
import {
  compareMatrixCells,
  type MatrixCell,
  type MatrixFilter,
  type TraceabilityMatrixRow,
} from "../../contracts/matrix.contract";
import type { MatrixRepo } from "../types";
import { clone } from "./clone";

export function matchesMatrixFilter(
  row: MatrixCell,
  f: MatrixFilter
): boolean {
  return (
    (f.source_layer === undefined || row.source_layer === f.source_layer) &&
    (f.target_layer === undefined || row.target_layer === f.target_layer) &&
    (f.entity_type === undefined ||
      row.source_entity_type === f.entity_type ||
      row.target_entity_type === f.entity_type)
  );
}

export class MatrixMemoryRepo implements MatrixRepo {
  private readonly byTenant = new Map<string, TraceabilityMatrixRow[]>();

  public async replace(
    tenantId: string,
    cells: MatrixCell[],
    at: Date
  ): Promise<TraceabilityMatrixRow[]> {
    const rows = [...cells].sort(compareMatrixCells).map(
      (c): TraceabilityMatrixRow => ({
        ...c,
        id: randomUUID(),
        tenant_id: tenantId,
        last_updated: at,
      })
    );
    this.byTenant.set(tenantId, rows.map(clone));
    return rows;
  }

  public async list(
    tenantId: string,
    filter: MatrixFilter
  ): Promise<TraceabilityMatrixRow[]> {
    return (this.byTenant.get(tenantId) ?? [])
      .filter((r) => matchesMatrixFilter(r, filter))
      .map(clone);
  }
}
