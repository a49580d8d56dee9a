// backend/services/validation/src/repo/mongo/matrixMongoRepo.ts
import type { FilterQuery } from "mongoose";
import {
  compareMatrixCells,
  type MatrixCell,
  type MatrixFilter,
  type TraceabilityMatrixRow,
} from "../../contracts/matrix.contract";
import { matrixRowToDomain } from "../../mappers/validation.mapper";
import {
  TraceabilityMatrixModel,
  type TraceabilityMatrixDoc,
} from "../../models/TraceabilityMatrix";
import type { MatrixRepo } from "../types";

export class MatrixMongoRepo implements MatrixRepo {
  // TODO: wrap delete+insert in a session once deployments run a replica set.
  public async replace(
    tenantId: string,
    cells: MatrixCell[],
    at: Date
  ): Promise<TraceabilityMatrixRow[]> {
    await TraceabilityMatrixModel.deleteMany({ tenant_id: tenantId }).exec();
    if (cells.length === 0) return [];
    const docs = await TraceabilityMatrixModel.insertMany(
      [...cells]
        .sort(compareMatrixCells)
        .map((c) => ({ ...c, tenant_id: tenantId, last_updated: at }))
    );
    return docs.map((d) => matrixRowToDomain(d.toObject()));
  }

  public async list(
    tenantId: string,
    f: MatrixFilter
  ): Promise<TraceabilityMatrixRow[]> {
    const filter: FilterQuery<TraceabilityMatrixDoc> = { tenant_id: tenantId };
    if (f.source_layer) filter.source_layer = f.source_layer;
    if (f.target_layer) filter.target_layer = f.target_layer;
    if (f.entity_type) {
      filter.$or = [
        { source_entity_type: f.entity_type },
        { target_entity_type: f.entity_type },
      ];
    }
    const docs = await TraceabilityMatrixModel.find(filter)
      .lean<TraceabilityMatrixDoc[]>()
      .exec();
    return docs.map(matrixRowToDomain).sort(compareMatrixCells);
  }
}
