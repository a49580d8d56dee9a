// backend/services/validation/src/repo/mongo/scorecardMongoRepo.ts
import { layerIndex } from "../../contracts/common";
import type {
  LayerScore,
  ValidationScorecard,
} from "../../contracts/scorecard.contract";
import { scorecardToDomain } from "../../mappers/validation.mapper";
import {
  ValidationScorecardModel,
  type ValidationScorecardDoc,
} from "../../models/ValidationScorecard";
import type { ScorecardRepo } from "../types";

export class ScorecardMongoRepo implements ScorecardRepo {
  public async insertMany(
    tenantId: string,
    cycleId: string,
    scores: LayerScore[]
  ): Promise<ValidationScorecard[]> {
    if (scores.length === 0) return [];
    const docs = await ValidationScorecardModel.insertMany(
      scores.map((s) => ({
        ...s,
        tenant_id: tenantId,
        validation_cycle_id: cycleId,
      }))
    );
    return docs.map((d) => scorecardToDomain(d.toObject()));
  }

  public async listForCycle(
    tenantId: string,
    cycleId: string
  ): Promise<ValidationScorecard[]> {
    const docs = await ValidationScorecardModel.find({
      tenant_id: tenantId,
      validation_cycle_id: cycleId,
    })
      .lean<ValidationScorecardDoc[]>()
      .exec();
    return docs
      .map(scorecardToDomain)
      .sort((a, b) => layerIndex(a.layer) - layerIndex(b.layer));
  }

  public async deleteForCycle(tenantId: string, cycleId: string): Promise<void> {
    await ValidationScorecardModel.deleteMany({
      tenant_id: tenantId,
      validation_cycle_id: cycleId,
    }).exec();
  }
}
