// backend/services/validation/src/repo/memory/scorecardMemoryRepo.ts
import { randomUUID } from "node:crypto";
import { layerIndex } from "../../contracts/common";
import type {
  LayerScore,
  ValidationScorecard,
} from "../../contracts/scorecard.contract";
import type { ScorecardRepo } from "../types";
import { systemClock, type Clock } from "../../utils/clock";
import { clone } from "./clone";

export class ScorecardMemoryRepo implements ScorecardRepo {
  private rows: ValidationScorecard[] = [];

  public constructor(private readonly now: Clock = systemClock) {}

  public async insertMany(
    tenantId: string,
    cycleId: string,
    scores: LayerScore[]
  ): Promise<ValidationScorecard[]> {
    const at = this.now();
    const out = scores.map(
      (s): ValidationScorecard => ({
        ...s,
        id: randomUUID(),
        tenant_id: tenantId,
        validation_cycle_id: cycleId,
        created_at: at,
      })
    );
    this.rows.push(...out.map(clone));
    return out;
  }

  public async listForCycle(
    tenantId: string,
    cycleId: string
  ): Promise<ValidationScorecard[]> {
    return this.rows
      .filter(
        (s) => s.tenant_id === tenantId && s.validation_cycle_id === cycleId
      )
      .sort((a, b) => layerIndex(a.layer) - layerIndex(b.layer))
      .map(clone);
  }

  public async deleteForCycle(tenantId: string, cycleId: string): Promise<void> {
    this.rows = this.rows.filter(
      (s) => !(s.tenant_id === tenantId && s.validation_cycle_id === cycleId)
    );
  }
}
