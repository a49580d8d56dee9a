// backend/services/validation/src/repo/mongo/cycleMongoRepo.ts
import type { FilterQuery } from "mongoose";
import type {
  CycleOutcome,
  ValidationCycle,
} from "../../contracts/cycle.contract";
import { cycleToDomain } from "../../mappers/validation.mapper";
import {
  ValidationCycleModel,
  type ValidationCycleDoc,
} from "../../models/ValidationCycle";
import type { CycleRepo, FinalStatus, NewCycle } from "../types";

export class CycleMongoRepo implements CycleRepo {
  public async create(input: NewCycle): Promise<ValidationCycle> {
    const doc = await ValidationCycleModel.create({
      ...input,
      start_time: new Date(),
      execution_status: "running",
    });
    return cycleToDomain(doc.toObject());
  }

  public async get(tenantId: string, id: string): Promise<ValidationCycle | null> {
    const doc = await ValidationCycleModel.findOne({ _id: id, tenant_id: tenantId })
      .lean<ValidationCycleDoc>()
      .exec();
    return doc ? cycleToDomain(doc) : null;
  }

  public async finish(
    tenantId: string,
    id: string,
    status: FinalStatus,
    outcome: CycleOutcome,
    endTime: Date
  ): Promise<ValidationCycle | null> {
    const doc = await ValidationCycleModel.findOneAndUpdate(
      { _id: id, tenant_id: tenantId, execution_status: "running" },
      { $set: { ...outcome, execution_status: status, end_time: endTime } },
      { new: true, runValidators: true }
    )
      .lean<ValidationCycleDoc>()
      .exec();
    return doc ? cycleToDomain(doc) : null;
  }

  public async page(
    tenantId: string,
    skip: number,
    limit: number
  ): Promise<{ cycles: ValidationCycle[]; total: number }> {
    const filter: FilterQuery<ValidationCycleDoc> = { tenant_id: tenantId };
    const [docs, total] = await Promise.all([
      ValidationCycleModel.find(filter)
        .sort({ start_time: -1 })
        .skip(skip)
        .limit(limit)
        .lean<ValidationCycleDoc[]>()
        .exec(),
      ValidationCycleModel.countDocuments(filter).exec(),
    ]);
    return { cycles: docs.map(cycleToDomain), total };
  }

  public async latestCompleted(tenantId: string): Promise<ValidationCycle | null> {
    const doc = await ValidationCycleModel.findOne({
      tenant_id: tenantId,
      execution_status: "completed",
    })
      .sort({ end_time: -1 })
      .lean<ValidationCycleDoc>()
      .exec();
    return doc ? cycleToDomain(doc) : null;
  }

  public async countAll(): Promise<number> {
    return ValidationCycleModel.estimatedDocumentCount().exec();
  }

  public async averageMaturity(): Promise<number | null> {
    const [row] = await ValidationCycleModel.aggregate<{ avg: number | null }>([
      { $match: { execution_status: "completed", maturity_score: { $ne: null } } },
      { $group: { _id: null, avg: { $avg: "$maturity_score" } } },
    ]).exec();
    return row?.avg ?? null;
  }

  /** Datastore reachability, used by readiness. */
  public async ping(): Promise<void> {
    const db = ValidationCycleModel.db.db;
    if (!db) throw new Error("MongoDB connection is not open");
    await db.admin().ping();
  }
}
