// backend/services/validation/src/repo/mongo/exceptionMongoRepo.ts
import type { FilterQuery } from "mongoose";
import type {
  NewException,
  ValidationException,
} from "../../contracts/exception.contract";
import { exceptionToDomain } from "../../mappers/validation.mapper";
import {
  ValidationExceptionModel,
  type ValidationExceptionDoc,
} from "../../models/ValidationException";
import type { ExceptionRepo } from "../types";

export class ExceptionMongoRepo implements ExceptionRepo {
  public async create(
    tenantId: string,
    input: NewException
  ): Promise<ValidationException> {
    const doc = await ValidationExceptionModel.create({
      ...input,
      tenant_id: tenantId,
      is_active: true,
    });
    return exceptionToDomain(doc.toObject());
  }

  public async list(
    tenantId: string,
    opts: { include_inactive: boolean }
  ): Promise<ValidationException[]> {
    const filter: FilterQuery<ValidationExceptionDoc> = { tenant_id: tenantId };
    if (!opts.include_inactive) filter.is_active = true;
    const docs = await ValidationExceptionModel.find(filter)
      .sort({ created_at: -1 })
      .lean<ValidationExceptionDoc[]>()
      .exec();
    return docs.map(exceptionToDomain);
  }

  public async get(
    tenantId: string,
    id: string
  ): Promise<ValidationException | null> {
    const doc = await ValidationExceptionModel.findOne({
      _id: id,
      tenant_id: tenantId,
    })
      .lean<ValidationExceptionDoc>()
      .exec();
    return doc ? exceptionToDomain(doc) : null;
  }

  public async deactivate(
    tenantId: string,
    id: string
  ): Promise<ValidationException | null> {
    const doc = await ValidationExceptionModel.findOneAndUpdate(
      { _id: id, tenant_id: tenantId },
      { $set: { is_active: false } },
      { new: true }
    )
      .lean<ValidationExceptionDoc>()
      .exec();
    return doc ? exceptionToDomain(doc) : null;
  }

  public async countAll(): Promise<number> {
    return ValidationExceptionModel.estimatedDocumentCount().exec();
  }
}
