// backend/services/validation/src/services/exceptionService.ts
import { logger } from "@shared/utils/logger";
import { NotFoundError, UnprocessableError } from "@shared/problem/problem";
import type {
  EffectiveStatus,
  ValidationException,
} from "../contracts/exception.contract";
import type { Clock } from "../utils/clock";
import type { ValidationRepos } from "../repo/types";
import { effectiveStatus } from "./exceptionOverlay";

export type CreateExceptionInput = {
  entity_type: string;
  entity_id: string;
  reason: string;
  rule_id?: string | null;
  expires_at?: Date | null;
};

export type ExceptionView = ValidationException & {
  effective_status: EffectiveStatus;
};

export class ExceptionService {
  public constructor(
    private readonly repos: ValidationRepos,
    private readonly clock: Clock
  ) {}

  public async create(
    tenantId: string,
    createdBy: string,
    input: CreateExceptionInput
  ): Promise<ExceptionView> {
    const now = this.clock();
    const expiresAt = input.expires_at ?? null;
    if (expiresAt && expiresAt.getTime() <= now.getTime()) {
      throw new UnprocessableError("expires_at must be in the future");
    }

    const ruleId = input.rule_id ?? null;
    if (ruleId !== null && !(await this.repos.rules.get(ruleId))) {
      throw new NotFoundError(`Validation rule ${ruleId} not found`);
    }

    const ex = await this.repos.exceptions.create(tenantId, {
      tenant_id: tenantId,
      entity_type: input.entity_type,
      entity_id: input.entity_id,
      rule_id: ruleId,
      reason: input.reason,
      created_by: createdBy,
      expires_at: expiresAt,
    });
    logger.info(
      {
        tenantId,
        exceptionId: ex.id,
        entityType: ex.entity_type,
        entityId: ex.entity_id,
        ruleId: ex.rule_id,
      },
      "[ExceptionService.create] exception granted"
    );
    return this.view(ex, now);
  }

  public async list(
    tenantId: string,
    opts: { include_inactive?: boolean } = {}
  ): Promise<ExceptionView[]> {
    const now = this.clock();
    const rows = await this.repos.exceptions.list(tenantId, {
      include_inactive: opts.include_inactive ?? false,
    });
    return rows.map((ex) => this.view(ex, now));
  }

  /** Idempotent. */
  public async revoke(tenantId: string, exceptionId: string): Promise<ExceptionView> {
    const ex = await this.repos.exceptions.deactivate(tenantId, exceptionId);
    if (!ex) throw new NotFoundError("Validation exception not found");
    return this.view(ex, this.clock());
  }

  private view(ex: ValidationException, now: Date): ExceptionView {
    return { ...ex, effective_status: effectiveStatus(ex, now) };
  }
}
