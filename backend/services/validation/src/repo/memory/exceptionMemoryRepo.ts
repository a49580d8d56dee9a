// backend/services/validation/src/repo/memory/exceptionMemoryRepo.ts
import { randomUUID } from "node:crypto";
import type {
  NewException,
  ValidationException,
} from "../../contracts/exception.contract";
import type { ExceptionRepo } from "../types";
import { systemClock, type Clock } from "../../utils/clock";
import { clone } from "./clone";

export class ExceptionMemoryRepo implements ExceptionRepo {
  private readonly rows = new Map<string, ValidationException>();

  public constructor(private readonly now: Clock = systemClock) {}

  public async create(
    tenantId: string,
    input: NewException
  ): Promise<ValidationException> {
    const ex: ValidationException = {
      ...input,
      id: randomUUID(),
      tenant_id: tenantId,
      created_at: this.now(),
      is_active: true,
    };
    this.rows.set(ex.id, clone(ex));
    return ex;
  }

  public async list(
    tenantId: string,
    opts: { include_inactive: boolean }
  ): Promise<ValidationException[]> {
    return [...this.rows.values()]
      .filter(
        (e) => e.tenant_id === tenantId && (opts.include_inactive || e.is_active)
      )
      .sort((a, b) => b.created_at.getTime() - a.created_at.getTime())
      .map(clone);
  }

  public async get(
    tenantId: string,
    id: string
  ): Promise<ValidationException | null> {
    const row = this.rows.get(id);
    return row && row.tenant_id === tenantId ? clone(row) : null;
  }

  public async deactivate(
    tenantId: string,
    id: string
  ): Promise<ValidationException | null> {
    const row = this.rows.get(id);
    if (!row || row.tenant_id !== tenantId) return null;
    const next = { ...row, is_active: false };
    this.rows.set(id, next);
    return clone(next);
  }

  public async countAll(): Promise<number> {
    return this.rows.size;
  }
}
