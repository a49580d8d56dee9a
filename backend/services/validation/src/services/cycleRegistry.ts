// backend/services/validation/src/services/cycleRegistry.ts
import type { ValidationCycle } from "../contracts/cycle.contract";

export class CycleCancelledError extends Error {
  public constructor(public readonly cycleId: string) {
    super(`Validation cycle ${cycleId} was cancelled`);
    this.name = "CycleCancelledError";
  }
}

export class CycleTimeoutError extends Error {
  public constructor(public readonly timeoutMs: number) {
    super(`Validation cycle timed out after ${timeoutMs} ms`);
    this.name = "CycleTimeoutError";
  }
}

export type InFlightCycle = {
  cycleId: string;
  tenantId: string;
  controller: AbortController;
  /** Set once results are being written; the cycle can no longer be aborted. */
  committing: boolean;
  /** Settles with the terminal cycle. */
  done: Promise<ValidationCycle>;
};

/**
 * In-flight cycles of this process. Owned by ValidationDeps; one per app.
 */
export class CycleRegistry {
  private readonly inflight = new Map<string, InFlightCycle>();

  public add(entry: InFlightCycle): void {
    this.inflight.set(entry.cycleId, entry);
  }

  public get(cycleId: string): InFlightCycle | undefined {
    return this.inflight.get(cycleId);
  }

  public markCommitting(cycleId: string): void {
    const entry = this.inflight.get(cycleId);
    if (entry) entry.committing = true;
  }

  public delete(cycleId: string): void {
    this.inflight.delete(cycleId);
  }

  public get size(): number {
    return this.inflight.size;
  }

  public entries(): InFlightCycle[] {
    return [...this.inflight.values()];
  }
}
