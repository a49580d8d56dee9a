// backend/services/validation/src/elements/elementSource.ts
import {
  elementContract,
  type ArchitectureElement,
  type ArchitectureElementInput,
} from "../contracts/element.contract";

export type FetchElementsOptions = {
  signal?: AbortSignal;
};

/** Read-only access to a tenant's architecture elements. */
export interface ElementSource {
  fetchElements(
    tenantId: string,
    opts?: FetchElementsOptions
  ): Promise<ArchitectureElement[]>;
}

/**
 * Fixed element sets per tenant. Backs VALIDATION_STORE=memory and tests.
 */
export class StaticElementSource implements ElementSource {
  private readonly byTenant = new Map<string, ArchitectureElement[]>();

  public constructor(seed: Record<string, ArchitectureElementInput[]> = {}) {
    for (const [tenantId, elements] of Object.entries(seed)) {
      this.set(tenantId, elements);
    }
  }

  /** Replaces a tenant's elements; throws on a malformed element. */
  public set(tenantId: string, elements: ArchitectureElementInput[]): void {
    this.byTenant.set(
      tenantId,
      elements.map((e) => elementContract.parse(e))
    );
  }

  public async fetchElements(
    tenantId: string,
    opts: FetchElementsOptions = {}
  ): Promise<ArchitectureElement[]> {
    opts.signal?.throwIfAborted();
    return structuredClone(this.byTenant.get(tenantId) ?? []);
  }
}
