// backend/services/validation/src/elements/httpElementSource.ts
/**
 * Element source backed by the element catalog services.
 *
 * - One GET per configured element type: `${baseUrl}/${type}`.
 * - Each call carries a freshly minted S2S bearer scoped to the tenant.
 * - Any transport error or non-2xx status fails the fetch (and the cycle);
 *   individual malformed records are skipped with a warning.
 */

import axios, { type AxiosInstance } from "axios";
import { z } from "zod";
import { logger } from "@shared/utils/logger";
import { s2sAuthHeader } from "@shared/utils/s2s/mintS2S";
import {
  elementContract,
  type ArchitectureElement,
} from "../contracts/element.contract";
import type { ElementSource, FetchElementsOptions } from "./elementSource";

export type HttpElementSourceOptions = {
  /** element type → catalog base URL */
  urls: Record<string, string>;
  timeoutMs: number;
  jwtSecret: string;
  serviceName: string;
  http?: AxiosInstance;
};

const zRecords = z.array(z.record(z.unknown()));

export class ElementFetchError extends Error {
  public constructor(
    public readonly elementType: string,
    detail: string
  ) {
    super(`Failed to fetch ${elementType} elements: ${detail}`);
    this.name = "ElementFetchError";
  }
}

export class HttpElementSource implements ElementSource {
  private readonly http: AxiosInstance;

  public constructor(private readonly opts: HttpElementSourceOptions) {
    this.http = opts.http ?? axios.create({ timeout: opts.timeoutMs });
  }

  public async fetchElements(
    tenantId: string,
    opts: FetchElementsOptions = {}
  ): Promise<ArchitectureElement[]> {
    const types = Object.keys(this.opts.urls).sort();
    const batches = await Promise.all(
      types.map((type) => this.fetchType(type, tenantId, opts.signal))
    );
    return batches.flat();
  }

  private async fetchType(
    type: string,
    tenantId: string,
    signal?: AbortSignal
  ): Promise<ArchitectureElement[]> {
    const base = this.opts.urls[type].replace(/\/+$/, "");
    const url = `${base}/${type}`;

    let data: unknown;
    try {
      const res = await this.http.get<unknown>(url, {
        signal,
        timeout: this.opts.timeoutMs,
        headers: {
          Accept: "application/json",
          ...s2sAuthHeader({
            secret: this.opts.jwtSecret,
            subject: `svc:${this.opts.serviceName}`,
            tenantId,
          }),
        },
      });
      data = res.data;
    } catch (err) {
      if (axios.isAxiosError(err)) {
        const detail = err.response
          ? `HTTP ${err.response.status}`
          : err.code ?? err.message;
        throw new ElementFetchError(type, detail);
      }
      throw err;
    }

    const records = zRecords.safeParse(data);
    if (!records.success) {
      throw new ElementFetchError(type, "response is not a JSON array");
    }

    const out: ArchitectureElement[] = [];
    for (const raw of records.data) {
      const parsed = elementContract.safeParse({ ...raw, type });
      if (parsed.success) {
        out.push(parsed.data);
      } else {
        logger.warn(
          { tenantId, type, id: raw.id, issues: parsed.error.issues.length },
          "[HttpElementSource] skipping malformed element"
        );
      }
    }
    logger.debug(
      { tenantId, type, count: out.length },
      "[HttpElementSource] fetched"
    );
    return out;
  }
}
