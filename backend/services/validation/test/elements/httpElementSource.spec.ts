// backend/services/validation/test/elements/httpElementSource.spec.ts
import { describe, it, expect } from "vitest";
import axios, { AxiosError, type InternalAxiosRequestConfig } from "axios";
import jwt from "jsonwebtoken";
import {
  ElementFetchError,
  HttpElementSource,
} from "../../src/elements/httpElementSource";
import { TEST_SECRET } from "../helpers/tokens";

type Seen = { url: string; authorization: string };

/** axios instance answering from a table instead of the network. */
function stubHttp(
  answer: (url: string, config: InternalAxiosRequestConfig) => unknown
) {
  const seen: Seen[] = [];
  const http = axios.create({
    adapter: async (config) => {
      const url = String(config.url);
      seen.push({ url, authorization: String(config.headers.Authorization) });
      return {
        data: answer(url, config),
        status: 200,
        statusText: "OK",
        headers: {},
        config,
      };
    },
  });
  return { http, seen };
}

function source(http: ReturnType<typeof stubHttp>["http"]) {
  return new HttpElementSource({
    urls: { goal: "http://catalog.test/", capability: "http://catalog.test" },
    timeoutMs: 1000,
    jwtSecret: TEST_SECRET,
    serviceName: "validation",
    http,
  });
}

describe("HttpElementSource", () => {
  it("fetches each type with a tenant-scoped service token", async () => {
    const { http, seen } = stubHttp((url) =>
      url.endsWith("/goal")
        ? [{ id: "G1", name: "Grow revenue" }, { name: "no id" }]
        : [{ id: "C1", name: "Payments", properties: { owner: "team-a" } }]
    );

    const elements = await source(http).fetchElements("t1");

    expect(elements.map((e) => [e.id, e.type, e.layer])).toEqual([
      ["C1", "capability", "Business"],
      ["G1", "goal", "Motivation"],
    ]);
    expect(seen.map((s) => s.url).sort()).toEqual([
      "http://catalog.test/capability",
      "http://catalog.test/goal",
    ]);

    const token = String(seen[0]?.authorization).replace(/^Bearer /, "");
    const claims = jwt.verify(token, TEST_SECRET);
    expect(claims).toMatchObject({
      user_id: "svc:validation",
      tenant_id: "t1",
      role: "Viewer",
    });
  });

  it("fails when a catalog answers something other than an array", async () => {
    const { http } = stubHttp((url) => (url.endsWith("/goal") ? { items: [] } : []));
    await expect(source(http).fetchElements("t1")).rejects.toThrow(
      "Failed to fetch goal elements: response is not a JSON array"
    );
  });

  it("reports the HTTP status of a failed call", async () => {
    const { http } = stubHttp((url, config) => {
      if (url.endsWith("/capability")) {
        throw new AxiosError("Request failed", "ERR_BAD_RESPONSE", config, null, {
          data: {},
          status: 503,
          statusText: "Service Unavailable",
          headers: {},
          config,
        });
      }
      return [];
    });
    const err = await source(http)
      .fetchElements("t1")
      .catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ElementFetchError);
    expect(err).toHaveProperty("message", "Failed to fetch capability elements: HTTP 503");
    expect(err).toHaveProperty("elementType", "capability");
  });

  it("reports the error code when there is no response", async () => {
    const { http } = stubHttp((url, config) => {
      if (url.endsWith("/capability")) {
        throw new AxiosError("connect ECONNREFUSED", "ECONNREFUSED", config);
      }
      return [];
    });
    await expect(source(http).fetchElements("t1")).rejects.toThrow(
      "Failed to fetch capability elements: ECONNREFUSED"
    );
  });
});
