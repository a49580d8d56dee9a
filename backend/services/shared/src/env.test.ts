// backend/services/shared/src/env.test.ts
import { describe, it, expect } from "vitest";
import { assertEnv, envFilesFor } from "./env";

describe("envFilesFor", () => {
  it("tries mode-specific files before .env", () => {
    expect(envFilesFor("dev")).toEqual(["env.dev", ".env.dev", ".env"]);
    expect(envFilesFor("docker")).toEqual(["env.docker", ".env.docker", ".env"]);
    expect(envFilesFor("production")).toEqual([".env"]);
  });
});

describe("assertEnv", () => {
  it("passes when every key has a value", () => {
    expect(() => assertEnv(["A", "B"], { A: "1", B: "x" })).not.toThrow();
  });

  it("names every missing or blank key", () => {
    expect(() => assertEnv(["A", "B", "C"], { A: "1", B: "  " })).toThrow(
      "Missing required env var(s): B, C"
    );
  });
});
