// backend/services/validation/test/services/exceptionOverlay.spec.ts
import { describe, it, expect } from "vitest";
import type { ValidationException } from "../../src/contracts/exception.contract";
import {
  SuppressionSet,
  effectiveStatus,
  isEffective,
  suppresses,
} from "../../src/services/exceptionOverlay";
import { T0 } from "../helpers/fixtures";

const HOUR = 60 * 60 * 1000;

function exception(overrides: Partial<ValidationException> = {}): ValidationException {
  return {
    id: "ex-1",
    tenant_id: "t1",
    entity_type: "goal",
    entity_id: "G1",
    rule_id: null,
    reason: "accepted risk",
    created_by: "user-admin",
    created_at: T0,
    expires_at: null,
    is_active: true,
    ...overrides,
  };
}

const issue = { entity_type: "goal", entity_id: "G1", rule_id: "r1" };

describe("exception effectiveness", () => {
  it("is active without an expiry", () => {
    expect(effectiveStatus(exception(), T0)).toBe("active");
  });

  it("expires at expires_at even while is_active", () => {
    const ex = exception({ expires_at: new Date(T0.getTime() + HOUR) });
    expect(isEffective(ex, T0)).toBe(true);
    expect(isEffective(ex, new Date(T0.getTime() + HOUR))).toBe(false);
    expect(effectiveStatus(ex, new Date(T0.getTime() + 2 * HOUR))).toBe("expired");
  });

  it("reports revoked before expired", () => {
    const ex = exception({
      is_active: false,
      expires_at: new Date(T0.getTime() - HOUR),
    });
    expect(effectiveStatus(ex, T0)).toBe("revoked");
  });
});

describe("suppresses", () => {
  it("covers every rule when rule_id is null", () => {
    expect(suppresses(exception(), issue, T0)).toBe(true);
    expect(suppresses(exception(), { ...issue, rule_id: null }, T0)).toBe(true);
  });

  it("covers only its rule when rule_id is set", () => {
    expect(suppresses(exception({ rule_id: "r1" }), issue, T0)).toBe(true);
    expect(suppresses(exception({ rule_id: "r2" }), issue, T0)).toBe(false);
  });

  it("does not cover another entity", () => {
    expect(suppresses(exception(), { ...issue, entity_id: "G2" }, T0)).toBe(false);
    expect(suppresses(exception(), { ...issue, entity_type: "driver" }, T0)).toBe(false);
  });

  it("does not suppress once expired", () => {
    const ex = exception({ expires_at: new Date(T0.getTime() - 1) });
    expect(suppresses(ex, issue, T0)).toBe(false);
  });
});

describe("SuppressionSet", () => {
  it("partitions candidates in order and exposes effective keys only", () => {
    const set = new SuppressionSet(
      [
        exception(),
        exception({ id: "ex-2", entity_id: "G2", is_active: false }),
        exception({
          id: "ex-3",
          entity_id: "G3",
          rule_id: "r9",
          expires_at: new Date(T0.getTime() + HOUR),
        }),
      ],
      T0
    );
    const candidates = [
      { ...issue, entity_id: "G2" },
      issue,
      { ...issue, entity_id: "G3" },
      { ...issue, entity_id: "G3", rule_id: "r9" },
    ];

    const { kept, suppressed } = set.partition(candidates);
    expect(kept.map((c) => [c.entity_id, c.rule_id])).toEqual([
      ["G2", "r1"],
      ["G3", "r1"],
    ]);
    expect(suppressed.map((c) => [c.entity_id, c.rule_id])).toEqual([
      ["G1", "r1"],
      ["G3", "r9"],
    ]);
    expect(set.keys()).toEqual([
      { entity_type: "goal", entity_id: "G1", rule_id: null },
      { entity_type: "goal", entity_id: "G3", rule_id: "r9" },
    ]);
  });
});
