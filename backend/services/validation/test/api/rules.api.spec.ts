// backend/services/validation/test/api/rules.api.spec.ts
import { describe, it, expect, beforeEach } from "vitest";
import request from "supertest";
import {
  buildHarness,
  goalToCapabilityRule,
  sampleElements,
  type TestHarness,
} from "../helpers/fixtures";
import { bearer } from "../helpers/tokens";
import { expectCreated, expectOK, expectStatus } from "../helpers/http";

let h: TestHarness;

beforeEach(() => {
  h = buildHarness({ elements: { t1: sampleElements() } });
});

const ownerRule = {
  name: "capability-has-owner",
  description: "Capabilities name an owner",
  rule_type: "completeness",
  scope: "Business",
  severity: "low",
  rule_logic: {
    target: { element_type: "capability" },
    assert: { op: "has_field", field: "owner" },
    issue_type: "invalid_enum",
  },
};

function create(body: Record<string, unknown>, role: "Admin" | "Viewer" = "Admin") {
  return request(h.app)
    .post("/validation/rules")
    .set("Authorization", bearer("t1", role))
    .send(body);
}

describe("POST /validation/rules", () => {
  it("stores object logic as JSON text", async () => {
    const res = await expectCreated(create(ownerRule));
    expect(res.body).toMatchObject({
      name: "capability-has-owner",
      rule_type: "completeness",
      scope: "Business",
      severity: "low",
      is_active: true,
      rule_set_id: null,
    });
    expect(JSON.parse(res.body.rule_logic)).toEqual(ownerRule.rule_logic);
  });

  it("defaults severity to medium", async () => {
    const res = await expectCreated(create({ ...ownerRule, severity: undefined }));
    expect(res.body.severity).toBe("medium");
  });

  it("rejects a duplicate name", async () => {
    await expectCreated(create(ownerRule));
    const res = await expectStatus(create(ownerRule), 409);
    expect(res.body.detail).toBe('Rule "capability-has-owner" already exists');
  });

  it("rejects logic that does not parse", async () => {
    const res = await expectStatus(
      create({ ...ownerRule, rule_logic: { assert: { op: "nope" }, issue_type: "stale" } }),
      422
    );
    expect(String(res.body.detail).startsWith("Invalid rule_logic: ")).toBe(true);
  });

  it("rejects an unknown scope", async () => {
    await expectStatus(create({ ...ownerRule, scope: "Strategy" }), 422);
  });

  it("is closed to viewers", async () => {
    await expectStatus(create(ownerRule, "Viewer"), 403);
  });
});

describe("GET /validation/rules", () => {
  it("lists by name and filters", async () => {
    await h.deps.repos.rules.create(goalToCapabilityRule);
    await expectCreated(create(ownerRule));

    const all = await expectOK(
      request(h.app).get("/validation/rules").set("Authorization", bearer("t1", "Viewer"))
    );
    expect(all.body.map((r: { name: string }) => r.name)).toEqual([
      "capability-has-owner",
      "goal-realized-by-capability",
    ]);

    const core = await expectOK(
      request(h.app)
        .get("/validation/rules?rule_set_id=core&rule_type=traceability")
        .set("Authorization", bearer("t1"))
    );
    expect(core.body.map((r: { name: string }) => r.name)).toEqual([
      "goal-realized-by-capability",
    ]);
  });

  it("answers 404 for an unknown id", async () => {
    await expectStatus(
      request(h.app).get("/validation/rules/missing").set("Authorization", bearer("t1")),
      404
    );
  });
});

describe("PATCH /validation/rules/:id", () => {
  it("toggles activation, idempotently", async () => {
    const rule = await h.deps.repos.rules.create(goalToCapabilityRule);

    for (let i = 0; i < 2; i += 1) {
      const res = await expectOK(
        request(h.app)
          .patch(`/validation/rules/${rule.id}`)
          .set("Authorization", bearer("t1"))
          .send({ is_active: false })
      );
      expect(res.body).toMatchObject({
        message: "Validation rule deactivated successfully",
        rule_id: rule.id,
        is_active: false,
      });
    }

    const inactive = await expectOK(
      request(h.app).get("/validation/rules?is_active=false").set("Authorization", bearer("t1"))
    );
    expect(inactive.body).toHaveLength(1);

    const cycle = await expectOK(
      request(h.app).post("/validation/run?wait=true").set("Authorization", bearer("t1"))
    );
    expect(cycle.body.cycle.rules_evaluated).toBe(0);
    expect(cycle.body.cycle.total_issues_found).toBe(0);
  });

  it("keeps issues the rule raised before it was deactivated", async () => {
    const rule = await h.deps.repos.rules.create(goalToCapabilityRule);
    await expectOK(
      request(h.app).post("/validation/run?wait=true").set("Authorization", bearer("t1"))
    );
    await expectOK(
      request(h.app)
        .patch(`/validation/rules/${rule.id}`)
        .set("Authorization", bearer("t1"))
        .send({ is_active: false })
    );
    const issues = await expectOK(
      request(h.app).get("/validation/issues").set("Authorization", bearer("t1"))
    );
    expect(issues.body.total_count).toBe(1);
  });

  it("requires a boolean is_active", async () => {
    const rule = await h.deps.repos.rules.create(goalToCapabilityRule);
    await expectStatus(
      request(h.app)
        .patch(`/validation/rules/${rule.id}`)
        .set("Authorization", bearer("t1"))
        .send({ is_active: "no" }),
      422
    );
  });

  it("answers 404 for an unknown rule", async () => {
    await expectStatus(
      request(h.app)
        .patch("/validation/rules/missing")
        .set("Authorization", bearer("t1"))
        .send({ is_active: true }),
      404
    );
  });
});
