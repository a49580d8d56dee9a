// backend/services/validation/test/api/exceptions.api.spec.ts
import { describe, it, expect, beforeEach } from "vitest";
import request from "supertest";
import {
  T0,
  buildHarness,
  goalToCapabilityRule,
  sampleElements,
  type TestHarness,
} from "../helpers/fixtures";
import { bearer } from "../helpers/tokens";
import { expectCreated, expectOK, expectStatus } from "../helpers/http";

const HOUR = 60 * 60 * 1000;

let h: TestHarness;
let ruleId: string;

beforeEach(async () => {
  h = buildHarness({ elements: { t1: sampleElements() } });
  ruleId = (await h.deps.repos.rules.create(goalToCapabilityRule)).id;
});

function grant(body: Record<string, unknown>) {
  return request(h.app)
    .post("/validation/exceptions")
    .set("Authorization", bearer("t1"))
    .send({ entity_type: "goal", entity_id: "G1", reason: "accepted risk", ...body });
}

async function run() {
  const res = await expectOK(
    request(h.app).post("/validation/run?wait=true").set("Authorization", bearer("t1"))
  );
  return res.body.cycle;
}

async function openIssues(): Promise<number> {
  const res = await expectOK(
    request(h.app).get("/validation/issues").set("Authorization", bearer("t1"))
  );
  return Number(res.body.total_count);
}

describe("POST /validation/exceptions", () => {
  it("creates an active exception", async () => {
    const res = await expectCreated(grant({ rule_id: ruleId }));
    expect(res.body.message).toBe("Validation exception created successfully");
    expect(res.body.exception_id).toBe(res.body.exception.id);
    expect(res.body.exception).toMatchObject({
      tenant_id: "t1",
      entity_type: "goal",
      entity_id: "G1",
      rule_id: ruleId,
      created_by: "user-admin",
      is_active: true,
      expires_at: null,
      effective_status: "active",
    });
  });

  it("rejects an expiry in the past", async () => {
    const res = await expectStatus(
      grant({ expires_at: new Date(T0.getTime() - HOUR).toISOString() }),
      422
    );
    expect(res.body.detail).toBe("expires_at must be in the future");
  });

  it("rejects an unknown rule", async () => {
    const res = await expectStatus(grant({ rule_id: "no-such-rule" }), 404);
    expect(res.body.detail).toBe("Validation rule no-such-rule not found");
  });

  it("requires a reason", async () => {
    await expectStatus(grant({ reason: "" }), 422);
  });
});

describe("suppression", () => {
  it("hides matching issues from an earlier cycle", async () => {
    await run();
    expect(await openIssues()).toBe(1);
    await expectCreated(grant({}));
    expect(await openIssues()).toBe(0);
  });

  it("keeps matching issues out of later cycles", async () => {
    await expectCreated(grant({ rule_id: ruleId }));
    const cycle = await run();
    expect(cycle.total_issues_found).toBe(0);
    expect(cycle.suppressed_issues).toBe(1);
    expect(cycle.maturity_score).toBe(1);
  });

  it("does not cover other rules", async () => {
    const other = await h.deps.repos.rules.create({
      ...goalToCapabilityRule,
      name: "other",
      rule_set_id: null,
    });
    await expectCreated(grant({ rule_id: other.id }));
    const cycle = await run();
    // goalToCapabilityRule and its copy both flag G1; one is covered.
    expect(cycle.total_issues_found).toBe(1);
    expect(cycle.suppressed_issues).toBe(1);
  });

  it("stops suppressing once expired", async () => {
    await expectCreated(grant({ expires_at: new Date(T0.getTime() + HOUR).toISOString() }));
    h.clock.advance(2 * HOUR);

    const list = await expectOK(
      request(h.app).get("/validation/exceptions").set("Authorization", bearer("t1"))
    );
    expect(list.body).toHaveLength(1);
    expect(list.body[0].effective_status).toBe("expired");

    const cycle = await run();
    expect(cycle.total_issues_found).toBe(1);
    expect(cycle.suppressed_issues).toBe(0);
  });
});

describe("DELETE /validation/exceptions/:id", () => {
  it("revokes, idempotently", async () => {
    const created = await expectCreated(grant({}));
    const id = String(created.body.exception_id);

    for (let i = 0; i < 2; i += 1) {
      const res = await expectOK(
        request(h.app).delete(`/validation/exceptions/${id}`).set("Authorization", bearer("t1"))
      );
      expect(res.body.is_active).toBe(false);
      expect(res.body.effective_status).toBe("revoked");
    }

    const active = await expectOK(
      request(h.app).get("/validation/exceptions").set("Authorization", bearer("t1"))
    );
    expect(active.body).toEqual([]);
    const all = await expectOK(
      request(h.app)
        .get("/validation/exceptions?include_inactive=true")
        .set("Authorization", bearer("t1"))
    );
    expect(all.body).toHaveLength(1);

    const cycle = await run();
    expect(cycle.total_issues_found).toBe(1);
  });

  it("answers 404 for another tenant's exception", async () => {
    const created = await expectCreated(grant({}));
    await expectStatus(
      request(h.app)
        .delete(`/validation/exceptions/${String(created.body.exception_id)}`)
        .set("Authorization", bearer("t2")),
      404
    );
  });
});
