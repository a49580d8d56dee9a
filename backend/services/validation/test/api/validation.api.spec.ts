// backend/services/validation/test/api/validation.api.spec.ts
import { describe, it, expect, beforeEach } from "vitest";
import request from "supertest";
import {
  buildHarness,
  goalToCapabilityRule,
  sampleElements,
  type TestHarness,
} from "../helpers/fixtures";
import { bearer } from "../helpers/tokens";
import { expectAccepted, expectOK, expectStatus } from "../helpers/http";

let h: TestHarness;

beforeEach(async () => {
  h = buildHarness({
    elements: { t1: sampleElements(), t2: [{ id: "G9", type: "goal", name: "Other" }] },
  });
  await h.deps.repos.rules.create(goalToCapabilityRule);
});

async function runAndWait(tenant = "t1"): Promise<string> {
  const res = await expectOK(
    request(h.app)
      .post("/validation/run?wait=true")
      .set("Authorization", bearer(tenant))
      .send({})
  );
  return String(res.body.validation_cycle_id);
}

describe("health", () => {
  it("answers without a token", async () => {
    const res = await expectOK(request(h.app).get("/validation/health"));
    expect(res.body).toEqual({
      status: "healthy",
      service: "validation",
      timestamp: "2026-01-15T12:00:00.000Z",
    });
  });

  it("reports readiness of the datastore", async () => {
    const res = await expectOK(request(h.app).get("/health/ready"));
    expect(res.body.ok).toBe(true);
    expect(res.body.datastore).toBe("ok");
  });
});

describe("POST /validation/run", () => {
  it("starts a cycle and answers 202", async () => {
    const res = await expectAccepted(
      request(h.app).post("/validation/run").set("Authorization", bearer("t1"))
    );
    const id = String(res.body.validation_cycle_id);
    expect(res.body.status).toBe("running");
    expect(res.body.message).toBe(`Validation cycle ${id} started successfully`);

    await h.deps.registry.get(id)?.done;
    const cycle = await expectOK(
      request(h.app).get(`/validation/cycles/${id}`).set("Authorization", bearer("t1"))
    );
    expect(cycle.body.execution_status).toBe("completed");
    expect(cycle.body.total_issues_found).toBe(1);
  });

  it("waits for the terminal state with wait=true", async () => {
    const res = await expectOK(
      request(h.app)
        .post("/validation/run?wait=true")
        .set("Authorization", bearer("t1"))
        .send({ rule_set_id: "core" })
    );
    expect(res.body.status).toBe("completed");
    expect(res.body.cycle.rule_set_id).toBe("core");
    expect(res.body.cycle.maturity_score).toBe(0.9667);
    expect(res.body.message).toBe(
      `Validation cycle ${String(res.body.validation_cycle_id)} completed`
    );
  });

  it("rejects a tenant_id that differs from the token", async () => {
    const res = await expectStatus(
      request(h.app)
        .post("/validation/run")
        .set("Authorization", bearer("t1"))
        .send({ tenant_id: "t2" }),
      403
    );
    expect(res.body.code).toBe("FORBIDDEN");
    expect(await h.deps.repos.cycles.countAll()).toBe(0);
  });

  it("rejects a bad wait flag", async () => {
    await expectStatus(
      request(h.app).post("/validation/run?wait=maybe").set("Authorization", bearer("t1")),
      422
    );
  });
});

describe("cycles", () => {
  it("does not show one tenant's cycle to another", async () => {
    const id = await runAndWait("t1");
    await expectStatus(
      request(h.app).get(`/validation/cycles/${id}`).set("Authorization", bearer("t2")),
      404
    );
  });

  it("refuses to cancel a finished cycle", async () => {
    const id = await runAndWait();
    const res = await expectStatus(
      request(h.app)
        .post(`/validation/cycles/${id}/cancel`)
        .set("Authorization", bearer("t1")),
      409
    );
    expect(res.body.detail).toBe("Validation cycle is already completed");
  });
});

describe("GET /validation/issues", () => {
  it("lists the tenant's open issues with severity counts", async () => {
    await runAndWait();
    const res = await expectOK(
      request(h.app).get("/validation/issues").set("Authorization", bearer("t1"))
    );
    expect(res.body.total_count).toBe(1);
    expect(res.body.high_count).toBe(1);
    expect(res.body.critical_count).toBe(0);
    expect(res.body.issues[0].entity_id).toBe("G1");
    expect(res.body.issues[0].issue_type).toBe("missing_link");
  });

  it("isolates tenants", async () => {
    await runAndWait("t1");
    await runAndWait("t2");
    const t2 = await expectOK(
      request(h.app).get("/validation/issues").set("Authorization", bearer("t2"))
    );
    expect(t2.body.issues.map((i: { entity_id: string }) => i.entity_id)).toEqual(["G9"]);
  });

  it("filters by severity and pages", async () => {
    await runAndWait();
    await runAndWait();
    const high = await expectOK(
      request(h.app)
        .get("/validation/issues?severity=high&limit=1&skip=1")
        .set("Authorization", bearer("t1"))
    );
    expect(high.body.total_count).toBe(2);
    expect(high.body.issues).toHaveLength(1);

    const low = await expectOK(
      request(h.app).get("/validation/issues?severity=low").set("Authorization", bearer("t1"))
    );
    expect(low.body.total_count).toBe(0);
  });

  it("rejects a limit above 1000", async () => {
    await expectStatus(
      request(h.app).get("/validation/issues?limit=1001").set("Authorization", bearer("t1")),
      422
    );
  });
});

describe("POST /validation/issues/:id/resolve", () => {
  async function firstIssueId(): Promise<string> {
    await runAndWait();
    const res = await expectOK(
      request(h.app).get("/validation/issues").set("Authorization", bearer("t1"))
    );
    return String(res.body.issues[0].id);
  }

  it("is idempotent", async () => {
    const id = await firstIssueId();
    const first = await expectOK(
      request(h.app)
        .post(`/validation/issues/${id}/resolve`)
        .set("Authorization", bearer("t1", "Editor"))
    );
    expect(first.body.is_resolved).toBe(true);
    expect(first.body.resolved_by).toBe("user-editor");

    h.clock.advance(60_000);
    const second = await expectOK(
      request(h.app)
        .post(`/validation/issues/${id}/resolve`)
        .set("Authorization", bearer("t1", "Admin"))
    );
    expect(second.body.resolved_at).toBe(first.body.resolved_at);
    expect(second.body.resolved_by).toBe("user-editor");
  });

  it("hides resolved issues unless asked", async () => {
    const id = await firstIssueId();
    await expectOK(
      request(h.app).post(`/validation/issues/${id}/resolve`).set("Authorization", bearer("t1"))
    );
    const open = await expectOK(
      request(h.app).get("/validation/issues").set("Authorization", bearer("t1"))
    );
    expect(open.body.total_count).toBe(0);
    const all = await expectOK(
      request(h.app)
        .get("/validation/issues?include_resolved=true")
        .set("Authorization", bearer("t1"))
    );
    expect(all.body.total_count).toBe(1);
  });

  it("is closed to viewers", async () => {
    const id = await firstIssueId();
    await expectStatus(
      request(h.app)
        .post(`/validation/issues/${id}/resolve`)
        .set("Authorization", bearer("t1", "Viewer")),
      403
    );
  });

  it("answers 404 for another tenant's issue", async () => {
    const id = await firstIssueId();
    await expectStatus(
      request(h.app).post(`/validation/issues/${id}/resolve`).set("Authorization", bearer("t2")),
      404
    );
  });
});

describe("GET /validation/scorecard", () => {
  it("is 404 before any completed cycle", async () => {
    const res = await expectStatus(
      request(h.app).get("/validation/scorecard").set("Authorization", bearer("t1")),
      404
    );
    expect(res.body.detail).toBe("No completed validation cycle for this tenant");
  });

  it("reports the latest completed cycle", async () => {
    const id = await runAndWait();
    const res = await expectOK(
      request(h.app).get("/validation/scorecard").set("Authorization", bearer("t1"))
    );
    expect(res.body.validation_cycle_id).toBe(id);
    expect(res.body.overall_maturity_score).toBe(0.9667);
    expect(
      res.body.layer_scores.map((s: { layer: string; overall_score: number }) => [
        s.layer,
        s.overall_score,
      ])
    ).toEqual([
      ["Motivation", 0.8333],
      ["Business", 1],
      ["Application", 1],
      ["Technology", 1],
      ["Implementation", 1],
    ]);
    expect(res.body.summary).toEqual({
      total_layers: 5,
      average_score: 0.9667,
      best_layer: "Business",
      worst_layer: "Motivation",
    });
  });

  it("accepts an explicit cycle id", async () => {
    const id = await runAndWait();
    const res = await expectOK(
      request(h.app)
        .get(`/validation/scorecard?validation_cycle_id=${id}`)
        .set("Authorization", bearer("t1"))
    );
    expect(res.body.validation_cycle_id).toBe(id);
    await expectStatus(
      request(h.app)
        .get(`/validation/scorecard?cycle_id=${id}`)
        .set("Authorization", bearer("t2")),
      404
    );
  });
});

describe("GET /validation/scorecard for unfinished cycles", () => {
  it("is 404 for a failed cycle", async () => {
    const failing = buildHarness({
      source: {
        fetchElements: async () => {
          throw new Error("catalog unreachable");
        },
      },
    });
    const cycle = await failing.deps.cycles.run(
      { tenant_id: "t1", triggered_by: "user-admin" },
      { wait: true }
    );
    expect(cycle.execution_status).toBe("failed");

    const res = await expectStatus(
      request(failing.app)
        .get(`/validation/scorecard?cycle_id=${cycle.id}`)
        .set("Authorization", bearer("t1")),
      404
    );
    expect(res.body.detail).toBe("No scorecard for this cycle");
  });

  it("is 404 for a running and then a cancelled cycle", async () => {
    const hanging = buildHarness({
      source: {
        fetchElements: (_tenantId, opts = {}) =>
          new Promise((_resolve, reject) => {
            opts.signal?.addEventListener("abort", () => reject(opts.signal?.reason), {
              once: true,
            });
          }),
      },
    });
    const cycle = await hanging.deps.cycles.run({ tenant_id: "t1", triggered_by: "u" });
    const scorecardOf = () =>
      request(hanging.app)
        .get(`/validation/scorecard?cycle_id=${cycle.id}`)
        .set("Authorization", bearer("t1"));

    await expectStatus(scorecardOf(), 404);
    await hanging.deps.cycles.cancel("t1", cycle.id);
    const res = await expectStatus(scorecardOf(), 404);
    expect(res.body.detail).toBe("No scorecard for this cycle");
  });
});

describe("traceability matrix", () => {
  it("is written by a cycle and filterable", async () => {
    await runAndWait();
    const all = await expectOK(
      request(h.app).get("/validation/traceability-matrix").set("Authorization", bearer("t1"))
    );
    expect(all.body).toHaveLength(4);

    const impl = await expectOK(
      request(h.app)
        .get("/validation/traceability-matrix?source_layer=Implementation")
        .set("Authorization", bearer("t1"))
    );
    expect(impl.body).toHaveLength(1);
    expect(impl.body[0].missing_connections).toBe(1);
    expect(impl.body[0].strength_score).toBe(0);
  });

  it("rebuilds on demand without a cycle", async () => {
    const res = await expectOK(
      request(h.app)
        .post("/validation/traceability-matrix/rebuild")
        .set("Authorization", bearer("t1"))
    );
    expect(res.body).toHaveLength(4);
    expect(res.body[0].source_entity_type).toBe("goal");
    expect(await h.deps.repos.cycles.countAll()).toBe(0);
  });

  it("rejects an unknown layer", async () => {
    await expectStatus(
      request(h.app)
        .get("/validation/traceability-matrix?target_layer=Strategy")
        .set("Authorization", bearer("t1")),
      422
    );
  });
});

describe("GET /validation/history", () => {
  it("pages cycles and averages completed maturity", async () => {
    await runAndWait();
    await runAndWait();
    const res = await expectOK(
      request(h.app).get("/validation/history").set("Authorization", bearer("t1"))
    );
    expect(res.body.total_cycles).toBe(2);
    expect(res.body.cycles).toHaveLength(2);
    expect(res.body.average_maturity_score).toBe(0.9667);
    expect(res.body.last_validation_date).toBe("2026-01-15T12:00:00.000Z");
  });

  it("is empty for a new tenant", async () => {
    const res = await expectOK(
      request(h.app).get("/validation/history").set("Authorization", bearer("t3"))
    );
    expect(res.body).toEqual({
      cycles: [],
      total_cycles: 0,
      average_maturity_score: 0,
      last_validation_date: null,
    });
  });
});

describe("GET /validation/metrics", () => {
  it("counts across tenants without a token", async () => {
    await runAndWait("t1");
    const res = await expectOK(request(h.app).get("/validation/metrics"));
    expect(res.body).toEqual({
      validation_cycles_total: 1,
      validation_issues_total: 1,
      validation_rules_active: 1,
      validation_exceptions_total: 0,
      average_maturity_score: 0.9667,
      cycles_in_flight: 0,
    });
  });
});
