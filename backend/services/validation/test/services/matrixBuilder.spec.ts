// backend/services/validation/test/services/matrixBuilder.spec.ts
import { describe, it, expect } from "vitest";
import { buildMatrix, strengthOf } from "../../src/services/matrixBuilder";
import { parseElements } from "../helpers/fixtures";

describe("buildMatrix", () => {
  it("aggregates links into ordered cells", () => {
    expect(buildMatrix(parseElements())).toEqual([
      {
        source_layer: "Motivation",
        target_layer: "Business",
        source_entity_type: "goal",
        target_entity_type: "capability",
        relationship_type: "realizes",
        connection_count: 1,
        missing_connections: 0,
        strength_score: 1,
      },
      {
        source_layer: "Business",
        target_layer: "Application",
        source_entity_type: "capability",
        target_entity_type: "application_service",
        relationship_type: "serves",
        connection_count: 1,
        missing_connections: 0,
        strength_score: 1,
      },
      {
        source_layer: "Application",
        target_layer: "Technology",
        source_entity_type: "application_service",
        target_entity_type: "node",
        relationship_type: "runs_on",
        connection_count: 1,
        missing_connections: 0,
        strength_score: 1,
      },
      {
        source_layer: "Implementation",
        target_layer: "Application",
        source_entity_type: "workpackage",
        target_entity_type: "application_service",
        relationship_type: "delivers",
        connection_count: 0,
        missing_connections: 1,
        strength_score: 0,
      },
    ]);
  });

  it("mixes connected and missing links in one cell", () => {
    const cells = buildMatrix(
      parseElements([
        {
          id: "G1",
          type: "goal",
          relationships: [
            { target_id: "C1", target_type: "capability", relationship_type: "realizes" },
            { target_id: "C2", target_type: "capability", relationship_type: "realizes" },
            { target_id: "C3", target_type: "capability", relationship_type: "realizes" },
          ],
        },
        { id: "C1", type: "capability" },
      ])
    );
    expect(cells).toHaveLength(1);
    expect(cells[0]?.connection_count).toBe(1);
    expect(cells[0]?.missing_connections).toBe(2);
    expect(cells[0]?.strength_score).toBe(0.3333);
  });

  it("skips unresolved links to unknown types", () => {
    const cells = buildMatrix(
      parseElements([
        {
          id: "G1",
          type: "goal",
          relationships: [
            { target_id: "X", target_type: "mystery", relationship_type: "relates" },
          ],
        },
      ])
    );
    expect(cells).toEqual([]);
  });

  it("uses the resolved element's type over the declared one", () => {
    const cells = buildMatrix(
      parseElements([
        {
          id: "G1",
          type: "goal",
          relationships: [
            { target_id: "D1", target_type: "mystery", relationship_type: "influences" },
          ],
        },
        { id: "D1", type: "driver" },
      ])
    );
    expect(cells.map((c) => [c.target_layer, c.target_entity_type])).toEqual([
      ["Motivation", "driver"],
    ]);
  });
});

describe("strengthOf", () => {
  it("is null for an empty cell", () => {
    expect(strengthOf(0, 0)).toBeNull();
    expect(strengthOf(3, 1)).toBe(0.75);
  });
});
