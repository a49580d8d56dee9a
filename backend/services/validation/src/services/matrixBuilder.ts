// backend/services/validation/src/services/matrixBuilder.ts
/**
 * Traceability matrix from a tenant's outbound relationships. Pure.
 *
 * Notes:
 * - A link counts as connected when its target id resolves to a known
 *   element, otherwise as missing.
 * - A missing link is placed by its declared `target_type`; links to an
 *   unknown type that do not resolve have no target layer and are skipped.
 */

import type { Layer } from "../contracts/common";
import { layerOfType, type ArchitectureElement } from "../contracts/element.contract";
import { compareMatrixCells, type MatrixCell } from "../contracts/matrix.contract";
import { round4 } from "./scoring";

type Key = {
  source_layer: Layer;
  target_layer: Layer;
  source_entity_type: string;
  target_entity_type: string;
  relationship_type: string;
};

const keyOf = (k: Key): string =>
  [
    k.source_layer,
    k.target_layer,
    k.source_entity_type,
    k.target_entity_type,
    k.relationship_type,
  ].join("\u0000");

export function strengthOf(connected: number, missing: number): number | null {
  const total = connected + missing;
  return total === 0 ? null : round4(connected / total);
}

export function buildMatrix(elements: readonly ArchitectureElement[]): MatrixCell[] {
  const byId = new Map(elements.map((e) => [e.id, e]));
  const cells = new Map<string, Key & { connected: number; missing: number }>();

  for (const el of elements) {
    for (const rel of el.relationships) {
      const target = byId.get(rel.target_id);
      const targetLayer = target ? target.layer : layerOfType(rel.target_type);
      if (!targetLayer) continue;

      const key: Key = {
        source_layer: el.layer,
        target_layer: targetLayer,
        source_entity_type: el.type,
        target_entity_type: target ? target.type : rel.target_type,
        relationship_type: rel.relationship_type,
      };
      const id = keyOf(key);
      const cell = cells.get(id) ?? { ...key, connected: 0, missing: 0 };
      if (target) cell.connected += 1;
      else cell.missing += 1;
      cells.set(id, cell);
    }
  }

  return [...cells.values()]
    .map(
      ({ connected, missing, ...key }): MatrixCell => ({
        ...key,
        connection_count: connected,
        missing_connections: missing,
        strength_score: strengthOf(connected, missing),
      })
    )
    .sort(compareMatrixCells);
}
