// backend/services/validation/src/engine/predicates.ts
import type { Layer } from "../contracts/common";
import {
  layerOfType,
  type ArchitectureElement,
  type Relationship,
} from "../contracts/element.contract";
import type { Predicate } from "./ruleLogic";

const DAY_MS = 24 * 60 * 60 * 1000;

type Inbound = { source: ArchitectureElement; rel: Relationship };

/**
 * Read-only view over one tenant's elements, indexed for link lookups.
 * Built once per evaluation.
 */
export class ElementGraph {
  private readonly byId = new Map<string, ArchitectureElement>();
  private readonly inbound = new Map<string, Inbound[]>();

  public constructor(public readonly elements: readonly ArchitectureElement[]) {
    for (const el of elements) this.byId.set(el.id, el);
    for (const el of elements) {
      for (const rel of el.relationships) {
        const list = this.inbound.get(rel.target_id) ?? [];
        list.push({ source: el, rel });
        this.inbound.set(rel.target_id, list);
      }
    }
  }

  public get(id: string): ArchitectureElement | undefined {
    return this.byId.get(id);
  }

  /** Layer of a link target: the resolved element's, else its declared type's. */
  public targetLayer(rel: Relationship): Layer | null {
    return this.byId.get(rel.target_id)?.layer ?? layerOfType(rel.target_type);
  }

  public inboundOf(id: string): readonly Inbound[] {
    return this.inbound.get(id) ?? [];
  }
}

/** Top-level element fields first, then `properties`. */
export function fieldValue(el: ArchitectureElement, field: string): unknown {
  switch (field) {
    case "id":
      return el.id;
    case "type":
      return el.type;
    case "name":
      return el.name;
    case "layer":
      return el.layer;
    case "last_modified":
      return el.last_modified;
    case "created_at":
      return el.created_at;
    default:
      return el.properties[field];
  }
}

/** null, undefined, blank strings and empty arrays count as absent. */
export function isPresent(v: unknown): boolean {
  if (v === undefined || v === null) return false;
  if (typeof v === "string") return v.trim().length > 0;
  if (Array.isArray(v)) return v.length > 0;
  return true;
}

export function holds(
  pred: Predicate,
  el: ArchitectureElement,
  graph: ElementGraph,
  now: Date
): boolean {
  switch (pred.op) {
    case "all":
      return pred.of.every((p) => holds(p, el, graph, now));
    case "any":
      return pred.of.some((p) => holds(p, el, graph, now));
    case "not":
      return !holds(pred.pred, el, graph, now);
    case "has_field":
      return isPresent(fieldValue(el, pred.field));
    case "field_in": {
      const v = fieldValue(el, pred.field);
      return pred.values.some((allowed) => allowed === v);
    }
    case "links": {
      const n = el.relationships.filter(
        (rel) =>
          (pred.target_type === undefined || rel.target_type === pred.target_type) &&
          (pred.relationship_type === undefined ||
            rel.relationship_type === pred.relationship_type) &&
          (pred.target_layer === undefined ||
            graph.targetLayer(rel) === pred.target_layer)
      ).length;
      return n >= (pred.min ?? 1) && (pred.max === undefined || n <= pred.max);
    }
    case "linked_from": {
      const n = graph
        .inboundOf(el.id)
        .filter(
          ({ source, rel }) =>
            (pred.source_type === undefined || source.type === pred.source_type) &&
            (pred.source_layer === undefined ||
              source.layer === pred.source_layer) &&
            (pred.relationship_type === undefined ||
              rel.relationship_type === pred.relationship_type)
        ).length;
      return n >= (pred.min ?? 1);
    }
    case "links_resolve":
      return el.relationships.every((rel) => graph.get(rel.target_id) !== undefined);
    case "fresh": {
      const stamp = el.last_modified ?? el.created_at;
      if (!stamp) return false;
      return now.getTime() - stamp.getTime() <= pred.max_age_days * DAY_MS;
    }
  }
}

/**
 * `has_field` checks that fail for this element, for issue text. Looks through
 * `all` nodes only; anything under `any`/`not` has no single missing field.
 */
export function missingFields(pred: Predicate, el: ArchitectureElement): string[] {
  if (pred.op === "has_field") {
    return isPresent(fieldValue(el, pred.field)) ? [] : [pred.field];
  }
  if (pred.op === "all") return pred.of.flatMap((p) => missingFields(p, el));
  return [];
}
