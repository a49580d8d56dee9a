// backend/services/validation/src/engine/ruleLogic.ts
/**
 * Rule logic: a JSON document stored on each ValidationRule, parsed into a
 * tagged predicate tree.
 *
 * Two input shapes are accepted:
 * - The tree itself: `{ target, assert, issue_type, min_count?, ... }`.
 * - The flat catalog shapes (traceability / completeness / alignment), which
 *   are compiled into an equivalent tree.
 *
 * Parsing never throws; callers get a `ParsedLogic` result to branch on.
 */

import { z } from "zod";
import { zIssueType, zLayer, type Layer } from "../contracts/common";

export type Scalar = string | number | boolean;

export type Predicate =
  | { op: "all"; of: Predicate[] }
  | { op: "any"; of: Predicate[] }
  | { op: "not"; pred: Predicate }
  | { op: "has_field"; field: string }
  | { op: "field_in"; field: string; values: Scalar[] }
  | {
      op: "links";
      target_type?: string;
      target_layer?: Layer;
      relationship_type?: string;
      min?: number;
      max?: number;
    }
  | {
      op: "linked_from";
      source_type?: string;
      source_layer?: Layer;
      relationship_type?: string;
      min?: number;
    }
  | { op: "links_resolve" }
  | { op: "fresh"; max_age_days: number };

const zCount = z.number().int().min(0);

export const zPredicate: z.ZodType<Predicate> = z.lazy(() =>
  z.discriminatedUnion("op", [
    z.object({ op: z.literal("all"), of: z.array(zPredicate) }),
    z.object({ op: z.literal("any"), of: z.array(zPredicate).min(1) }),
    z.object({ op: z.literal("not"), pred: zPredicate }),
    z.object({ op: z.literal("has_field"), field: z.string().min(1) }),
    z.object({
      op: z.literal("field_in"),
      field: z.string().min(1),
      values: z.array(z.union([z.string(), z.number(), z.boolean()])).min(1),
    }),
    z.object({
      op: z.literal("links"),
      target_type: z.string().min(1).optional(),
      target_layer: zLayer.optional(),
      relationship_type: z.string().min(1).optional(),
      min: zCount.optional(),
      max: zCount.optional(),
    }),
    z.object({
      op: z.literal("linked_from"),
      source_type: z.string().min(1).optional(),
      source_layer: zLayer.optional(),
      relationship_type: z.string().min(1).optional(),
      min: zCount.optional(),
    }),
    z.object({ op: z.literal("links_resolve") }),
    z.object({ op: z.literal("fresh"), max_age_days: z.number().positive() }),
  ])
);

export const zRuleTarget = z
  .object({
    element_type: z.string().min(1).optional(),
    layer: zLayer.optional(),
  })
  .strict();

export const zRuleLogic = z
  .object({
    target: zRuleTarget.default({}),
    assert: zPredicate,
    issue_type: zIssueType,
    min_count: zCount.optional(),
    description: z.string().min(1).optional(),
    recommended_fix: z.string().min(1).optional(),
  })
  .strict();

export type RuleLogic = z.output<typeof zRuleLogic>;

// ── flat catalog shapes ─────────────────────────────────────────────────────

const zTraceabilityShape = z.object({
  source_type: z.string().min(1),
  target_type: z.string().min(1),
  relationship_type: z.string().min(1).optional(),
  min_connections: z.number().int().min(1).default(1),
});

const zCompletenessShape = z.object({
  element_type: z.string().min(1),
  required_fields: z.array(z.string().min(1)).default([]),
  min_count: zCount.default(1),
});

const zAlignmentShape = z.object({
  source_layer: zLayer,
  target_layer: zLayer,
  alignment_criteria: z.record(z.unknown()).optional(),
});

function compileTraceability(
  s: z.output<typeof zTraceabilityShape>
): RuleLogic {
  const rel = s.relationship_type ?? "any";
  return {
    target: { element_type: s.source_type },
    assert: {
      op: "links",
      target_type: s.target_type,
      relationship_type: s.relationship_type,
      min: s.min_connections,
    },
    issue_type: "missing_link",
    description: `{name} ({type}) has insufficient connections to ${s.target_type}`,
    recommended_fix: `Create ${rel} relationship to at least ${s.min_connections} ${s.target_type} element(s)`,
  };
}

function compileCompleteness(
  s: z.output<typeof zCompletenessShape>
): RuleLogic {
  return {
    target: { element_type: s.element_type },
    assert: {
      op: "all",
      of: s.required_fields.map(
        (field): Predicate => ({ op: "has_field", field })
      ),
    },
    issue_type: "invalid_enum",
    min_count: s.min_count,
    description: "{name} ({type}) missing required fields: {missing_fields}",
    recommended_fix: "Complete the missing fields: {missing_fields}",
  };
}

function compileAlignment(s: z.output<typeof zAlignmentShape>): RuleLogic {
  return {
    target: { layer: s.source_layer },
    assert: { op: "links", target_layer: s.target_layer, min: 1 },
    issue_type: "broken_traceability",
    description: `{name} (${s.source_layer}) lacks alignment with ${s.target_layer}`,
    recommended_fix: `Create alignment relationships with ${s.target_layer} elements`,
  };
}

export type ParsedLogic =
  | { ok: true; logic: RuleLogic; compiled: boolean }
  | { ok: false; error: string };

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function describe(err: z.ZodError): string {
  return err.issues
    .map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message))
    .join("; ");
}

export function parseRuleLogic(text: string): ParsedLogic {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    return {
      ok: false,
      error: `rule_logic is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
    };
  }
  if (!isRecord(raw)) return { ok: false, error: "rule_logic must be a JSON object" };

  if ("assert" in raw) {
    const r = zRuleLogic.safeParse(raw);
    return r.success
      ? { ok: true, logic: r.data, compiled: false }
      : { ok: false, error: describe(r.error) };
  }

  if ("source_type" in raw) {
    const r = zTraceabilityShape.safeParse(raw);
    return r.success
      ? { ok: true, logic: compileTraceability(r.data), compiled: true }
      : { ok: false, error: describe(r.error) };
  }
  if ("element_type" in raw) {
    const r = zCompletenessShape.safeParse(raw);
    return r.success
      ? { ok: true, logic: compileCompleteness(r.data), compiled: true }
      : { ok: false, error: describe(r.error) };
  }
  if ("source_layer" in raw) {
    const r = zAlignmentShape.safeParse(raw);
    return r.success
      ? { ok: true, logic: compileAlignment(r.data), compiled: true }
      : { ok: false, error: describe(r.error) };
  }

  return {
    ok: false,
    error:
      "rule_logic must be a predicate tree (with `assert`) or a traceability, completeness or alignment shape",
  };
}
