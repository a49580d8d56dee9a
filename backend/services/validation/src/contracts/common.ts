// backend/services/validation/src/contracts/common.ts
import { z } from "zod";

export const ISSUE_TYPES = [
  "missing_link",
  "orphaned",
  "stale",
  "invalid_enum",
  "broken_traceability",
] as const;
export const zIssueType = z.enum(ISSUE_TYPES);
export type IssueType = z.infer<typeof zIssueType>;

export const SEVERITIES = ["low", "medium", "high", "critical"] as const;
export const zSeverity = z.enum(SEVERITIES);
export type Severity = z.infer<typeof zSeverity>;

export const RULE_TYPES = ["traceability", "completeness", "alignment"] as const;
export const zRuleType = z.enum(RULE_TYPES);
export type RuleType = z.infer<typeof zRuleType>;

/** Architecture layers, in reporting order. Also the rule `scope` values. */
export const LAYERS = [
  "Motivation",
  "Business",
  "Application",
  "Technology",
  "Implementation",
] as const;
export const zLayer = z.enum(LAYERS);
export type Layer = z.infer<typeof zLayer>;

export const EXECUTION_STATUSES = [
  "running",
  "completed",
  "failed",
  "cancelled",
] as const;
export const zExecutionStatus = z.enum(EXECUTION_STATUSES);
export type ExecutionStatus = z.infer<typeof zExecutionStatus>;

export const TERMINAL_STATUSES: ReadonlySet<ExecutionStatus> = new Set([
  "completed",
  "failed",
  "cancelled",
]);

export const zId = z.string().min(1);
export const zNullableDate = z.date().nullable();


/** Position of a layer in reporting order. */
export function layerIndex(layer: Layer): number {
  return LAYERS.indexOf(layer);
}
