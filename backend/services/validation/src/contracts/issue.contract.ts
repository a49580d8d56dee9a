// backend/services/validation/src/contracts/issue.contract.ts
import { z } from "zod";
import {
  zId,
  zIssueType,
  zLayer,
  zNullableDate,
  zSeverity,
  type Severity,
} from "./common";

export const issueContract = z.object({
  id: zId,
  tenant_id: zId,
  validation_cycle_id: z.string().nullable(),
  rule_id: z.string().nullable(),
  entity_type: z.string().min(1),
  entity_id: z.string().min(1),
  layer: zLayer.nullable(),
  issue_type: zIssueType,
  severity: zSeverity,
  description: z.string(),
  recommended_fix: z.string().nullable(),
  metadata: z.record(z.unknown()).nullable(),
  timestamp: z.date(),
  is_resolved: z.boolean(),
  resolved_at: zNullableDate,
  resolved_by: z.string().nullable(),
});

export type ValidationIssue = z.infer<typeof issueContract>;

/** What the rule evaluator produces before persistence assigns ids. */
export type IssueCandidate = Omit<
  ValidationIssue,
  | "id"
  | "tenant_id"
  | "validation_cycle_id"
  | "timestamp"
  | "is_resolved"
  | "resolved_at"
  | "resolved_by"
>;

export type SeverityCounts = {
  critical_count: number;
  high_count: number;
  medium_count: number;
  low_count: number;
};

export type IssuesPage = SeverityCounts & {
  issues: ValidationIssue[];
  total_count: number;
};

export const SEVERITY_COUNT_KEY: Record<Severity, keyof SeverityCounts> = {
  critical: "critical_count",
  high: "high_count",
  medium: "medium_count",
  low: "low_count",
};

export function countBySeverity(
  issues: ReadonlyArray<Pick<ValidationIssue, "severity">>
): SeverityCounts {
  const counts: SeverityCounts = {
    critical_count: 0,
    high_count: 0,
    medium_count: 0,
    low_count: 0,
  };
  for (const i of issues) counts[SEVERITY_COUNT_KEY[i.severity]] += 1;
  return counts;
}
