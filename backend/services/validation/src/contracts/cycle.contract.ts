// backend/services/validation/src/contracts/cycle.contract.ts
import { z } from "zod";
import { zExecutionStatus, zId, zNullableDate } from "./common";

export const cycleContract = z.object({
  id: zId,
  tenant_id: zId,
  start_time: z.date(),
  end_time: zNullableDate,
  triggered_by: z.string().min(1),
  rule_set_id: z.string().nullable(),
  total_issues_found: z.number().int().min(0),
  suppressed_issues: z.number().int().min(0),
  rules_evaluated: z.number().int().min(0),
  elements_checked: z.number().int().min(0),
  execution_status: zExecutionStatus,
  maturity_score: z.number().min(0).max(1).nullable(),
  error: z.string().nullable(),
  created_at: z.date(),
  updated_at: z.date(),
});

export type ValidationCycle = z.infer<typeof cycleContract>;

/** Fields a terminal transition may set. */
export type CycleOutcome = Partial<
  Pick<
    ValidationCycle,
    | "total_issues_found"
    | "suppressed_issues"
    | "rules_evaluated"
    | "elements_checked"
    | "maturity_score"
    | "error"
  >
>;
