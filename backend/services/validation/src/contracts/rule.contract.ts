// backend/services/validation/src/contracts/rule.contract.ts
import { z } from "zod";
import { zId, zLayer, zRuleType, zSeverity } from "./common";

export const ruleContract = z.object({
  id: zId,
  name: z.string().min(1),
  description: z.string(),
  rule_type: zRuleType,
  scope: zLayer,
  rule_logic: z.string().min(1),
  is_active: z.boolean(),
  severity: zSeverity,
  rule_set_id: z.string().nullable(),
  created_at: z.date(),
  updated_at: z.date(),
});

export type ValidationRule = z.infer<typeof ruleContract>;

export type NewRule = Omit<
  ValidationRule,
  "id" | "is_active" | "created_at" | "updated_at"
> & { is_active?: boolean };
