// backend/services/validation/src/contracts/exception.contract.ts
import { z } from "zod";
import { zId, zNullableDate } from "./common";

export const exceptionContract = z.object({
  id: zId,
  tenant_id: zId,
  entity_type: z.string().min(1),
  entity_id: z.string().min(1),
  rule_id: z.string().nullable(),
  reason: z.string().min(1),
  created_by: z.string().min(1),
  created_at: z.date(),
  expires_at: zNullableDate,
  is_active: z.boolean(),
});

export type ValidationException = z.infer<typeof exceptionContract>;

export type NewException = Omit<
  ValidationException,
  "id" | "created_at" | "is_active"
>;

export type EffectiveStatus = "active" | "expired" | "revoked";
