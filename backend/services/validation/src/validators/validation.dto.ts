// backend/services/validation/src/validators/validation.dto.ts
/**
 * Request DTOs for the /validation routes. Parsed in handlers; a ZodError
 * reaches errorProblemJson() and becomes 422.
 *
 * Query strings arrive as strings, so numbers and booleans are coerced here.
 */

import { z } from "zod";
import { zLayer, zRuleType, zSeverity } from "../contracts/common";

const zQueryBool = z
  .enum(["true", "false", "1", "0"])
  .transform((v) => v === "true" || v === "1");

const zSkip = z.coerce.number().int().min(0).default(0);

/** Optional tenant echo; must match the token when present. */
const zTenantEcho = z.string().min(1).optional();

export const runQueryDto = z.object({
  wait: zQueryBool.default("false"),
  tenant_id: zTenantEcho,
});

export const runBodyDto = z
  .object({
    rule_set_id: z.string().min(1).nullable().optional(),
    tenant_id: zTenantEcho,
  })
  .default({});

export const idParamDto = z.object({ id: z.string().min(1) });

export const listIssuesQueryDto = z.object({
  skip: zSkip,
  limit: z.coerce.number().int().min(1).max(1000).default(100),
  include_resolved: zQueryBool.default("false"),
  severity: zSeverity.optional(),
  cycle_id: z.string().min(1).optional(),
  tenant_id: zTenantEcho,
});

export const scorecardQueryDto = z.object({
  validation_cycle_id: z.string().min(1).optional(),
  cycle_id: z.string().min(1).optional(),
  tenant_id: zTenantEcho,
});

export const matrixQueryDto = z.object({
  source_layer: zLayer.optional(),
  target_layer: zLayer.optional(),
  entity_type: z.string().min(1).optional(),
  tenant_id: zTenantEcho,
});

export const historyQueryDto = z.object({
  skip: zSkip,
  limit: z.coerce.number().int().min(1).max(100).default(50),
  tenant_id: zTenantEcho,
});

export const createExceptionDto = z.object({
  entity_type: z.string().min(1),
  entity_id: z.string().min(1),
  reason: z.string().min(1),
  rule_id: z.string().min(1).nullable().optional(),
  expires_at: z.coerce.date().nullable().optional(),
  tenant_id: zTenantEcho,
});

export const listExceptionsQueryDto = z.object({
  include_inactive: zQueryBool.default("false"),
  tenant_id: zTenantEcho,
});

export const listRulesQueryDto = z.object({
  rule_type: zRuleType.optional(),
  scope: zLayer.optional(),
  is_active: zQueryBool.optional(),
  rule_set_id: z.string().min(1).optional(),
});

export const createRuleDto = z.object({
  name: z.string().min(1).max(200),
  description: z.string().default(""),
  rule_type: zRuleType,
  scope: zLayer,
  rule_logic: z.union([
    z.string().min(1),
    // Accept the logic as a JSON object and store it as text.
    z.record(z.unknown()).transform((v) => JSON.stringify(v)),
  ]),
  severity: zSeverity.default("medium"),
  is_active: z.boolean().optional(),
  rule_set_id: z.string().min(1).nullable().default(null),
});

export const toggleRuleDto = z.object({ is_active: z.boolean() });

export type CreateRuleDto = z.output<typeof createRuleDto>;
