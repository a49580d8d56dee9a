// backend/services/validation/src/seeds/seed.ts
/**
 * Default rule catalog. Seeds only an empty rule collection, so operator
 * edits are never overwritten.
 */

import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { logger } from "@shared/utils/logger";
import type { RuleService } from "../services/ruleService";
import { createRuleDto, type CreateRuleDto } from "../validators/validation.dto";

export const DEFAULT_RULES_PATH = path.join(__dirname, "defaultRules.json");

export function loadRuleCatalog(file: string = DEFAULT_RULES_PATH): CreateRuleDto[] {
  const raw: unknown = JSON.parse(fs.readFileSync(file, "utf8"));
  return z.array(createRuleDto).parse(raw);
}

/** Returns the number of rules created. */
export async function seedDefaultRules(
  rules: RuleService,
  catalog: CreateRuleDto[] = loadRuleCatalog()
): Promise<number> {
  const existing = await rules.list();
  if (existing.length > 0) {
    logger.info(
      { existing: existing.length },
      "[seedDefaultRules] rules present; skipping"
    );
    return 0;
  }
  for (const rule of catalog) await rules.create(rule);
  logger.info({ created: catalog.length }, "[seedDefaultRules] seeded");
  return catalog.length;
}
