// backend/services/validation/src/services/exceptionOverlay.ts
/**
 * Exception effectiveness and issue suppression.
 *
 * Invariants:
 * - Expiry overrides `is_active`: an active exception past `expires_at`
 *   suppresses nothing.
 * - An exception without `rule_id` covers every rule for its entity.
 * - Callers pass exceptions of one tenant only.
 */

import type {
  EffectiveStatus,
  ValidationException,
} from "../contracts/exception.contract";
import type { ValidationIssue } from "../contracts/issue.contract";
import type { SuppressionKey } from "../repo/types";

type Suppressible = Pick<ValidationIssue, "entity_type" | "entity_id" | "rule_id">;

export function isEffective(ex: ValidationException, now: Date): boolean {
  return (
    ex.is_active &&
    (ex.expires_at === null || ex.expires_at.getTime() > now.getTime())
  );
}

export function effectiveStatus(
  ex: ValidationException,
  now: Date
): EffectiveStatus {
  if (!ex.is_active) return "revoked";
  return isEffective(ex, now) ? "active" : "expired";
}

export function suppresses(
  ex: ValidationException,
  issue: Suppressible,
  now: Date
): boolean {
  return (
    isEffective(ex, now) &&
    ex.entity_type === issue.entity_type &&
    ex.entity_id === issue.entity_id &&
    (ex.rule_id === null || ex.rule_id === issue.rule_id)
  );
}

/** The effective exceptions of one tenant at one instant. */
export class SuppressionSet {
  private readonly effective: ValidationException[];

  public constructor(exceptions: readonly ValidationException[], private readonly now: Date) {
    this.effective = exceptions.filter((ex) => isEffective(ex, now));
  }

  public has(issue: Suppressible): boolean {
    return this.effective.some((ex) => suppresses(ex, issue, this.now));
  }

  /** Split candidates into kept and suppressed, preserving order. */
  public partition<T extends Suppressible>(
    issues: readonly T[]
  ): { kept: T[]; suppressed: T[] } {
    const kept: T[] = [];
    const suppressed: T[] = [];
    for (const i of issues) (this.has(i) ? suppressed : kept).push(i);
    return { kept, suppressed };
  }

  /** Repository-side form, for listings. */
  public keys(): SuppressionKey[] {
    return this.effective.map((ex) => ({
      entity_type: ex.entity_type,
      entity_id: ex.entity_id,
      rule_id: ex.rule_id,
    }));
  }
}
