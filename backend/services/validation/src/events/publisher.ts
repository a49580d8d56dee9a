// backend/services/validation/src/events/publisher.ts
/**
 * Validation lifecycle events.
 *
 * - Redis pub/sub when REDIS_URL is configured; channel = event type.
 * - Publishing is best effort: failures are logged and never reach the cycle.
 */

import { logger } from "@shared/utils/logger";
import type { RedisClient } from "@shared/utils/redis";

export type ValidationEventType =
  | "validation.completed"
  | "validation.failed"
  | "validation.cancelled"
  | "validation.issue_detected";

export type ValidationEvent = {
  type: ValidationEventType;
  tenant_id: string;
  validation_cycle_id: string;
  occurred_at: string;
  payload: Record<string, unknown>;
};

export interface EventPublisher {
  publish(event: ValidationEvent): Promise<void>;
}

export class RedisEventPublisher implements EventPublisher {
  public constructor(private readonly client: RedisClient) {}

  public async publish(event: ValidationEvent): Promise<void> {
    await this.client.publish(event.type, JSON.stringify(event));
  }
}

export class NoopEventPublisher implements EventPublisher {
  public async publish(): Promise<void> {}
}

/** Swallows and logs publish failures. */
export async function publishSafely(
  publisher: EventPublisher,
  event: ValidationEvent
): Promise<void> {
  try {
    await publisher.publish(event);
  } catch (err) {
    logger.warn(
      {
        type: event.type,
        tenantId: event.tenant_id,
        cycleId: event.validation_cycle_id,
        err: err instanceof Error ? err.message : String(err),
      },
      "[EventPublisher] publish failed"
    );
  }
}
