// backend/services/shared/src/utils/redis.ts

import { createClient } from "redis";
import { logger } from "./logger";

export type RedisClient = ReturnType<typeof createClient>;

/**
 * Build and connect a Redis client. The caller owns the returned client and
 * must `quit()` it on shutdown.
 */
export async function connectRedis(url: string): Promise<RedisClient> {
  const client = createClient({ url });

  client.on("error", (err: unknown) => {
    logger.warn(
      { component: "redis", err: err instanceof Error ? err.message : String(err) },
      "[redis] error"
    );
  });

  await client.connect();
  logger.info({ component: "redis" }, "[redis] connected");
  return client;
}
