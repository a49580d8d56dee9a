// backend/services/validation/index.ts
/**
 * Start-up: load env (bootstrap) → init logs → connect stores → build deps →
 * seed rules (optional) → start HTTP with the shared startHttpService.
 */

import "./src/bootstrap";
import "./src/log.init";

import { logger } from "@shared/utils/logger";
import { startHttpService } from "@shared/bootstrap/startHttpService";
import { connectRedis, type RedisClient } from "@shared/utils/redis";
import { SERVICE_NAME } from "./src/serviceName";
import { loadConfig } from "./src/config";
import { connectDb, disconnectDb } from "./src/db";
import { createApp } from "./src/app";
import { createValidationDeps } from "./src/deps";
import { createMongoRepos } from "./src/repo/mongo";
import { createMemoryRepos } from "./src/repo/memory";
import { HttpElementSource } from "./src/elements/httpElementSource";
import { StaticElementSource, type ElementSource } from "./src/elements/elementSource";
import {
  NoopEventPublisher,
  RedisEventPublisher,
  type EventPublisher,
} from "./src/events/publisher";
import { seedDefaultRules } from "./src/seeds/seed";

// Top-level guards
process.on("unhandledRejection", (reason) => {
  logger.error({ reason }, `[${SERVICE_NAME}] Unhandled Promise Rejection`);
});
process.on("uncaughtException", (err) => {
  logger.error({ err }, `[${SERVICE_NAME}] Uncaught Exception`);
});

async function start(): Promise<void> {
  const config = loadConfig();

  if (config.store === "mongo") await connectDb(config.mongoUri);
  const repos = config.store === "mongo" ? createMongoRepos() : createMemoryRepos();

  let redis: RedisClient | null = null;
  let events: EventPublisher = new NoopEventPublisher();
  if (config.redisUrl) {
    redis = await connectRedis(config.redisUrl);
    events = new RedisEventPublisher(redis);
  }
  const redisClient = redis;

  const elements: ElementSource =
    Object.keys(config.elementSourceUrls).length > 0
      ? new HttpElementSource({
          urls: config.elementSourceUrls,
          timeoutMs: config.elementTimeoutMs,
          jwtSecret: config.jwtSecret,
          serviceName: SERVICE_NAME,
        })
      : new StaticElementSource();
  if (elements instanceof StaticElementSource) {
    logger.warn(
      "[validation] VALIDATION_ELEMENT_SOURCE_URLS not set; cycles will see no elements"
    );
  }

  const deps = createValidationDeps({
    repos,
    elements,
    events,
    cycleTimeoutMs: config.cycleTimeoutMs,
    probes: redisClient
      ? {
          redis: async () => {
            await redisClient.ping();
          },
        }
      : {},
  });

  if (config.seedRules) await seedDefaultRules(deps.rules);

  startHttpService({
    app: createApp(deps, { jwtSecret: config.jwtSecret }),
    port: config.port,
    serviceName: SERVICE_NAME,
    logger,
    onShutdown: async () => {
      await deps.cycles.shutdown();
      if (redisClient) await redisClient.quit();
      if (config.store === "mongo") await disconnectDb();
    },
  });
}

start().catch((err: unknown) => {
  logger.error({ err }, `failed to start ${SERVICE_NAME} service`);
  process.exit(1);
});
