// backend/services/validation/src/config.ts

/**
 * Typed service config.
 * - No dotenv loading here (bootstrap.ts loads env).
 * - Required vars have no defaults; optional ones are listed below with theirs.
 * - Fail fast: anything missing or malformed throws at load time.
 */

export type StoreKind = "mongo" | "memory";

type StoreConfig =
  | { store: "mongo"; mongoUri: string }
  | { store: "memory"; mongoUri: string | null };

export type ValidationConfig = Readonly<StoreConfig & {
  env: string | undefined;
  port: number;
  jwtSecret: string;
  logLevel: string;
  redisUrl: string | null;
  cycleTimeoutMs: number;
  elementSourceUrls: Readonly<Record<string, string>>;
  elementTimeoutMs: number;
  seedRules: boolean;
}>;

type Env = Record<string, string | undefined>;

function requireEnv(env: Env, name: string): string {
  const v = env[name];
  if (v == null || String(v).trim() === "") {
    throw new Error(`Missing required env var: ${name}`);
  }
  return v.trim();
}

function optionalEnv(env: Env, name: string): string | null {
  const v = env[name];
  return v == null || v.trim() === "" ? null : v.trim();
}

function toNumber(name: string, raw: string, min: number): number {
  const n = Number(raw);
  if (!Number.isFinite(n) || n < min) {
    throw new Error(`Invalid number for env var ${name}: "${raw}"`);
  }
  return n;
}

function requireNumber(env: Env, name: string, min = 0): number {
  return toNumber(name, requireEnv(env, name), min);
}

function optionalNumber(env: Env, name: string, fallback: number, min = 0): number {
  const raw = optionalEnv(env, name);
  return raw === null ? fallback : toNumber(name, raw, min);
}

function parseStore(raw: string): StoreKind {
  if (raw === "mongo" || raw === "memory") return raw;
  throw new Error(`Invalid env var VALIDATION_STORE: "${raw}" (mongo | memory)`);
}

function parseUrlMap(raw: string | null): Record<string, string> {
  if (raw === null) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new Error("Invalid JSON in env var VALIDATION_ELEMENT_SOURCE_URLS");
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new Error(
      "Invalid env var VALIDATION_ELEMENT_SOURCE_URLS: expected a JSON object"
    );
  }
  const out: Record<string, string> = {};
  for (const [type, url] of Object.entries(parsed)) {
    if (typeof url !== "string" || !url.trim()) {
      throw new Error(
        `Invalid env var VALIDATION_ELEMENT_SOURCE_URLS: "${type}" must map to a URL string`
      );
    }
    out[type] = url.trim();
  }
  return out;
}

export function loadConfig(env: Env = process.env): ValidationConfig {
  const storeConfig: StoreConfig =
    parseStore(requireEnv(env, "VALIDATION_STORE")) === "mongo"
      ? { store: "mongo", mongoUri: requireEnv(env, "VALIDATION_MONGO_URI") }
      : { store: "memory", mongoUri: optionalEnv(env, "VALIDATION_MONGO_URI") };
  return Object.freeze({
    env: env.NODE_ENV,
    port: requireNumber(env, "VALIDATION_PORT", 1),
    jwtSecret: requireEnv(env, "VALIDATION_JWT_SECRET"),
    logLevel: requireEnv(env, "LOG_LEVEL"),
    ...storeConfig,
    redisUrl: optionalEnv(env, "REDIS_URL"),
    cycleTimeoutMs: optionalNumber(env, "VALIDATION_CYCLE_TIMEOUT_MS", 60_000, 1),
    elementSourceUrls: Object.freeze(
      parseUrlMap(optionalEnv(env, "VALIDATION_ELEMENT_SOURCE_URLS"))
    ),
    elementTimeoutMs: optionalNumber(env, "VALIDATION_ELEMENT_TIMEOUT_MS", 5_000, 1),
    seedRules: optionalEnv(env, "VALIDATION_SEED_RULES") === "true",
  });
}
