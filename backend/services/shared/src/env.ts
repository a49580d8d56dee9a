// backend/services/shared/src/env.ts

/**
 * Purpose:
 * - Deterministic environment loading for every service with strict
 *   precedence: repo root → service family → service root. Later wins.
 * - Per NODE_ENV, try these at each layer:
 *   dev:    env.dev → .env.dev → .env
 *   docker: env.docker → .env.docker → .env
 *   other:  .env (optional; prefer injected env)
 *
 * Notes:
 * - Only env cascade + assertions live here. Typed config is per service.
 * - Values already present in process.env are never overwritten.
 */

import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";
import { expand } from "dotenv-expand";

/** Walk up until we see .git or a package.json with workspaces; else two levels up. */
function findRepoRoot(start: string): string {
  let dir = path.resolve(start);
  let lastHit: string | null = null;
  for (;;) {
    if (
      fs.existsSync(path.join(dir, ".git")) ||
      fs.existsSync(path.join(dir, "package.json"))
    ) {
      lastHit = dir;
    }
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return lastHit ?? path.resolve(start, "..", "..");
}

/** Load a single env file if it exists; expand; return true if loaded. */
function loadIfExists(absPath: string): boolean {
  if (!fs.existsSync(absPath)) return false;
  const parsed = dotenv.config({ path: absPath });
  if (parsed.error) {
    throw new Error(
      `Failed to load env file: ${absPath} — ${String(parsed.error)}`
    );
  }
  expand(parsed);
  return true;
}

/** Files tried at each layer for the given NODE_ENV. */
export function envFilesFor(mode: string): string[] {
  if (mode === "dev") return ["env.dev", ".env.dev", ".env"];
  if (mode === "docker") return ["env.docker", ".env.docker", ".env"];
  return [".env"];
}

/**
 * Cascading loader for a service.
 * Returns the files that were actually loaded, in order.
 */
export function loadEnvCascadeForService(serviceRootAbs: string): string[] {
  const mode = (process.env.NODE_ENV || "").trim();
  if (!mode) {
    throw new Error("NODE_ENV is required (dev | docker | test | production).");
  }

  const servicePath = path.resolve(serviceRootAbs);
  const serviceRoot = fs.existsSync(path.join(servicePath, "src"))
    ? servicePath
    : path.dirname(servicePath);
  const familyDir = path.resolve(serviceRoot, "..");
  const repoRoot = findRepoRoot(serviceRoot);

  const candidates: string[] = [];
  for (const dir of [repoRoot, familyDir, serviceRoot]) {
    for (const name of envFilesFor(mode)) candidates.push(path.join(dir, name));
  }

  const loaded = candidates.filter((p) => loadIfExists(p));

  // dev/docker must load something; test/production may rely on injected env.
  if (loaded.length === 0 && (mode === "dev" || mode === "docker")) {
    throw new Error(
      `No env files found for mode="${mode}". Looked in:\n` +
        candidates.map((p) => `  - ${p}`).join("\n")
    );
  }
  return loaded;
}

export function assertEnv(
  keys: string[],
  env: NodeJS.ProcessEnv = process.env
): void {
  const missing = keys.filter((k) => !env[k] || !String(env[k]).trim());
  if (missing.length) {
    throw new Error(`Missing required env var(s): ${missing.join(", ")}`);
  }
}
