// backend/services/shared/src/env.ts

/**
 * Why:
 * - Deterministic environment loading for every service with strict precedence:
 *   repo root → service family → service root. Later wins.
 * - Per NODE_ENV, try these at each layer:
 *   dev:    env.dev → .env.dev → .env
 *   docker: env.docker → .env.docker → .env
 *   other:  .env (optional; prefer injected env)
 *
 * Notes:
 * - Variables already present in process.env (injected by the shell, the
 *   container or a test) are never overwritten by file values.
 * - Only env cascade + validators live here. Boot policy is in the service bootstrap.
 */

import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";
import dotenvExpand from "dotenv-expand";

/** Find the repo root by walking up; the topmost dir holding .git or tsconfig.json wins. */
export function findRepoRoot(start: string): string {
  let dir = path.resolve(start);
  let lastHit: string | null = null;
  for (;;) {
    const hasGit = fs.existsSync(path.join(dir, ".git"));
    const hasTsconfig = fs.existsSync(path.join(dir, "tsconfig.json"));
    if (hasGit || hasTsconfig) lastHit = dir;
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return lastHit ?? path.resolve(start, "..", ".."); // last-ditch: two levels up
}

/** Parse a single env file if it exists; null when absent. */
function readIfExists(absPath: string): Record<string, string> | null {
  if (!fs.existsSync(absPath)) return null;
  return dotenv.parse(fs.readFileSync(absPath));
}

export function envFileNamesFor(mode: string): string[] {
  if (mode === "dev") return ["env.dev", ".env.dev", ".env"];
  if (mode === "docker") return ["env.docker", ".env.docker", ".env"];
  return [".env"];
}

/**
 * Cascading loader for a service.
 * Layers: repoRoot → serviceFamilyDir → serviceRoot.
 * Returns the files that were actually loaded, in order.
 */
export function loadEnvCascadeForService(
  serviceRootAbs: string,
  opts: { allowMissingInProd?: boolean } = {}
): string[] {
  const mode = (process.env.NODE_ENV || "").trim();
  if (!mode)
    throw new Error("NODE_ENV is required (dev | docker | production).");

  // Accept any path inside the service (service root or src). Normalize:
  const servicePath = path.resolve(serviceRootAbs);
  const serviceRoot = fs.existsSync(path.join(servicePath, "src"))
    ? servicePath
    : path.dirname(servicePath);
  const familyDir = path.resolve(serviceRoot, "..");
  const repoRoot = findRepoRoot(serviceRoot);

  const layers = [repoRoot, familyDir, serviceRoot];
  const candidates: string[] = [];
  for (const dir of layers)
    for (const name of envFileNamesFor(mode)) candidates.push(path.join(dir, name));

  // Merge in declared order (later files win), then let injected env win over files.
  const merged: Record<string, string> = {};
  const loaded: string[] = [];
  for (const p of candidates) {
    const parsed = readIfExists(p);
    if (!parsed) continue;
    Object.assign(merged, parsed);
    loaded.push(p);
  }
  for (const key of Object.keys(merged)) {
    if (process.env[key] !== undefined) delete merged[key];
  }
  dotenvExpand.expand({ parsed: merged });

  // Dev/docker must load something; prod may rely on injected envs.
  const allowMissing =
    mode === "production" && (opts.allowMissingInProd ?? true);
  if (loaded.length === 0 && !allowMissing) {
    throw new Error(
      `No env files found for mode="${mode}". Looked in:\n` +
        candidates.map((p) => `  - ${p}`).join("\n")
    );
  }
  return loaded;
}

/** Assertions / getters */
export function assertEnv(keys: string[]): void {
  const missing = keys.filter(
    (k) => !process.env[k] || !String(process.env[k]).trim()
  );
  if (missing.length)
    throw new Error(`Missing required env vars: ${missing.join(", ")}`);
}

export function requireEnv(name: string): string {
  const v = process.env[name];
  if (!v || !v.trim()) throw new Error(`Missing required env var: ${name}`);
  return v.trim();
}

export function requireEnum<T extends string>(
  name: string,
  allowed: readonly T[]
): T {
  const v = requireEnv(name);
  const hit = allowed.find((a) => a === v);
  if (hit === undefined)
    throw new Error(
      `Invalid env var ${name}="${v}". Allowed: ${allowed.join(", ")}`
    );
  return hit;
}

export function requireNumber(name: string): number {
  const v = requireEnv(name);
  if (!/^-?\d+(\.\d+)?$/.test(v))
    throw new Error(`Env var ${name} must be a number, got "${v}"`);
  return Number(v);
}

export function requireBoolean(name: string): boolean {
  const v = requireEnv(name).toLowerCase();
  if (v !== "true" && v !== "false")
    throw new Error(`Env var ${name} must be "true" or "false"`);
  return v === "true";
}

/** Redact helper for logging maps of envs (never dump real values to logs). */
export function redactEnv(
  obj: Record<string, unknown>
): Record<string, string> {
  return Object.fromEntries(Object.keys(obj).map((k) => [k, "***redacted***"]));
}
