// backend/services/shared/src/env/env.ts
/**
 * Purpose:
 * - Minimal env helpers (fail-fast where required).
 * - Every helper takes the env record explicitly so callers (and tests) can
 *   resolve config without touching process.env.
 */

export type EnvRecord = Record<string, string | undefined>;

/** Return trimmed env var or undefined. */
export function getEnv(env: EnvRecord, name: string): string | undefined {
  const v = env[name];
  if (v == null) return undefined;
  const s = String(v).trim();
  return s === "" ? undefined : s;
}

/** Integer env var with a fallback when unset; rejects anything non-integral. */
export function requireNumber(
  env: EnvRecord,
  name: string,
  fallback: number
): number {
  const raw = getEnv(env, name);
  if (raw === undefined) return fallback;
  if (!/^-?\d+$/.test(raw))
    throw new Error(`Invalid numeric env var: ${name}="${raw}"`);
  return Number(raw);
}

/** Restrict a value to an allowed set. */
export function requireEnum<T extends string>(
  name: string,
  v: string,
  allowed: readonly T[]
): T {
  const hit = allowed.find((a) => a === v);
  if (hit === undefined)
    throw new Error(`Invalid ${name}: ${v}. Allowed: ${allowed.join(", ")}`);
  return hit;
}
