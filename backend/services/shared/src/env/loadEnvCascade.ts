// backend/services/shared/src/env/loadEnvCascade.ts
/**
 * Purpose:
 * - Load dotenv files before any config is read:
 *     <serviceRoot>/.env  (service-local, optional)
 *     <repoRoot>/.env     (common, optional)
 *   or, when ENV_FILE is set, ONLY that file (must exist).
 *
 * Notes:
 * - dotenv never overrides, so the process env beats the service file, which
 *   beats the repo file.
 * - Returns the list of files actually loaded so bootstrap can log it.
 */

import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";

export interface EnvCascadeOptions {
  repoRootAbs: string;
  serviceRootAbs: string;
  /** Explicit override; absolute or relative to cwd. */
  envFile?: string;
}

function loadEnvFile(filePath: string): boolean {
  if (!fs.existsSync(filePath)) return false;
  const res = dotenv.config({ path: filePath });
  if (res.error) throw res.error;
  return true;
}

export function loadEnvCascade(opts: EnvCascadeOptions): string[] {
  const explicit = opts.envFile?.trim();
  if (explicit) {
    const abs = path.isAbsolute(explicit)
      ? explicit
      : path.resolve(process.cwd(), explicit);
    if (!loadEnvFile(abs)) {
      throw new Error(`[bootstrap] ENV_FILE not found: ${abs}`);
    }
    return [abs];
  }

  const loaded: string[] = [];
  for (const candidate of [
    path.join(opts.serviceRootAbs, ".env"),
    path.join(opts.repoRootAbs, ".env"),
  ]) {
    if (loadEnvFile(candidate)) loaded.push(candidate);
  }
  return loaded;
}
