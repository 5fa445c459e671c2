// backend/services/telemetry/src/config.ts
/**
 * Config for the telemetry service.
 * - No dotenv loading here (index.ts runs the env cascade first).
 * - MONGODB_URL is optional at load time: a missing address surfaces as
 *   ConfigurationError on first store use, so the service still boots and
 *   answers liveness.
 * - Malformed values fail fast.
 */

import {
  getEnv,
  requireEnum,
  requireNumber,
  type EnvRecord,
} from "@shared/env/env";
import { LOG_LEVELS } from "@shared/logger/Logger";

export const SERVICE_NAME = "telemetry" as const;
export const SERVICE_VERSION = "1.0.0";

export const DEFAULT_DB_NAME = "embedded-statistics-tracking-dev";
export const DEFAULT_COLLECTION = "sensor_readings";

export type TelemetryConfig = Readonly<{
  env: string;
  port: number;
  host: string;
  logLevel: (typeof LOG_LEVELS)[number];
  corsOrigins: string[];
  mongo: Readonly<{
    uri?: string;
    dbName: string;
    collection: string;
    serverSelectionTimeoutMS: number;
  }>;
}>;

function requirePort(env: EnvRecord): number {
  const port = requireNumber(env, "PORT", 8000);
  if (port < 0 || port > 65535) {
    throw new Error(`Invalid PORT: ${port}. Expected 0-65535`);
  }
  return port;
}

export function loadConfig(env: EnvRecord): TelemetryConfig {
  const timeout = requireNumber(env, "MONGODB_SERVER_SELECTION_TIMEOUT_MS", 5000);
  if (timeout <= 0) {
    throw new Error(
      `Invalid MONGODB_SERVER_SELECTION_TIMEOUT_MS: ${timeout}. Expected a positive integer`
    );
  }

  const corsOrigins = (getEnv(env, "CORS_ORIGINS") ?? "*")
    .split(",")
    .map((o) => o.trim())
    .filter((o) => o.length > 0);

  return Object.freeze({
    env: getEnv(env, "NODE_ENV") ?? "development",
    port: requirePort(env),
    host: getEnv(env, "HOST") ?? "0.0.0.0",
    logLevel: requireEnum("LOG_LEVEL", getEnv(env, "LOG_LEVEL") ?? "info", LOG_LEVELS),
    corsOrigins: corsOrigins.length > 0 ? corsOrigins : ["*"],
    mongo: Object.freeze({
      uri: getEnv(env, "MONGODB_URL"),
      dbName: getEnv(env, "MONGODB_DB_NAME") ?? DEFAULT_DB_NAME,
      collection: getEnv(env, "MONGODB_COLLECTION") ?? DEFAULT_COLLECTION,
      serverSelectionTimeoutMS: timeout,
    }),
  });
}
