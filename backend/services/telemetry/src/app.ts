// backend/services/telemetry/src/app.ts
/**
 * Why:
 * - Assemble via the shared builder: requestId → httpLogger → health (open) →
 *   CORS → parsers → routes → 404 → error funnel.
 * - Everything stateful (connection manager, repo, clock, randomness) is
 *   injected so tests run the real app against an in-process store.
 */

import type { Express } from "express";
import { createServiceApp } from "@shared/app/createServiceApp";
import type { ConnectionManager } from "@shared/db/ConnectionManager";
import type { IBoundLogger } from "@shared/logger/Logger";
import { SERVICE_NAME, SERVICE_VERSION, type TelemetryConfig } from "./config";
import type { SensorReadingRepo } from "./repo/sensorReading.repo";
import { sensorRoutes } from "./routes/sensorRoutes";
import type { RandomSource } from "./services/testDataGenerator";

export interface TelemetryAppDeps {
  config: TelemetryConfig;
  manager: ConnectionManager;
  repo: SensorReadingRepo;
  log: IBoundLogger;
  random?: RandomSource;
  now?: () => Date;
}

const ENDPOINTS = {
  "POST /api/send_data": "Receive sensor data from embedded system",
  "GET /api/sensors_data": "Get all sensor data",
  "DELETE /api/sensors_data": "Delete all sensor data",
  "GET /api/stats": "Collection statistics",
  "POST /api/generate_random_data": "Generate one random reading (for development)",
  "POST /api/seed_test_data": "Generate test data (for development)",
} as const;

export function createTelemetryApp(deps: TelemetryAppDeps): Express {
  const handlerDeps = {
    repo: deps.repo,
    random: deps.random ?? Math.random,
    now: deps.now ?? (() => new Date()),
  };

  return createServiceApp({
    serviceName: SERVICE_NAME,
    serviceVersion: SERVICE_VERSION,
    envLabel: deps.config.env,
    apiPrefix: "/api",
    log: deps.log,
    corsOrigins: deps.config.corsOrigins,
    // Readiness reports; it never triggers a connect.
    readiness: () => ({
      mongo: deps.manager.isConnected() ? "connected" : "disconnected",
      state: deps.manager.state,
    }),
    mountRoot: (app) => {
      app.get("/", (_req, res) => {
        res.json({
          message: "Embedded Statistics Tracking API",
          version: SERVICE_VERSION,
          endpoints: ENDPOINTS,
        });
      });
    },
    mountRoutes: (api) => {
      api.use(sensorRoutes(handlerDeps));
    },
  });
}
