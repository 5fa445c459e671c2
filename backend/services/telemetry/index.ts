// backend/services/telemetry/index.ts
/**
 * Why:
 * - Keep start-up boring: load env, init logs, build the one connection
 *   manager for this process, then start HTTP with shared startHttpService.
 * - No connect at boot; the first store call connects.
 */

import "tsconfig-paths/register";

import { loadEnvCascade } from "@shared/env/loadEnvCascade";
import { getLogger, initLogger } from "@shared/logger/Logger";
import { ExecutionContext } from "@shared/db/ExecutionContext";
import { ConnectionManager } from "@shared/db/ConnectionManager";
import { MongoDbFactory } from "@shared/db/mongo/MongoDbFactory";
import { startHttpService } from "@shared/bootstrap/startHttpService";
import { SERVICE_NAME, loadConfig } from "./src/config";
import { createTelemetryApp } from "./src/app";
import { SensorReadingRepo } from "./src/repo/sensorReading.repo";

function main(): void {
  const envFiles = loadEnvCascade({
    repoRootAbs: process.cwd(),
    serviceRootAbs: __dirname,
    envFile: process.env.ENV_FILE,
  });

  const config = loadConfig(process.env);
  initLogger({ service: SERVICE_NAME, level: config.logLevel });
  const log = getLogger();
  log.info({ envFiles, env: config.env }, "configuration loaded");

  // Top-level guards
  process.on("unhandledRejection", (reason) => {
    log.error({ reason: log.serializeError(reason) }, "unhandled promise rejection");
  });
  process.on("uncaughtException", (err) => {
    log.error({ error: log.serializeError(err) }, "uncaught exception");
  });

  const context = new ExecutionContext();
  const manager = new ConnectionManager({
    factory: new MongoDbFactory(),
    uri: config.mongo.uri,
    dbName: config.mongo.dbName,
    collection: config.mongo.collection,
    indexes: [{ field: "timestamp", name: "timestamp_1", direction: 1 }],
    serverSelectionTimeoutMS: config.mongo.serverSelectionTimeoutMS,
    context,
    log,
  });
  if (!config.mongo.uri) {
    log.warn("MONGODB_URL is not set; store operations will fail until it is configured");
  }

  const repo = new SensorReadingRepo(manager, { log });
  const app = createTelemetryApp({ config, manager, repo, log });

  startHttpService({
    app,
    port: config.port,
    host: config.host,
    serviceName: SERVICE_NAME,
    log,
    onShutdown: async () => {
      await manager.disconnect();
      context.close();
    },
  });
}

try {
  main();
} catch (err) {
  getLogger().error(
    { error: getLogger().serializeError(err) },
    `failed to start ${SERVICE_NAME} service`
  );
  process.exit(1);
}
