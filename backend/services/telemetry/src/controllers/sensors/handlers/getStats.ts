// backend/services/telemetry/src/controllers/sensors/handlers/getStats.ts
import type { RequestHandler } from "express";
import { asyncHandler } from "@shared/middleware/asyncHandler";
import type { SensorStats } from "../../../contracts/sensorReading";
import type { SensorHandlerDeps } from "../deps";
import { storeFailure } from "../errors";

/** GET /api/stats: snake_case on the wire, like the rest of the API. */
export function getStats(deps: SensorHandlerDeps): RequestHandler {
  return asyncHandler(async (_req, res) => {
    let stats: SensorStats;
    try {
      stats = await deps.repo.getStats();
    } catch (err) {
      throw storeFailure("Failed to retrieve stats", err);
    }
    res.status(200).json({
      database: stats.database,
      collection: stats.collection,
      document_count: stats.documentCount,
      exists: stats.exists,
      data_size: stats.dataSize,
      indexes: stats.indexes,
    });
  });
}
