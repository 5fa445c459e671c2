// backend/services/telemetry/src/controllers/sensors/handlers/clearSensorData.ts
import type { RequestHandler } from "express";
import { asyncHandler } from "@shared/middleware/asyncHandler";
import type { SensorHandlerDeps } from "../deps";
import { storeFailure } from "../errors";

/** DELETE /api/sensors_data */
export function clearSensorData(deps: SensorHandlerDeps): RequestHandler {
  return asyncHandler(async (_req, res) => {
    let deleted: number;
    try {
      deleted = await deps.repo.clearAll();
    } catch (err) {
      throw storeFailure("Failed to clear sensor data", err);
    }
    res.status(200).json({ status: "success", deleted_count: deleted });
  });
}
