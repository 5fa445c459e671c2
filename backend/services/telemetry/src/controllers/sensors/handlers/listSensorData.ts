// backend/services/telemetry/src/controllers/sensors/handlers/listSensorData.ts
import type { RequestHandler } from "express";
import { asyncHandler } from "@shared/middleware/asyncHandler";
import { toWire } from "../../../mappers/sensorReading.mapper";
import type { SensorReading } from "../../../contracts/sensorReading";
import type { SensorHandlerDeps } from "../deps";
import { storeFailure } from "../errors";

/** GET /api/sensors_data: every reading, newest first. */
export function listSensorData(deps: SensorHandlerDeps): RequestHandler {
  return asyncHandler(async (_req, res) => {
    let readings: SensorReading[];
    try {
      readings = await deps.repo.listAll();
    } catch (err) {
      throw storeFailure("Failed to retrieve sensor data", err);
    }
    res.status(200).json(readings.map(toWire));
  });
}
