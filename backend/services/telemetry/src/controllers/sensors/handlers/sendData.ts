// backend/services/telemetry/src/controllers/sensors/handlers/sendData.ts
import type { RequestHandler } from "express";
import { asyncHandler } from "@shared/middleware/asyncHandler";
import { sensorReadingInput } from "../../../contracts/sensorReading";
import type { SensorHandlerDeps } from "../deps";
import { storeFailure, validationFailure } from "../errors";

/** POST /api/send_data: one reading from the board. */
export function sendData(deps: SensorHandlerDeps): RequestHandler {
  return asyncHandler(async (req, res) => {
    const parsed = sensorReadingInput.safeParse(req.body);
    if (!parsed.success) {
      throw validationFailure("Sensor data failed validation", parsed.error);
    }

    let id: string;
    try {
      id = await deps.repo.insert(parsed.data);
    } catch (err) {
      throw storeFailure("Failed to store sensor data", err);
    }

    res.status(200).json({
      status: "success",
      message: "Sensor data stored successfully",
      id,
    });
  });
}
