// backend/services/telemetry/src/controllers/sensors/handlers/generateRandomData.ts
import type { RequestHandler } from "express";
import { asyncHandler } from "@shared/middleware/asyncHandler";
import { generateTestReading } from "../../../services/testDataGenerator";
import type { SensorHandlerDeps } from "../deps";
import { storeFailure } from "../errors";

/** POST /api/generate_random_data: one synthetic reading, stored like a real one. */
export function generateRandomData(deps: SensorHandlerDeps): RequestHandler {
  return asyncHandler(async (_req, res) => {
    const data = generateTestReading(deps.random);

    let id: string;
    try {
      id = await deps.repo.insert(data);
    } catch (err) {
      throw storeFailure("Failed to generate random data", err);
    }

    res.status(200).json({
      status: "success",
      message: "Random sensor data generated and stored successfully",
      id,
      data,
    });
  });
}
