// backend/services/telemetry/src/controllers/sensors/handlers/seedTestData.ts
import type { RequestHandler } from "express";
import { z } from "zod";
import { asyncHandler } from "@shared/middleware/asyncHandler";
import { HttpError } from "@shared/problem/problem";
import {
  SEED_LIMITS,
  buildSeedPlan,
  generateTestReading,
} from "../../../services/testDataGenerator";
import type { SensorHandlerDeps } from "../deps";
import { storeFailure, validationFailure } from "../errors";

const seedQuery = z.object({
  hours: z.coerce
    .number()
    .int()
    .min(SEED_LIMITS.hours.min)
    .max(SEED_LIMITS.hours.max)
    .default(SEED_LIMITS.hours.default),
  interval_minutes: z.coerce
    .number()
    .int()
    .min(SEED_LIMITS.intervalMinutes.min)
    .max(SEED_LIMITS.intervalMinutes.max)
    .default(SEED_LIMITS.intervalMinutes.default),
});

/**
 * POST /api/seed_test_data?hours=24&interval_minutes=5
 * Historical readings spaced back from now, oldest first, in one write.
 */
export function seedTestData(deps: SensorHandlerDeps): RequestHandler {
  return asyncHandler(async (req, res) => {
    const parsed = seedQuery.safeParse(req.query);
    if (!parsed.success) {
      throw validationFailure("Seed parameters out of range", parsed.error);
    }
    const { hours, interval_minutes } = parsed.data;

    const plan = buildSeedPlan(hours, interval_minutes, deps.now());
    if (plan.length > SEED_LIMITS.maxRecords) {
      throw new HttpError(
        400,
        "TOO_MANY_RECORDS",
        `Too many records requested (${plan.length}). Maximum is ${SEED_LIMITS.maxRecords}.`
      );
    }

    let inserted: number;
    try {
      inserted = await deps.repo.insertMany(
        plan.map((timestamp) => ({
          reading: generateTestReading(deps.random),
          timestamp,
        }))
      );
    } catch (err) {
      throw storeFailure("Failed to seed test data", err);
    }

    res.status(200).json({
      status: "success",
      message: `Generated and inserted ${inserted} test records`,
      records_inserted: inserted,
      hours,
      interval_minutes,
    });
  });
}
