// backend/services/telemetry/src/controllers/sensors/deps.ts
import type { SensorReadingRepo } from "../../repo/sensorReading.repo";
import type { RandomSource } from "../../services/testDataGenerator";

/** Handed to every handler factory; built once in app.ts. */
export interface SensorHandlerDeps {
  repo: SensorReadingRepo;
  random: RandomSource;
  now: () => Date;
}
