// backend/services/telemetry/src/routes/sensorRoutes.ts
import { Router } from "express";
import type { SensorHandlerDeps } from "../controllers/sensors/deps";
import { sendData } from "../controllers/sensors/handlers/sendData";
import { listSensorData } from "../controllers/sensors/handlers/listSensorData";
import { clearSensorData } from "../controllers/sensors/handlers/clearSensorData";
import { getStats } from "../controllers/sensors/handlers/getStats";
import { generateRandomData } from "../controllers/sensors/handlers/generateRandomData";
import { seedTestData } from "../controllers/sensors/handlers/seedTestData";

// one-liners only, no logic here
export function sensorRoutes(deps: SensorHandlerDeps): Router {
  const router = Router();

  router.post("/send_data", sendData(deps));
  router.get("/sensors_data", listSensorData(deps));
  router.delete("/sensors_data", clearSensorData(deps));
  router.get("/stats", getStats(deps));

  // demo / development data
  router.post("/generate_random_data", generateRandomData(deps));
  router.post("/seed_test_data", seedTestData(deps));

  return router;
}
