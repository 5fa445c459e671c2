// backend/services/telemetry/test/helpers/harness.ts
import { ConnectionManager } from "@shared/db/ConnectionManager";
import { ExecutionContext } from "@shared/db/ExecutionContext";
import { getLogger } from "@shared/logger/Logger";
import { SensorReadingRepo } from "../../src/repo/sensorReading.repo";
import type { SensorReadingInput } from "../../src/contracts/sensorReading";
import { FakeDbServer } from "./fakeDb";

export const TEST_URI = "mongodb://127.0.0.1:27017";
export const TEST_DB = "telemetry-test";
export const TEST_COLLECTION = "sensor_readings";

export type HarnessOptions = {
  /** null leaves the connection address unset. */
  uri?: string | null;
  now?: () => Date;
};

export function makeHarness(opts: HarnessOptions = {}) {
  const server = new FakeDbServer();
  const context = new ExecutionContext();
  const log = getLogger();
  const manager = new ConnectionManager({
    factory: server,
    uri: opts.uri === null ? undefined : opts.uri ?? TEST_URI,
    dbName: TEST_DB,
    collection: TEST_COLLECTION,
    indexes: [{ field: "timestamp", name: "timestamp_1", direction: 1 }],
    context,
    log,
  });
  const repo = new SensorReadingRepo(manager, { log, now: opts.now });
  return { server, context, manager, repo, log };
}

export function sampleReading(overrides: Partial<SensorReadingInput> = {}): SensorReadingInput {
  return {
    temperature: 21.5,
    humidity: 48.25,
    voc: 120,
    light: 800,
    sound: 310,
    accelerometer: { x: 0.01, y: -0.02, z: 9.81 },
    gyroscope: { x: 0.001, y: 0, z: -0.003 },
    ...overrides,
  };
}

/** Clock that hands out the given instants in order, then repeats the last. */
export function sequenceClock(...instants: Date[]): () => Date {
  let i = 0;
  return () => {
    const at = instants[Math.min(i, instants.length - 1)];
    i += 1;
    return new Date(at.getTime());
  };
}
