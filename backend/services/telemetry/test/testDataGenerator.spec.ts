// backend/services/telemetry/test/testDataGenerator.spec.ts
import { describe, it, expect } from "vitest";
import { sensorReadingInput } from "../src/contracts/sensorReading";
import {
  buildSeedPlan,
  generateTestReading,
  seedRecordCount,
} from "../src/services/testDataGenerator";

/** Small deterministic LCG so ranges are exercised without Math.random. */
function lcg(seed: number): () => number {
  let s = seed >>> 0;
  return () => {
    s = (Math.imul(s, 1664525) + 1013904223) >>> 0;
    return s / 2 ** 32;
  };
}

describe("generateTestReading", () => {
  it("sits on the low edge when the source returns 0", () => {
    expect(generateTestReading(() => 0)).toEqual({
      temperature: 19.9,
      humidity: 44.9,
      voc: 0,
      light: 100,
      sound: 50,
      accelerometer: { x: -0.5, y: -0.5, z: 9.5 },
      gyroscope: { x: -0.1, y: -0.1, z: -0.1 },
    });
  });

  it("reaches the inclusive integer maxima", () => {
    const r = generateTestReading(() => 0.999999);
    expect([r.voc, r.light, r.sound]).toEqual([500, 3000, 2000]);
  });

  it("always produces readings the ingest contract accepts", () => {
    const random = lcg(42);
    for (let i = 0; i < 500; i++) {
      const r = generateTestReading(random);
      expect(sensorReadingInput.safeParse(r).success).toBe(true);
      expect(r.temperature).toBeGreaterThanOrEqual(19.9);
      expect(r.temperature).toBeLessThanOrEqual(23.1);
      expect(r.humidity).toBeGreaterThanOrEqual(44.9);
      expect(r.humidity).toBeLessThanOrEqual(55.1);
      expect(r.accelerometer.z).toBeGreaterThanOrEqual(9.5);
      expect(r.accelerometer.z).toBeLessThanOrEqual(10);
      expect(Math.abs(r.gyroscope.x)).toBeLessThanOrEqual(0.1);
    }
  });
});

describe("buildSeedPlan", () => {
  const now = new Date("2025-03-01T12:00:00.000Z");

  it("spaces timestamps back from now, oldest first", () => {
    const plan = buildSeedPlan(1, 15, now);
    expect(plan.map((d) => d.toISOString())).toEqual([
      "2025-03-01T11:15:00.000Z",
      "2025-03-01T11:30:00.000Z",
      "2025-03-01T11:45:00.000Z",
      "2025-03-01T12:00:00.000Z",
    ]);
  });

  it("uses floor division for the record count", () => {
    expect(seedRecordCount(1, 7)).toBe(8);
    expect(seedRecordCount(24, 5)).toBe(288);
    expect(seedRecordCount(168, 1)).toBe(10080);
    expect(buildSeedPlan(1, 7, now)).toHaveLength(8);
  });
});
