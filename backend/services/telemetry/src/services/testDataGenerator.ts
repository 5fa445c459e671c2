// backend/services/telemetry/src/services/testDataGenerator.ts
/**
 * Synthetic readings in the same format the embedded board posts.
 * Used by the demo endpoints (generate_random_data, seed_test_data).
 */

import type { SensorReadingInput } from "../contracts/sensorReading";

/** Uniform source in [0, 1). */
export type RandomSource = () => number;

export const SEED_LIMITS = {
  hours: { min: 1, max: 168, default: 24 },
  intervalMinutes: { min: 1, max: 60, default: 5 },
  maxRecords: 10_000,
} as const;

const VARIATION = 0.1;

function uniform(random: RandomSource, lo: number, hi: number): number {
  return lo + (hi - lo) * random();
}

/** Inclusive on both ends. */
function randInt(random: RandomSource, lo: number, hi: number): number {
  return lo + Math.floor(random() * (hi - lo + 1));
}

function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

export function generateTestReading(random: RandomSource = Math.random): SensorReadingInput {
  const jitter = () => uniform(random, -VARIATION, VARIATION);
  return {
    temperature: round2(uniform(random, 20, 23) + jitter()),
    humidity: round2(uniform(random, 45, 55) + jitter()),
    voc: randInt(random, 0, 500),
    light: randInt(random, 100, 3000),
    sound: randInt(random, 50, 2000),
    accelerometer: {
      x: round2(uniform(random, -0.5, 0.5)),
      y: round2(uniform(random, -0.5, 0.5)),
      // gravity sits on z
      z: round2(uniform(random, 9.5, 10)),
    },
    gyroscope: {
      x: round2(uniform(random, -0.1, 0.1)),
      y: round2(uniform(random, -0.1, 0.1)),
      z: round2(uniform(random, -0.1, 0.1)),
    },
  };
}

export function seedRecordCount(hours: number, intervalMinutes: number): number {
  return Math.floor((hours * 60) / intervalMinutes);
}

/**
 * Timestamps for a seed run, oldest first; the last one is `now`.
 * Spaced `intervalMinutes` apart going back from `now`.
 */
export function buildSeedPlan(hours: number, intervalMinutes: number, now: Date): Date[] {
  const count = seedRecordCount(hours, intervalMinutes);
  const stepMs = intervalMinutes * 60_000;
  const end = now.getTime();
  return Array.from({ length: count }, (_, i) => new Date(end - stepMs * (count - i - 1)));
}
