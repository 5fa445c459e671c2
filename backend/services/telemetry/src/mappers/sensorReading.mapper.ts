// backend/services/telemetry/src/mappers/sensorReading.mapper.ts
/**
 * Why:
 * - The Zod contract is the single source of truth for the stored shape.
 * - Validate on the way out (DB → domain) so callers never see malformed data.
 * - Keep DB-managed fields (_id, timestamp) out of caller control.
 */

import { DocumentValidationError } from "@shared/db/errors";
import {
  sensorReadingDocument,
  type NewSensorReadingDocument,
  type SensorReading,
  type SensorReadingInput,
  type SensorReadingWire,
} from "../contracts/sensorReading";

/** Prepare a validated input for persistence, stamping the write time. */
export function toDocument(
  input: SensorReadingInput,
  timestamp: Date
): NewSensorReadingDocument {
  return {
    temperature: input.temperature,
    humidity: input.humidity,
    voc: input.voc,
    light: input.light,
    sound: input.sound,
    accelerometer: { ...input.accelerometer },
    gyroscope: { ...input.gyroscope },
    timestamp,
  };
}

/**
 * Convert a raw stored document to the domain shape.
 * @throws DocumentValidationError carrying the raw document and the zod issues
 */
export function dbToDomain(raw: unknown): SensorReading {
  const parsed = sensorReadingDocument.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => ({
      path: i.path.join("."),
      message: i.message,
    }));
    throw new DocumentValidationError(
      `Stored sensor reading is malformed: ${issues
        .map((i) => `${i.path || "(root)"} ${i.message}`)
        .join("; ")}`,
      { document: raw, issues, cause: parsed.error }
    );
  }
  const { _id, ...rest } = parsed.data;
  return { ...rest, id: _id.toString() };
}

export function toWire(reading: SensorReading): SensorReadingWire {
  return {
    id: reading.id,
    timestamp: reading.timestamp.toISOString(),
    temperature: reading.temperature,
    humidity: reading.humidity,
    voc: reading.voc,
    light: reading.light,
    sound: reading.sound,
    accelerometer: reading.accelerometer,
    gyroscope: reading.gyroscope,
  };
}
