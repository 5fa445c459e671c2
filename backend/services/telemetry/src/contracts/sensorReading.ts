// backend/services/telemetry/src/contracts/sensorReading.ts
/**
 * Sensor reading contracts (Zod).
 *
 *  - sensorReadingInput    : request body for POST /api/send_data
 *  - sensorReadingDocument : stored shape, validated on the way out of the DB
 *  - SensorReading         : domain shape handed to controllers
 *  - SensorReadingWire     : what goes over the wire (ISO timestamp)
 *
 * Notes:
 *  - Integer ranges follow the sensor hardware: VOC is a 32-bit unsigned
 *    raw value, light and sound are 12-bit ADC readings.
 *  - Unknown keys are stripped, never rejected.
 */

import { ObjectId } from "mongodb";
import { z } from "zod";

const finite = () => z.number().finite();

export const vector3 = z.object({
  x: finite(),
  y: finite(),
  z: finite(),
});

export const UINT32_MAX = 4_294_967_295;
export const ADC_MAX = 4095;

export const sensorReadingInput = z.object({
  temperature: finite(),
  humidity: finite(),
  voc: z.number().int().min(0).max(UINT32_MAX),
  light: z.number().int().min(0).max(ADC_MAX),
  sound: z.number().int().min(0).max(ADC_MAX),
  accelerometer: vector3,
  gyroscope: vector3,
});

const storedId = z.union([
  z.instanceof(ObjectId),
  z.string().min(1, "stored _id must be non-empty"),
]);

export const sensorReadingDocument = sensorReadingInput.extend({
  _id: storedId,
  timestamp: z.date(),
});

export type SensorReadingInput = z.infer<typeof sensorReadingInput>;

/** Document as written: the store assigns `_id`. */
export type NewSensorReadingDocument = SensorReadingInput & { timestamp: Date };

export type SensorReading = SensorReadingInput & {
  id: string;
  timestamp: Date;
};

export type SensorReadingWire = SensorReadingInput & {
  id: string;
  timestamp: string;
};

export type SensorStats = {
  database: string;
  collection: string;
  documentCount: number;
  exists: boolean;
  dataSize: number;
  indexes: string[];
};
