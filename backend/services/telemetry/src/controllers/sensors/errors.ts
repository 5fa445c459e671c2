// backend/services/telemetry/src/controllers/sensors/errors.ts
import type { ZodError } from "zod";
import { StoreError } from "@shared/db/errors";
import { HttpError } from "@shared/problem/problem";

/**
 * Store failure → 500 with "<prefix>: <message>" as the Problem detail.
 * The code comes from the store error class when there is one.
 */
export function storeFailure(prefix: string, err: unknown): HttpError {
  if (err instanceof HttpError) return err;
  const message = err instanceof Error ? err.message : String(err);
  const code = err instanceof StoreError ? err.code : "INTERNAL_ERROR";
  return new HttpError(500, code, `${prefix}: ${message}`, { cause: err });
}

export function validationFailure(detail: string, error: ZodError): HttpError {
  return new HttpError(422, "VALIDATION_FAILED", detail, {
    meta: {
      issues: error.issues.map((i) => ({
        path: i.path.join("."),
        code: i.code,
        message: i.message,
      })),
    },
  });
}
