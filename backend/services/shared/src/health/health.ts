// backend/services/shared/src/health/health.ts
/**
 * Exposes:
 *   GET /health         -> liveness
 *   GET /health/live    -> liveness
 *   GET /health/ready   -> readiness
 *   GET /healthz        -> k8s-style liveness
 *   GET /readyz         -> k8s-style readiness
 *
 * Readiness details come from the service; a throwing readiness fn answers 503.
 */

import express, { type Request, type Response, type Router } from "express";
import { requestIdOf } from "../middleware/requestId";

export type ReadinessDetails = Record<string, unknown>;
export type ReadinessFn = () => Promise<ReadinessDetails> | ReadinessDetails;

export type HealthRouterOptions = {
  service: string;
  env?: string;
  version?: string;
  readiness?: ReadinessFn;
};

export function createHealthRouter(opts: HealthRouterOptions): Router {
  const router = express.Router();

  const base = {
    service: opts.service,
    env: opts.env,
    version: opts.version,
  };

  const liveness = (req: Request, res: Response) => {
    res.json({ ...base, ok: true, instance: requestIdOf(req) });
  };

  const readiness = async (req: Request, res: Response) => {
    try {
      const details = opts.readiness ? await opts.readiness() : {};
      res.json({ ...base, ok: true, instance: requestIdOf(req), ...details });
    } catch (err) {
      res.status(503).json({
        ...base,
        ok: false,
        instance: requestIdOf(req),
        error: err instanceof Error ? err.message : String(err),
      });
    }
  };

  router.get("/health", liveness);
  router.get("/health/live", liveness);
  router.get("/health/ready", readiness);
  router.get("/healthz", liveness);
  router.get("/readyz", readiness);

  return router;
}
