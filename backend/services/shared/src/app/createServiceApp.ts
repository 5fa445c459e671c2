// backend/services/shared/src/app/createServiceApp.ts
/**
 * Purpose:
 * - Assemble the internal Express stack once for every service:
 *   requestId → http logger → health (open) → CORS → json parser →
 *   routes → 404 → Problem+JSON error funnel.
 *
 * Notes:
 * - Routes are mounted by the service through `mountRoutes`; this builder owns
 *   everything around them.
 * - `apiPrefix` routes get Problem+JSON 404s; unknown paths elsewhere get a bare 404.
 */

import express, { type Express, type Router } from "express";
import cors from "cors";
import type { IBoundLogger } from "../logger/Logger";
import { requestIdMiddleware } from "../middleware/requestId";
import { makeHttpLogger } from "../middleware/httpLogger";
import { createHealthRouter, type ReadinessFn } from "../health/health";
import {
  createProblemMiddleware,
  notFoundProblemJson,
} from "../problem/createProblemMiddleware";

export type CreateServiceAppOptions = {
  /** Service slug, used in logs and Problem+JSON. */
  serviceName: string;
  serviceVersion?: string;
  /** Environment label (NODE_ENV). */
  envLabel: string;
  /** API base path (e.g., "/api"). */
  apiPrefix: string;
  log: IBoundLogger;
  /** Mounts the service's API routes onto the router served at `apiPrefix`. */
  mountRoutes: (router: Router) => void;
  /** Routes served at "/" outside the API prefix (banners, etc.). */
  mountRoot?: (app: Express) => void;
  readiness?: ReadinessFn;
  /** Allowed origins; ["*"] allows any. */
  corsOrigins?: string[];
  jsonLimit?: string;
};

export function createServiceApp(opts: CreateServiceAppOptions): Express {
  const app = express();
  app.disable("x-powered-by");

  // ── Transport & telemetry ───────────────────────────────────────────────────
  app.use(requestIdMiddleware());
  app.use(makeHttpLogger(opts.log, opts.serviceName));

  // ── Health (public) ─────────────────────────────────────────────────────────
  app.use(
    createHealthRouter({
      service: opts.serviceName,
      env: opts.envLabel,
      version: opts.serviceVersion,
      readiness: opts.readiness,
    })
  );

  // ── CORS + parsers ──────────────────────────────────────────────────────────
  const origins = opts.corsOrigins ?? ["*"];
  app.use(cors({ origin: origins.includes("*") ? true : origins }));
  app.use(express.json({ limit: opts.jsonLimit ?? "1mb" }));

  // ── Routes ──────────────────────────────────────────────────────────────────
  opts.mountRoot?.(app);
  const api = express.Router();
  opts.mountRoutes(api);
  app.use(opts.apiPrefix, api);

  // ── Tails: 404 + error funnel ───────────────────────────────────────────────
  app.use(
    notFoundProblemJson({
      validPrefixes: [opts.apiPrefix],
      serviceSlug: opts.serviceName,
      envLabel: opts.envLabel,
    })
  );
  app.use(
    createProblemMiddleware({
      log: opts.log,
      serviceSlug: opts.serviceName,
      envLabel: opts.envLabel,
    })
  );

  return app;
}
