// backend/services/shared/src/middleware/httpLogger.ts
/**
 * Purpose:
 * - Consistent, structured request logs so ops can aggregate by `service`
 *   and correlate by `reqId`.
 *
 * Order:
 * - Mount immediately after `requestIdMiddleware` so `req.id` is populated.
 *
 * Notes:
 * - Severity mapping: 2xx/3xx=info, 4xx=warn, 5xx/error=error.
 * - Health checks and favicons are not logged.
 */

import pinoHttp from "pino-http";
import { randomUUID } from "node:crypto";
import type { IncomingMessage, ServerResponse } from "node:http";
import type { IBoundLogger } from "../logger/Logger";
import { headerRequestId } from "./requestId";

const QUIET_PATHS = new Set([
  "/health",
  "/health/live",
  "/health/ready",
  "/healthz",
  "/readyz",
  "/favicon.ico",
]);

export function makeHttpLogger(log: IBoundLogger, serviceName: string) {
  const logger = log.bind({ component: "http" }).pino;

  return pinoHttp({
    logger,

    genReqId: (req, res) => {
      if (typeof req.id === "string") return req.id;
      const id = headerRequestId(req) ?? randomUUID();
      res.setHeader("x-request-id", id);
      return id;
    },

    customLogLevel: (
      _req: IncomingMessage,
      res: ServerResponse,
      err?: Error
    ) => {
      if (err) return "error";
      const s = res.statusCode;
      if (s >= 500) return "error";
      if (s >= 400) return "warn";
      return "info";
    },

    customProps: (req: IncomingMessage) => ({
      service: serviceName,
      reqId: req.id,
    }),

    autoLogging: {
      ignore: (req: IncomingMessage) => QUIET_PATHS.has(req.url ?? ""),
    },

    serializers: {
      req(req: IncomingMessage) {
        return { id: req.id, method: req.method, url: req.url };
      },
      res(res: ServerResponse) {
        return { statusCode: res.statusCode };
      },
      err(err: Error) {
        return { type: err.name, msg: err.message };
      },
    },
  });
}
