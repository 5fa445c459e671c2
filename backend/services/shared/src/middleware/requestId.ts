// backend/services/shared/src/middleware/requestId.ts
/**
 * Purpose:
 * - Every inbound request carries one correlation key, used by the http logger,
 *   the error funnel and health responses.
 *
 * Notes:
 * - Must run before the http logger.
 * - Never overwrite a caller-supplied ID; mint a UUID only if the request lacks
 *   all recognized headers.
 * - Headers honored: `x-request-id`, `x-correlation-id`, `x-amzn-trace-id`.
 *   The response always echoes `x-request-id`.
 * - `req.id` is declared on IncomingMessage by pino-http's typings.
 */

import type { IncomingMessage } from "node:http";
import type { RequestHandler } from "express";
import { randomUUID } from "node:crypto";

const HEADERS = ["x-request-id", "x-correlation-id", "x-amzn-trace-id"] as const;

export function headerRequestId(req: IncomingMessage): string | undefined {
  for (const name of HEADERS) {
    const hdr = req.headers[name];
    const v = Array.isArray(hdr) ? hdr[0] : hdr;
    if (v && v.trim()) return v.trim();
  }
  return undefined;
}

export function requestIdOf(req: IncomingMessage): string | undefined {
  return typeof req.id === "string" ? req.id : headerRequestId(req);
}

export function requestIdMiddleware(): RequestHandler {
  return (req, res, next) => {
    const id = headerRequestId(req) ?? randomUUID();
    req.id = id;
    res.setHeader("x-request-id", id);
    next();
  };
}
