// backend/services/shared/src/problem/createProblemMiddleware.ts
/**
 * Purpose:
 * - Express-only final error funnel plus the API 404 tail.
 * - HttpError throws keep their status/code/detail.
 * - Anything else becomes a 500 ProblemJson carrying the error's message and
 *   is logged with its stack.
 *
 * Invariants:
 * - Express import allowed here (adapter).
 * - No process.env reads.
 */

import type { ErrorRequestHandler, Request, RequestHandler } from "express";
import type { IBoundLogger } from "../logger/Logger";
import { HttpError, ProblemFactory } from "./problem";
import { requestIdOf } from "../middleware/requestId";

const PROBLEM_CONTENT_TYPE = "application/problem+json";

function isMalformedBody(err: unknown): boolean {
  // body-parser marks JSON syntax errors with type "entity.parse.failed"
  return (
    err instanceof SyntaxError &&
    "type" in err &&
    err.type === "entity.parse.failed"
  );
}

export function createProblemMiddleware(opts: {
  log: IBoundLogger;
  serviceSlug: string;
  envLabel: string;
}): ErrorRequestHandler {
  const log = opts.log.bind({ component: "problem" });
  const pf = new ProblemFactory({
    serviceSlug: opts.serviceSlug,
    env: opts.envLabel,
  });

  return (err: unknown, req: Request, res, _next) => {
    const instance = requestIdOf(req);

    if (err instanceof HttpError) {
      if (err.status >= 500) {
        log.error(
          {
            status: err.status,
            code: err.code,
            path: req.originalUrl,
            requestId: instance,
            cause: log.serializeError(err.cause),
          },
          err.message
        );
      }
      res
        .status(err.status)
        .type(PROBLEM_CONTENT_TYPE)
        .json(pf.fromHttpError(err, instance));
      return;
    }

    if (isMalformedBody(err)) {
      const bad = new HttpError(400, "MALFORMED_JSON", "Request body is not valid JSON");
      res.status(400).type(PROBLEM_CONTENT_TYPE).json(pf.fromHttpError(bad, instance));
      return;
    }

    log.error(
      {
        path: req.originalUrl,
        method: req.method,
        requestId: instance,
        error: log.serializeError(err),
      },
      "unhandled error in request pipeline"
    );

    const detail = err instanceof Error ? err.message : undefined;
    res
      .status(500)
      .type(PROBLEM_CONTENT_TYPE)
      .json(pf.internalError(detail, instance));
  };
}

/**
 * 404 formatter: only emits Problem+JSON for known prefixes.
 * Everything else returns a bare 404.
 */
export function notFoundProblemJson(opts: {
  validPrefixes: string[];
  serviceSlug: string;
  envLabel: string;
}): RequestHandler {
  const pf = new ProblemFactory({
    serviceSlug: opts.serviceSlug,
    env: opts.envLabel,
  });
  return (req, res) => {
    if (opts.validPrefixes.some((p) => req.path.startsWith(p))) {
      res
        .status(404)
        .type(PROBLEM_CONTENT_TYPE)
        .json(pf.notFound("Route not found", requestIdOf(req)));
      return;
    }
    res.status(404).end();
  };
}
