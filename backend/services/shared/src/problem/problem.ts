// backend/services/shared/src/problem/problem.ts
/**
 * Purpose:
 * - Transport-agnostic Problem primitives (RFC7807-ish).
 * - Single source of truth for:
 *   - ProblemJson wire shape
 *   - ProblemFactory helpers used by controllers and the error funnel
 *   - HttpError, the one throwable that carries an explicit status
 *
 * Invariants:
 * - No Express imports.
 * - No process.env access.
 */

export type ProblemJson = {
  type: string;
  title: string;
  status: number;

  detail?: string;
  code?: string;

  instance?: string;
  serviceSlug?: string;
  env?: string;

  meta?: Record<string, unknown>;
};

const TITLES: Record<number, string> = {
  400: "Bad Request",
  404: "Not Found",
  422: "Unprocessable Entity",
  500: "Internal Server Error",
  503: "Service Unavailable",
};

export function titleFor(status: number): string {
  return TITLES[status] ?? (status >= 500 ? "Internal Server Error" : "Request Failed");
}

/**
 * Thrown by controllers when they already know the status to answer with.
 * The error funnel turns it into ProblemJson verbatim.
 */
export class HttpError extends Error {
  public readonly status: number;
  public readonly code: string;
  public readonly meta?: Record<string, unknown>;

  public constructor(
    status: number,
    code: string,
    detail: string,
    opts?: { meta?: Record<string, unknown>; cause?: unknown }
  ) {
    super(detail, opts?.cause === undefined ? undefined : { cause: opts.cause });
    this.name = "HttpError";
    this.status = status;
    this.code = code;
    this.meta = opts?.meta;
  }
}

export class ProblemFactory {
  private readonly serviceSlug: string;
  private readonly env: string;

  public constructor(opts: { serviceSlug: string; env: string }) {
    if (!opts.serviceSlug.trim()) {
      throw new Error(
        "PROBLEM_FACTORY_INVALID: serviceSlug is required. Ops: pass a valid serviceSlug."
      );
    }
    if (!opts.env.trim()) {
      throw new Error(
        "PROBLEM_FACTORY_INVALID: env is required. Ops: pass a valid env label."
      );
    }
    this.serviceSlug = opts.serviceSlug.trim();
    this.env = opts.env.trim();
  }

  private base(p: Omit<ProblemJson, "serviceSlug" | "env">): ProblemJson {
    return { serviceSlug: this.serviceSlug, env: this.env, ...p };
  }

  public fromHttpError(err: HttpError, instance?: string): ProblemJson {
    return this.base({
      type: "about:blank",
      title: titleFor(err.status),
      status: err.status,
      code: err.code,
      detail: err.message,
      instance,
      meta: err.meta,
    });
  }

  public internalError(detail?: string, instance?: string): ProblemJson {
    return this.base({
      type: "about:blank",
      title: titleFor(500),
      status: 500,
      code: "INTERNAL_ERROR",
      detail: detail ?? "An unexpected error occurred.",
      instance,
    });
  }

  public notFound(detail: string, instance?: string): ProblemJson {
    return this.base({
      type: "about:blank",
      title: titleFor(404),
      status: 404,
      code: "NOT_FOUND",
      detail,
      instance,
    });
  }
}
