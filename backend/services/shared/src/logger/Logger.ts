// backend/services/shared/src/logger/Logger.ts
/**
 * Purpose:
 * - Single shared logging API for all services with contextual .bind().
 * - Overloaded methods allow:
 *     log.info("msg")            OR  log.info({ctx}, "msg")
 *     log.info("msg", {meta})
 * - Backed by pino; the raw pino instance is exposed for pino-http.
 *
 * Notes:
 * - initLogger() must run once at bootstrap, before request loggers exist.
 *   Until then a default pino at "info" is used so early boot lines still land.
 * - No process.env reads here; the service config passes LOG_LEVEL in.
 */

import pino, {
  stdTimeFunctions,
  type Logger as PinoLogger,
  type LevelWithSilent,
  type LoggerOptions,
} from "pino";
import { requireEnum } from "../env/env";

type Json = Record<string, unknown>;

export const LOG_LEVELS = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
] as const satisfies readonly LevelWithSilent[];

export type SerializedError = {
  name?: string;
  message: string;
  stack?: string;
};

/** Public interface for bound logger handles (no private members). */
export interface IBoundLogger {
  bind(ctx: Json): IBoundLogger;

  debug(msg: string, meta?: Json): void;
  debug(obj: Json, msg?: string): void;

  info(msg: string, meta?: Json): void;
  info(obj: Json, msg?: string): void;

  warn(msg: string, meta?: Json): void;
  warn(obj: Json, msg?: string): void;

  error(msg: string, meta?: Json): void;
  error(obj: Json, msg?: string): void;

  serializeError(err: unknown): SerializedError;

  /** Underlying pino instance (pino-http wants the real thing). */
  readonly pino: PinoLogger;
}

type Level = "debug" | "info" | "warn" | "error";

export function serializeError(err: unknown): SerializedError {
  if (err instanceof Error) {
    return { name: err.name, message: err.message, stack: err.stack };
  }
  return { message: String(err) };
}

class BoundLogger implements IBoundLogger {
  public constructor(public readonly pino: PinoLogger) {}

  public bind(ctx: Json): IBoundLogger {
    return new BoundLogger(this.pino.child(ctx));
  }

  public debug(msg: string, meta?: Json): void;
  public debug(obj: Json, msg?: string): void;
  public debug(a: string | Json, b?: string | Json): void {
    this.emit("debug", a, b);
  }

  public info(msg: string, meta?: Json): void;
  public info(obj: Json, msg?: string): void;
  public info(a: string | Json, b?: string | Json): void {
    this.emit("info", a, b);
  }

  public warn(msg: string, meta?: Json): void;
  public warn(obj: Json, msg?: string): void;
  public warn(a: string | Json, b?: string | Json): void {
    this.emit("warn", a, b);
  }

  public error(msg: string, meta?: Json): void;
  public error(obj: Json, msg?: string): void;
  public error(a: string | Json, b?: string | Json): void {
    this.emit("error", a, b);
  }

  public serializeError(err: unknown): SerializedError {
    return serializeError(err);
  }

  private emit(level: Level, a: string | Json, b?: string | Json): void {
    if (typeof a === "string") {
      if (b !== undefined && typeof b === "object") this.pino[level](b, a);
      else this.pino[level](a);
      return;
    }
    this.pino[level](a, typeof b === "string" ? b : undefined);
  }
}

const baseOptions: LoggerOptions = {
  timestamp: stdTimeFunctions.isoTime,
  redact: {
    remove: true,
    paths: ["req.headers.authorization", "req.headers.cookie"],
  },
};

let ROOT: BoundLogger = new BoundLogger(
  pino({ ...baseOptions, level: "info" })
);

/** Initialize the shared logger for this running service. Call once at bootstrap. */
export function initLogger(opts: { service: string; level: string }): void {
  const service = opts.service.trim();
  if (!service) throw new Error("initLogger requires a service name");
  const level = requireEnum("LOG_LEVEL", opts.level, LOG_LEVELS);
  ROOT = new BoundLogger(pino({ ...baseOptions, level, base: { service } }));
}

/** Set level dynamically (e.g., silence in tests). */
export function setLogLevel(level: string): void {
  ROOT.pino.level = requireEnum("LOG_LEVEL", level, LOG_LEVELS);
}

export function getLogger(): IBoundLogger {
  return ROOT;
}
