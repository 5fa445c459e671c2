// backend/services/shared/src/db/errors.ts
/**
 * Purpose:
 * - Error taxonomy for the store layer. Every class carries a stable `code`
 *   that the HTTP layer copies into Problem+JSON.
 * - Classification of driver failures that mean "the connection's execution
 *   context is gone" (the only class recovered automatically).
 */

export type StoreErrorCode =
  | "CONFIGURATION_ERROR"
  | "CONNECT_ERROR"
  | "STALE_CONTEXT"
  | "DOCUMENT_INVALID"
  | "STATS_UNAVAILABLE";

export class StoreError extends Error {
  public readonly code: StoreErrorCode;

  public constructor(code: StoreErrorCode, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
    this.code = code;
  }
}

/** Base for failures to obtain a usable connection. */
export class ConnectionError extends StoreError {}

/** Required connection address missing. Fatal; never retried. */
export class ConfigurationError extends ConnectionError {
  public constructor(message: string) {
    super("CONFIGURATION_ERROR", message);
  }
}

/** Network/auth failure during connect or the liveness ping. */
export class ConnectError extends ConnectionError {
  public constructor(message: string, cause?: unknown) {
    super("CONNECT_ERROR", message, cause);
  }
}

/** The execution context backing the connection was torn down. */
export class StaleContextError extends StoreError {
  public constructor(message: string, cause?: unknown) {
    super("STALE_CONTEXT", message, cause);
  }
}

export type ValidationIssue = { path: string; message: string };

/** A stored document does not conform to the expected output shape. */
export class DocumentValidationError extends StoreError {
  public readonly document: unknown;
  public readonly issues: ValidationIssue[];

  public constructor(
    message: string,
    opts: { document: unknown; issues: ValidationIssue[]; cause?: unknown }
  ) {
    super("DOCUMENT_INVALID", message, opts.cause);
    this.document = opts.document;
    this.issues = opts.issues;
  }
}

/** Collection statistics could not be read. Always recovered by the caller. */
export class StatsUnavailableError extends StoreError {
  public constructor(collection: string, cause?: unknown) {
    super(
      "STATS_UNAVAILABLE",
      `Statistics unavailable for collection "${collection}"`,
      cause
    );
  }
}

// The driver reports these as distinct classes, but wrappers and older
// releases only preserve the message, so both are checked.
const STALE_ERROR_NAMES = new Set([
  "MongoTopologyClosedError",
  "MongoNotConnectedError",
  "MongoExpiredSessionError",
  "PoolClosedError",
]);

const STALE_MESSAGE_PATTERNS: readonly RegExp[] = [
  /topology (is|was) closed/i,
  /client must be connected/i,
  /connection pool .*closed/i,
  /closed connection pool/i,
  /pool (is|was) closed/i,
  /session that has ended/i,
  /execution context .*(closed|torn down)/i,
];

export function isStaleContextError(err: unknown): boolean {
  if (err instanceof StaleContextError) return true;
  if (!(err instanceof Error)) return false;
  if (STALE_ERROR_NAMES.has(err.name)) return true;
  return STALE_MESSAGE_PATTERNS.some((re) => re.test(err.message));
}

/** Server code 48 (NamespaceExists): collection already created. */
export function isAlreadyExistsError(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  if ("code" in err && err.code === 48) return true;
  if ("codeName" in err && err.codeName === "NamespaceExists") return true;
  return /already exists/i.test(err.message);
}
