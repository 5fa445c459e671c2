// backend/services/shared/src/base/RepoBase.ts
/**
 * Purpose:
 * - Thin shared base for repos that reach the store through ConnectionManager.
 * - Every operation runs inside withConnection(): ensure connected, run, and
 *   on a stale-context failure invalidate + reconnect + run exactly once more.
 *
 * Notes:
 * - Only the stale-context class is retried. Configuration, connect and
 *   validation failures propagate unmodified.
 * - No backoff: the retry follows a fresh connect, which is itself the wait.
 */

import type { ConnectionHandle, ConnectionManager } from "../db/ConnectionManager";
import { isStaleContextError } from "../db/errors";
import type { DbDocument, IDbCollection } from "../db/types";
import type { IBoundLogger } from "../logger/Logger";

export interface RepoBaseConfig {
  /** Logical collection name; defaults to the manager's prepared collection. */
  collection?: string;
  log: IBoundLogger;
}

export type RepoCall<TDoc extends DbDocument, T> = (
  coll: IDbCollection<TDoc>,
  handle: ConnectionHandle
) => Promise<T>;

export abstract class RepoBase<TDoc extends DbDocument = DbDocument> {
  protected readonly manager: ConnectionManager;
  protected readonly collection: string;
  protected readonly log: IBoundLogger;

  protected constructor(manager: ConnectionManager, cfg: RepoBaseConfig) {
    const collection = (cfg.collection ?? manager.collection).trim();
    if (!collection) {
      throw new Error("RepoBase: collection is required");
    }
    this.manager = manager;
    this.collection = collection;
    this.log = cfg.log.bind({ collection });
  }

  /** Retry-once-on-stale wrapper. A second failure surfaces as thrown. */
  protected async withConnection<T>(label: string, fn: RepoCall<TDoc, T>): Promise<T> {
    const first = await this.manager.ensureConnected();
    try {
      return await fn(this.collOf(first), first);
    } catch (err) {
      if (!isStaleContextError(err)) {
        this.log.error(
          { op: label, error: this.log.serializeError(err) },
          `${label} failed`
        );
        throw err;
      }
      this.log.warn(
        { op: label, attempt: 1, error: this.log.serializeError(err) },
        `${label} hit a stale connection; reconnecting and retrying once`
      );
      this.manager.invalidate(first, `${label}: stale execution context`);
    }

    const second = await this.manager.ensureConnected();
    try {
      return await fn(this.collOf(second), second);
    } catch (err) {
      this.log.error(
        { op: label, attempt: 2, error: this.log.serializeError(err) },
        `${label} failed after retry`
      );
      throw err;
    }
  }

  private collOf(handle: ConnectionHandle): IDbCollection<TDoc> {
    return handle.connection.collection<TDoc>(this.collection);
  }
}
