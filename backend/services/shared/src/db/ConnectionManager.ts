// backend/services/shared/src/db/ConnectionManager.ts
/**
 * Purpose:
 * - Owns the store connection lifecycle for one process: lazy connect,
 *   reconnect when the execution context changes, explicit disconnect.
 * - Construct once at startup and pass the instance to every repo.
 *
 * States:
 *   disconnected ──ensureConnected()──▶ connecting ──ok──▶ connected
 *        ▲                                  │fail               │
 *        └──────────────────────────────────┴───────────────────┘
 *              disconnect() | stale context | invalidate()
 *
 * Invariants:
 * - `handle` is either null or complete (connection + db + context id);
 *   it is assigned in a single statement after the connect sequence succeeds.
 * - At most one connect sequence runs at a time per context: callers take
 *   the fast path, or wait on the lock and re-check before connecting.
 * - A lock is bound to the context generation that created it and is never
 *   reused across generations.
 * - A failed connect leaves no trace; the next caller simply tries again.
 * - A connect is installed only if, when it completes, the context is still
 *   open and on the same generation and no disconnect() ran meanwhile.
 *   Otherwise its connection is closed and the caller gets StaleContextError.
 */

import type { IBoundLogger } from "../logger/Logger";
import { Mutex } from "../utils/Mutex";
import type {
  ExecutionContextSnapshot,
  IExecutionContext,
} from "./ExecutionContext";
import {
  ConfigurationError,
  ConnectError,
  StaleContextError,
  isAlreadyExistsError,
} from "./errors";
import { redactMongoUri } from "./redactUri";
import type { IDbConnection, IDbFactory, IndexSpec } from "./types";

export type ConnectionState = "disconnected" | "connecting" | "connected";

export interface ConnectionHandle {
  readonly connection: IDbConnection;
  readonly dbName: string;
  /** Generation of the execution context the connection was opened in. */
  readonly contextId: number;
}

interface ConnectionLock {
  readonly mutex: Mutex;
  readonly contextId: number;
}

type StaleReason = "context_closed" | "context_changed" | "transport_closed";

export interface ConnectionManagerOptions {
  factory: IDbFactory;
  /** Connection address; absence surfaces as ConfigurationError on first use. */
  uri?: string;
  dbName: string;
  /** Collection prepared (created + indexed) on every connect. */
  collection: string;
  indexes?: IndexSpec[];
  serverSelectionTimeoutMS?: number;
  context: IExecutionContext;
  log: IBoundLogger;
}

export class ConnectionManager {
  private readonly factory: IDbFactory;
  private readonly uri?: string;
  private readonly context: IExecutionContext;
  private readonly indexes: IndexSpec[];
  private readonly serverSelectionTimeoutMS?: number;
  private readonly log: IBoundLogger;

  public readonly dbName: string;
  public readonly collection: string;

  private handle: ConnectionHandle | null = null;
  private lock: ConnectionLock | null = null;
  private _state: ConnectionState = "disconnected";
  /** Bumped by disconnect(); connects started before it are abandoned. */
  private epoch = 0;

  public constructor(opts: ConnectionManagerOptions) {
    if (!opts.dbName.trim()) {
      throw new Error("ConnectionManager: dbName is required");
    }
    if (!opts.collection.trim()) {
      throw new Error("ConnectionManager: collection is required");
    }
    this.factory = opts.factory;
    this.uri = opts.uri;
    this.dbName = opts.dbName.trim();
    this.collection = opts.collection.trim();
    this.indexes = opts.indexes ?? [];
    this.serverSelectionTimeoutMS = opts.serverSelectionTimeoutMS;
    this.context = opts.context;
    this.log = opts.log.bind({ component: "connection-manager" });
  }

  public get state(): ConnectionState {
    return this._state;
  }

  /** Snapshot only: never connects and never mutates state. */
  public isConnected(): boolean {
    const handle = this.handle;
    return (
      handle !== null &&
      this.staleReason(handle, this.context.snapshot()) === null
    );
  }

  /**
   * Resolve a live handle, connecting if needed. Safe under concurrent callers.
   *
   * @throws ConfigurationError when no connection address is configured
   * @throws ConnectError when connect or the liveness ping fails
   * @throws StaleContextError when the execution context is closed
   */
  public async ensureConnected(): Promise<ConnectionHandle> {
    const ctx = this.context.snapshot();
    const current = this.handle;
    if (current && this.staleReason(current, ctx) === null) return current;

    this.dropIfStale(ctx);
    const lock = this.lockFor(ctx);

    return lock.mutex.runExclusive(async () => {
      // Another caller may have connected while this one waited.
      const now = this.context.snapshot();
      const existing = this.handle;
      if (existing && this.staleReason(existing, now) === null) return existing;
      this.dropIfStale(now);
      return this.connect(now);
    });
  }

  /**
   * Forget `handle` without waiting on it (its transport may already be
   * unusable). No-op if the manager has since moved on to another handle.
   */
  public invalidate(handle: ConnectionHandle, reason: string): void {
    if (this.handle !== handle) return;
    this.handle = null;
    this._state = "disconnected";
    this.log.warn(
      { reason, contextId: handle.contextId },
      "connection invalidated"
    );
    this.discard(handle.connection, reason);
  }

  /** Close the connection (if any) and clear all state. Never throws. */
  public async disconnect(): Promise<void> {
    const handle = this.handle;
    this.handle = null;
    this.lock = null;
    this._state = "disconnected";
    this.epoch += 1;
    if (!handle) return;

    try {
      await handle.connection.close();
      this.log.info({ dbName: this.dbName }, "disconnected from MongoDB");
    } catch (err) {
      this.log.warn(
        { error: this.log.serializeError(err) },
        "close failed during disconnect; state cleared anyway"
      );
    }
  }

  // ── internals ───────────────────────────────────────────────────────────────

  private staleReason(
    handle: ConnectionHandle,
    ctx: ExecutionContextSnapshot
  ): StaleReason | null {
    if (ctx.closed) return "context_closed";
    if (handle.contextId !== ctx.id) return "context_changed";
    if (!handle.connection.isAlive()) return "transport_closed";
    return null;
  }

  private dropIfStale(ctx: ExecutionContextSnapshot): void {
    const handle = this.handle;
    if (!handle) return;
    const reason = this.staleReason(handle, ctx);
    if (reason === null) return;

    this.handle = null;
    this._state = "disconnected";
    this.log.info(
      { reason, handleContextId: handle.contextId, contextId: ctx.id },
      "stale connection detected; reconnect forced"
    );
    this.discard(handle.connection, reason);
  }

  private lockFor(ctx: ExecutionContextSnapshot): ConnectionLock {
    if (!this.lock || this.lock.contextId !== ctx.id) {
      this.lock = { mutex: new Mutex(), contextId: ctx.id };
    }
    return this.lock;
  }

  private async connect(ctx: ExecutionContextSnapshot): Promise<ConnectionHandle> {
    const epoch = this.epoch;
    if (ctx.closed) {
      throw new StaleContextError(
        "Execution context is closed; renew it before using the store"
      );
    }
    const uri = this.uri?.trim();
    if (!uri) {
      throw new ConfigurationError(
        "MONGODB_URL environment variable is not set"
      );
    }

    this._state = "connecting";
    this.log.info(
      { uri: redactMongoUri(uri), dbName: this.dbName, contextId: ctx.id },
      "connecting to MongoDB"
    );

    let connection: IDbConnection | null = null;
    try {
      connection = await this.factory.open({
        uri,
        dbName: this.dbName,
        serverSelectionTimeoutMS: this.serverSelectionTimeoutMS,
      });
      await connection.ping();
    } catch (err) {
      if (!this.handle) this._state = "disconnected";
      if (connection) this.discard(connection, "connect_failed");
      const detail = err instanceof Error ? err.message : String(err);
      this.log.error(
        { dbName: this.dbName, error: this.log.serializeError(err) },
        "MongoDB connect failed"
      );
      throw new ConnectError(`Failed to connect to MongoDB: ${detail}`, err);
    }

    await this.prepareSchema(connection);

    const abandoned = this.abandonReason(ctx, epoch);
    if (abandoned !== null) {
      if (!this.handle) this._state = "disconnected";
      this.discard(connection, abandoned);
      this.log.warn(
        { reason: abandoned, contextId: ctx.id },
        "connect completed after its context went away; connection discarded"
      );
      throw new StaleContextError(
        abandoned === "disconnected_during_connect"
          ? "Connection manager was disconnected while connecting"
          : "Execution context changed while connecting"
      );
    }

    const previous = this.handle;
    if (previous) this.discard(previous.connection, "replaced");

    const handle: ConnectionHandle = {
      connection,
      dbName: this.dbName,
      contextId: ctx.id,
    };
    this.handle = handle;
    this._state = "connected";
    this.log.info(
      { dbName: this.dbName, contextId: ctx.id },
      "connected to MongoDB"
    );
    return handle;
  }

  private abandonReason(
    started: ExecutionContextSnapshot,
    epoch: number
  ): "disconnected_during_connect" | "context_changed_during_connect" | null {
    if (epoch !== this.epoch) return "disconnected_during_connect";
    const now = this.context.snapshot();
    if (now.closed || now.id !== started.id) return "context_changed_during_connect";
    return null;
  }

  /** Collection + index creation are best effort; neither fails a connect. */
  private async prepareSchema(connection: IDbConnection): Promise<void> {
    try {
      const names = await connection.listCollectionNames();
      if (!names.includes(this.collection)) {
        await connection.createCollection(this.collection);
        this.log.info({ collection: this.collection }, "collection created");
      }
    } catch (err) {
      if (isAlreadyExistsError(err)) {
        this.log.debug({ collection: this.collection }, "collection already exists");
      } else {
        this.log.warn(
          { collection: this.collection, error: this.log.serializeError(err) },
          "collection preparation failed; continuing"
        );
      }
    }

    const coll = connection.collection(this.collection);
    for (const index of this.indexes) {
      try {
        await coll.createIndex(index);
      } catch (err) {
        this.log.warn(
          {
            collection: this.collection,
            index: index.name,
            error: this.log.serializeError(err),
          },
          "index creation failed; continuing without it"
        );
      }
    }
  }

  private discard(connection: IDbConnection, reason: string): void {
    void connection.close().catch((err: unknown) => {
      this.log.warn(
        { reason, error: this.log.serializeError(err) },
        "closing discarded connection failed"
      );
    });
  }
}
