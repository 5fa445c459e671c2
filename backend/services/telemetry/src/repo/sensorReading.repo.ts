// backend/services/telemetry/src/repo/sensorReading.repo.ts
/**
 * Purpose:
 * - Store operations for sensor readings: insert, insertMany, listAll,
 *   clearAll, getStats.
 * - Each call goes through RepoBase.withConnection(), so callers never
 *   reason about the connection lifecycle.
 *
 * Notes:
 * - The write timestamp is assigned here (injectable clock), never by the caller,
 *   except for seeding where the plan carries explicit timestamps.
 * - listAll is all-or-nothing: one malformed document fails the whole call.
 */

import { RepoBase } from "@shared/base/RepoBase";
import type { ConnectionManager } from "@shared/db/ConnectionManager";
import { StatsUnavailableError, isStaleContextError } from "@shared/db/errors";
import type { IDbCollection, IDbConnection } from "@shared/db/types";
import type { IBoundLogger } from "@shared/logger/Logger";
import type {
  NewSensorReadingDocument,
  SensorReading,
  SensorReadingInput,
  SensorStats,
} from "../contracts/sensorReading";
import { dbToDomain, toDocument } from "../mappers/sensorReading.mapper";

export type SeedEntry = { reading: SensorReadingInput; timestamp: Date };

export interface SensorReadingRepoOptions {
  log: IBoundLogger;
  /** Clock used for write timestamps. */
  now?: () => Date;
}

export class SensorReadingRepo extends RepoBase<NewSensorReadingDocument> {
  private readonly now: () => Date;

  public constructor(manager: ConnectionManager, opts: SensorReadingRepoOptions) {
    super(manager, { log: opts.log.bind({ component: "sensor-reading-repo" }) });
    this.now = opts.now ?? (() => new Date());
  }

  /** @returns the generated id */
  public async insert(reading: SensorReadingInput): Promise<string> {
    const doc = toDocument(reading, this.now());
    const id = await this.withConnection("insert", (coll) => coll.insertOne(doc));
    this.log.debug({ id }, "sensor reading stored");
    return id;
  }

  /** @returns the inserted count */
  public async insertMany(entries: SeedEntry[]): Promise<number> {
    if (entries.length === 0) return 0;
    const docs = entries.map((e) => toDocument(e.reading, e.timestamp));
    const inserted = await this.withConnection("insertMany", (coll) =>
      coll.insertMany(docs)
    );
    this.log.info({ inserted }, "sensor readings seeded");
    return inserted;
  }

  /** Newest first. */
  public async listAll(): Promise<SensorReading[]> {
    const raw = await this.withConnection("listAll", (coll) =>
      coll.findSorted("timestamp", -1)
    );

    const out: SensorReading[] = [];
    for (const doc of raw) {
      try {
        out.push(dbToDomain(doc));
      } catch (err) {
        this.log.error(
          { document: doc, error: this.log.serializeError(err) },
          "sensor reading translation failed"
        );
        throw err;
      }
    }
    return out;
  }

  /** @returns the deleted count */
  public async clearAll(): Promise<number> {
    const deleted = await this.withConnection("clearAll", (coll) => coll.deleteMany());
    this.log.info({ deleted }, "sensor readings cleared");
    return deleted;
  }

  /** Best effort: unavailable statistics yield the zero snapshot. */
  public async getStats(): Promise<SensorStats> {
    return this.withConnection("getStats", async (coll, handle) => {
      try {
        return await this.readStats(handle.connection, coll);
      } catch (err) {
        if (!(err instanceof StatsUnavailableError)) throw err;
        this.log.warn(
          { error: this.log.serializeError(err.cause ?? err) },
          "collection statistics unavailable; reporting empty snapshot"
        );
        return this.zeroStats();
      }
    });
  }

  private async readStats(
    connection: IDbConnection,
    coll: IDbCollection<NewSensorReadingDocument>
  ): Promise<SensorStats> {
    try {
      const stats = await connection.collStats(this.collection);
      const documentCount = await coll.countDocuments();
      const indexes = await coll.listIndexNames();
      return {
        database: this.manager.dbName,
        collection: this.collection,
        documentCount,
        exists: documentCount > 0 || stats.size > 0,
        dataSize: stats.size,
        indexes,
      };
    } catch (err) {
      // Stale failures must reach withConnection so the retry applies.
      if (isStaleContextError(err)) throw err;
      throw new StatsUnavailableError(this.collection, err);
    }
  }

  private zeroStats(): SensorStats {
    return {
      database: this.manager.dbName,
      collection: this.collection,
      documentCount: 0,
      exists: false,
      dataSize: 0,
      indexes: [],
    };
  }
}
