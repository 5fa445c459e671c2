// backend/services/shared/src/db/mongo/MongoDbFactory.ts
/**
 * Purpose:
 * - MongoDB-specific factory implementing IDbFactory, injected into ConnectionManager.
 * - Each open() yields one MongoClient wrapped as an IDbConnection.
 *
 * Notes:
 * - The connection is marked dead on the driver's topologyClosed event so
 *   the manager can replace it without a network round trip.
 */

import {
  MongoClient,
  type Collection,
  type Db,
  type Document,
} from "mongodb";
import type {
  CollectionStats,
  DbDocument,
  IDbCollection,
  IDbConnection,
  IDbConnectionInfo,
  IDbFactory,
  IndexSpec,
} from "../types";

const APP_NAME = "sensor-telemetry";

function numberField(doc: Document, key: string): number {
  const v: unknown = doc[key];
  return typeof v === "number" && Number.isFinite(v) ? v : 0;
}

class MongoCollection<TDoc extends DbDocument> implements IDbCollection<TDoc> {
  public constructor(private readonly coll: Collection<Document>) {}

  public get name(): string {
    return this.coll.collectionName;
  }

  public async insertOne(doc: TDoc): Promise<string> {
    const toInsert: Document = { ...doc };
    const res = await this.coll.insertOne(toInsert);
    return res.insertedId.toString();
  }

  public async insertMany(docs: TDoc[]): Promise<number> {
    if (docs.length === 0) return 0;
    const toInsert: Document[] = docs.map((d) => ({ ...d }));
    const res = await this.coll.insertMany(toInsert, { ordered: true });
    return res.insertedCount;
  }

  public async findSorted(field: string, direction: 1 | -1): Promise<DbDocument[]> {
    return this.coll.find({}).sort({ [field]: direction }).toArray();
  }

  public async deleteMany(): Promise<number> {
    const res = await this.coll.deleteMany({});
    return res.deletedCount;
  }

  public countDocuments(): Promise<number> {
    return this.coll.countDocuments({});
  }

  public createIndex(index: IndexSpec): Promise<string> {
    return this.coll.createIndex(
      { [index.field]: index.direction ?? 1 },
      { name: index.name }
    );
  }

  public async listIndexNames(): Promise<string[]> {
    const indexes = await this.coll.indexes();
    return indexes.flatMap((ix) => (typeof ix.name === "string" ? [ix.name] : []));
  }
}

class MongoConnection implements IDbConnection {
  private alive = true;
  private readonly db: Db;

  public constructor(private readonly client: MongoClient, public readonly dbName: string) {
    this.db = client.db(dbName);
    client.on("topologyClosed", () => {
      this.alive = false;
    });
  }

  public async ping(): Promise<void> {
    await this.client.db("admin").command({ ping: 1 });
  }

  public async listCollectionNames(): Promise<string[]> {
    const infos = await this.db
      .listCollections({}, { nameOnly: true })
      .toArray();
    return infos.map((c) => c.name);
  }

  public async createCollection(name: string): Promise<void> {
    await this.db.createCollection(name);
  }

  public collection<TDoc extends DbDocument = DbDocument>(name: string): IDbCollection<TDoc> {
    return new MongoCollection<TDoc>(this.db.collection(name));
  }

  public async collStats(name: string): Promise<CollectionStats> {
    const stats = await this.db.command({ collStats: name });
    return { count: numberField(stats, "count"), size: numberField(stats, "size") };
  }

  public isAlive(): boolean {
    return this.alive;
  }

  public async close(): Promise<void> {
    this.alive = false;
    await this.client.close();
  }
}

export class MongoDbFactory implements IDbFactory {
  public async open(info: IDbConnectionInfo): Promise<IDbConnection> {
    const client = new MongoClient(info.uri, {
      appName: APP_NAME,
      serverSelectionTimeoutMS: info.serverSelectionTimeoutMS ?? 5_000,
    });
    try {
      await client.connect();
    } catch (err) {
      // the connect failure is what the caller needs; a close failure adds nothing
      await client.close().catch(() => undefined);
      throw err;
    }
    return new MongoConnection(client, info.dbName);
  }
}
