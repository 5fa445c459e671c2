// backend/services/telemetry/test/helpers/fakeDb.ts
/**
 * In-process stand-in for the MongoDB driver port.
 * One FakeDbServer holds the data; every open() hands out a new connection
 * over it, like separate MongoClients against one server.
 *
 * Fault knobs live on `server.faults`; call counters on `server.calls`.
 */

import { MongoTopologyClosedError, ObjectId } from "mongodb";
import type {
  CollectionStats,
  DbDocument,
  IDbCollection,
  IDbConnection,
  IDbConnectionInfo,
  IDbFactory,
  IndexSpec,
} from "@shared/db/types";

export type FakeFaults = {
  openError?: Error;
  pingError?: Error;
  createCollectionError?: Error;
  indexError?: Error;
  collStatsError?: Error;
  /** Next N data calls fail with the driver's "Topology is closed". */
  staleCalls: number;
  /** Next data call fails with this error. */
  nextError?: Error;
  /** Delay before open() resolves, so concurrent callers overlap. */
  openDelayMs: number;
};

type StoredCollection = {
  docs: DbDocument[];
  indexes: Map<string, IndexSpec>;
};

const ID_INDEX: IndexSpec = { field: "_id", name: "_id_" };

function sortValue(v: unknown): number | string {
  if (v instanceof Date) return v.getTime();
  if (typeof v === "number") return v;
  return String(v);
}

function approxSize(docs: DbDocument[]): number {
  return docs.reduce((sum, d) => sum + JSON.stringify(d).length, 0);
}

export class FakeDbServer implements IDbFactory {
  public readonly collections = new Map<string, StoredCollection>();
  public readonly faults: FakeFaults = { staleCalls: 0, openDelayMs: 0 };
  public readonly connections: FakeConnection[] = [];
  public readonly calls = {
    open: 0,
    ping: 0,
    close: 0,
    /** Every round trip, connect included. */
    total: 0,
    ops: new Map<string, number>(),
  };
  public lastInfo?: IDbConnectionInfo;

  public async open(info: IDbConnectionInfo): Promise<IDbConnection> {
    this.calls.open += 1;
    this.calls.total += 1;
    this.lastInfo = info;
    if (this.faults.openDelayMs > 0) {
      await new Promise((r) => setTimeout(r, this.faults.openDelayMs));
    }
    if (this.faults.openError) throw this.faults.openError;
    const conn = new FakeConnection(this, info.dbName);
    this.connections.push(conn);
    return conn;
  }

  public opCount(name: string): number {
    return this.calls.ops.get(name) ?? 0;
  }

  /** Counts a data call and applies one-shot faults. */
  public hit(op: string): void {
    this.calls.total += 1;
    this.calls.ops.set(op, this.opCount(op) + 1);
    if (this.faults.staleCalls > 0) {
      this.faults.staleCalls -= 1;
      throw new MongoTopologyClosedError("Topology is closed");
    }
    const next = this.faults.nextError;
    if (next) {
      this.faults.nextError = undefined;
      throw next;
    }
  }

  public ensureCollection(name: string): StoredCollection {
    let c = this.collections.get(name);
    if (!c) {
      c = { docs: [], indexes: new Map([[ID_INDEX.name, ID_INDEX]]) };
      this.collections.set(name, c);
    }
    return c;
  }

  /** Write a document verbatim, bypassing any connection. */
  public seedRaw(collection: string, doc: DbDocument): void {
    this.ensureCollection(collection).docs.push(doc);
  }
}

export class FakeConnection implements IDbConnection {
  private alive = true;
  public closed = false;

  public constructor(private readonly server: FakeDbServer, public readonly dbName: string) {}

  public async ping(): Promise<void> {
    this.server.calls.ping += 1;
    this.server.calls.total += 1;
    if (this.server.faults.pingError) throw this.server.faults.pingError;
  }

  public async listCollectionNames(): Promise<string[]> {
    this.server.calls.total += 1;
    return [...this.server.collections.keys()];
  }

  public async createCollection(name: string): Promise<void> {
    this.server.calls.total += 1;
    if (this.server.faults.createCollectionError) {
      throw this.server.faults.createCollectionError;
    }
    if (this.server.collections.has(name)) {
      throw Object.assign(new Error(`Collection ${name} already exists`), {
        code: 48,
        codeName: "NamespaceExists",
      });
    }
    this.server.ensureCollection(name);
  }

  public collection<TDoc extends DbDocument = DbDocument>(name: string): IDbCollection<TDoc> {
    return new FakeCollection<TDoc>(this.server, name);
  }

  public async collStats(name: string): Promise<CollectionStats> {
    this.server.hit("collStats");
    if (this.server.faults.collStatsError) throw this.server.faults.collStatsError;
    const c = this.server.collections.get(name);
    if (!c) throw new Error(`ns not found: ${this.dbName}.${name}`);
    return { count: c.docs.length, size: approxSize(c.docs) };
  }

  public isAlive(): boolean {
    return this.alive;
  }

  /** What the driver's topologyClosed event does to a live client. */
  public kill(): void {
    this.alive = false;
  }

  public async close(): Promise<void> {
    this.server.calls.close += 1;
    this.alive = false;
    this.closed = true;
  }
}

class FakeCollection<TDoc extends DbDocument> implements IDbCollection<TDoc> {
  public constructor(private readonly server: FakeDbServer, public readonly name: string) {}

  public async insertOne(doc: TDoc): Promise<string> {
    this.server.hit("insertOne");
    const _id = new ObjectId();
    this.server.ensureCollection(this.name).docs.push({ ...doc, _id });
    return _id.toHexString();
  }

  public async insertMany(docs: TDoc[]): Promise<number> {
    this.server.hit("insertMany");
    const target = this.server.ensureCollection(this.name);
    for (const d of docs) target.docs.push({ ...d, _id: new ObjectId() });
    return docs.length;
  }

  public async findSorted(field: string, direction: 1 | -1): Promise<DbDocument[]> {
    this.server.hit("find");
    const docs = this.server.collections.get(this.name)?.docs ?? [];
    return [...docs].sort((a, b) => {
      const av = sortValue(a[field]);
      const bv = sortValue(b[field]);
      if (av === bv) return 0;
      return (av < bv ? -1 : 1) * direction;
    });
  }

  public async deleteMany(): Promise<number> {
    this.server.hit("deleteMany");
    const c = this.server.collections.get(this.name);
    if (!c) return 0;
    const n = c.docs.length;
    c.docs = [];
    return n;
  }

  public async countDocuments(): Promise<number> {
    this.server.hit("countDocuments");
    return this.server.collections.get(this.name)?.docs.length ?? 0;
  }

  public async createIndex(index: IndexSpec): Promise<string> {
    this.server.calls.total += 1;
    if (this.server.faults.indexError) throw this.server.faults.indexError;
    this.server.ensureCollection(this.name).indexes.set(index.name, index);
    return index.name;
  }

  public async listIndexNames(): Promise<string[]> {
    this.server.hit("listIndexes");
    const c = this.server.collections.get(this.name);
    if (!c) throw new Error(`ns does not exist: ${this.name}`);
    return [...c.indexes.keys()];
  }
}
