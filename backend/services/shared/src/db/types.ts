// backend/services/shared/src/db/types.ts
/**
 * Purpose:
 * - Driver port the ConnectionManager and repos depend on, so services never
 *   touch a driver directly and tests can run against an in-process fake.
 * - Mirrors the handful of store calls the services actually make.
 */

export type DbDocument = Record<string, unknown>;

export interface IDbConnectionInfo {
  uri: string;
  dbName: string;
  serverSelectionTimeoutMS?: number;
}

export interface CollectionStats {
  /** Documents in the collection. */
  count: number;
  /** Uncompressed data size in bytes (0 once every document is deleted). */
  size: number;
}

export interface IndexSpec {
  field: string;
  name: string;
  direction?: 1 | -1;
}

export interface IDbCollection<TDoc extends DbDocument = DbDocument> {
  readonly name: string;

  /** Insert one document; resolves to the generated id as a string. */
  insertOne(doc: TDoc): Promise<string>;

  /** Insert many documents; resolves to the inserted count. */
  insertMany(docs: TDoc[]): Promise<number>;

  /** Every document, sorted on one field. Raw: callers validate the shape. */
  findSorted(field: string, direction: 1 | -1): Promise<DbDocument[]>;

  /** Delete every document; resolves to the deleted count. */
  deleteMany(): Promise<number>;

  countDocuments(): Promise<number>;

  /** Idempotent: an equivalent existing index is not an error. */
  createIndex(index: IndexSpec): Promise<string>;

  listIndexNames(): Promise<string[]>;
}

/** One live connection with its database already selected. */
export interface IDbConnection {
  readonly dbName: string;

  /** Liveness ping: one round trip to the server. */
  ping(): Promise<void>;

  listCollectionNames(): Promise<string[]>;

  /** Rejects with a "namespace exists" error when the collection is already there. */
  createCollection(name: string): Promise<void>;

  collection<TDoc extends DbDocument = DbDocument>(name: string): IDbCollection<TDoc>;

  /** Rejects when statistics are unavailable (e.g., collection never created). */
  collStats(name: string): Promise<CollectionStats>;

  /** False once the transport has reported the connection closed. */
  isAlive(): boolean;

  close(): Promise<void>;
}

export interface IDbFactory {
  /** Open a connection and select `info.dbName`. */
  open(info: IDbConnectionInfo): Promise<IDbConnection>;
}
