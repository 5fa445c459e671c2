// backend/services/shared/test/errors.spec.ts
import { describe, it, expect } from "vitest";
import { MongoTopologyClosedError } from "mongodb";
import {
  ConfigurationError,
  ConnectError,
  ConnectionError,
  StaleContextError,
  StoreError,
  isAlreadyExistsError,
  isStaleContextError,
} from "@shared/db/errors";

describe("isStaleContextError", () => {
  it("recognizes the driver's closed-topology error by class", () => {
    expect(isStaleContextError(new MongoTopologyClosedError())).toBe(true);
  });

  it("recognizes wrapped driver failures by message", () => {
    expect(isStaleContextError(new Error("Topology is closed"))).toBe(true);
    expect(isStaleContextError(new Error("Client must be connected before running operations"))).toBe(true);
    expect(isStaleContextError(new Error("Attempted to check out a connection from closed connection pool"))).toBe(true);
    expect(isStaleContextError(new Error("Cannot use a session that has ended"))).toBe(true);
  });

  it("accepts its own StaleContextError", () => {
    expect(isStaleContextError(new StaleContextError("gone"))).toBe(true);
  });

  it("rejects unrelated failures and non-errors", () => {
    expect(isStaleContextError(new Error("E11000 duplicate key error"))).toBe(false);
    expect(isStaleContextError(new ConnectError("Failed to connect to MongoDB: refused"))).toBe(false);
    expect(isStaleContextError("Topology is closed")).toBe(false);
    expect(isStaleContextError(undefined)).toBe(false);
  });
});

describe("isAlreadyExistsError", () => {
  it("matches server code 48 and NamespaceExists", () => {
    expect(isAlreadyExistsError(Object.assign(new Error("x"), { code: 48 }))).toBe(true);
    expect(isAlreadyExistsError(Object.assign(new Error("x"), { codeName: "NamespaceExists" }))).toBe(true);
    expect(isAlreadyExistsError(new Error("Collection sensor_readings already exists"))).toBe(true);
    expect(isAlreadyExistsError(new Error("not authorized"))).toBe(false);
  });
});

describe("store error taxonomy", () => {
  it("carries codes, names and causes", () => {
    const cause = new Error("ECONNREFUSED");
    const err = new ConnectError("Failed to connect to MongoDB: ECONNREFUSED", cause);

    expect(err).toBeInstanceOf(ConnectionError);
    expect(err).toBeInstanceOf(StoreError);
    expect(err.name).toBe("ConnectError");
    expect(err.code).toBe("CONNECT_ERROR");
    expect(err.cause).toBe(cause);

    const cfg = new ConfigurationError("MONGODB_URL environment variable is not set");
    expect(cfg).toBeInstanceOf(ConnectionError);
    expect(cfg.code).toBe("CONFIGURATION_ERROR");
    expect(cfg.cause).toBeUndefined();
  });
});
