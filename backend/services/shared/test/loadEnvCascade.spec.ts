// backend/services/shared/test/loadEnvCascade.spec.ts
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { loadEnvCascade } from "@shared/env/loadEnvCascade";

const KEYS = ["CASCADE_TEST_A", "CASCADE_TEST_B", "CASCADE_TEST_C"];

describe("loadEnvCascade", () => {
  let repoRoot: string;
  let serviceRoot: string;

  beforeEach(() => {
    repoRoot = fs.mkdtempSync(path.join(os.tmpdir(), "env-cascade-"));
    serviceRoot = path.join(repoRoot, "svc");
    fs.mkdirSync(serviceRoot);
    fs.writeFileSync(path.join(serviceRoot, ".env"), "CASCADE_TEST_A=service\n");
    fs.writeFileSync(
      path.join(repoRoot, ".env"),
      "CASCADE_TEST_A=repo\nCASCADE_TEST_B=repo\n"
    );
  });

  afterEach(() => {
    for (const k of KEYS) delete process.env[k];
    fs.rmSync(repoRoot, { recursive: true, force: true });
  });

  it("loads the service file over the repo file", () => {
    const loaded = loadEnvCascade({ repoRootAbs: repoRoot, serviceRootAbs: serviceRoot });

    expect(loaded).toEqual([path.join(serviceRoot, ".env"), path.join(repoRoot, ".env")]);
    expect(process.env.CASCADE_TEST_A).toBe("service");
    expect(process.env.CASCADE_TEST_B).toBe("repo");
  });

  it("never overrides the process environment", () => {
    process.env.CASCADE_TEST_A = "process";
    loadEnvCascade({ repoRootAbs: repoRoot, serviceRootAbs: serviceRoot });
    expect(process.env.CASCADE_TEST_A).toBe("process");
  });

  it("loads only ENV_FILE when given", () => {
    const explicit = path.join(repoRoot, "custom.env");
    fs.writeFileSync(explicit, "CASCADE_TEST_C=explicit\n");

    const loaded = loadEnvCascade({
      repoRootAbs: repoRoot,
      serviceRootAbs: serviceRoot,
      envFile: explicit,
    });

    expect(loaded).toEqual([explicit]);
    expect(process.env.CASCADE_TEST_C).toBe("explicit");
    expect(process.env.CASCADE_TEST_A).toBeUndefined();
  });

  it("fails when ENV_FILE does not exist", () => {
    const missing = path.join(repoRoot, "missing.env");
    expect(() =>
      loadEnvCascade({ repoRootAbs: repoRoot, serviceRootAbs: serviceRoot, envFile: missing })
    ).toThrow(`[bootstrap] ENV_FILE not found: ${missing}`);
  });
});
