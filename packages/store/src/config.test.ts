import { describe, it, expect } from "vitest";
import { homedir } from "node:os";
import { join, resolve } from "node:path";
import { loadConfig, resolvePath } from "./config.js";
import { ConfigError } from "./errors.js";

describe("loadConfig()", () => {
  it("should default to the local backend", () => {
    expect(loadConfig({})).toEqual({
      storage: { backend: "local", filePath: resolve("./data/services.json") },
      seedPath: undefined,
      instrument: true,
      logLevel: "info",
    });
  });

  it("should ignore unrelated and empty variables", () => {
    const config = loadConfig({
      PATH: "/usr/bin",
      CATALOG_DATA_PATH: "   ",
      CATALOG_LOG_LEVEL: "",
    });

    expect(config.storage).toEqual({
      backend: "local",
      filePath: resolve("./data/services.json"),
    });
    expect(config.logLevel).toBe("info");
  });

  it("should resolve local paths", () => {
    const config = loadConfig({
      CATALOG_DATA_PATH: "~/catalog/services.json",
      CATALOG_SEED_PATH: "fixtures/seed.json",
    });

    expect(config.storage).toEqual({
      backend: "local",
      filePath: join(homedir(), "catalog/services.json"),
    });
    expect(config.seedPath).toBe(resolve("fixtures/seed.json"));
  });

  it("should build a remote configuration with static credentials", () => {
    const config = loadConfig({
      CATALOG_STORAGE_BACKEND: "remote",
      CATALOG_REMOTE_BUCKET: "catalog",
      CATALOG_REMOTE_KEY: "prod/services.json",
      CATALOG_REMOTE_REGION: "eu-west-1",
      CATALOG_REMOTE_ENDPOINT: "http://localhost:9000",
      CATALOG_REMOTE_FORCE_PATH_STYLE: "1",
      CATALOG_REMOTE_ACCESS_KEY_ID: "test-key",
      CATALOG_REMOTE_SECRET_ACCESS_KEY: "test-secret",
      CATALOG_REMOTE_MAX_ATTEMPTS: "3",
      CATALOG_INSTRUMENT: "false",
      CATALOG_LOG_LEVEL: "debug",
    });

    expect(config).toEqual({
      storage: {
        backend: "remote",
        bucket: "catalog",
        key: "prod/services.json",
        region: "eu-west-1",
        endpoint: "http://localhost:9000",
        forcePathStyle: true,
        credentials: { source: "static", accessKeyId: "test-key", secretAccessKey: "test-secret" },
        maxAttempts: 3,
      },
      seedPath: undefined,
      instrument: false,
      logLevel: "debug",
    });
  });

  it("should defer to the default credential chain without static keys", () => {
    const config = loadConfig({ CATALOG_STORAGE_BACKEND: "remote", CATALOG_REMOTE_BUCKET: "b" });

    expect(config.storage).toEqual({
      backend: "remote",
      bucket: "b",
      key: "services.json",
      region: "us-east-1",
      endpoint: undefined,
      forcePathStyle: false,
      credentials: { source: "default" },
      maxAttempts: 1,
    });
  });

  it("should require a bucket for the remote backend", () => {
    expect(() => loadConfig({ CATALOG_STORAGE_BACKEND: "remote" })).toThrow(
      "Invalid configuration: CATALOG_REMOTE_BUCKET: is required when CATALOG_STORAGE_BACKEND is remote"
    );
  });

  it("should require both halves of a static key pair", () => {
    expect(() =>
      loadConfig({
        CATALOG_STORAGE_BACKEND: "remote",
        CATALOG_REMOTE_BUCKET: "b",
        CATALOG_REMOTE_ACCESS_KEY_ID: "test-key",
      })
    ).toThrow(
      "Invalid configuration: CATALOG_REMOTE_SECRET_ACCESS_KEY: access key id and secret must be set together"
    );
  });

  it("should reject an invalid boolean", () => {
    expect(() => loadConfig({ CATALOG_INSTRUMENT: "yes" })).toThrow(
      "Invalid configuration: CATALOG_INSTRUMENT: must be true, false, 1 or 0"
    );
  });

  it("should reject an unknown backend", () => {
    try {
      loadConfig({ CATALOG_STORAGE_BACKEND: "ftp" });
      expect.unreachable("loadConfig should have thrown");
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) {
        expect(err.code).toBe("E_CONFIG");
        expect(err.issues.map((issue) => issue.path)).toEqual(["CATALOG_STORAGE_BACKEND"]);
      }
    }
  });

  it("should reject out-of-range attempt counts", () => {
    expect(() => loadConfig({ CATALOG_REMOTE_MAX_ATTEMPTS: "0" })).toThrow(ConfigError);
    expect(() => loadConfig({ CATALOG_REMOTE_MAX_ATTEMPTS: "many" })).toThrow(ConfigError);
  });
});

describe("resolvePath()", () => {
  it("should expand a bare tilde", () => {
    expect(resolvePath("~")).toBe(homedir());
  });

  it("should leave ~user references alone", () => {
    expect(resolvePath("~other/file.json")).toBe(resolve("~other/file.json"));
  });
});
