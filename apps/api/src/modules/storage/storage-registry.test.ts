import { describe, expect, it, vi } from "vitest";
import { ConfigurationError } from "../../core/errors.js";
import { silentLogger } from "../../core/logger.js";
import type { StorageAdapter } from "./storage-adapter.js";
import { StorageRegistry, type StorageFactory } from "./storage-registry.js";

const logger = silentLogger();

function recordingFactory(options: { failInitialize?: boolean } = {}) {
  const initialize = vi.fn(async (_options: Record<string, string>) => {
    if (options.failInitialize) {
      throw new ConfigurationError("Missing fake configuration: endpoint", ["endpoint"]);
    }
  });
  const release = vi.fn(async () => undefined);
  const factory: StorageFactory = (): StorageAdapter => ({
    name: "fake",
    supportsSharing: false,
    initialize,
    upload: async () => undefined,
    download: async () => undefined,
    exists: async () => false,
    delete: async () => undefined,
    generateShareLink: async () => "",
    release
  });
  return { factory, initialize, release };
}

describe("StorageRegistry", () => {
  it("should list the built-in backends in order", () => {
    const registry = new StorageRegistry(logger);
    expect(registry.names()).toEqual(["azure", "b2", "dropbox", "gcp", "gdrive", "github", "local", "s3", "sftp"]);
  });

  it("should look names up without regard to case or padding", () => {
    const registry = new StorageRegistry(logger);
    expect(registry.has(" S3 ")).toBe(true);
    expect(registry.instantiate("GDrive").name).toBe("gdrive");
  });

  it("should name the valid types when the name is unknown", () => {
    const registry = new StorageRegistry(logger, {}, { local: recordingFactory().factory });
    expect(() => registry.instantiate("ftp")).toThrow("Unknown storage type 'ftp'. Valid types: local");
  });

  it("should accept additional backends", () => {
    const registry = new StorageRegistry(logger, {}, {});
    registry.register("Fake", recordingFactory().factory);
    expect(registry.names()).toEqual(["fake"]);
  });

  it("should refuse an empty backend name", () => {
    const registry = new StorageRegistry(logger, {}, {});
    expect(() => registry.register("  ", recordingFactory().factory)).toThrow(ConfigurationError);
  });

  it("should hand configured options to the backend it resolves", async () => {
    const fake = recordingFactory();
    const registry = new StorageRegistry(logger, { fake: { endpoint: "http://fake.test" } }, { fake: fake.factory });
    const storage = await registry.resolve("FAKE");
    expect(fake.initialize).toHaveBeenCalledWith({ endpoint: "http://fake.test" });
    await storage.release();
  });

  it("should resolve with empty options when nothing is configured", async () => {
    const fake = recordingFactory();
    const registry = new StorageRegistry(logger, {}, { fake: fake.factory });
    await registry.resolve("fake");
    expect(fake.initialize).toHaveBeenCalledWith({});
  });

  it("should release a backend whose initialization failed", async () => {
    const fake = recordingFactory({ failInitialize: true });
    const registry = new StorageRegistry(logger, {}, { fake: fake.factory });
    await expect(registry.resolve("fake")).rejects.toBeInstanceOf(ConfigurationError);
    expect(fake.release).toHaveBeenCalledTimes(1);
  });
});
