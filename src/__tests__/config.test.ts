import path from "path";
import { describe, it, expect } from "vitest";
import { buildRuntimeConfig } from "../config";

describe("buildRuntimeConfig", () => {
  it("applies defaults", () => {
    const config = buildRuntimeConfig({});

    expect(config.port).toBe(4000);
    expect(config.sqlitePath).toBe("data/leafscan.db");
    expect(config.cache).toEqual({
      enabled: true,
      ttlSeconds: 604800,
      memoryMaxTtlSeconds: 3600,
      memoryMaxKeys: 500,
    });
    expect(config.redis.enabled).toBe(false);
    expect(config.queue).toEqual({ enabled: false, name: "leaf-predictions", publishTimeoutMs: 2000 });
    expect(config.models.symptomsEnabled).toBe(true);
  });

  it("parses boolean flags and numbers from strings", () => {
    const config = buildRuntimeConfig({
      PORT: "8080",
      REDIS_ENABLED: "yes",
      CACHE_ENABLED: "off",
      QUEUE_ENABLED: "",
      SYMPTOMS_ENABLED: "0",
      CACHE_MEMORY_MAX_KEYS: "50",
    });

    expect(config.port).toBe(8080);
    expect(config.redis.enabled).toBe(true);
    expect(config.cache.enabled).toBe(false);
    expect(config.queue.enabled).toBe(false);
    expect(config.models.symptomsEnabled).toBe(false);
    expect(config.cache.memoryMaxKeys).toBe(50);
  });

  it("probes the configured model directory first", () => {
    const config = buildRuntimeConfig({ MODEL_DIR: "weights" });
    expect(config.models.searchDirs[0]).toBe(path.resolve(process.cwd(), "weights"));
    expect(config.models.searchDirs[1]).toBe(path.resolve(process.cwd(), "public", "models"));
  });

  it("rejects invalid values", () => {
    expect(() => buildRuntimeConfig({ LOG_LEVEL: "loud" })).toThrow();
    expect(() => buildRuntimeConfig({ QUEUE_PUBLISH_TIMEOUT_MS: "-5" })).toThrow();
    expect(() => buildRuntimeConfig({ CACHE_MEMORY_MAX_TTL_SECONDS: "86400" })).toThrow();
  });
});
