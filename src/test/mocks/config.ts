import path from "path";
import type { RuntimeConfig } from "../../config";

/** In-memory database, no Redis, queue enabled (tests inject the broker). */
export function testConfig(modelDir: string): RuntimeConfig {
  return {
    port: 0,
    nodeEnv: "test",
    logLevel: "silent",
    sqlitePath: ":memory:",
    imageStoreDir: path.join(modelDir, "images"),
    models: {
      dir: modelDir,
      imageModelFile: "leaf.onnx",
      symptomModelFile: "symptoms.onnx",
      watch: false,
      symptomsEnabled: false,
      searchDirs: [modelDir],
    },
    redis: { enabled: false, url: "redis://127.0.0.1:6379" },
    queue: { enabled: true, name: "leaf-predictions-test", publishTimeoutMs: 100 },
    cache: { enabled: true, ttlSeconds: 3600, memoryMaxTtlSeconds: 300, memoryMaxKeys: 100 },
  };
}
