/**
 * Unit tests for InferenceEngine
 *
 * Tests the load, swap and lease behaviour against the in-process model
 * loader without requiring ONNX Runtime or model files on disk.
 */

import { describe, it, expect } from "vitest";
import { InferenceFailedError } from "../../domain/errors";
import { InferenceEngine } from "../inferenceEngine";
import { FakeModelCatalog, FakeModelLoader, recordingLogger, silentLogger } from "../../test/mocks/fakes";

const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

const tensor = { data: new Float32Array(3), dims: [1, 3] };

function createEngine(loader: FakeModelLoader, catalog = new FakeModelCatalog({ image: "/models/v1.onnx" })) {
  return { engine: new InferenceEngine(catalog, loader, silentLogger(), { modelType: "image" }), catalog };
}

describe("InferenceEngine", () => {
  describe("ensureLoaded", () => {
    it("loads the catalogue model once for concurrent callers", async () => {
      const loader = new FakeModelLoader({ v1: { scores: [1, 2] } });
      const { engine, catalog } = createEngine(loader);

      const results = await Promise.all([engine.ensureLoaded(), engine.ensureLoaded()]);

      expect(results).toEqual([true, true]);
      expect(loader.loads).toEqual(["v1"]);
      expect(engine.currentHandle()?.version).toBe("v1");
      expect(catalog.swaps).toEqual([{ modelType: "image", version: "v1", previousVersion: null }]);
    });

    it("stays unloaded when the model file is missing", async () => {
      const loader = new FakeModelLoader({});
      const { engine } = createEngine(loader, new FakeModelCatalog({}));

      expect(await engine.ensureLoaded()).toBe(false);
      expect(engine.isReady()).toBe(false);
      expect(await engine.acquire()).toBeNull();
      await expect(engine.run(tensor)).rejects.toThrow("No image model loaded");
      expect(await engine.healthCheck()).toEqual({
        component: "inference:image",
        healthy: false,
        detail: "no model loaded",
      });
    });

    it("warns about a missing file once, then retries quietly", async () => {
      const { logger, lines } = recordingLogger();
      const files: { image?: string } = {};
      const catalog = new FakeModelCatalog(files);
      const engine = new InferenceEngine(catalog, new FakeModelLoader({ v1: { scores: [1] } }), logger, {
        modelType: "image",
      });

      await engine.ensureLoaded();
      await engine.ensureLoaded();
      await engine.ensureLoaded();

      const misses = lines.filter((line) => line.msg === "Model file not found, running without a model");
      expect(misses.map((line) => line.level)).toEqual([40, 20, 20]);

      files.image = "/models/v1.onnx";
      expect(await engine.ensureLoaded()).toBe(true);
    });

    it("reports the load error when the runtime rejects the file", async () => {
      const loader = new FakeModelLoader({});
      const { engine } = createEngine(loader);

      expect(await engine.ensureLoaded()).toBe(false);
      expect((await engine.healthCheck()).detail).toBe("No fake model registered for v1");
    });
  });

  describe("swap", () => {
    it("lets an in-flight lease finish on the old model", async () => {
      const loader = new FakeModelLoader({
        v1: { scores: [1, 0] },
        v2: { dims: [1, 224, 224, 3], scores: [0, 1] },
      });
      const { engine, catalog } = createEngine(loader);
      await engine.ensureLoaded();

      const lease = await engine.acquire();
      expect(lease).not.toBeNull();
      if (!lease) return;

      const swapping = engine.swap("/models/v2.onnx");
      await flush();

      // Loaded, but not committed while the lease is held
      expect(loader.loads).toEqual(["v1", "v2"]);
      expect(engine.currentHandle()?.version).toBe("v1");
      expect(Array.from(await lease.run(tensor))).toEqual([1, 0]);
      expect(lease.handle.version).toBe("v1");

      lease.release();
      const handle = await swapping;

      expect(handle.version).toBe("v2");
      expect(handle.tensorLayout).toBe("channelLast");
      expect(handle.expectedShape).toEqual([1, 224, 224, 3]);
      expect(loader.released).toEqual(["v1"]);
      expect(catalog.swaps.map((swap) => [swap.version, swap.previousVersion])).toEqual([
        ["v1", null],
        ["v2", "v1"],
      ]);

      const { handle: used, scores } = await engine.run(tensor);
      expect(used.version).toBe("v2");
      expect(Array.from(scores)).toEqual([0, 1]);
    });

    it("keeps the current model when loading the replacement fails", async () => {
      const loader = new FakeModelLoader({ v1: { scores: [1] } });
      const { engine, catalog } = createEngine(loader);
      await engine.ensureLoaded();

      await expect(engine.swap("/models/v3.onnx")).rejects.toThrow("No fake model registered for v3");

      expect(engine.currentHandle()?.version).toBe("v1");
      expect(loader.released).toEqual([]);
      expect(catalog.swaps).toHaveLength(1);
    });

    it("hands out frozen handles", async () => {
      const loader = new FakeModelLoader({ v1: { scores: [1] } });
      const { engine } = createEngine(loader);
      await engine.ensureLoaded();

      const handle = engine.currentHandle();
      expect(Object.isFrozen(handle)).toBe(true);
      expect(Object.isFrozen(handle?.expectedShape)).toBe(true);
    });
  });

  describe("forward passes", () => {
    it("counts every forward pass", async () => {
      const loader = new FakeModelLoader({ v1: { scores: [1, 2] } });
      const { engine } = createEngine(loader);
      await engine.ensureLoaded();

      await engine.run(tensor);
      await engine.run(tensor);

      expect(engine.inferenceCount).toBe(2);
      expect(loader.runsOf("v1")).toBe(2);
    });

    it("wraps runtime failures in InferenceFailedError", async () => {
      const loader = new FakeModelLoader({ v1: { scores: [1], failOn: (call) => call === 1 } });
      const { engine } = createEngine(loader);
      await engine.ensureLoaded();

      const error = await engine.run(tensor).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(InferenceFailedError);
      expect(error).toHaveProperty("message", "Inference failed on v1: forward pass 1 failed");
      expect(engine.isReady()).toBe(true);
    });

    it("rejects an empty output", async () => {
      const loader = new FakeModelLoader({ v1: { scores: [] } });
      const { engine } = createEngine(loader);
      await engine.ensureLoaded();

      await expect(engine.run(tensor)).rejects.toThrow("Model v1 returned an empty output");
    });
  });

  it("releases the active model on close", async () => {
    const loader = new FakeModelLoader({ v1: { scores: [1] } });
    const { engine } = createEngine(loader);
    await engine.ensureLoaded();

    await engine.close();

    expect(engine.isReady()).toBe(false);
    expect(loader.released).toEqual(["v1"]);
  });
});
