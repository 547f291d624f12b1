/**
 * HTTP API tests
 *
 * Boots the real Express app on an ephemeral loopback port, wired through
 * createContext with an in-memory database, image store and queue broker
 * and a fake model loader.
 */

import fs from "fs";
import os from "os";
import path from "path";
import type { Server } from "http";
import { afterEach, beforeAll, beforeEach, describe, it, expect } from "vitest";
import { createContext, type AppContext } from "../../app/context";
import { createApp } from "../../app/http";
import { MemoryImageStore } from "../../storage/imageStore";
import { testConfig } from "../../test/mocks/config";
import { FakeModelLoader, InMemoryQueueBroker, silentLogger } from "../../test/mocks/fakes";
import { stripedLeafImage, toPng } from "../../test/mocks/images";

describe("HTTP API", () => {
  let leafPng: Buffer;
  let modelDir: string;
  let broker: InMemoryQueueBroker;
  let loader: FakeModelLoader;
  let ctx: AppContext;
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    leafPng = await toPng(stripedLeafImage());
  });

  beforeEach(async () => {
    modelDir = fs.mkdtempSync(path.join(os.tmpdir(), "leafscan-api-"));
    fs.writeFileSync(path.join(modelDir, "leaf.onnx"), "placeholder");

    broker = new InMemoryQueueBroker();
    loader = new FakeModelLoader({
      leaf: { scores: [0, 3, 0, 0, 0] },
      leaf_v2: { dims: [1, 224, 224, 3], scores: [3, 0, 0, 0, 0] },
    });
    ctx = createContext(testConfig(modelDir), {
      logger: silentLogger(),
      loader,
      images: new MemoryImageStore(),
      sharedCache: null,
      broker,
    });
    ctx.worker.start();

    const app = createApp(ctx);
    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, "127.0.0.1", () => resolve(listening));
    });
    const address = server.address();
    if (address === null || typeof address === "string") {
      throw new Error("Server did not bind to a TCP port");
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
    await ctx.close();
    fs.rmSync(modelDir, { recursive: true, force: true });
  });

  const postImage = (route: string, body: Buffer) =>
    fetch(`${baseUrl}${route}`, {
      method: "POST",
      headers: { "Content-Type": "application/octet-stream" },
      body,
    });

  const postJson = (route: string, body: unknown) =>
    fetch(`${baseUrl}${route}`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
    });

  describe("POST /api/predictions", () => {
    it("returns the ensemble prediction", async () => {
      const res = await postImage("/api/predictions", leafPng);
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(body).toMatchObject({
        diseaseName: "Healthy",
        confidence: 0.98,
        severityLevel: "Very High",
        modelVersion: "coffee_resnet50_v1.1_enhanced_REAL",
      });
      expect(res.headers.get("x-robots-tag")).toBe("noindex, nofollow");
    });

    it("answers 400 for an undecodable image", async () => {
      const res = await postImage("/api/predictions", Buffer.from("plain text, not pixels"));
      const body = await res.json();

      expect(res.status).toBe(400);
      expect(body).toHaveProperty("code", "DECODE_FAILED");
    });

    it("answers 400 for malformed symptom ids", async () => {
      const res = await postImage("/api/predictions?symptoms=1,x", leafPng);

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: "symptoms must be a comma-separated list of positive integers",
        code: "INVALID_REQUEST",
      });
    });
  });

  describe("POST /api/predictions/batch", () => {
    it("reports successes and failures per image", async () => {
      const res = await postJson("/api/predictions/batch", {
        images: [leafPng.toString("base64"), Buffer.from("garbage").toString("base64")],
      });
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(body).toMatchObject({
        totalProcessed: 2,
        successCount: 1,
        failureCount: 1,
        errors: [expect.stringMatching(/^Image 2: Failed to decode image/)],
      });
    });

    it("rejects an empty batch", async () => {
      const res = await postJson("/api/predictions/batch", { images: [] });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: "images must contain at least one base64 image",
        code: "INVALID_REQUEST",
      });
    });
  });

  describe("async submission", () => {
    it("queues the image and reports progress by request id", async () => {
      const submit = await postImage("/api/predictions/async?requestId=req-http-1&symptoms=2,4", leafPng);
      const accepted = await submit.json();

      expect(submit.status).toBe(202);
      expect(accepted).toMatchObject({ requestId: "req-http-1", status: "Processing" });
      expect(broker.published[0].symptomIds).toEqual([2, 4]);

      const pending = await (await fetch(`${baseUrl}/api/predictions/status/req-http-1`)).json();
      expect(pending).toHaveProperty("status", "Processing");

      expect(await broker.deliverAll()).toEqual(["ack"]);

      const done = await (await fetch(`${baseUrl}/api/predictions/status/req-http-1`)).json();
      expect(done).toHaveProperty("status", "Success");
      expect(done).toHaveProperty("result.diseaseName", "Healthy");
    });

    it("reports progress by image reference", async () => {
      await postImage("/api/predictions/async?requestId=req-http-3", leafPng);
      const imageRef = broker.published[0].imageRef;

      const pending = await (await fetch(`${baseUrl}/api/predictions/status/image/${imageRef}`)).json();
      expect(pending).toMatchObject({ requestId: "req-http-3", imageRef, status: "Processing" });

      await broker.deliverAll();

      const done = await (await fetch(`${baseUrl}/api/predictions/status/image/${imageRef}`)).json();
      expect(done).toMatchObject({ requestId: "req-http-3", status: "Success" });

      const missing = await fetch(`${baseUrl}/api/predictions/status/image/no-such-image`);
      expect(missing.status).toBe(404);
      expect(await missing.json()).toEqual({ error: "Image no-such-image not found", code: "NOT_FOUND" });
    });

    it("completes synchronously when the queue is down", async () => {
      broker.mode = "down";

      const res = await postImage("/api/predictions/async?requestId=req-http-2", leafPng);
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(body).toHaveProperty("status", "Completed");
      expect(body).toHaveProperty("result.diseaseName", "Healthy");
      expect(body).toHaveProperty("result.id", expect.any(Number));
    });

    it("answers 404 for an unknown request id", async () => {
      const res = await fetch(`${baseUrl}/api/predictions/status/nope`);

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: "Request nope not found", code: "NOT_FOUND" });
    });
  });

  describe("GET /api/health", () => {
    it("reports mock mode before the model has loaded", async () => {
      const res = await fetch(`${baseUrl}/api/health`);
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(body).toMatchObject({ status: "degraded", mode: "mock", shuttingDown: false });
    });

    it("reports healthy once the model serves predictions", async () => {
      await postImage("/api/predictions", leafPng);
      const body = await (await fetch(`${baseUrl}/api/health`)).json();

      expect(body).toMatchObject({ status: "healthy", mode: "model" });
    });

    it("answers 503 when the broker is down", async () => {
      broker.mode = "down";
      const res = await fetch(`${baseUrl}/api/health`);

      expect(res.status).toBe(503);
      expect(await res.json()).toHaveProperty("status", "unhealthy");
    });

    it("answers 503 while shutting down", async () => {
      ctx.setShuttingDown(true);
      const res = await fetch(`${baseUrl}/api/health`);

      expect(res.status).toBe(503);
      expect(await res.json()).toHaveProperty("shuttingDown", true);
    });
  });

  describe("model management", () => {
    it("hot-swaps the image model and clears cached results", async () => {
      await postImage("/api/predictions", leafPng);
      const v2Path = path.join(modelDir, "leaf_v2.onnx");
      fs.writeFileSync(v2Path, "placeholder");

      const res = await postJson("/api/models/swap", { modelPath: v2Path });
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(body).toEqual({
        version: "leaf_v2",
        modelPath: v2Path,
        inputName: "input_leaf_v2",
        outputName: "output_leaf_v2",
        tensorLayout: "channelLast",
        expectedShape: [1, 224, 224, 3],
      });

      const after = await (await postImage("/api/predictions", leafPng)).json();
      expect(after).toHaveProperty("diseaseName", "Cercospora");
    });

    it("answers 500 when the replacement cannot be loaded", async () => {
      const res = await postJson("/api/models/swap", { modelPath: path.join(modelDir, "broken.onnx") });

      expect(res.status).toBe(500);
      expect(await res.json()).toEqual({ error: "No fake model registered for broken", code: "INTERNAL_ERROR" });
    });

    it("exposes counters and model versions", async () => {
      await postImage("/api/predictions", leafPng);
      await postImage("/api/predictions", leafPng);
      const body = await (await fetch(`${baseUrl}/api/metrics`)).json();

      expect(body).toMatchObject({
        counters: { cache_hits_total: 1, predictions_total: 1, predictions_by_model_file: { leaf: 1 } },
        inference: {
          image_forward_passes_total: 8,
          symptom_forward_passes_total: 0,
          image_model: "leaf",
          symptom_model: null,
        },
        cache: { keys: 1 },
      });
    });
  });

  it("answers 404 for unknown routes", async () => {
    const res = await fetch(`${baseUrl}/api/unknown`);

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: "Route not found", code: "NOT_FOUND" });
  });
});
