/**
 * Prediction Routes
 *
 * Image bodies are posted raw (any content type); batch requests carry
 * base64-encoded images in JSON.
 */

import express, { type Express, type Request, type Response } from "express";
import { z } from "zod";
import type { AppContext } from "../app/context";
import { sendError } from "./errors";

const IMAGE_BODY_LIMIT = "15mb";

const symptomListSchema = z
  .string()
  .optional()
  .transform((value, ctx) => {
    if (!value || value.trim() === "") return [];
    const ids = value.split(",").map((part) => Number(part.trim()));
    if (ids.some((id) => !Number.isInteger(id) || id < 1)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "symptoms must be a comma-separated list of positive integers" });
      return z.NEVER;
    }
    return ids;
  });

const asyncQuerySchema = z.object({
  symptoms: symptomListSchema,
  requestId: z.string().min(1).max(100).optional(),
});

const batchBodySchema = z.object({
  images: z.array(z.string().min(1)).min(1, "images must contain at least one base64 image").max(20),
});

const rawImage = express.raw({ type: () => true, limit: IMAGE_BODY_LIMIT });

function imageBytes(req: Request): Buffer {
  return Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);
}

function queryString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

export function registerPredictionRoutes(app: Express, ctx: AppContext): void {
  const { logger, orchestrator, dispatcher } = ctx;

  /**
   * POST /api/predictions?symptoms=1,4,7
   * Synchronous prediction for one image
   */
  app.post("/api/predictions", rawImage, async (req: Request, res: Response) => {
    try {
      const symptomIds = symptomListSchema.parse(queryString(req.query.symptoms));
      const result = await orchestrator.predict(imageBytes(req), symptomIds);
      res.json(result);
    } catch (error) {
      sendError(res, logger, error, "Prediction failed");
    }
  });

  /**
   * POST /api/predictions/batch
   * Body: { images: base64[] }
   */
  app.post("/api/predictions/batch", express.json({ limit: "50mb" }), async (req: Request, res: Response) => {
    try {
      const { images } = batchBodySchema.parse(req.body);
      const response = await orchestrator.predictBatch(images.map((image) => Buffer.from(image, "base64")));
      res.json(response);
    } catch (error) {
      sendError(res, logger, error, "Batch prediction failed");
    }
  });

  /**
   * POST /api/predictions/async?requestId=...&symptoms=...
   * Queues the image; falls back to inline processing when the queue is down
   */
  app.post("/api/predictions/async", rawImage, async (req: Request, res: Response) => {
    try {
      const query = asyncQuerySchema.parse({
        symptoms: queryString(req.query.symptoms),
        requestId: queryString(req.query.requestId),
      });
      const response = await dispatcher.submit(imageBytes(req), {
        requestId: query.requestId,
        symptomIds: query.symptoms,
      });
      res.status(response.status === "Processing" ? 202 : 200).json(response);
    } catch (error) {
      sendError(res, logger, error, "Prediction submission failed");
    }
  });

  /**
   * GET /api/predictions/status/:requestId
   * Latest persisted status for a request, sync or async
   */
  app.get("/api/predictions/status/:requestId", (req: Request, res: Response) => {
    try {
      const status = dispatcher.getStatus(req.params.requestId);
      if (!status) {
        return res.status(404).json({ error: `Request ${req.params.requestId} not found`, code: "NOT_FOUND" });
      }
      res.json(status);
    } catch (error) {
      sendError(res, logger, error, "Status lookup failed");
    }
  });

  /**
   * GET /api/predictions/status/image/:imageRef
   * Latest status among the requests made for a stored image
   */
  app.get("/api/predictions/status/image/:imageRef", (req: Request, res: Response) => {
    try {
      const status = dispatcher.getStatusByImage(req.params.imageRef);
      if (!status) {
        return res.status(404).json({ error: `Image ${req.params.imageRef} not found`, code: "NOT_FOUND" });
      }
      res.json(status);
    } catch (error) {
      sendError(res, logger, error, "Status lookup failed");
    }
  });
}
