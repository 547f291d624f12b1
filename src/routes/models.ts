/**
 * Model management and metrics routes.
 */

import express, { type Express, type Request, type Response } from "express";
import { z } from "zod";
import type { AppContext } from "../app/context";
import { sendError } from "./errors";

const swapBodySchema = z.object({
  modelPath: z.string().min(1).optional(),
});

export function registerModelRoutes(app: Express, ctx: AppContext): void {
  const { logger, orchestrator, imageEngine, symptomEngine, capabilities, metricsCollector } = ctx;

  /**
   * POST /api/models/swap
   * Body: { modelPath?: string } - reloads the catalogue's model when omitted
   */
  app.post("/api/models/swap", express.json(), async (req: Request, res: Response) => {
    try {
      const { modelPath } = swapBodySchema.parse(req.body ?? {});
      const handle = await orchestrator.swapModel(modelPath);
      res.json({
        version: handle.version,
        modelPath: handle.modelPath,
        inputName: handle.inputName,
        outputName: handle.outputName,
        tensorLayout: handle.tensorLayout,
        expectedShape: handle.expectedShape,
      });
    } catch (error) {
      sendError(res, logger, error, "Model swap failed");
    }
  });

  app.get("/api/metrics", (_req: Request, res: Response) => {
    const imageHandle = imageEngine.currentHandle();
    const symptomHandle = symptomEngine.currentHandle();
    res.json({
      ...metricsCollector.getMetrics(),
      cache: capabilities.cache.stats(),
      inference: {
        image_forward_passes_total: imageEngine.inferenceCount,
        symptom_forward_passes_total: symptomEngine.inferenceCount,
        image_model: imageHandle?.version ?? null,
        symptom_model: symptomHandle?.version ?? null,
      },
    });
  });
}
