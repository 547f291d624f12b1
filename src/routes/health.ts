import type { Express, Request, Response } from "express";
import type { AppContext } from "../app/context";
import { sendError } from "./errors";

export function registerHealthRoutes(app: Express, ctx: AppContext): void {
  const { logger, orchestrator } = ctx;

  // 503 only when a non-model component is down; mock mode still serves predictions
  app.get("/api/health", async (_req: Request, res: Response) => {
    try {
      const report = await orchestrator.healthCheck();
      res.status(report.status === "unhealthy" || ctx.isShuttingDown() ? 503 : 200).json({
        ...report,
        shuttingDown: ctx.isShuttingDown(),
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      sendError(res, logger, error, "Health check failed");
    }
  });
}
