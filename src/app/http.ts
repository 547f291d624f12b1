/**
 * HTTP Application Factory
 *
 * Thin adapter over the prediction pipeline; body parsing is declared per
 * route because image uploads arrive raw while the rest is JSON.
 */

import express, { type Express, type NextFunction, type Request, type Response } from "express";
import type { AppContext } from "./context";
import { registerHealthRoutes } from "../routes/health";
import { registerModelRoutes } from "../routes/models";
import { registerPredictionRoutes } from "../routes/predictions";

export function createApp(ctx: AppContext): Express {
  const app = express();

  app.set("trust proxy", 1);
  app.disable("x-powered-by");

  app.use("/api", (_req: Request, res: Response, next: NextFunction) => {
    res.setHeader("X-Robots-Tag", "noindex, nofollow");
    next();
  });

  registerPredictionRoutes(app, ctx);
  registerModelRoutes(app, ctx);
  registerHealthRoutes(app, ctx);

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: "Route not found", code: "NOT_FOUND" });
  });

  // Body-parser failures (oversized or malformed JSON) end up here
  app.use((err: Error & { status?: number; type?: string }, _req: Request, res: Response, _next: NextFunction) => {
    const status = err.status !== undefined && err.status >= 400 && err.status < 500 ? err.status : 500;
    if (status === 500) {
      ctx.logger.error({ err }, "Unhandled request error");
    }
    res.status(status).json({ error: err.message, code: status === 500 ? "INTERNAL_ERROR" : "INVALID_REQUEST" });
  });

  return app;
}
