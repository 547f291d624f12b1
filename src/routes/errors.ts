import type { Response } from "express";
import type { Logger } from "pino";
import { ZodError } from "zod";
import { DecodeFailedError, PipelineError, errorMessage } from "../domain/errors";

/**
 * Maps failures onto the JSON error body: undecodable images and invalid
 * request input are 400, everything else is a logged 500.
 */
export function sendError(res: Response, logger: Logger, error: unknown, context: string): void {
  if (error instanceof DecodeFailedError) {
    res.status(400).json({ error: error.message, code: error.code });
    return;
  }
  if (error instanceof ZodError) {
    res.status(400).json({ error: error.issues.map((issue) => issue.message).join("; "), code: "INVALID_REQUEST" });
    return;
  }

  logger.error({ err: error }, context);
  res.status(500).json({
    error: errorMessage(error),
    code: error instanceof PipelineError ? error.code : "INTERNAL_ERROR",
  });
}
