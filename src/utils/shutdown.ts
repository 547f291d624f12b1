import type { Server } from "node:http";
import type { AppContext } from "../app/context";

const SHUTDOWN_TIMEOUT_MS = 30000;

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

/**
 * Stops accepting requests, lets the worker finish its in-progress message,
 * then releases models, queue and database handles.
 */
export async function gracefulShutdown(ctx: AppContext, server: Server, signal: string): Promise<number> {
  const { logger } = ctx;
  if (ctx.isShuttingDown()) {
    logger.warn({ signal }, "Shutdown already in progress");
    return 0;
  }
  ctx.setShuttingDown(true);
  logger.info({ signal }, "Starting graceful shutdown");

  const timeout = setTimeout(() => {
    logger.error("Shutdown timeout reached, forcing exit");
    process.exit(1);
  }, SHUTDOWN_TIMEOUT_MS);
  timeout.unref();

  try {
    logger.info("Stopping HTTP server");
    await closeServer(server);

    logger.info("Draining queue worker and closing resources");
    await ctx.close();

    logger.info("Graceful shutdown complete");
    return 0;
  } catch (error) {
    logger.error({ err: error }, "Error during shutdown");
    return 1;
  } finally {
    clearTimeout(timeout);
  }
}
