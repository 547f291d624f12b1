import { createContext } from "./app/context";
import { createApp } from "./app/http";
import { runtimeConfig } from "./config";
import type { ModelType } from "./inference/modelCatalog";
import { gracefulShutdown } from "./utils/shutdown";

async function main(): Promise<void> {
  const ctx = createContext(runtimeConfig);
  const { logger, config } = ctx;

  const [imageReady, symptomReady] = await Promise.all([
    ctx.imageEngine.ensureLoaded(),
    ctx.symptomEngine.ensureLoaded(),
  ]);
  logger.info(
    { imageModel: ctx.imageEngine.currentHandle()?.version ?? null, symptomModel: ctx.symptomEngine.currentHandle()?.version ?? null },
    imageReady ? "Models loaded" : "Image model unavailable, serving smart mock predictions",
  );
  if (!symptomReady) {
    logger.info("Symptom model unavailable, symptom fusion uses the uniform fallback");
  }

  if (config.models.watch) {
    const engines = { image: ctx.imageEngine, symptom: ctx.symptomEngine };
    ctx.modelCatalog.watch((modelType: ModelType, modelPath: string) => {
      engines[modelType].swap(modelPath).catch((error: unknown) => {
        logger.error({ err: error, modelType, modelPath }, "Hot swap from watcher failed");
      });
    });
  }

  ctx.worker.start();

  const app = createApp(ctx);
  const server = app.listen(config.port, () => {
    logger.info({ port: config.port, env: config.nodeEnv }, "Prediction service listening");
  });

  const onSignal = (signal: NodeJS.Signals) => {
    gracefulShutdown(ctx, server, signal)
      .then((code) => process.exit(code))
      .catch((error: unknown) => {
        logger.error({ err: error }, "Shutdown failed");
        process.exit(1);
      });
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

main().catch((error: unknown) => {
  console.error("Fatal startup error", error);
  process.exit(1);
});
