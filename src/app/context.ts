/**
 * AppContext: composition root.
 *
 * Wires configuration, storage, the two inference engines, the optional
 * capabilities and the prediction pipeline. HTTP routes and the queue worker
 * only ever see this object.
 */

import type Database from "better-sqlite3";
import type { Logger } from "pino";

import { clearOnModelSwap } from "../cache/resultCache";
import { runtimeConfig, type RuntimeConfig } from "../config";
import { openDatabase } from "../db/connection";
import { DiseaseCatalog } from "../domain/disease";
import { InferenceEngine } from "../inference/inferenceEngine";
import { FileModelCatalog } from "../inference/modelCatalog";
import { OnnxModelLoader, type ModelLoader } from "../inference/onnxModelLoader";
import { SharpImageIO, type ImageIO } from "../platform/imageio/sharp";
import { FusionPolicy } from "../prediction/fusionPolicy";
import { PredictionOrchestrator } from "../prediction/predictionOrchestrator";
import { SYMPTOM_FEATURE_SIZE } from "../prediction/symptomClassifier";
import { ImageEnhancer } from "../processing/imageEnhancer";
import { AsyncDispatcher, PredictionWorker } from "../queue/asyncDispatcher";
import { SqlitePredictionRepository } from "../repositories/predictionRepository";
import { createCapabilities, type Capabilities, type CapabilityOverrides } from "../services/capabilities";
import { MetricsCollector } from "../services/metricsCollector";
import { FileImageStore, type ImageStore } from "../storage/imageStore";
import { createLogger } from "../utils/logger";

export interface AppContext {
  config: RuntimeConfig;
  logger: Logger;
  db: Database.Database;
  repository: SqlitePredictionRepository;
  images: ImageStore;
  modelCatalog: FileModelCatalog;
  imageEngine: InferenceEngine;
  symptomEngine: InferenceEngine;
  capabilities: Capabilities;
  orchestrator: PredictionOrchestrator;
  dispatcher: AsyncDispatcher;
  worker: PredictionWorker;
  metricsCollector: MetricsCollector;

  // Shutdown state and helpers
  isShuttingDown: () => boolean;
  setShuttingDown: (value: boolean) => void;
  close: () => Promise<void>;
}

/** Seams for tests and alternative deployments; anything omitted is built from config. */
export interface ContextOverrides extends CapabilityOverrides {
  logger?: Logger;
  loader?: ModelLoader;
  images?: ImageStore;
  io?: ImageIO;
}

export function createContext(config: RuntimeConfig = runtimeConfig, overrides: ContextOverrides = {}): AppContext {
  const logger = overrides.logger ?? createLogger(config);
  const db = openDatabase(config.sqlitePath);
  const repository = new SqlitePredictionRepository(db);
  const images = overrides.images ?? new FileImageStore(config.imageStoreDir);
  const io = overrides.io ?? new SharpImageIO();
  const metricsCollector = new MetricsCollector();

  const modelCatalog = new FileModelCatalog(
    {
      searchDirs: config.models.searchDirs,
      files: { image: config.models.imageModelFile, symptom: config.models.symptomModelFile },
    },
    logger.child({ component: "model-catalog" }),
  );
  const loader = overrides.loader ?? new OnnxModelLoader(logger.child({ component: "onnx" }));
  const imageEngine = new InferenceEngine(modelCatalog, loader, logger.child({ component: "engine:image" }), {
    modelType: "image",
  });
  const symptomEngine = new InferenceEngine(modelCatalog, loader, logger.child({ component: "engine:symptom" }), {
    modelType: "symptom",
    loadOptions: { defaultShape: [1, SYMPTOM_FEATURE_SIZE], readSidecar: false },
  });

  const capabilities = createCapabilities(config, symptomEngine, logger, overrides);
  const unsubscribeCache = clearOnModelSwap(modelCatalog, capabilities.cache, logger);

  const orchestrator = new PredictionOrchestrator({
    io,
    engine: imageEngine,
    enhancer: new ImageEnhancer(io, logger.child({ component: "enhancer" })),
    fusion: new FusionPolicy(capabilities.symptoms, logger.child({ component: "fusion" })),
    cache: capabilities.cache,
    catalog: new DiseaseCatalog(),
    metrics: metricsCollector,
    logger,
    healthChecks: [capabilities.symptoms, capabilities.broker],
    cacheTtlSeconds: config.cache.ttlSeconds,
  });

  const dispatcher = new AsyncDispatcher({
    broker: capabilities.broker,
    images,
    repository,
    predictor: orchestrator,
    logger,
    publishTimeoutMs: config.queue.publishTimeoutMs,
  });
  const worker = new PredictionWorker(capabilities.broker, dispatcher, logger);

  let shuttingDown = false;

  return {
    config,
    logger,
    db,
    repository,
    images,
    modelCatalog,
    imageEngine,
    symptomEngine,
    capabilities,
    orchestrator,
    dispatcher,
    worker,
    metricsCollector,
    isShuttingDown: () => shuttingDown,
    setShuttingDown: (value: boolean) => {
      shuttingDown = value;
    },
    close: async () => {
      await worker.stop();
      unsubscribeCache();
      await modelCatalog.close();
      await capabilities.close();
      await imageEngine.close();
      await symptomEngine.close();
      db.close();
    },
  };
}
