import type { Logger } from "pino";
import type { ResultCache } from "../cache/resultCache";
import { NOT_COFFEE_LEAF, type DiseaseCatalog } from "../domain/disease";
import { DecodeFailedError, EmptyEnsembleError, InferenceFailedError, errorMessage } from "../domain/errors";
import {
  MODEL_VERSION,
  type BatchPredictionResponse,
  type ClassProbability,
  type HealthStatus,
  type PredictionResult,
} from "../domain/prediction";
import type { InferenceEngine, ModelLease } from "../inference/inferenceEngine";
import { softmax, type ModelHandle } from "../inference/modelHandle";
import type { Image, ImageIO } from "../platform/imageio/sharp";
import { AUGMENTATIONS, applyAugmentation, type AugmentationSpec } from "../processing/augmentation";
import { analyzeImage, type ImageAnalysis } from "../processing/featureExtractor";
import type { ImageEnhancer } from "../processing/imageEnhancer";
import { encodeTensor } from "../processing/tensorCodec";
import type { MetricsCollector } from "../services/metricsCollector";
import { computeImageHash, predictionCacheKey } from "../utils/hash";
import { adjustConfidence } from "./confidencePolicy";
import { combineEnsemble, toClassProbabilities } from "./ensembleCombiner";
import type { FusionPolicy } from "./fusionPolicy";
import { buildResult } from "./resultBuilder";
import { FALLBACK_DECISION, smartMockDecision } from "./smartMock";

/** Images scoring below this are answered with "Not Coffee Leaf" and never reach the model. */
export const LEAF_SCORE_GATE = 0.3;

export interface HealthCheckable {
  healthCheck(): Promise<HealthStatus>;
}

export interface HealthReport {
  status: "healthy" | "degraded" | "unhealthy";
  mode: "model" | "mock";
  components: HealthStatus[];
}

interface PipelineOutcome {
  result: PredictionResult;
  // Version of the model file that produced the result; null for mock, fallback and gate answers
  answeredBy: string | null;
}

export interface OrchestratorDeps {
  io: ImageIO;
  engine: InferenceEngine;
  enhancer: ImageEnhancer;
  fusion: FusionPolicy;
  cache: ResultCache;
  catalog: DiseaseCatalog;
  metrics: MetricsCollector;
  logger: Logger;
  healthChecks?: HealthCheckable[];
  augmentations?: readonly AugmentationSpec[];
  cacheTtlSeconds?: number;
}

/**
 * Single entry point of the prediction pipeline.
 *
 * model ready? → cache → analyse → leaf gate → enhance → augment and
 * infer per branch → combine → adjust → fuse → cache write.
 *
 * Cache entries are keyed by the model file, so only model answers are
 * looked up or stored. A missing model or any failure past decoding lands
 * on the smart mock; only undecodable input and an ensemble with no
 * surviving branch reach the caller as errors.
 */
export class PredictionOrchestrator {
  private readonly logger: Logger;

  constructor(private readonly deps: OrchestratorDeps) {
    this.logger = deps.logger.child({ component: "orchestrator" });
  }

  async predict(bytes: Buffer, symptomIds: readonly number[] = []): Promise<PredictionResult> {
    const startedAt = performance.now();
    const symptoms = [...new Set(symptomIds)];
    const imageHash = computeImageHash(bytes);

    const modelReady = await this.deps.engine.ensureLoaded();
    const activeModel = this.deps.engine.currentHandle()?.version;
    if (activeModel) {
      const cached = await this.deps.cache.get(predictionCacheKey(activeModel, imageHash, symptoms));
      if (cached) {
        this.deps.metrics.recordCacheHit();
        this.logger.debug({ imageHash, modelFile: activeModel }, "Prediction cache hit");
        return cached;
      }
      this.deps.metrics.recordCacheMiss();
    }

    const image = await this.deps.io.decode(bytes);
    const { result, answeredBy } = await this.predictDecoded(image, symptoms, modelReady, startedAt);

    this.deps.metrics.recordPrediction(result.modelVersion, result.processingTimeMs, answeredBy ?? undefined);
    if (answeredBy) {
      await this.deps.cache.set(
        predictionCacheKey(answeredBy, imageHash, symptoms),
        result,
        this.deps.cacheTtlSeconds,
      );
    }
    return result;
  }

  async predictBatch(images: readonly Buffer[]): Promise<BatchPredictionResponse> {
    const startedAt = performance.now();
    const results: PredictionResult[] = [];
    const errors: string[] = [];

    for (const [index, bytes] of images.entries()) {
      try {
        results.push(await this.predict(bytes));
      } catch (error) {
        errors.push(`Image ${index + 1}: ${errorMessage(error)}`);
        this.logger.warn({ err: error, index }, "Batch item failed");
      }
    }

    return {
      results,
      totalProcessed: images.length,
      successCount: results.length,
      failureCount: errors.length,
      totalProcessingTimeMs: Math.round(performance.now() - startedAt),
      errors,
    };
  }

  /** Hot-swaps the image model; cache invalidation rides on the catalogue notification. */
  async swapModel(modelPath?: string): Promise<ModelHandle> {
    const handle = await this.deps.engine.swap(modelPath);
    this.logger.info({ version: handle.version, layout: handle.tensorLayout }, "Image model swapped");
    return handle;
  }

  async healthCheck(): Promise<HealthReport> {
    const checks: HealthCheckable[] = [this.deps.engine, this.deps.cache, ...(this.deps.healthChecks ?? [])];
    const components = await Promise.all(
      checks.map((check) =>
        check.healthCheck().catch(
          (error: unknown): HealthStatus => ({ component: "unknown", healthy: false, detail: errorMessage(error) }),
        ),
      ),
    );

    const modelLoaded = this.deps.engine.isReady();
    // An unloaded model means mock mode, not an outage
    const failing = components.filter((c) => !c.healthy && !c.component.startsWith("inference:"));
    return {
      status: failing.length > 0 ? "unhealthy" : modelLoaded ? "healthy" : "degraded",
      mode: modelLoaded ? "model" : "mock",
      components,
    };
  }

  private async predictDecoded(
    image: Image,
    symptoms: readonly number[],
    modelReady: boolean,
    startedAt: number,
  ): Promise<PipelineOutcome> {
    let analysis: ImageAnalysis | null = null;
    try {
      analysis = analyzeImage(image);
      if (!modelReady) {
        return { result: await this.mockResult(analysis, symptoms, startedAt), answeredBy: null };
      }

      const { quality, leaf } = analysis;
      this.logger.debug(
        { qualityScore: quality.qualityScore, coffeeLeafScore: leaf.coffeeLeafScore },
        "Image analysed",
      );

      if (leaf.coffeeLeafScore < LEAF_SCORE_GATE) {
        this.deps.metrics.recordNotCoffeeLeaf();
        this.logger.info({ coffeeLeafScore: leaf.coffeeLeafScore }, "Image rejected by leaf gate");
        const result = buildResult(this.deps.catalog, {
          label: NOT_COFFEE_LEAF,
          confidence: 1 - leaf.coffeeLeafScore,
          quality,
          modelVersion: MODEL_VERSION.leafGate,
          startedAt,
        });
        return { result, answeredBy: null };
      }

      return await this.modelResult(image, analysis, symptoms, startedAt);
    } catch (error) {
      if (error instanceof DecodeFailedError || error instanceof EmptyEnsembleError) {
        throw error;
      }
      this.deps.metrics.recordFallback();
      this.logger.warn({ err: error }, "Prediction pipeline failed, using smart mock");
      return { result: await this.mockOrFallback(image, analysis, symptoms, startedAt), answeredBy: null };
    }
  }

  private async modelResult(
    image: Image,
    analysis: ImageAnalysis,
    symptoms: readonly number[],
    startedAt: number,
  ): Promise<PipelineOutcome> {
    const { quality, leaf, environment } = analysis;
    const enhanced = await this.deps.enhancer.enhance(image, quality, environment);

    const lease = await this.deps.engine.acquire();
    if (!lease) {
      // Model was unloaded between the readiness check and now
      return { result: await this.mockResult(analysis, symptoms, startedAt), answeredBy: null };
    }

    const modelFile = lease.handle.version;
    let predictions: ClassProbability[];
    try {
      predictions = await this.runBranches(lease, enhanced.image);
    } finally {
      lease.release();
    }

    const decision = combineEnsemble(predictions, leaf);
    const confidence = adjustConfidence(decision.confidence, quality, leaf);
    const fusion = await this.deps.fusion.fuse(confidence, symptoms);

    this.logger.info(
      {
        diseaseName: decision.diseaseName,
        members: decision.members,
        branches: predictions.length,
        confidence,
        finalConfidence: fusion.fused ? fusion.finalConfidence : undefined,
        modelVersion: MODEL_VERSION.real,
        modelFile,
      },
      "Ensemble prediction complete",
    );

    const result = buildResult(this.deps.catalog, {
      label: decision.diseaseName,
      confidence,
      ...(fusion.fused && { finalConfidence: fusion.finalConfidence }),
      quality,
      modelVersion: MODEL_VERSION.real,
      startedAt,
    });
    return { result, answeredBy: modelFile };
  }

  /**
   * Join semantics: waits for every branch, keeps the ones that produced a
   * prediction. A branch covers both its transform and its forward pass.
   */
  private async runBranches(lease: ModelLease, base: Image): Promise<ClassProbability[]> {
    const specs = this.deps.augmentations ?? AUGMENTATIONS;
    const settled = await Promise.allSettled(specs.map((spec) => this.runBranch(lease, base, spec)));

    const predictions: ClassProbability[] = [];
    settled.forEach((outcome, index) => {
      if (outcome.status === "fulfilled") {
        predictions.push(outcome.value);
        return;
      }
      this.deps.metrics.recordBranchFailure();
      this.logger.warn(
        { err: outcome.reason, augmentation: specs[index].name, modelFile: lease.handle.version },
        "Augmentation branch dropped",
      );
    });
    return predictions;
  }

  private async runBranch(lease: ModelLease, base: Image, spec: AugmentationSpec): Promise<ClassProbability> {
    const variant = await applyAugmentation(this.deps.io, base, spec);
    const tensor = await encodeTensor(this.deps.io, variant.image, lease.handle);
    const started = performance.now();
    const scores = await lease.run(tensor);
    this.deps.metrics.recordInferenceLatency(performance.now() - started);

    const [top] = toClassProbabilities(softmax(scores));
    if (!top) {
      throw new InferenceFailedError(`No class scores for augmentation ${variant.name}`);
    }
    return top;
  }

  private async mockResult(
    analysis: ImageAnalysis,
    symptoms: readonly number[],
    startedAt: number,
  ): Promise<PredictionResult> {
    const decision = smartMockDecision(analysis);
    const fusion = await this.deps.fusion.fuse(decision.confidence, symptoms);
    return buildResult(this.deps.catalog, {
      label: decision.diseaseName,
      confidence: decision.confidence,
      ...(fusion.fused && { finalConfidence: fusion.finalConfidence }),
      quality: analysis.quality,
      modelVersion: MODEL_VERSION.smartMock,
      startedAt,
    });
  }

  private async mockOrFallback(
    image: Image,
    analysis: ImageAnalysis | null,
    symptoms: readonly number[],
    startedAt: number,
  ): Promise<PredictionResult> {
    try {
      return await this.mockResult(analysis ?? analyzeImage(image), symptoms, startedAt);
    } catch (error) {
      this.logger.error({ err: error }, "Smart mock failed, returning basic fallback");
      return buildResult(this.deps.catalog, {
        label: FALLBACK_DECISION.diseaseName,
        confidence: FALLBACK_DECISION.confidence,
        modelVersion: MODEL_VERSION.fallback,
        startedAt,
      });
    }
  }
}
