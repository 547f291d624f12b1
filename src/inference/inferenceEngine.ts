import type { Logger } from "pino";
import { InferenceFailedError, ModelNotFoundError, errorMessage } from "../domain/errors";
import type { HealthStatus } from "../domain/prediction";
import type { ModelHandle, ModelTensor } from "./modelHandle";
import { versionFromPath, type ModelCatalog, type ModelType } from "./modelCatalog";
import type { LoadOptions, LoadedModel, ModelLoader } from "./onnxModelLoader";
import { ReadWriteLock } from "./readWriteLock";

/**
 * A read lease pins one model for the duration of a prediction round:
 * every forward pass made through it sees the same handle and session.
 */
export interface ModelLease {
  readonly handle: ModelHandle;
  run(tensor: ModelTensor): Promise<Float32Array>;
  release(): void;
}

export interface InferenceEngineOptions {
  modelType: ModelType;
  loadOptions?: LoadOptions;
}

/**
 * Owns the active model behind a single reference cell. Loading happens
 * outside the lock; only the pointer replacement takes the write lock.
 */
export class InferenceEngine {
  private active: LoadedModel | null = null;
  private readonly lock = new ReadWriteLock();
  private pendingLoad: Promise<ModelHandle | null> | null = null;
  private inferenceCalls = 0;
  private lastError: string | null = null;
  private missingFileReported = false;

  constructor(
    private readonly catalog: ModelCatalog,
    private readonly loader: ModelLoader,
    private readonly logger: Logger,
    private readonly options: InferenceEngineOptions = { modelType: "image" },
  ) {}

  get modelType(): ModelType {
    return this.options.modelType;
  }

  isReady(): boolean {
    return this.active !== null;
  }

  currentHandle(): ModelHandle | null {
    return this.active?.handle ?? null;
  }

  /** Forward passes executed since start-up. */
  get inferenceCount(): number {
    return this.inferenceCalls;
  }

  /**
   * Loads the catalogue's model once. A missing file is not an error here:
   * the engine stays unloaded and callers take their fallback path. Every
   * call retries, so a file copied in later is picked up; the miss is
   * logged at warn level only the first time.
   */
  async ensureLoaded(): Promise<boolean> {
    if (this.active) return true;
    if (!this.pendingLoad) {
      this.pendingLoad = this.swap()
        .catch((error: unknown) => {
          if (error instanceof ModelNotFoundError) {
            const level = this.missingFileReported ? "debug" : "warn";
            this.logger[level](
              { modelType: this.modelType, searched: error.searchedPaths },
              "Model file not found, running without a model",
            );
            this.missingFileReported = true;
            return null;
          }
          this.logger.error({ err: error, modelType: this.modelType }, "Model load failed");
          return null;
        })
        .finally(() => {
          this.pendingLoad = null;
        });
    }
    return (await this.pendingLoad) !== null;
  }

  /**
   * Loads a model file (the catalogue's, unless a path is given) and commits
   * it atomically. In-flight leases finish on the previous model, which is
   * released once they drain.
   */
  async swap(modelPath?: string): Promise<ModelHandle> {
    const resolvedPath = modelPath ?? this.catalog.findModelFile(this.modelType);
    const version = versionFromPath(resolvedPath);

    let loaded: LoadedModel;
    try {
      loaded = await this.loader.load(resolvedPath, version, this.options.loadOptions);
    } catch (error) {
      this.lastError = errorMessage(error);
      throw error;
    }

    const release = await this.lock.acquireWrite();
    const previous = this.active;
    this.active = loaded;
    release();

    this.lastError = null;
    this.missingFileReported = false;
    this.catalog.onModelSwapped(this.modelType, version, previous?.handle.version ?? null);

    if (previous) {
      await previous.release().catch((error: unknown) => {
        this.logger.warn({ err: error, version: previous.handle.version }, "Failed to release previous model");
      });
    }
    return loaded.handle;
  }

  /** Returns null when no model is loaded. */
  async acquire(): Promise<ModelLease | null> {
    const release = await this.lock.acquireRead();
    const model = this.active;
    if (!model) {
      release();
      return null;
    }
    return {
      handle: model.handle,
      run: (tensor) => this.forward(model, tensor),
      release,
    };
  }

  async run(tensor: ModelTensor): Promise<{ handle: ModelHandle; scores: Float32Array }> {
    const lease = await this.acquire();
    if (!lease) {
      throw new InferenceFailedError(`No ${this.modelType} model loaded`);
    }
    try {
      return { handle: lease.handle, scores: await lease.run(tensor) };
    } finally {
      lease.release();
    }
  }

  async healthCheck(): Promise<HealthStatus> {
    const handle = this.currentHandle();
    return {
      component: `inference:${this.modelType}`,
      healthy: handle !== null,
      detail: handle
        ? `model ${handle.version} (${handle.tensorLayout}, ${handle.expectedShape.join("x")})`
        : this.lastError ?? "no model loaded",
    };
  }

  async close(): Promise<void> {
    const release = await this.lock.acquireWrite();
    const previous = this.active;
    this.active = null;
    release();
    if (previous) {
      await previous.release();
    }
  }

  private async forward(model: LoadedModel, tensor: ModelTensor): Promise<Float32Array> {
    this.inferenceCalls++;
    let scores: Float32Array;
    try {
      scores = await model.run(tensor);
    } catch (error) {
      if (error instanceof InferenceFailedError) throw error;
      throw new InferenceFailedError(`Inference failed on ${model.handle.version}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
    if (scores.length === 0) {
      throw new InferenceFailedError(`Model ${model.handle.version} returned an empty output`);
    }
    return scores;
  }
}
