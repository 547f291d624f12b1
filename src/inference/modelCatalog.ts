import fs from "fs";
import path from "path";
import * as chokidar from "chokidar";
import type { Logger } from "pino";
import { ModelNotFoundError } from "../domain/errors";

export const MODEL_TYPES = ["image", "symptom"] as const;

export type ModelType = (typeof MODEL_TYPES)[number];

/** `previousVersion` is null for the first load of a model type in this process. */
export type ModelSwapListener = (modelType: ModelType, version: string, previousVersion: string | null) => void;

export interface ModelCatalog {
  /** Throws ModelNotFoundError when no candidate path exists. */
  findModelFile(modelType: ModelType): string;
  onModelSwapped(modelType: ModelType, version: string, previousVersion: string | null): void;
  subscribe(listener: ModelSwapListener): () => void;
}

export interface FileModelCatalogOptions {
  searchDirs: string[];
  files: Record<ModelType, string>;
}

export function versionFromPath(modelPath: string): string {
  return path.basename(modelPath, path.extname(modelPath));
}

/**
 * Probes an ordered list of directories for each model file and fans out
 * swap notifications to subscribers (the result cache among them).
 */
export class FileModelCatalog implements ModelCatalog {
  private readonly listeners = new Set<ModelSwapListener>();
  private watcher?: chokidar.FSWatcher;

  constructor(
    private readonly options: FileModelCatalogOptions,
    private readonly logger: Logger,
  ) {}

  candidatePaths(modelType: ModelType): string[] {
    const fileName = this.options.files[modelType];
    return this.options.searchDirs.map((dir) => path.join(dir, fileName));
  }

  findModelFile(modelType: ModelType): string {
    const candidates = this.candidatePaths(modelType);
    const found = candidates.find((candidate) => fs.existsSync(candidate));
    if (!found) {
      throw new ModelNotFoundError(modelType, candidates);
    }
    this.logger.debug({ modelType, modelPath: found }, "Model file located");
    return found;
  }

  onModelSwapped(modelType: ModelType, version: string, previousVersion: string | null): void {
    this.logger.info({ modelType, version, previousVersion }, "Model swap committed");
    for (const listener of this.listeners) {
      try {
        listener(modelType, version, previousVersion);
      } catch (error) {
        this.logger.error({ err: error, modelType, version }, "Model swap listener failed");
      }
    }
  }

  subscribe(listener: ModelSwapListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Watches the model directories and reports changed model files, so a
   * newly copied file can be hot-swapped without a restart.
   */
  watch(onChange: (modelType: ModelType, modelPath: string) => void): void {
    if (this.watcher) return;

    const watched = new Map<string, ModelType>();
    for (const modelType of MODEL_TYPES) {
      for (const candidate of this.candidatePaths(modelType)) {
        watched.set(path.resolve(candidate), modelType);
      }
    }

    this.watcher = chokidar.watch([...watched.keys()], {
      persistent: true,
      ignoreInitial: true,
      awaitWriteFinish: {
        stabilityThreshold: 1000,
        pollInterval: 200,
      },
    });

    const handle = (filePath: string) => {
      const modelType = watched.get(path.resolve(filePath));
      if (modelType) {
        this.logger.info({ modelType, filePath }, "Model file changed on disk");
        onChange(modelType, filePath);
      }
    };

    this.watcher.on("add", handle);
    this.watcher.on("change", handle);
    this.watcher.on("error", (error: unknown) => {
      this.logger.error({ err: error }, "Model watcher error");
    });
  }

  async close(): Promise<void> {
    if (this.watcher) {
      await this.watcher.close();
      this.watcher = undefined;
    }
  }
}
