import NodeCache from "node-cache";
import type { Logger } from "pino";
import { z } from "zod";
import { DISEASE_CLASSES, NOT_COFFEE_LEAF } from "../domain/disease";
import { CacheUnavailableError, errorMessage } from "../domain/errors";
import type { HealthStatus, PredictionResult } from "../domain/prediction";
import type { ModelCatalog } from "../inference/modelCatalog";
import type { SharedCacheTier } from "../storage/redis";

export interface CacheStats {
  hits: number;
  misses: number;
  fastHits: number;
  sharedHits: number;
  sharedErrors: number;
  keys: number;
}

export interface ResultCache {
  get(key: string): Promise<PredictionResult | null>;
  set(key: string, result: PredictionResult, ttlSeconds?: number): Promise<void>;
  invalidate(key: string): Promise<void>;
  clear(): Promise<void>;
  healthCheck(): Promise<HealthStatus>;
  stats(): CacheStats;
}

/** Upper bound on the in-process tier's TTL, whatever the caller or configuration asks for. */
export const FAST_TIER_MAX_TTL_SECONDS = 3600;

export interface TwoTierCacheOptions {
  ttlSeconds: number;
  memoryMaxTtlSeconds: number;
  memoryMaxKeys: number;
}

const predictionResultSchema = z.object({
  id: z.number().int().optional(),
  diseaseName: z.enum([...DISEASE_CLASSES, NOT_COFFEE_LEAF]),
  confidence: z.number().min(0).max(1),
  finalConfidence: z.number().min(0).max(1).optional(),
  severityLevel: z.enum(["Very High", "High", "Medium", "Low", "Very Low"]),
  description: z.string(),
  treatmentSuggestion: z.string(),
  warnings: z.array(z.string()),
  modelVersion: z.string().min(1),
  processingTimeMs: z.number().min(0),
  createdAt: z.string(),
});

/**
 * Lookaside cache with an in-process tier (node-cache, TTL clamped) and an
 * optional shared tier. Shared-tier failures are logged and the cache keeps
 * serving from the fast tier; nothing here throws to the caller.
 */
export class TwoTierResultCache implements ResultCache {
  private readonly fast: NodeCache;
  private readonly fastTtlSeconds: number;
  private hits = 0;
  private misses = 0;
  private fastHits = 0;
  private sharedHits = 0;
  private sharedErrors = 0;

  constructor(
    private readonly options: TwoTierCacheOptions,
    private readonly shared: SharedCacheTier | null,
    private readonly logger: Logger,
  ) {
    this.fastTtlSeconds = Math.min(options.memoryMaxTtlSeconds, FAST_TIER_MAX_TTL_SECONDS);
    this.fast = new NodeCache({
      stdTTL: this.fastTtlSeconds,
      maxKeys: options.memoryMaxKeys,
      checkperiod: Math.min(600, this.fastTtlSeconds),
      useClones: true,
    });
  }

  async get(key: string): Promise<PredictionResult | null> {
    const local = this.fast.get<PredictionResult>(key);
    if (local !== undefined) {
      this.hits++;
      this.fastHits++;
      return local;
    }

    if (this.shared) {
      const remote = await this.sharedCall("get", () => this.readShared(key));
      if (remote) {
        this.hits++;
        this.sharedHits++;
        this.writeFast(key, remote, this.options.ttlSeconds);
        return remote;
      }
    }

    this.misses++;
    return null;
  }

  async set(key: string, result: PredictionResult, ttlSeconds = this.options.ttlSeconds): Promise<void> {
    this.writeFast(key, result, ttlSeconds);
    const shared = this.shared;
    if (shared) {
      await this.sharedCall("set", () => shared.set(key, JSON.stringify(result), ttlSeconds));
    }
  }

  async invalidate(key: string): Promise<void> {
    this.fast.del(key);
    const shared = this.shared;
    if (shared) {
      await this.sharedCall("delete", () => shared.delete(key));
    }
  }

  async clear(): Promise<void> {
    const dropped = this.fast.keys().length;
    this.fast.flushAll();
    const shared = this.shared;
    const removed = shared ? await this.sharedCall("clear", () => shared.clear()) : null;
    this.logger.info({ fastKeys: dropped, sharedKeys: removed ?? 0 }, "Prediction cache cleared");
  }

  async healthCheck(): Promise<HealthStatus> {
    if (!this.shared) {
      return { component: "cache", healthy: true, detail: `memory only, ${this.fast.keys().length} keys` };
    }
    const sharedHealth = await this.shared.healthCheck();
    // A broken shared tier degrades the cache but does not make it unhealthy
    return {
      component: "cache",
      healthy: true,
      detail: sharedHealth.healthy
        ? `two-tier, ${this.fast.keys().length} keys in memory`
        : `degraded to memory only (${sharedHealth.detail})`,
    };
  }

  stats(): CacheStats {
    return {
      hits: this.hits,
      misses: this.misses,
      fastHits: this.fastHits,
      sharedHits: this.sharedHits,
      sharedErrors: this.sharedErrors,
      keys: this.fast.keys().length,
    };
  }

  private writeFast(key: string, result: PredictionResult, ttlSeconds: number): void {
    const ttl = Math.min(ttlSeconds, this.fastTtlSeconds);
    try {
      this.fast.set(key, result, ttl);
    } catch (error) {
      // node-cache throws ECACHEFULL once maxKeys is reached
      this.logger.warn({ err: error, key }, "Memory cache full, entry not stored");
    }
  }

  private async readShared(key: string): Promise<PredictionResult | null> {
    const raw = await this.shared?.get(key);
    if (!raw) return null;

    const parsed = predictionResultSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      this.logger.warn({ key, issues: parsed.error.issues.length }, "Discarding malformed shared cache entry");
      return null;
    }
    return parsed.data;
  }

  private async sharedCall<T>(operation: string, call: () => Promise<T>): Promise<T | null> {
    try {
      return await call();
    } catch (error) {
      this.sharedErrors++;
      const wrapped = new CacheUnavailableError(`Shared cache ${operation} failed: ${errorMessage(error)}`, {
        cause: error,
      });
      this.logger.warn({ err: wrapped, operation }, "Shared cache unavailable, using memory tier only");
      return null;
    }
  }
}

/** Used when caching is disabled: every lookup misses. */
export class NullResultCache implements ResultCache {
  private misses = 0;

  async get(): Promise<PredictionResult | null> {
    this.misses++;
    return null;
  }

  async set(): Promise<void> {}

  async invalidate(): Promise<void> {}

  async clear(): Promise<void> {}

  async healthCheck(): Promise<HealthStatus> {
    return { component: "cache", healthy: true, detail: "disabled" };
  }

  stats(): CacheStats {
    return { hits: 0, misses: this.misses, fastHits: 0, sharedHits: 0, sharedErrors: 0, keys: 0 };
  }
}

/**
 * Drops every cached prediction when a loaded image model is replaced.
 * The first load in a process has nothing to replace and leaves the
 * shared tier alone. Returns the unsubscribe hook.
 */
export function clearOnModelSwap(catalog: ModelCatalog, cache: ResultCache, logger: Logger): () => void {
  return catalog.subscribe((modelType, version, previousVersion) => {
    if (modelType !== "image" || previousVersion === null) return;
    cache.clear().catch((error: unknown) => {
      logger.error({ err: error, version, previousVersion }, "Failed to clear prediction cache after model swap");
    });
  });
}
