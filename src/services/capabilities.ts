import Redis from "ioredis";
import type { Logger } from "pino";
import { NullResultCache, TwoTierResultCache, type ResultCache } from "../cache/resultCache";
import type { RuntimeConfig } from "../config";
import type { InferenceEngine } from "../inference/inferenceEngine";
import { ModelSymptomClassifier, NullSymptomClassifier, type SymptomClassifier } from "../prediction/symptomClassifier";
import { BullMqBroker, NullQueueBroker, type QueueBroker } from "../queue/queueBroker";
import { RedisCache, createRedisClient, type SharedCacheTier } from "../storage/redis";

/**
 * Optional collaborators resolved once at start-up. Each slot always holds
 * an implementation; disabled features get the null object.
 */
export interface Capabilities {
  cache: ResultCache;
  broker: QueueBroker;
  symptoms: SymptomClassifier;
  close(): Promise<void>;
}

export interface CapabilityOverrides {
  sharedCache?: SharedCacheTier | null;
  broker?: QueueBroker;
}

export function createCapabilities(
  config: RuntimeConfig,
  symptomEngine: InferenceEngine,
  logger: Logger,
  overrides: CapabilityOverrides = {},
): Capabilities {
  const closers: Array<() => Promise<unknown>> = [];

  let shared: SharedCacheTier | null = null;
  if (overrides.sharedCache !== undefined) {
    shared = overrides.sharedCache;
  } else if (config.redis.enabled && config.cache.enabled) {
    const redisCache = new RedisCache(createRedisClient(config.redis.url, logger.child({ component: "redis" })), "cache");
    closers.push(() => redisCache.close());
    shared = redisCache;
  }

  const cache: ResultCache = config.cache.enabled
    ? new TwoTierResultCache(
        {
          ttlSeconds: config.cache.ttlSeconds,
          memoryMaxTtlSeconds: config.cache.memoryMaxTtlSeconds,
          memoryMaxKeys: config.cache.memoryMaxKeys,
        },
        shared,
        logger.child({ component: "cache" }),
      )
    : new NullResultCache();

  let broker: QueueBroker;
  if (overrides.broker) {
    broker = overrides.broker;
  } else if (config.queue.enabled) {
    // BullMQ requires maxRetriesPerRequest: null on its connections
    const connection = new Redis(config.redis.url, { maxRetriesPerRequest: null });
    broker = new BullMqBroker(config.queue.name, connection, logger.child({ component: "queue" }));
    closers.push(() => connection.quit());
  } else {
    broker = new NullQueueBroker(logger.child({ component: "queue" }));
  }
  closers.unshift(() => broker.close());

  const symptoms: SymptomClassifier = config.models.symptomsEnabled
    ? new ModelSymptomClassifier(symptomEngine, logger.child({ component: "symptoms" }))
    : new NullSymptomClassifier();

  return {
    cache,
    broker,
    symptoms,
    close: async () => {
      for (const close of closers) {
        await close();
      }
    },
  };
}
