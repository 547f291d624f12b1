import Redis from "ioredis";
import type { Logger } from "pino";
import type { HealthStatus } from "../domain/prediction";

/** Shared cache tier contract; implemented by Redis and by test doubles. */
export interface SharedCacheTier {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
  delete(key: string): Promise<void>;
  clear(): Promise<number>;
  healthCheck(): Promise<HealthStatus>;
}

export function createRedisClient(url: string, logger: Logger): Redis {
  const client = new Redis(url, {
    retryStrategy: (times: number) => {
      const delay = Math.min(times * 50, 2000);
      logger.warn({ attempt: times, delayMs: delay }, "Redis connection retry");
      return delay;
    },
    // Fail cache commands fast while disconnected instead of queueing them
    maxRetriesPerRequest: 1,
    enableOfflineQueue: false,
    enableReadyCheck: true,
    lazyConnect: false,
  });

  client.on("error", (error: Error) => {
    logger.error({ err: error }, "Redis client error");
  });
  client.on("ready", () => {
    logger.info("Redis client ready");
  });

  return client;
}

export class RedisCache implements SharedCacheTier {
  private readonly prefix: string;

  constructor(
    private readonly client: Redis,
    prefix: string,
  ) {
    this.prefix = `leafscan:${prefix}:`;
  }

  async get(key: string): Promise<string | null> {
    return this.client.get(this.prefix + key);
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    if (ttlSeconds > 0) {
      await this.client.setex(this.prefix + key, ttlSeconds, value);
    } else {
      await this.client.set(this.prefix + key, value);
    }
  }

  async delete(key: string): Promise<void> {
    await this.client.del(this.prefix + key);
  }

  /** Deletes every key under this cache's prefix. */
  async clear(): Promise<number> {
    let cursor = "0";
    let removed = 0;
    do {
      const [next, keys] = await this.client.scan(cursor, "MATCH", `${this.prefix}*`, "COUNT", 200);
      cursor = next;
      if (keys.length > 0) {
        removed += await this.client.del(...keys);
      }
    } while (cursor !== "0");
    return removed;
  }

  async healthCheck(): Promise<HealthStatus> {
    try {
      const reply = await this.client.ping();
      return { component: "cache:redis", healthy: reply === "PONG", detail: `status ${this.client.status}` };
    } catch (error) {
      return { component: "cache:redis", healthy: false, detail: `ping failed: ${error}` };
    }
  }

  async close(): Promise<void> {
    await this.client.quit();
  }
}
