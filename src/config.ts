import { config as loadEnv } from "dotenv";
import { z } from "zod";
import path from "path";

const boolFromEnv = (defaultValue: boolean) =>
  z.preprocess((value) => {
    if (typeof value === "boolean") return value;
    if (typeof value === "number") return value !== 0;
    if (typeof value === "string") {
      const normalized = value.trim().toLowerCase();
      if (normalized === "") return undefined;
      if (["true", "1", "yes", "y", "on"].includes(normalized)) return true;
      if (["false", "0", "no", "n", "off"].includes(normalized)) return false;
    }
    return value;
  }, z.boolean().default(defaultValue));

// Load .env from the package root, regardless of process.cwd()
const envPath = path.resolve(__dirname, "../.env");
loadEnv({ path: envPath });

export const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4000),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  SQLITE_DB: z.string().default("data/leafscan.db"),
  IMAGE_STORE_DIR: z.string().default("data/images"),
  // Model files are probed in MODEL_DIR first, then in the fallback locations below
  MODEL_DIR: z.string().default("models"),
  MODEL_FILE: z.string().default("coffee_resnet50_v1.1.onnx"),
  SYMPTOM_MODEL_FILE: z.string().default("coffee_mlp_v1.0.onnx"),
  MODEL_WATCH: boolFromEnv(false),
  SYMPTOMS_ENABLED: boolFromEnv(true),
  REDIS_ENABLED: boolFromEnv(false),
  REDIS_URL: z.string().default("redis://127.0.0.1:6379"),
  QUEUE_ENABLED: boolFromEnv(false),
  QUEUE_NAME: z.string().default("leaf-predictions"),
  QUEUE_PUBLISH_TIMEOUT_MS: z.coerce.number().int().positive().default(2000),
  CACHE_ENABLED: boolFromEnv(true),
  CACHE_TTL_SECONDS: z.coerce.number().int().positive().default(7 * 24 * 3600),
  CACHE_MEMORY_MAX_TTL_SECONDS: z.coerce.number().int().positive().max(3600).default(3600),
  CACHE_MEMORY_MAX_KEYS: z.coerce.number().int().positive().default(500),
});

export type Env = z.infer<typeof envSchema>;

export interface RuntimeConfig {
  port: number;
  nodeEnv: Env["NODE_ENV"];
  logLevel: Env["LOG_LEVEL"];
  sqlitePath: string;
  imageStoreDir: string;
  models: {
    dir: string;
    imageModelFile: string;
    symptomModelFile: string;
    watch: boolean;
    symptomsEnabled: boolean;
    // Ordered probe list for the model catalogue
    searchDirs: string[];
  };
  redis: {
    enabled: boolean;
    url: string;
  };
  queue: {
    enabled: boolean;
    name: string;
    publishTimeoutMs: number;
  };
  cache: {
    enabled: boolean;
    ttlSeconds: number;
    memoryMaxTtlSeconds: number;
    memoryMaxKeys: number;
  };
}

export function buildRuntimeConfig(env: NodeJS.ProcessEnv): RuntimeConfig {
  const parsed = envSchema.parse(env);
  return {
    port: parsed.PORT,
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,
    sqlitePath: parsed.SQLITE_DB,
    imageStoreDir: parsed.IMAGE_STORE_DIR,
    models: {
      dir: parsed.MODEL_DIR,
      imageModelFile: parsed.MODEL_FILE,
      symptomModelFile: parsed.SYMPTOM_MODEL_FILE,
      watch: parsed.MODEL_WATCH,
      symptomsEnabled: parsed.SYMPTOMS_ENABLED,
      searchDirs: [
        path.resolve(process.cwd(), parsed.MODEL_DIR),
        path.resolve(process.cwd(), "public", "models"),
        path.resolve(__dirname, "..", "models"),
      ],
    },
    redis: {
      enabled: parsed.REDIS_ENABLED,
      url: parsed.REDIS_URL,
    },
    queue: {
      enabled: parsed.QUEUE_ENABLED,
      name: parsed.QUEUE_NAME,
      publishTimeoutMs: parsed.QUEUE_PUBLISH_TIMEOUT_MS,
    },
    cache: {
      enabled: parsed.CACHE_ENABLED,
      ttlSeconds: parsed.CACHE_TTL_SECONDS,
      memoryMaxTtlSeconds: parsed.CACHE_MEMORY_MAX_TTL_SECONDS,
      memoryMaxKeys: parsed.CACHE_MEMORY_MAX_KEYS,
    },
  };
}

export const runtimeConfig: RuntimeConfig = buildRuntimeConfig(process.env);
