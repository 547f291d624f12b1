import pino, { type Logger } from "pino";
import type { RuntimeConfig } from "../config";

export function createLogger(config: Pick<RuntimeConfig, "logLevel" | "nodeEnv">): Logger {
  const isDevelopment = config.nodeEnv === "development";

  return pino({
    level: config.logLevel,
    transport: isDevelopment
      ? {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "HH:MM:ss Z",
            ignore: "pid,hostname",
          },
        }
      : undefined,
    base: {
      service: "leafscan",
      env: config.nodeEnv,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    serializers: {
      err: pino.stdSerializers.err,
    },
  });
}
