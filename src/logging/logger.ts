import pino from "pino";
import type { LoggingConfig } from "../config/types.js";

export type Logger = pino.Logger;

export function createLogger(config?: Partial<LoggingConfig>): Logger {
  const level = config?.level ?? "info";
  const isJson = config?.json ?? process.env["NODE_ENV"] === "production";

  const transport = isJson
    ? undefined
    : {
        target: "pino-pretty",
        options: { colorize: true, translateTime: "HH:MM:ss", destination: 2 },
      };

  const options: pino.LoggerOptions = {
    name: "learnloop",
    level,
    ...(transport && !config?.file ? { transport } : {}),
  };

  if (config?.file) {
    return pino(options, pino.destination({ dest: config.file, sync: true, mkdir: true }));
  }

  return pino(options);
}

/** Logger for tests and library callers that do not want output. */
export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
