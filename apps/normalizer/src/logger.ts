import { createLogger, format, transports, type Logger } from "winston";
import { loadConfig } from "./config";

/** The only logging capability the normalization core needs. */
export type WarnLogger = {
  warn: (message: string, meta?: Record<string, unknown>) => unknown;
};

export function createNormalizerLogger(level: string): Logger {
  return createLogger({
    level,
    format: format.combine(
      format.timestamp(),
      format.errors({ stack: true }),
      format.json()
    ),
    defaultMeta: { service: "normalizer" },
    transports: [
      // stdout carries the normalized JSON when no --out is given
      new transports.Console({
        stderrLevels: ["error", "warn", "info", "http", "verbose", "debug", "silly"],
      }),
    ],
  });
}

export const logger = createNormalizerLogger(loadConfig().logLevel);
