import winston from "winston";
import { ConfigManager } from "../config";
import type { LogLevel } from "../types";

let logger: winston.Logger | null = null;
let levelOverride: LogLevel | null = null;

function createLogger(): winston.Logger {
  const logLevel =
    levelOverride ?? (ConfigManager.loaded ? ConfigManager.cfg.logLevel : "warn");

  return winston.createLogger({
    level: logLevel,
    format: winston.format.combine(
      winston.format.timestamp({
        format: "YYYY-MM-DD HH:mm:ss",
      }),
      winston.format.errors({ stack: true }),
      winston.format.printf(({ level, message, timestamp, stack, ...meta }) => {
        const prefix = `[${timestamp}] [rawscrub] [${level.toUpperCase()}]`;
        const extra = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : "";
        if (stack) {
          return `${prefix} ${message}${extra}\n${stack}`;
        }
        return `${prefix} ${message}${extra}`;
      })
    ),
    transports: [
      // stdout carries the run summary; diagnostics go to stderr
      new winston.transports.Console({
        stderrLevels: ["error", "warn", "info", "verbose", "debug"],
      }),
    ],
    exitOnError: false,
  });
}

function getLogger(): winston.Logger {
  if (!logger) {
    logger = createLogger();
  }
  return logger;
}

type LogMeta = Record<string, unknown>;

export const log = {
  error: (message: string, meta?: LogMeta) => getLogger().error(message, meta),
  warn: (message: string, meta?: LogMeta) => getLogger().warn(message, meta),
  info: (message: string, meta?: LogMeta) => getLogger().info(message, meta),
  verbose: (message: string, meta?: LogMeta) => getLogger().verbose(message, meta),
  debug: (message: string, meta?: LogMeta) => getLogger().debug(message, meta),
};

/** Force a level regardless of configuration (CLI --verbose) */
export function configureLogger(opts: { logLevel: LogLevel }): void {
  levelOverride = opts.logLevel;
  logger = null;
}

export function resetLogger(): void {
  levelOverride = null;
  logger = null;
}
