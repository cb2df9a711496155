import pino, { type DestinationStream, type LoggerOptions, stdTimeFunctions, type Logger as PinoLogger } from "pino";

import type { Environment } from "../utils/env.js";

export type LoggerBindings = Record<string, unknown>;

export type AppLogger = PinoLogger;

export type NormalizedError = {
  message: string;
  name?: string;
  code?: string | number;
  cause?: NormalizedError | string;
};

type CreateLoggerOptions = {
  level?: string;
  serviceName?: string;
  bindings?: LoggerBindings;
  options?: LoggerOptions;
  env?: Environment;
  /** Defaults to stderr: stdout carries the staging transcript. */
  destination?: DestinationStream;
};

export function resolveLevel(env: Environment = process.env): string {
  if (env.BP_DEBUG && env.BP_DEBUG.trim().length > 0) {
    return "debug";
  }
  const envLevel = (env.PHPSTAGE_LOG_LEVEL ?? env.LOG_LEVEL)?.trim();
  return envLevel && envLevel.length > 0 ? envLevel : "info";
}

function resolveServiceName(env: Environment): string {
  const envName = (env.PHPSTAGE_SERVICE_NAME ?? env.SERVICE_NAME)?.trim();
  return envName && envName.length > 0 ? envName : "phpstage";
}

function buildLoggerOptions(options: CreateLoggerOptions): LoggerOptions {
  const env = options.env ?? process.env;
  return {
    level: options.level ?? resolveLevel(env),
    base: { service: options.serviceName ?? resolveServiceName(env) },
    timestamp: stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
    ...options.options,
  };
}

export function createLogger(options: CreateLoggerOptions = {}): AppLogger {
  const logger = pino(buildLoggerOptions(options), options.destination ?? pino.destination(2));
  const { bindings } = options;
  return bindings && Object.keys(bindings).length > 0 ? logger.child(bindings) : logger;
}

export const appLogger: AppLogger = createLogger({ bindings: { subsystem: "stager" } });
export default appLogger;

function extractCode(error: object): string | number | undefined {
  if ("code" in error && (typeof error.code === "string" || typeof error.code === "number")) {
    return error.code;
  }
  return undefined;
}

export function normalizeError(error: unknown): NormalizedError {
  if (error instanceof Error) {
    const normalized: NormalizedError = { message: error.message, name: error.name };
    const code = extractCode(error);
    if (code !== undefined) {
      normalized.code = code;
    }
    if (error.cause instanceof Error) {
      normalized.cause = normalizeError(error.cause);
    } else if (typeof error.cause === "string") {
      normalized.cause = error.cause;
    }
    return normalized;
  }

  if (typeof error === "string") {
    return { message: error };
  }

  return { message: safeStringify(error) ?? String(error) };
}

function safeStringify(value: unknown): string | undefined {
  try {
    return JSON.stringify(value);
  } catch {
    return undefined;
  }
}
