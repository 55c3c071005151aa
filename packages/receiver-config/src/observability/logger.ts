import { readFileSync } from "node:fs";

import pino, { type DestinationStream, type LoggerOptions, stdTimeFunctions, type Logger as PinoLogger } from "pino";

export type LoggerBindings = Record<string, unknown>;

export type AppLogger = PinoLogger;

export type NormalizedError = {
  message: string;
  name?: string;
  stack?: string;
  cause?: unknown;
  details?: Record<string, unknown>;
};

type CreateLoggerOptions = {
  level?: string;
  serviceName?: string;
  bindings?: LoggerBindings;
  options?: LoggerOptions;
  destination?: DestinationStream;
};

function readFileValue(path: string): string | undefined {
  try {
    const content = readFileSync(path, "utf-8").trim();
    return content.length > 0 ? content : undefined;
  } catch {
    return undefined;
  }
}

/** Reads `name` from the environment, preferring the file named by `<name>_FILE`. */
export function resolveEnv(name: string, fallback?: string): string | undefined {
  const filePath = process.env[`${name}_FILE`];
  if (filePath) {
    const fromFile = readFileValue(filePath);
    if (fromFile !== undefined) {
      return fromFile;
    }
  }
  const direct = process.env[name]?.trim();
  if (direct !== undefined && direct !== "") {
    return direct;
  }
  return fallback;
}

function buildLoggerOptions(overrides?: LoggerOptions): LoggerOptions {
  const base: LoggerOptions = {
    level: resolveEnv("LOG_LEVEL", "info"),
    base: { service: resolveEnv("SERVICE_NAME", "receiver-config") },
    timestamp: stdTimeFunctions.isoTime,
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
  };
  return overrides ? { ...base, ...overrides } : base;
}

export function createLogger(options: CreateLoggerOptions = {}): AppLogger {
  const loggerOptions = buildLoggerOptions(options.options);
  if (options.level) {
    loggerOptions.level = options.level;
  }
  if (options.serviceName) {
    loggerOptions.base = { ...(loggerOptions.base ?? {}), service: options.serviceName };
  }
  const logger = options.destination ? pino(loggerOptions, options.destination) : pino(loggerOptions);
  if (options.bindings && Object.keys(options.bindings).length > 0) {
    return logger.child(options.bindings);
  }
  return logger;
}

export const appLogger: AppLogger = createLogger({ bindings: { subsystem: "receivers" } });

function extractDetails(error: Error): Record<string, unknown> | undefined {
  const details: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(error)) {
    if (key === "message" || key === "name" || key === "stack" || key === "cause") {
      continue;
    }
    details[key] = value;
  }
  return Object.keys(details).length > 0 ? details : undefined;
}

/** Flattens an error into fields suitable for a structured log line. */
export function normalizeError(error: unknown): NormalizedError {
  if (error instanceof Error) {
    const normalized: NormalizedError = {
      message: error.message,
      name: error.name,
    };
    if (error.stack) {
      normalized.stack = error.stack;
    }
    if (error.cause !== undefined) {
      normalized.cause = error.cause instanceof Error ? normalizeError(error.cause) : error.cause;
    }
    const details = extractDetails(error);
    if (details) {
      normalized.details = details;
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
