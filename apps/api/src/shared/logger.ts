/* eslint-disable no-console */
// Console output mirrors the structured logs locally while they ship to Better Stack.
import type { Logtail } from "@logtail/node";
import { monitoringConfig } from "./config/monitoring";

export type LoggerProcessType = "server" | "pipeline" | "cli";

export type LoggerMetadata = Record<string, unknown>;

type LoggerOptions = {
  module: string;
  processType: LoggerProcessType;
};

type LogLevel = "debug" | "info" | "warn" | "error" | "fatal";

type LogtailAdapter = {
  log: (
    level: LogLevel,
    message: string,
    metadata: LoggerMetadata,
  ) => Promise<void>;
  flush: () => Promise<void>;
};

const createLogtailAdapter = (client: Logtail): LogtailAdapter => {
  const log = async (
    level: LogLevel,
    message: string,
    metadata: LoggerMetadata,
  ) => {
    switch (level) {
      case "debug":
        await client.debug(message, metadata);
        return;
      case "info":
        await client.info(message, metadata);
        return;
      case "warn":
        await client.warn(message, metadata);
        return;
      default:
        await client.error(message, metadata);
    }
  };

  const flush = async () => {
    await client.flush();
  };

  return { log, flush };
};

let logtailInstance: Promise<LogtailAdapter | null> | null = null;

const consoleWriters: Record<LogLevel, (...data: unknown[]) => void> = {
  debug: console.debug.bind(console),
  info: console.info.bind(console),
  warn: console.warn.bind(console),
  error: console.error.bind(console),
  fatal: console.error.bind(console),
};

const loadLogtail = async (): Promise<LogtailAdapter | null> => {
  if (!monitoringConfig.logtail.enabled) {
    return null;
  }

  if (logtailInstance) {
    return logtailInstance;
  }

  logtailInstance = (async () => {
    try {
      const { Logtail: LogtailClient } = await import("@logtail/node");
      const client = new LogtailClient(monitoringConfig.logtail.token);
      return createLogtailAdapter(client);
    } catch (error) {
      console.error("Failed to initialise Better Stack Logtail client", error);
      return null;
    }
  })();

  return logtailInstance;
};

const formatConsolePayload = (
  level: LogLevel,
  message: string,
  metadata?: LoggerMetadata,
) => {
  const timestamp = new Date().toISOString();
  return [
    `[${timestamp}] [${level.toUpperCase()}] ${message}`,
    metadata ?? {},
  ] as const;
};

const emitLogtail = async (
  level: LogLevel,
  message: string,
  metadata: LoggerMetadata,
) => {
  try {
    const instance = await loadLogtail();
    if (!instance) {
      return;
    }

    await instance.log(level, message, metadata);
  } catch (error) {
    console.error("Failed to send log to Better Stack", error);
  }
};

const createEmitter =
  ({ module, processType }: LoggerOptions, level: LogLevel) =>
  (message: string, metadata: LoggerMetadata = {}) => {
    const enrichedMetadata = {
      ...metadata,
      module,
      processType,
      environment: monitoringConfig.environment,
      timestamp: new Date().toISOString(),
      level,
    };

    const [consoleMessage, consoleMetadata] = formatConsolePayload(
      level,
      message,
      enrichedMetadata,
    );

    consoleWriters[level](consoleMessage, consoleMetadata);

    if (monitoringConfig.logtail.enabled) {
      emitLogtail(level, message, enrichedMetadata).catch((error: unknown) => {
        console.error("Failed to send log to Better Stack", error);
      });
    }
  };

export const createLogger = (options: LoggerOptions) => {
  const debug = createEmitter(options, "debug");
  const info = createEmitter(options, "info");
  const warn = createEmitter(options, "warn");
  const error = createEmitter(options, "error");
  const fatal = createEmitter(options, "fatal");

  const flush = async () => {
    const instance = await loadLogtail();
    await instance?.flush();
  };

  return {
    debug,
    info,
    warn,
    error,
    fatal,
    flush,
  };
};

export type Logger = ReturnType<typeof createLogger>;

const loggerCache = new Map<string, Logger>();

export const getLogger = (
  module: string,
  processType: LoggerProcessType,
): Logger => {
  const cacheKey = `${processType}:${module}`;

  const cached = loggerCache.get(cacheKey);
  if (cached) {
    return cached;
  }

  const logger = createLogger({ module, processType });
  loggerCache.set(cacheKey, logger);
  return logger;
};

export type ErrorPayload = {
  message: string;
  name?: string;
  stack?: string;
};

export const toErrorPayload = (error: unknown): ErrorPayload => {
  if (error instanceof Error) {
    return {
      message: error.message,
      name: error.name,
      stack: error.stack,
    };
  }

  if (typeof error === "string") {
    return { message: error };
  }

  try {
    return { message: JSON.stringify(error) };
  } catch {
    return { message: "unknown" };
  }
};
